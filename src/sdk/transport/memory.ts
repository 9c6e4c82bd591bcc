/**
 * In-memory transport pair for deterministic testing.
 *
 * Both sides open, deliver and close via queueMicrotask, giving the same
 * asynchronous ordering a socket has without real I/O.
 */

import {
  CLOSE_ABNORMAL,
  CLOSE_NORMAL,
  type CloseEvent,
  type Disposable,
  type Transport,
  type TransportState,
} from "./transport.js";

export interface MemoryTransportOptions {
  /** Fail the open handshake with this error instead of connecting. */
  refuse?: Error;
}

/**
 * Create a linked pair of in-memory transports, `[client, server]`.
 * Messages sent on one appear on the other.
 */
export function createMemoryTransport(
  opts: MemoryTransportOptions = {},
): [MemoryTransport, MemoryTransport] {
  const a = new MemoryTransport();
  const b = new MemoryTransport();
  a.peer = b;
  b.peer = a;

  queueMicrotask(() => {
    if (opts.refuse) {
      a.fail(opts.refuse);
      return;
    }
    a.open();
    b.open();
  });
  return [a, b];
}

export class MemoryTransport implements Transport {
  readonly #openHandlers = new Set<() => void>();
  readonly #messageHandlers = new Set<(data: string) => void>();
  readonly #closeHandlers = new Set<(event: CloseEvent) => void>();
  readonly #errorHandlers = new Set<(error: Error) => void>();
  #state: TransportState = "connecting";
  peer: MemoryTransport | null = null;

  get state(): TransportState {
    return this.#state;
  }

  send(data: string): void {
    if (this.#state !== "open") {
      throw new Error(`Cannot send in "${this.#state}" state`);
    }
    const target = this.peer;
    if (!target) return;
    queueMicrotask(() => {
      if (target.#state !== "open") return;
      for (const handler of target.#messageHandlers) {
        handler(data);
      }
    });
  }

  onOpen(handler: () => void): Disposable {
    this.#openHandlers.add(handler);
    return { dispose: () => this.#openHandlers.delete(handler) };
  }

  onMessage(handler: (data: string) => void): Disposable {
    this.#messageHandlers.add(handler);
    return { dispose: () => this.#messageHandlers.delete(handler) };
  }

  onClose(handler: (event: CloseEvent) => void): Disposable {
    this.#closeHandlers.add(handler);
    return { dispose: () => this.#closeHandlers.delete(handler) };
  }

  onError(handler: (error: Error) => void): Disposable {
    this.#errorHandlers.add(handler);
    return { dispose: () => this.#errorHandlers.delete(handler) };
  }

  /** Close both sides. This side sees a local close, the peer a remote one. */
  close(code: number = CLOSE_NORMAL, reason: string = ""): void {
    if (this.#state === "closing" || this.#state === "closed") return;
    this.#state = "closing";
    const peer = this.peer;
    queueMicrotask(() => {
      this.#finish({ code, reason, remote: false });
      if (peer != null) peer.#finish({ code, reason, remote: true });
    });
  }

  /** Simulate a network failure: an error event, then an abnormal close on both sides. */
  fail(error: Error): void {
    if (this.#state === "closed") return;
    for (const handler of this.#errorHandlers) {
      handler(error);
    }
    const event = { code: CLOSE_ABNORMAL, reason: error.message, remote: true };
    this.#finish(event);
    const peer = this.peer;
    if (peer != null) peer.#finish(event);
  }

  /** @internal Called by {@link createMemoryTransport}. */
  open(): void {
    if (this.#state !== "connecting") return;
    this.#state = "open";
    for (const handler of this.#openHandlers) {
      handler();
    }
    this.#openHandlers.clear();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  #finish(event: CloseEvent): void {
    if (this.#state === "closed") return;
    this.#state = "closed";
    for (const handler of this.#closeHandlers) {
      handler(event);
    }
    this.#closeHandlers.clear();
  }
}
