/**
 * WebSocket transport — one JSON message per text frame, backed by `ws`.
 */

import WebSocket from "ws";
import {
  CLOSE_NORMAL,
  type CloseEvent,
  type Disposable,
  type Transport,
  type TransportFactory,
  type TransportState,
} from "./transport.js";

/** Options for constructing a WebSocketTransport. */
export interface WebSocketTransportOptions {
  /** Extra HTTP headers for the upgrade request (credentials, cookies). */
  headers?: Record<string, string>;
  /** WebSocket subprotocols to offer. */
  protocols?: string[];
  /** Upgrade handshake timeout in milliseconds. */
  handshakeTimeoutMs?: number;
  /** Maximum accepted inbound message size in bytes. */
  maxPayload?: number;
}

/**
 * Transport over a single WebSocket connection.
 *
 * Starts connecting in the constructor. Binary frames are decoded as UTF-8
 * so the codec always sees text.
 */
export class WebSocketTransport implements Transport {
  readonly #ws: WebSocket;
  readonly #openHandlers = new Set<() => void>();
  readonly #messageHandlers = new Set<(data: string) => void>();
  readonly #closeHandlers = new Set<(event: CloseEvent) => void>();
  readonly #errorHandlers = new Set<(error: Error) => void>();
  #state: TransportState = "connecting";
  #closeRequested = false;

  constructor(url: string, opts: WebSocketTransportOptions = {}) {
    this.#ws = new WebSocket(url, opts.protocols, {
      headers: opts.headers,
      handshakeTimeout: opts.handshakeTimeoutMs,
      maxPayload: opts.maxPayload,
    });

    this.#ws.on("open", () => {
      if (this.#state !== "connecting") return;
      this.#state = "open";
      for (const handler of this.#openHandlers) {
        handler();
      }
      this.#openHandlers.clear();
    });

    this.#ws.on("message", (data: WebSocket.RawData) => {
      const text = rawDataToString(data);
      for (const handler of this.#messageHandlers) {
        handler(text);
      }
    });

    this.#ws.on("error", (err: Error) => {
      for (const handler of this.#errorHandlers) {
        handler(err);
      }
    });

    this.#ws.on("close", (code: number, reason: Buffer) => {
      if (this.#state === "closed") return;
      this.#state = "closed";
      const event = {
        code,
        reason: reason.toString("utf8"),
        remote: !this.#closeRequested,
      };
      for (const handler of this.#closeHandlers) {
        handler(event);
      }
      this.#closeHandlers.clear();
    });
  }

  /** Current connection state. */
  get state(): TransportState {
    return this.#state;
  }

  /** Send a serialized message string. Throws if not open. */
  send(data: string): void {
    if (this.#state !== "open") {
      throw new Error(`Cannot send in "${this.#state}" state`);
    }
    this.#ws.send(data, (err) => {
      if (!err) return;
      for (const handler of this.#errorHandlers) {
        handler(err);
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

  /** Start the closing handshake. Idempotent. */
  close(code: number = CLOSE_NORMAL, reason: string = ""): void {
    if (this.#state === "closing" || this.#state === "closed") return;
    this.#closeRequested = true;
    if (this.#state === "connecting") {
      // No handshake to perform yet; ws reports close 1006 once torn down.
      this.#state = "closing";
      this.#ws.terminate();
      return;
    }
    this.#state = "closing";
    this.#ws.close(code, reason);
  }

  /** Symbol.dispose support for `using` syntax. */
  [Symbol.dispose](): void {
    this.close();
  }
}

/** Factory producing {@link WebSocketTransport}s that share the same options. */
export function webSocketTransportFactory(
  opts: WebSocketTransportOptions = {},
): TransportFactory {
  return (url) => new WebSocketTransport(url, opts);
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
