/**
 * Connection state machine.
 *
 * ```
 * disconnected ──open()──▶ connecting ──transport open──▶ connected
 *      ▲                       │                              │
 *      │◀──── error ───────────┴──────────── error ───────────┤
 *      │                                                      │ close()
 *      └──────────── transport close ◀──── closing ◀──────────┘
 * ```
 *
 * Every method here, and every transport callback, runs inside a
 * dispatcher action: transport events are re-enqueued through `enqueue`
 * rather than handled on the transport's own stack.
 */

import {
  ConnectFailureError,
  ConnectionLostError,
  toError,
  type SignalingError,
} from "./errors.js";
import {
  CLOSE_ABNORMAL,
  CLOSE_NORMAL,
  type CloseEvent,
  type Disposable,
  type Transport,
  type TransportFactory,
} from "./transport/transport.js";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "closing";

/** Hooks the owner of a connection provides. */
export interface ConnectionEvents {
  onStateChange(state: ConnectionState, previous: ConnectionState): void;
  onMessage(data: string): void;
  /**
   * The connection is gone. `error` is what pending calls resolve with;
   * `failed` is true when it ended through an error rather than a close.
   */
  onClosed(event: CloseEvent, error: SignalingError, failed: boolean): void;
  /** A transport error that does not change state (one arriving while closing). */
  onTransportError(error: Error, state: ConnectionState): void;
}

export type Enqueue = (label: string, action: () => void) => void;

export class Connection {
  readonly url: string;
  readonly #factory: TransportFactory;
  readonly #enqueue: Enqueue;
  readonly #events: ConnectionEvents;
  #state: ConnectionState = "disconnected";
  #transport: Transport | null = null;
  #subscriptions: Disposable[] = [];
  #reconnectWhenClosed = false;

  constructor(url: string, factory: TransportFactory, enqueue: Enqueue, events: ConnectionEvents) {
    this.url = url;
    this.#factory = factory;
    this.#enqueue = enqueue;
    this.#events = events;
  }

  get state(): ConnectionState {
    return this.#state;
  }

  isConnected(): boolean {
    return this.#state === "connected";
  }

  /** Start connecting. Deferred until the close completes when closing. */
  open(): void {
    switch (this.#state) {
      case "connected":
      case "connecting":
        return;
      case "closing":
        this.#reconnectWhenClosed = true;
        return;
      case "disconnected":
        this.#start();
        return;
    }
  }

  /** Ask the transport to close. Only the first call per transport has an effect. */
  close(): void {
    switch (this.#state) {
      case "connected":
      case "connecting": {
        const transport = this.#transport;
        this.#setState("closing");
        transport?.close(CLOSE_NORMAL, "");
        return;
      }
      case "closing":
        this.#reconnectWhenClosed = false;
        return;
      case "disconnected":
        return;
    }
  }

  /** Write to the transport. Throws when not connected or when the transport does. */
  send(data: string): void {
    if (this.#state !== "connected" || !this.#transport) {
      throw new Error(`Cannot send in "${this.#state}" state`);
    }
    this.#transport.send(data);
  }

  #start(): void {
    let transport: Transport;
    try {
      transport = this.#factory(this.url);
    } catch (err) {
      const cause = toError(err);
      this.#events.onClosed(
        { code: CLOSE_ABNORMAL, reason: cause.message, remote: false },
        new ConnectFailureError(this.url, cause),
        true,
      );
      return;
    }

    this.#transport = transport;
    this.#subscriptions = [
      transport.onOpen(() => this.#enqueue("transport:open", () => this.#handleOpen(transport))),
      transport.onMessage((data) =>
        this.#enqueue("transport:message", () => {
          if (transport === this.#transport) this.#events.onMessage(data);
        }),
      ),
      transport.onClose((event) =>
        this.#enqueue("transport:close", () => this.#handleClose(transport, event)),
      ),
      transport.onError((error) =>
        this.#enqueue("transport:error", () => this.#handleError(transport, error)),
      ),
    ];
    this.#setState("connecting");
  }

  #handleOpen(transport: Transport): void {
    if (transport !== this.#transport || this.#state !== "connecting") return;
    this.#setState("connected");
  }

  #handleClose(transport: Transport, event: CloseEvent): void {
    if (transport !== this.#transport) return;
    this.#release();
    this.#setState("disconnected");
    this.#events.onClosed(
      event,
      new ConnectionLostError(event.code, event.reason, event.remote),
      false,
    );
    if (this.#reconnectWhenClosed) {
      this.#reconnectWhenClosed = false;
      this.#start();
    }
  }

  #handleError(transport: Transport, cause: Error): void {
    if (transport !== this.#transport) return;
    if (this.#state === "closing") {
      this.#events.onTransportError(cause, this.#state);
      return;
    }

    const failure =
      this.#state === "connecting"
        ? new ConnectFailureError(this.url, cause)
        : new ConnectionLostError(CLOSE_ABNORMAL, cause.message, true, cause);
    this.#release();
    transport.close();
    this.#setState("disconnected");
    this.#events.onClosed(
      { code: CLOSE_ABNORMAL, reason: cause.message, remote: true },
      failure,
      true,
    );
  }

  /** Detach from the current transport; its later events are ignored. */
  #release(): void {
    for (const sub of this.#subscriptions) {
      sub.dispose();
    }
    this.#subscriptions = [];
    this.#transport = null;
  }

  #setState(next: ConnectionState): void {
    const previous = this.#state;
    if (previous === next) return;
    this.#state = next;
    this.#events.onStateChange(next, previous);
  }
}
