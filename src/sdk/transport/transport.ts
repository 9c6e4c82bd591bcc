/** Lifecycle state of a transport connection. */
export type TransportState = "connecting" | "open" | "closing" | "closed";

/** Callback cleanup handle. */
export interface Disposable {
  dispose(): void;
}

/** How a transport ended. `remote` is true when the peer initiated it. */
export interface CloseEvent {
  code: number;
  reason: string;
  remote: boolean;
}

/** Normal closure, as in RFC 6455. */
export const CLOSE_NORMAL = 1000;
/** Abnormal closure: the connection dropped without a close frame. */
export const CLOSE_ABNORMAL = 1006;

/**
 * Duplex, message-oriented channel for JSON-RPC traffic.
 *
 * A transport starts opening as soon as it is constructed and is used for a
 * single connection; reconnecting means building a new one. Consumers send
 * and receive serialized JSON strings.
 */
export interface Transport {
  /** Current connection state. */
  readonly state: TransportState;

  /** Send a serialized message string. Throws if not open. */
  send(data: string): void;

  /** Register a handler for the open event. Fires once. */
  onOpen(handler: () => void): Disposable;

  /** Register a handler for incoming messages. Returns cleanup handle. */
  onMessage(handler: (data: string) => void): Disposable;

  /** Register a handler for transport close. Fires once. */
  onClose(handler: (event: CloseEvent) => void): Disposable;

  /** Register a handler for transport errors. */
  onError(handler: (error: Error) => void): Disposable;

  /** Request a graceful close. Completion is reported through onClose. Idempotent. */
  close(code?: number, reason?: string): void;

  /** Symbol.dispose support for `using` syntax. */
  [Symbol.dispose](): void;
}

/** Builds a fresh transport that starts opening towards `url`. */
export type TransportFactory = (url: string) => Transport;
