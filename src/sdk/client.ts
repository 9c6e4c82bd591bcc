/**
 * SignalingClient — JSON-RPC 2.0 client core over one duplex connection.
 *
 * Composes the connection state machine, the pending-call registry, the
 * codec and the notification router behind a single serialized
 * dispatcher. Public methods only enqueue; the work happens on the
 * dispatcher, in enqueue order.
 *
 * @example
 * ```ts
 * const client = new SignalingClient({
 *   url: "wss://media.example.test/room",
 *   sink: {
 *     onResponse: (id, outcome) => console.log(id, outcome),
 *     onNotification: (method, params) => console.log(method, params),
 *     onConnectionClosed: (code, reason) => console.log("closed", code, reason),
 *   },
 * });
 *
 * client.connect();
 * await client.whenConnected();
 * client.send("joinRoom", { user: "ana", room: "lobby" }, 1);
 * ```
 */

import type { Logger } from "pino";
import { Connection, type ConnectionState } from "./connection.js";
import {
  AbortError,
  ClientClosedError,
  ConnectionLostError,
  DecodeError,
  EncodeError,
  NotConnectedError,
  DuplicateIdError,
  isSignalingError,
  toError,
  type SignalingError,
} from "./errors.js";
import type { DiagnosticSink } from "./diagnostics.js";
import {
  resolveClientOptions,
  type NotConnectedPolicy,
  type RpcObserver,
  type SignalingClientOptions,
  type SignalingSink,
  type TrafficRecord,
} from "./config.js";
import { SerialDispatcher } from "./rpc/dispatcher.js";
import { PendingCallRegistry, type Continuation } from "./rpc/registry.js";
import { NotificationRouter } from "./rpc/router.js";
import { decodeMessage, encodeCall, encodeErrorResponse, encodeResponse } from "./rpc/codec.js";
import type { Call, InboundMessage, JsonValue, NamedParams } from "./rpc/types.js";
import { CLOSE_ABNORMAL, type CloseEvent, type Disposable } from "./transport/transport.js";

/** Called with the new and previous state on every transition. */
export type StateChangeHandler = (state: ConnectionState, previous: ConnectionState) => void;

export interface CallOptions {
  /** Stop waiting. The pending entry stays until its response or teardown. */
  signal?: AbortSignal;
}

export class SignalingClient {
  readonly #sink: SignalingSink;
  readonly #log: Logger;
  readonly #diagnostics: DiagnosticSink;
  readonly #observer: RpcObserver;
  readonly #policy: NotConnectedPolicy;
  readonly #dispatcher: SerialDispatcher;
  readonly #registry: PendingCallRegistry;
  readonly #router: NotificationRouter;
  readonly #connection: Connection;
  readonly #stateHandlers = new Set<StateChangeHandler>();
  readonly #connectWaiters = new Set<(error: SignalingError) => void>();
  #nextCallId: number;
  #closed = false;

  constructor(options: SignalingClientOptions) {
    const opts = resolveClientOptions(options);
    this.#sink = opts.sink;
    this.#log = opts.logger;
    this.#diagnostics = opts.diagnostics;
    this.#observer = opts.observer;
    this.#policy = opts.notConnected;
    this.#nextCallId = opts.callIdFloor;

    this.#dispatcher = new SerialDispatcher(
      (label, err) => this.#reportDispatchError(label, err),
      (label, err) => this.#log.error({ err, action: label }, "dispatch error hook failed"),
    );
    this.#registry = new PendingCallRegistry((id, err) =>
      this.#reportDispatchError(`continuation:${id}`, err),
    );

    const sink = this.#sink;
    const onRequest = sink.onRequest?.bind(sink);
    this.#router = new NotificationRouter(
      this.#registry,
      {
        onNotification: (method, params) =>
          this.#guard("sink:notification", () => sink.onNotification(method, params)),
        onRequest: onRequest
          ? (request) => this.#guard("sink:request", () => onRequest(request))
          : undefined,
      },
      this.#diagnostics,
      (id, error) => {
        const wire = encodeErrorResponse(id, error);
        this.#transmit(wire, { raw: wire, kind: "error", id });
      },
    );

    this.#connection = new Connection(
      opts.url,
      opts.transport,
      (label, action) => this.#dispatcher.enqueue(label, action),
      {
        onStateChange: (state, previous) => this.#emitState(state, previous),
        onMessage: (data) => this.#receive(data),
        onClosed: (event, error, failed) => this.#teardown(event, error, failed),
        onTransportError: (error, state) => this.#diagnostics.onTransportError(error, state),
      },
    );
  }

  /** Endpoint this client connects to. */
  get url(): string {
    return this.#connection.url;
  }

  /** Current connection state. */
  get state(): ConnectionState {
    return this.#connection.state;
  }

  /** True only in the connected state. */
  isConnected(): boolean {
    return this.#connection.isConnected();
  }

  /** Ids awaiting a response, oldest first. */
  pendingIds(): number[] {
    return this.#registry.ids();
  }

  /** Dispatcher actions run so far. */
  get processedActions(): number {
    return this.#dispatcher.processed;
  }

  /** Whether the client is closed. */
  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Open the connection. Returns at once; watch {@link onStateChange}.
   * Once closed, the client reports ClientClosedError through `sink.onError`.
   */
  connect(): void {
    this.#dispatcher.enqueue("connect", () => {
      if (this.#closed) {
        this.#reportError(new ClientClosedError());
        return;
      }
      this.#connection.open();
    });
  }

  /** Close the connection. Pending calls resolve with ConnectionLostError. */
  disconnect(): void {
    this.#dispatcher.enqueue("disconnect", () => this.#connection.close());
  }

  /**
   * Fire a call. With `id >= 0` the outcome reaches `sink.onResponse(id, …)`;
   * with a negative id nothing comes back. Outside the connected state the
   * call is dropped, or reported through `sink.onError` under the "error"
   * policy. A closed client treats every send the same way.
   */
  send(method: string, params: NamedParams | null, id: number): void {
    const call: Call = params ? { method, params, id } : { method, id };
    this.#dispatcher.enqueue(`send:${method}`, () => {
      const continuation: Continuation | null =
        id >= 0 ? (outcome) => this.#sink.onResponse(id, outcome) : null;
      const error = this.#issue(call, continuation);
      if (!error) return;
      if (!(error instanceof NotConnectedError)) {
        this.#reportError(error);
      } else if (this.#policy === "drop") {
        this.#guard("diagnostics:dropped", () =>
          this.#diagnostics.onDroppedSend(call, this.#connection.state),
        );
      } else {
        this.#reportError(this.#closed ? new ClientClosedError() : error);
      }
    });
  }

  /**
   * Issue a call and await its result. Ids come from the client's own
   * counter, starting at `callIdFloor`.
   */
  call(method: string, params?: NamedParams, opts: CallOptions = {}): Promise<JsonValue> {
    if (this.#closed) return Promise.reject(new ClientClosedError());
    const { signal } = opts;
    const id = this.#nextCallId++;

    return new Promise<JsonValue>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortError(`${method}: aborted`));
        return;
      }

      let settled = false;
      const onAbort = () => settle(() => reject(new AbortError(`${method}: aborted`)));
      const settle = (fn: () => void) => {
        signal?.removeEventListener("abort", onAbort);
        if (settled) return;
        settled = true;
        fn();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.#dispatcher.enqueue(`call:${method}`, () => {
        const error = this.#issue(params ? { method, params, id } : { method, id }, (outcome) =>
          settle(() => (outcome.ok ? resolve(outcome.result) : reject(outcome.error))),
        );
        if (error) settle(() => reject(error));
      });
    });
  }

  /** Answer a server-initiated request. */
  respond(id: number, result: JsonValue): void {
    this.#dispatcher.enqueue("respond", () => {
      this.#reply(id, encodeResponse(id, result), "response");
    });
  }

  /** Answer a server-initiated request with an error. */
  respondError(id: number, code: number, message: string, data?: JsonValue): void {
    this.#dispatcher.enqueue("respond:error", () => {
      this.#reply(id, encodeErrorResponse(id, { code, message, data }), "error");
    });
  }

  /** Register a handler for state transitions. Returns cleanup handle. */
  onStateChange(handler: StateChangeHandler): Disposable {
    this.#stateHandlers.add(handler);
    return { dispose: () => this.#stateHandlers.delete(handler) };
  }

  /** Resolves once the client is in `target`; at once if it already is. */
  whenState(target: ConnectionState, signal?: AbortSignal): Promise<void> {
    if (this.state === target) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        sub.dispose();
        reject(new AbortError(`Gave up waiting for "${target}"`));
      };
      const sub = this.onStateChange((state) => {
        if (state !== target) return;
        sub.dispose();
        signal?.removeEventListener("abort", onAbort);
        resolve();
      });
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Resolves once connected. Rejects with the error that ended the attempt
   * when the client falls back to disconnected instead.
   */
  whenConnected(signal?: AbortSignal): Promise<void> {
    if (this.isConnected()) return Promise.resolve();
    if (this.#closed) return Promise.reject(new ClientClosedError());
    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        sub.dispose();
        this.#connectWaiters.delete(onFailed);
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        cleanup();
        reject(new AbortError('Gave up waiting for "connected"'));
      };
      const onFailed = (error: SignalingError) => {
        cleanup();
        reject(error);
      };
      const sub = this.onStateChange((state) => {
        if (state !== "connected") return;
        cleanup();
        resolve();
      });
      this.#connectWaiters.add(onFailed);
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Resolves once every queued action has run. */
  idle(): Promise<void> {
    return this.#dispatcher.idle();
  }

  /** Disconnect and refuse further work. Idempotent. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.disconnect();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  // ---------------------------------------------------------------------------
  // Private: everything below runs on the dispatcher
  // ---------------------------------------------------------------------------

  /**
   * Encode, register and transmit one call. Returns the error that stopped
   * it before transmission, or null. Transmission failures resolve the
   * registered entry instead.
   */
  #issue(call: Call, continuation: Continuation | null): SignalingError | null {
    if (!this.#connection.isConnected()) return new NotConnectedError(call.method);

    let wire: string;
    try {
      wire = encodeCall(call);
    } catch (err) {
      return isSignalingError(err) ? err : new EncodeError(call.method, toError(err).message);
    }

    const registered = continuation !== null && call.id >= 0;
    if (registered) {
      if (this.#registry.has(call.id)) return new DuplicateIdError(call.id, call.method);
      this.#registry.register(call.id, call.method, continuation);
    }

    const record: TrafficRecord = {
      raw: wire,
      kind: call.id >= 0 ? "call" : "notification",
      method: call.method,
    };
    if (call.id >= 0) record.id = call.id;
    const failure = this.#transmit(wire, record);
    if (failure && registered) {
      this.#registry.resolve(call.id, {
        ok: false,
        error: new ConnectionLostError(CLOSE_ABNORMAL, failure.message, false, failure),
      });
    }
    return null;
  }

  /** Write to the transport. Returns the error it threw, if any. */
  #transmit(wire: string, record: TrafficRecord): Error | null {
    try {
      this.#connection.send(wire);
    } catch (err) {
      const error = toError(err);
      this.#diagnostics.onTransportError(error, this.#connection.state);
      return error;
    }
    this.#guard("observer:outgoing", () => this.#observer.onOutgoing?.(record));
    return null;
  }

  #reply(id: number, wire: string, kind: "response" | "error"): void {
    if (!this.#connection.isConnected()) {
      this.#log.debug({ id, kind, state: this.#connection.state }, "reply dropped: not connected");
      return;
    }
    this.#transmit(wire, { raw: wire, kind, id });
  }

  #receive(data: string): void {
    let message: InboundMessage;
    try {
      message = decodeMessage(data);
    } catch (err) {
      this.#guard("observer:incoming", () =>
        this.#observer.onIncoming?.({ raw: data, kind: "invalid" }),
      );
      if (err instanceof DecodeError) {
        this.#diagnostics.onDecodeError(err);
        return;
      }
      throw err;
    }
    this.#guard("observer:incoming", () => this.#observer.onIncoming?.(describeInbound(data, message)));
    this.#router.route(message);
  }

  #teardown(event: CloseEvent, error: SignalingError, failed: boolean): void {
    this.#registry.resolveAll(error);
    if (failed) this.#reportError(error);
    this.#guard("sink:closed", () =>
      this.#sink.onConnectionClosed(event.code, event.reason, event.remote),
    );
    if (this.#connectWaiters.size === 0) return;
    // A deferred reconnect starts in this same action; only give up on
    // connect waiters if the client is still down afterwards.
    this.#dispatcher.enqueue("connect-waiters", () => {
      if (this.#connection.state !== "disconnected") return;
      for (const fail of [...this.#connectWaiters]) fail(error);
    });
  }

  #emitState(state: ConnectionState, previous: ConnectionState): void {
    this.#log.debug({ state, previous }, "connection state");
    for (const handler of [...this.#stateHandlers]) {
      this.#guard("state-change", () => handler(state, previous));
    }
  }

  #reportError(error: SignalingError): void {
    const onError = this.#sink.onError?.bind(this.#sink);
    if (onError) {
      this.#guard("sink:error", () => onError(error));
    } else {
      this.#log.warn({ err: error }, "unhandled client error");
    }
  }

  /** Run a user callback; what it throws goes to the diagnostic sink. */
  #guard(label: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.#reportDispatchError(label, toError(err));
    }
  }

  #reportDispatchError(label: string, error: Error): void {
    try {
      this.#diagnostics.onDispatchError(label, error);
    } catch (hookErr) {
      this.#log.error({ err: error, hookErr: toError(hookErr), action: label }, "diagnostic sink threw");
    }
  }
}

function describeInbound(raw: string, message: InboundMessage): TrafficRecord {
  switch (message.kind) {
    case "response":
    case "error":
      return { raw, kind: message.kind, id: message.id };
    case "notification":
      return { raw, kind: "notification", method: message.method };
    case "request":
      return { raw, kind: "request", method: message.method, id: message.id };
  }
}
