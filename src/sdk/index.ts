/**
 * Signaling SDK — JSON-RPC 2.0 client core over a persistent duplex
 * connection.
 *
 * @example Quick start
 * ```ts
 * import { SignalingClient } from "./sdk/index.js";
 *
 * const client = new SignalingClient({ url: "wss://media.example.test/room", sink });
 * client.connect();
 * await client.whenConnected();
 *
 * const result = await client.call("joinRoom", { user: "ana", room: "lobby" });
 * client.close();
 * ```
 *
 * @module
 */

// ── Primary API ─────────────────────────────────────────────────────
export {
  SignalingClient,
  type CallOptions,
  type StateChangeHandler,
} from "./client.js";
export {
  resolveClientOptions,
  validateEndpoint,
  DEFAULT_CALL_ID_FLOOR,
  type SignalingClientOptions,
  type ResolvedClientOptions,
  type SignalingSink,
  type NotConnectedPolicy,
  type RpcObserver,
  type TrafficKind,
  type TrafficRecord,
} from "./config.js";
export { type ConnectionState } from "./connection.js";

// ── Errors ──────────────────────────────────────────────────────────
export {
  SignalingError,
  ConnectFailureError,
  NotConnectedError,
  DuplicateIdError,
  DecodeError,
  EncodeError,
  RpcError,
  ConnectionLostError,
  AbortError,
  ClientClosedError,
  isSignalingError,
  isErrorCode,
  type SignalingErrorCode,
} from "./errors.js";

// ── Diagnostics & logging ───────────────────────────────────────────
export {
  createLoggingDiagnostics,
  type DiagnosticSink,
  type StrayResponse,
} from "./diagnostics.js";
export { createLogger, rootLogger, silentLogger, parseLevel, type Logger } from "./logger.js";

// ── Low-level (advanced usage) ──────────────────────────────────────
export { Connection, type ConnectionEvents } from "./connection.js";
export { SerialDispatcher, type Action } from "./rpc/dispatcher.js";
export { PendingCallRegistry, type CallOutcome, type Continuation } from "./rpc/registry.js";
export { NotificationRouter, type RouteTargets } from "./rpc/router.js";
export { encodeCall, encodeResponse, encodeErrorResponse, decodeMessage } from "./rpc/codec.js";
export {
  type Transport,
  type TransportState,
  type TransportFactory,
  type Disposable,
  type CloseEvent,
  CLOSE_NORMAL,
  CLOSE_ABNORMAL,
} from "./transport/transport.js";
export {
  WebSocketTransport,
  webSocketTransportFactory,
  type WebSocketTransportOptions,
} from "./transport/websocket.js";
export { createMemoryTransport, MemoryTransport } from "./transport/memory.js";

// ── JSON-RPC types ──────────────────────────────────────────────────
export type {
  Call,
  InboundMessage,
  InboundRequest,
  JsonObject,
  JsonRpcErrorData,
  JsonValue,
  NamedParams,
  ParamValue,
} from "./rpc/types.js";
export { ErrorCodes, NO_REPLY } from "./rpc/types.js";
