/**
 * Client options and their defaults.
 */

import type { Logger } from "pino";
import type { SignalingError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createLoggingDiagnostics, type DiagnosticSink } from "./diagnostics.js";
import type { CallOutcome } from "./rpc/registry.js";
import type { InboundRequest, JsonObject } from "./rpc/types.js";
import type { TransportFactory } from "./transport/transport.js";
import { webSocketTransportFactory } from "./transport/websocket.js";

/**
 * Callbacks the domain layer implements. All of them run on the
 * dispatcher and must return quickly.
 */
export interface SignalingSink {
  /** Result of a `send()` made with a non-negative id. */
  onResponse(id: number, outcome: CallOutcome): void;
  /** Server push that answers no call. */
  onNotification(method: string, params: JsonObject): void;
  /** The connection ended, cleanly or not. */
  onConnectionClosed(code: number, reason: string, remote: boolean): void;
  /** Server-initiated call. Without it, requests get METHOD_NOT_FOUND. */
  onRequest?(request: InboundRequest): void;
  /** Connection failures and sends that could not go out. */
  onError?(error: SignalingError): void;
}

/** What `send()` does outside the connected state. */
export type NotConnectedPolicy = "drop" | "error";

/** Kinds of traffic seen by an {@link RpcObserver}. */
export type TrafficKind = "call" | "notification" | "request" | "response" | "error" | "invalid";

/** One message on the wire. */
export interface TrafficRecord {
  raw: string;
  kind: TrafficKind;
  method?: string;
  id?: number;
}

/** Callback for observing raw RPC traffic. */
export interface RpcObserver {
  onOutgoing?: (record: TrafficRecord) => void;
  onIncoming?: (record: TrafficRecord) => void;
}

export interface SignalingClientOptions {
  /** Endpoint, `ws:` or `wss:`. */
  url: string;
  sink: SignalingSink;
  /** Builds the transport for each connect. Default: WebSocket via `ws`. */
  transport?: TransportFactory;
  logger?: Logger;
  /** Default: logs through `logger`. */
  diagnostics?: DiagnosticSink;
  observer?: RpcObserver;
  /** Default "drop". */
  notConnected?: NotConnectedPolicy;
  /**
   * First id `call()` allocates. Ids below it are left to callers of
   * `send()`. Default 1_000_000.
   */
  callIdFloor?: number;
}

export interface ResolvedClientOptions {
  url: string;
  sink: SignalingSink;
  transport: TransportFactory;
  logger: Logger;
  diagnostics: DiagnosticSink;
  observer: RpcObserver;
  notConnected: NotConnectedPolicy;
  callIdFloor: number;
}

export const DEFAULT_CALL_ID_FLOOR = 1_000_000;

/** Fill in defaults and validate. Throws TypeError on a bad URL or id floor. */
export function resolveClientOptions(opts: SignalingClientOptions): ResolvedClientOptions {
  const url = validateEndpoint(opts.url);
  const callIdFloor = opts.callIdFloor ?? DEFAULT_CALL_ID_FLOOR;
  if (!Number.isSafeInteger(callIdFloor) || callIdFloor < 0) {
    throw new TypeError(`callIdFloor must be a non-negative integer, got ${callIdFloor}`);
  }
  const logger = opts.logger ?? createLogger("signaling");
  return {
    url,
    sink: opts.sink,
    transport: opts.transport ?? webSocketTransportFactory(),
    logger,
    diagnostics: opts.diagnostics ?? createLoggingDiagnostics(logger),
    observer: opts.observer ?? {},
    notConnected: opts.notConnected ?? "drop",
    callIdFloor,
  };
}

/** Check that `url` parses and speaks WebSocket. Returns it unchanged. */
export function validateEndpoint(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new TypeError(`Invalid endpoint URL: ${url}`);
  }
  if (parsed.protocol !== "ws:" && parsed.protocol !== "wss:") {
    throw new TypeError(`Endpoint must use ws: or wss:, got ${parsed.protocol}`);
  }
  return url;
}
