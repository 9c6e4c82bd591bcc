/**
 * JSON-RPC 2.0 message type definitions.
 */

/** Any value JSON can carry. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A single named call parameter. */
export type ParamValue = string | number | boolean | null;

/** Named call parameters. */
export type NamedParams = Readonly<Record<string, ParamValue>>;

/** Correlation id for calls that expect no reply. */
export const NO_REPLY = -1;

/** An outbound call. A negative `id` means no reply is expected. */
export interface Call {
  method: string;
  params?: NamedParams;
  id: number;
}

export interface JsonRpcErrorData {
  code: number;
  message: string;
  data?: JsonValue;
}

/** A decoded inbound message. */
export type InboundMessage =
  | { kind: "response"; id: number; result: JsonValue }
  | { kind: "error"; id: number; error: JsonRpcErrorData }
  | { kind: "notification"; method: string; params: JsonObject }
  | { kind: "request"; id: number; method: string; params: JsonObject };

export type JsonObject = { [key: string]: JsonValue };

/** A server-initiated call handed to the sink. */
export type InboundRequest = Extract<InboundMessage, { kind: "request" }>;

/** Standard JSON-RPC 2.0 error codes. */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;
