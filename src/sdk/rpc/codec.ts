/**
 * JSON-RPC 2.0 envelope codec.
 *
 * Outbound calls are serialized to one JSON text per message. Inbound text
 * is classified by which members are present:
 *
 * | members           | kind           |
 * |-------------------|----------------|
 * | id + result       | response       |
 * | id + error        | error          |
 * | method, no id     | notification   |
 * | method + id       | request        |
 *
 * Anything else is a {@link DecodeError}.
 */

import { DecodeError, EncodeError } from "../errors.js";
import type {
  Call,
  InboundMessage,
  JsonObject,
  JsonRpcErrorData,
  JsonValue,
} from "./types.js";

const VERSION = "2.0";

/** Serialize an outbound call. Negative ids are left off the wire. */
export function encodeCall(call: Call): string {
  if (typeof call.method !== "string" || call.method.length === 0) {
    throw new EncodeError(String(call.method), "method must be a non-empty string");
  }
  if (!Number.isInteger(call.id)) {
    throw new EncodeError(call.method, `id must be an integer, got ${call.id}`);
  }

  const envelope: JsonObject = { jsonrpc: VERSION, method: call.method };
  if (call.params) {
    const params: JsonObject = {};
    for (const [key, value] of Object.entries(call.params)) {
      if (typeof value === "number" && !Number.isFinite(value)) {
        throw new EncodeError(call.method, `param "${key}" is not a finite number`);
      }
      defineEntry(params, key, value);
    }
    envelope.params = params;
  }
  if (call.id >= 0) envelope.id = call.id;
  return JSON.stringify(envelope);
}

/**
 * Set an own enumerable property, so keys such as `__proto__` land on the
 * object instead of its prototype.
 */
export function defineEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Serialize a success reply to a server-initiated request. */
export function encodeResponse(id: number, result: JsonValue): string {
  return JSON.stringify({ jsonrpc: VERSION, id, result });
}

/** Serialize an error reply to a server-initiated request. */
export function encodeErrorResponse(id: number, error: JsonRpcErrorData): string {
  const payload: JsonObject = { code: error.code, message: error.message };
  if (error.data !== undefined) payload.data = error.data;
  return JSON.stringify({ jsonrpc: VERSION, id, error: payload });
}

/** Parse and classify one inbound message. Throws {@link DecodeError}. */
export function decodeMessage(text: string): InboundMessage {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(
      "Malformed JSON",
      text,
      err instanceof Error ? err : undefined,
    );
  }

  if (!isJsonObject(parsed)) {
    throw new DecodeError("Envelope is not a JSON object", text);
  }
  if ("jsonrpc" in parsed && parsed.jsonrpc !== VERSION) {
    throw new DecodeError(`Unsupported jsonrpc version: ${String(parsed.jsonrpc)}`, text);
  }

  const method: JsonValue | undefined = parsed.method;
  if (method !== undefined && typeof method !== "string") {
    throw new DecodeError("method must be a string", text);
  }

  const rawId: JsonValue | undefined = parsed.id;
  const hasId = rawId !== undefined && rawId !== null;
  if (hasId && !isCorrelationId(rawId)) {
    throw new DecodeError(`Invalid id: ${JSON.stringify(rawId)}`, text);
  }
  const id = isCorrelationId(rawId) ? rawId : null;

  if (method !== undefined) {
    const params = decodeParams(parsed.params, text);
    return id === null
      ? { kind: "notification", method, params }
      : { kind: "request", id, method, params };
  }

  const hasResult = "result" in parsed;
  const hasError = "error" in parsed;
  if (id === null) {
    if (hasError) {
      throw new DecodeError(`Error response without id: ${describeError(parsed.error)}`, text);
    }
    throw new DecodeError("Envelope has neither method nor id", text);
  }
  if (hasResult && hasError) {
    throw new DecodeError("Response carries both result and error", text);
  }
  if (hasError) {
    return { kind: "error", id, error: decodeErrorData(parsed.error, text) };
  }
  if (hasResult) {
    return { kind: "response", id, result: parsed.result ?? null };
  }
  throw new DecodeError("Response has neither result nor error", text);
}

// ---------------------------------------------------------------------------
// Private
// ---------------------------------------------------------------------------

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCorrelationId(value: JsonValue | undefined): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function decodeParams(value: JsonValue | undefined, text: string): JsonObject {
  if (value === undefined || value === null) return {};
  if (!isJsonObject(value)) {
    throw new DecodeError("params must be an object", text);
  }
  return value;
}

function decodeErrorData(value: JsonValue | undefined, text: string): JsonRpcErrorData {
  if (
    !isJsonObject(value) ||
    typeof value.code !== "number" ||
    !Number.isInteger(value.code) ||
    typeof value.message !== "string"
  ) {
    throw new DecodeError("Malformed error object", text);
  }
  const error: JsonRpcErrorData = { code: value.code, message: value.message };
  if (value.data !== undefined) error.data = value.data;
  return error;
}

function describeError(value: JsonValue | undefined): string {
  if (isJsonObject(value) && typeof value.message === "string") return value.message;
  return JSON.stringify(value ?? null);
}
