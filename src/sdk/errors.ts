/**
 * Structured error hierarchy for the signaling client.
 *
 * All errors extend SignalingError with a `.code` discriminant for
 * programmatic handling via switch statements or type predicates.
 *
 * @example
 * ```ts
 * try {
 *   await client.call("joinRoom", { user: "ana", room: "lobby" });
 * } catch (e) {
 *   if (e instanceof SignalingError) {
 *     switch (e.code) {
 *       case "CONNECTION_LOST": console.error(`Dropped (${e.closeCode})`); break;
 *       case "PROTOCOL_ERROR":  console.error(`RPC [${e.rpcCode}]: ${e.message}`); break;
 *       case "NOT_CONNECTED":   console.error("Connect first"); break;
 *     }
 *   }
 * }
 * ```
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Union of all error codes for exhaustive switch handling. */
export type SignalingErrorCode =
  | "CONNECT_FAILURE"
  | "NOT_CONNECTED"
  | "DUPLICATE_ID"
  | "DECODE_ERROR"
  | "ENCODE_ERROR"
  | "PROTOCOL_ERROR"
  | "CONNECTION_LOST"
  | "ABORTED"
  | "CLIENT_CLOSED";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for all signaling client errors. */
export class SignalingError extends Error {
  readonly code: SignalingErrorCode;
  override readonly cause?: Error;

  constructor(code: SignalingErrorCode, message: string, opts?: { cause?: Error }) {
    super(message);
    this.code = code;
    this.name = "SignalingError";
    if (opts?.cause) this.cause = opts.cause;
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** The transport failed to open. */
export class ConnectFailureError extends SignalingError {
  override readonly code = "CONNECT_FAILURE" as const;
  readonly url: string;

  constructor(url: string, cause?: Error) {
    super(
      "CONNECT_FAILURE",
      cause ? `Failed to connect to ${url}: ${cause.message}` : `Failed to connect to ${url}`,
      { cause },
    );
    this.name = "ConnectFailureError";
    this.url = url;
  }
}

/** A send was attempted outside the connected state. */
export class NotConnectedError extends SignalingError {
  override readonly code = "NOT_CONNECTED" as const;
  readonly method: string;

  constructor(method: string) {
    super("NOT_CONNECTED", `${method}: not connected`);
    this.name = "NotConnectedError";
    this.method = method;
  }
}

/** A correlation id was reused while its previous call was still pending. */
export class DuplicateIdError extends SignalingError {
  override readonly code = "DUPLICATE_ID" as const;
  readonly id: number;
  readonly method: string;

  constructor(id: number, method: string) {
    super("DUPLICATE_ID", `${method}: id ${id} is already pending`);
    this.name = "DuplicateIdError";
    this.id = id;
    this.method = method;
  }
}

/** Inbound text that is not a valid envelope. */
export class DecodeError extends SignalingError {
  override readonly code = "DECODE_ERROR" as const;
  /** The offending text, capped at 500 characters. */
  readonly raw: string;

  constructor(message: string, raw: string, cause?: Error) {
    super("DECODE_ERROR", message, { cause });
    this.name = "DecodeError";
    this.raw = raw.length > 500 ? `${raw.slice(0, 500)}…` : raw;
  }
}

/** An outgoing call that cannot be serialized. */
export class EncodeError extends SignalingError {
  override readonly code = "ENCODE_ERROR" as const;
  readonly method: string;

  constructor(method: string, message: string) {
    super("ENCODE_ERROR", `${method}: ${message}`);
    this.name = "EncodeError";
    this.method = method;
  }
}

/** Server returned a JSON-RPC error response. */
export class RpcError extends SignalingError {
  override readonly code = "PROTOCOL_ERROR" as const;
  readonly method: string;
  readonly rpcCode: number;
  readonly data?: unknown;

  constructor(method: string, rpcCode: number, message: string, data?: unknown) {
    super("PROTOCOL_ERROR", message);
    this.name = "RpcError";
    this.method = method;
    this.rpcCode = rpcCode;
    this.data = data;
  }
}

/** The connection went away while the call was pending. */
export class ConnectionLostError extends SignalingError {
  override readonly code = "CONNECTION_LOST" as const;
  readonly closeCode: number;
  readonly reason: string;
  readonly remote: boolean;

  constructor(closeCode: number, reason: string, remote: boolean, cause?: Error) {
    super(
      "CONNECTION_LOST",
      `Connection lost (code=${closeCode}${reason ? `, reason=${reason}` : ""})`,
      { cause },
    );
    this.name = "ConnectionLostError";
    this.closeCode = closeCode;
    this.reason = reason;
    this.remote = remote;
  }
}

/** The caller stopped waiting for a call. */
export class AbortError extends SignalingError {
  override readonly code = "ABORTED" as const;

  constructor(message: string = "Operation aborted") {
    super("ABORTED", message);
    this.name = "AbortError";
  }
}

/** Client was used after close(). */
export class ClientClosedError extends SignalingError {
  override readonly code = "CLIENT_CLOSED" as const;

  constructor() {
    super("CLIENT_CLOSED", "Client is closed");
    this.name = "ClientClosedError";
  }
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link SignalingError}. */
export function isSignalingError(err: unknown): err is SignalingError {
  return err instanceof SignalingError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends SignalingErrorCode>(
  err: unknown,
  code: C,
): err is SignalingError & { code: C } {
  return err instanceof SignalingError && err.code === code;
}

/** Coerce a thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Exhaustive-check helper. Call in the `default` branch of a switch. */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
