/**
 * Diagnostic sink: where the client reports things that are not any
 * caller's business: undecodable input, responses nobody waits for, sends
 * dropped by the not-connected policy, and failures inside the dispatcher.
 */

import type { Logger } from "pino";
import type { DecodeError } from "./errors.js";
import type { ConnectionState } from "./connection.js";
import type { Call, InboundMessage } from "./rpc/types.js";

/** A response or error response with no pending call to receive it. */
export type StrayResponse = Extract<InboundMessage, { kind: "response" | "error" }>;

export interface DiagnosticSink {
  onDecodeError(error: DecodeError): void;
  onStrayResponse(message: StrayResponse): void;
  onDroppedSend(call: Call, state: ConnectionState): void;
  onDispatchError(label: string, error: Error): void;
  onTransportError(error: Error, state: ConnectionState): void;
}

/** Default sink: every report becomes a structured log line. */
export function createLoggingDiagnostics(logger: Logger): DiagnosticSink {
  return {
    onDecodeError(error) {
      logger.warn({ err: error, raw: error.raw }, "dropping undecodable message");
    },
    onStrayResponse(message) {
      logger.warn({ id: message.id, kind: message.kind }, "response for unknown id");
    },
    onDroppedSend(call, state) {
      logger.debug({ method: call.method, id: call.id, state }, "send dropped: not connected");
    },
    onDispatchError(label, error) {
      logger.error({ err: error, action: label }, "dispatch action failed");
    },
    onTransportError(error, state) {
      logger.warn({ err: error, state }, "transport error");
    },
  };
}
