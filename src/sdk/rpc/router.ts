/**
 * Notification router: sends each decoded message to exactly one place:
 * the pending call it answers, the notification handler, or the request
 * handler.
 */

import { RpcError, assertNever } from "../errors.js";
import type { DiagnosticSink } from "../diagnostics.js";
import type { PendingCallRegistry } from "./registry.js";
import { ErrorCodes } from "./types.js";
import type { InboundMessage, InboundRequest, JsonObject, JsonRpcErrorData } from "./types.js";

/** Where unsolicited messages go. */
export interface RouteTargets {
  onNotification(method: string, params: JsonObject): void;
  /** Absent means server requests are answered with METHOD_NOT_FOUND. */
  onRequest?(request: InboundRequest): void;
}

/** Sends an error reply for a server request nobody handles. */
export type ErrorReply = (id: number, error: JsonRpcErrorData) => void;

export class NotificationRouter {
  readonly #registry: PendingCallRegistry;
  readonly #targets: RouteTargets;
  readonly #diagnostics: DiagnosticSink;
  readonly #replyError: ErrorReply;

  constructor(
    registry: PendingCallRegistry,
    targets: RouteTargets,
    diagnostics: DiagnosticSink,
    replyError: ErrorReply,
  ) {
    this.#registry = registry;
    this.#targets = targets;
    this.#diagnostics = diagnostics;
    this.#replyError = replyError;
  }

  route(message: InboundMessage): void {
    switch (message.kind) {
      case "response": {
        if (!this.#registry.resolve(message.id, { ok: true, result: message.result })) {
          this.#diagnostics.onStrayResponse(message);
        }
        return;
      }
      case "error": {
        const { code, message: text, data } = message.error;
        const method = this.#registry.methodOf(message.id) ?? "";
        const error = new RpcError(method, code, text, data);
        if (!this.#registry.resolve(message.id, { ok: false, error })) {
          this.#diagnostics.onStrayResponse(message);
        }
        return;
      }
      case "notification":
        this.#targets.onNotification(message.method, message.params);
        return;
      case "request":
        if (this.#targets.onRequest) {
          this.#targets.onRequest(message);
        } else {
          this.#replyError(message.id, {
            code: ErrorCodes.METHOD_NOT_FOUND,
            message: `No handler for ${message.method}`,
          });
        }
        return;
      default:
        assertNever(message);
    }
  }
}
