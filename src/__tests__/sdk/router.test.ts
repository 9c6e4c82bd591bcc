import { describe, it, expect, vi } from "vitest";
import { NotificationRouter, type RouteTargets } from "../../sdk/rpc/router.js";
import { PendingCallRegistry, type CallOutcome } from "../../sdk/rpc/registry.js";
import { RpcError } from "../../sdk/errors.js";
import type { JsonRpcErrorData } from "../../sdk/rpc/types.js";
import { RecordingDiagnostics } from "../helpers/harness.js";

function setup(targets: { onRequest?: RouteTargets["onRequest"] } = {}) {
  const registry = new PendingCallRegistry(vi.fn());
  const diagnostics = new RecordingDiagnostics();
  const onNotification = vi.fn();
  const replyError = vi.fn<(id: number, error: JsonRpcErrorData) => void>();
  const router = new NotificationRouter(
    registry,
    { onNotification, ...targets },
    diagnostics,
    replyError,
  );
  return { registry, diagnostics, onNotification, replyError, router };
}

describe("NotificationRouter", () => {
  it("routes a response to its pending call", () => {
    const { registry, router } = setup();
    const continuation = vi.fn<(outcome: CallOutcome) => void>();
    registry.register(1, "joinRoom", continuation);
    router.route({ kind: "response", id: 1, result: { value: [] } });
    expect(continuation).toHaveBeenCalledWith({ ok: true, result: { value: [] } });
  });

  it("routes an error response as an RpcError named after the pending method", () => {
    const { registry, router } = setup();
    const continuation = vi.fn<(outcome: CallOutcome) => void>();
    registry.register(2, "publishVideo", continuation);
    router.route({ kind: "error", id: 2, error: { code: 104, message: "Not in a room" } });

    const outcome = continuation.mock.calls[0][0];
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(RpcError);
      expect(outcome.error).toMatchObject({
        method: "publishVideo",
        rpcCode: 104,
        message: "Not in a room",
      });
    }
  });

  it("sends responses and errors for unknown ids to diagnostics", () => {
    const { diagnostics, router } = setup();
    router.route({ kind: "response", id: 5, result: 1 });
    router.route({ kind: "error", id: 6, error: { code: 1, message: "x" } });
    expect(diagnostics.strays).toEqual([
      { kind: "response", id: 5, result: 1 },
      { kind: "error", id: 6, error: { code: 1, message: "x" } },
    ]);
  });

  it("routes notifications to onNotification", () => {
    const { onNotification, router } = setup();
    router.route({ kind: "notification", method: "participantJoined", params: { id: "bob" } });
    expect(onNotification).toHaveBeenCalledWith("participantJoined", { id: "bob" });
  });

  it("routes requests to onRequest when present", () => {
    const onRequest = vi.fn();
    const { replyError, router } = setup({ onRequest });
    const request = { kind: "request" as const, id: 3, method: "ping", params: {} };
    router.route(request);
    expect(onRequest).toHaveBeenCalledWith(request);
    expect(replyError).not.toHaveBeenCalled();
  });

  it("answers requests with METHOD_NOT_FOUND without onRequest", () => {
    const { replyError, router } = setup();
    router.route({ kind: "request", id: 3, method: "ping", params: {} });
    expect(replyError).toHaveBeenCalledWith(3, { code: -32601, message: "No handler for ping" });
  });
});
