import { describe, it, expect, vi } from "vitest";
import { PendingCallRegistry, type CallOutcome } from "../../sdk/rpc/registry.js";
import { ConnectionLostError, DuplicateIdError } from "../../sdk/errors.js";

describe("PendingCallRegistry", () => {
  it("resolves an entry exactly once", () => {
    const registry = new PendingCallRegistry(vi.fn());
    const continuation = vi.fn<(outcome: CallOutcome) => void>();
    registry.register(1, "joinRoom", continuation);
    expect(registry.size).toBe(1);
    expect(registry.methodOf(1)).toBe("joinRoom");

    expect(registry.resolve(1, { ok: true, result: "ok" })).toBe(true);
    expect(registry.resolve(1, { ok: true, result: "again" })).toBe(false);
    expect(continuation).toHaveBeenCalledTimes(1);
    expect(continuation).toHaveBeenCalledWith({ ok: true, result: "ok" });
    expect(registry.has(1)).toBe(false);
    expect(registry.methodOf(1)).toBeUndefined();
  });

  it("reports false for an unknown id", () => {
    const registry = new PendingCallRegistry(vi.fn());
    expect(registry.resolve(42, { ok: true, result: null })).toBe(false);
  });

  it("refuses a duplicate id and keeps the first entry", () => {
    const registry = new PendingCallRegistry(vi.fn());
    const first = vi.fn();
    registry.register(1, "joinRoom", first);
    expect(() => registry.register(1, "leaveRoom", vi.fn())).toThrow(DuplicateIdError);
    expect(registry.methodOf(1)).toBe("joinRoom");
  });

  it("resolveAll fails every entry in registration order and empties the registry", () => {
    const registry = new PendingCallRegistry(vi.fn());
    const order: number[] = [];
    for (const id of [3, 1, 2]) {
      registry.register(id, "m", () => order.push(id));
    }
    expect(registry.ids()).toEqual([3, 1, 2]);

    registry.resolveAll(new ConnectionLostError(1000, "", false));
    expect(order).toEqual([3, 1, 2]);
    expect(registry.size).toBe(0);
  });

  it("hands a throwing continuation to the error hook and carries on", () => {
    const onError = vi.fn<(id: number, error: Error) => void>();
    const registry = new PendingCallRegistry(onError);
    const second = vi.fn();
    registry.register(1, "m", () => {
      throw new Error("boom");
    });
    registry.register(2, "m", second);

    registry.resolveAll(new ConnectionLostError(1006, "gone", true));
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe(1);
    expect(onError.mock.calls[0][1].message).toBe("boom");
    expect(second).toHaveBeenCalledTimes(1);
  });
});
