import { describe, it, expect, beforeEach } from "vitest";
import {
  MAX_TRAFFIC_ENTRIES,
  createTrafficStore,
  formatTrafficEntry,
  type TrafficStore,
} from "../../state/traffic.js";

describe("traffic store", () => {
  let store: TrafficStore;

  beforeEach(() => {
    store = createTrafficStore({ capacity: 2, now: () => 1000 });
  });

  it("starts empty", () => {
    expect(store.getState().entries).toEqual([]);
    expect(store.getState().dropped).toBe(0);
  });

  it("push appends an entry with a sequence number and timestamp", () => {
    store.getState().push("outgoing", { raw: "{}", kind: "call", method: "joinRoom", id: 1 });
    expect(store.getState().entries).toEqual([
      {
        seq: 1,
        direction: "outgoing",
        timestamp: 1000,
        raw: "{}",
        kind: "call",
        method: "joinRoom",
        id: 1,
      },
    ]);
  });

  it("evicts the oldest entry when full and counts it", () => {
    const { push } = store.getState();
    push("outgoing", { raw: "a", kind: "call" });
    push("incoming", { raw: "b", kind: "response" });
    push("incoming", { raw: "c", kind: "notification" });
    expect(store.getState().entries.map((e) => [e.seq, e.raw])).toEqual([
      [2, "b"],
      [3, "c"],
    ]);
    expect(store.getState().dropped).toBe(1);
  });

  it("clear empties the log but keeps numbering", () => {
    const { push, clear } = store.getState();
    push("outgoing", { raw: "a", kind: "call" });
    clear();
    expect(store.getState().entries).toEqual([]);
    push("outgoing", { raw: "b", kind: "call" });
    expect(store.getState().entries[0].seq).toBe(2);
  });

  it("observer() records both directions", () => {
    const observer = store.getState().observer();
    observer.onOutgoing?.({ raw: "out", kind: "call" });
    observer.onIncoming?.({ raw: "in", kind: "response" });
    expect(store.getState().entries.map((e) => e.direction)).toEqual(["outgoing", "incoming"]);
  });

  it("defaults to a capacity of MAX_TRAFFIC_ENTRIES", () => {
    const big = createTrafficStore();
    for (let i = 0; i < MAX_TRAFFIC_ENTRIES + 5; i++) {
      big.getState().push("incoming", { raw: String(i), kind: "notification" });
    }
    expect(big.getState().entries).toHaveLength(200);
    expect(big.getState().dropped).toBe(5);
    expect(big.getState().entries[0].raw).toBe("5");
  });
});

describe("formatTrafficEntry", () => {
  it("renders an outgoing call", () => {
    expect(
      formatTrafficEntry({
        seq: 1,
        direction: "outgoing",
        timestamp: 0,
        raw: '{"x":1}',
        kind: "call",
        method: "joinRoom",
        id: 1,
      }),
    ).toBe('   1 → call joinRoom #1 {"x":1}');
  });

  it("leaves out what an entry lacks", () => {
    expect(
      formatTrafficEntry({ seq: 12, direction: "incoming", timestamp: 0, raw: "{", kind: "invalid" }),
    ).toBe("  12 ← invalid {");
  });
});
