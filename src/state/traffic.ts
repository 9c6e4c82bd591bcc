/**
 * Traffic log: capped ring buffer of RPC messages in a zustand store.
 *
 * `observer()` adapts the store to the client's {@link RpcObserver} hook.
 *
 * @module
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { RpcObserver, TrafficKind, TrafficRecord } from "../sdk/config.js";

// ── Constants ────────────────────────────────────────────────────

export const MAX_TRAFFIC_ENTRIES = 200;

// ── Types ────────────────────────────────────────────────────────

export interface TrafficEntry {
  /** Sequence number, unique within the store. */
  seq: number;
  direction: "outgoing" | "incoming";
  timestamp: number;
  raw: string;
  kind: TrafficKind;
  method?: string;
  id?: number;
}

export interface TrafficState {
  entries: readonly TrafficEntry[];
  /** Entries evicted since the last clear. */
  dropped: number;

  /** Append a message to the log. */
  push: (direction: TrafficEntry["direction"], record: TrafficRecord) => void;
  /** Clear all entries. */
  clear: () => void;
  /** Adapter for `SignalingClientOptions.observer`. */
  observer: () => RpcObserver;
}

export type TrafficStore = StoreApi<TrafficState>;

// ── Store creator ────────────────────────────────────────────────

export function createTrafficStore(
  opts: { capacity?: number; now?: () => number } = {},
): TrafficStore {
  const capacity = opts.capacity ?? MAX_TRAFFIC_ENTRIES;
  const now = opts.now ?? Date.now;
  let nextSeq = 0;

  return createStore<TrafficState>()((set, get) => ({
    entries: [],
    dropped: 0,

    push: (direction, record) => {
      const entry: TrafficEntry = { ...record, seq: ++nextSeq, direction, timestamp: now() };
      set((state) => {
        if (state.entries.length < capacity) {
          return { entries: [...state.entries, entry] };
        }
        const overflow = state.entries.length - capacity + 1;
        return {
          entries: [...state.entries.slice(overflow), entry],
          dropped: state.dropped + overflow,
        };
      });
    },

    clear: () => set({ entries: [], dropped: 0 }),

    observer: () => ({
      onOutgoing: (record) => get().push("outgoing", record),
      onIncoming: (record) => get().push("incoming", record),
    }),
  }));
}

/** One-line rendering used by the CLI's `--debug` dump. */
export function formatTrafficEntry(entry: TrafficEntry): string {
  const arrow = entry.direction === "outgoing" ? "→" : "←";
  const label = [entry.kind, entry.method, entry.id !== undefined ? `#${entry.id}` : undefined]
    .filter((part) => part !== undefined)
    .join(" ");
  return `${String(entry.seq).padStart(4)} ${arrow} ${label} ${entry.raw}`;
}
