/**
 * Pending-call registry: correlation id → continuation.
 *
 * Only the dispatcher touches it, so it needs no locking of its own. Every
 * registered entry is invoked exactly once: by its response, or by the
 * teardown sweep in {@link PendingCallRegistry.resolveAll}.
 */

import { DuplicateIdError, toError } from "../errors.js";
import type { SignalingError } from "../errors.js";
import type { JsonValue } from "./types.js";

/** How a pending call ended. */
export type CallOutcome =
  | { ok: true; result: JsonValue }
  | { ok: false; error: SignalingError };

/** Invoked exactly once with the call's outcome. */
export type Continuation = (outcome: CallOutcome) => void;

interface PendingEntry {
  method: string;
  continuation: Continuation;
}

export class PendingCallRegistry {
  readonly #pending = new Map<number, PendingEntry>();
  readonly #onContinuationError: (id: number, error: Error) => void;

  /** `onContinuationError` receives anything a continuation throws. */
  constructor(onContinuationError: (id: number, error: Error) => void) {
    this.#onContinuationError = onContinuationError;
  }

  /** Number of calls awaiting a response. */
  get size(): number {
    return this.#pending.size;
  }

  has(id: number): boolean {
    return this.#pending.has(id);
  }

  /** Pending ids in registration order. */
  ids(): number[] {
    return [...this.#pending.keys()];
  }

  /** Method name of a pending call, if any. */
  methodOf(id: number): string | undefined {
    return this.#pending.get(id)?.method;
  }

  /** Store a continuation. Throws {@link DuplicateIdError} if `id` is pending. */
  register(id: number, method: string, continuation: Continuation): void {
    if (this.#pending.has(id)) {
      throw new DuplicateIdError(id, method);
    }
    this.#pending.set(id, { method, continuation });
  }

  /**
   * Remove and invoke the entry for `id`.
   * Returns false when nothing was pending under that id.
   */
  resolve(id: number, outcome: CallOutcome): boolean {
    const entry = this.#pending.get(id);
    if (!entry) return false;
    this.#pending.delete(id);
    this.#invoke(id, entry, outcome);
    return true;
  }

  /** Resolve every pending entry with `error`, oldest first, and empty the registry. */
  resolveAll(error: SignalingError): void {
    const entries = [...this.#pending];
    this.#pending.clear();
    for (const [id, entry] of entries) {
      this.#invoke(id, entry, { ok: false, error });
    }
  }

  #invoke(id: number, entry: PendingEntry, outcome: CallOutcome): void {
    try {
      entry.continuation(outcome);
    } catch (err) {
      this.#onContinuationError(id, toError(err));
    }
  }
}
