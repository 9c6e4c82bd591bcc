/**
 * Serialized dispatcher — a single-consumer action queue.
 *
 * Callers and transport callbacks enqueue actions; one drain loop runs them
 * strictly in arrival order, never on the enqueuer's stack. Connection state
 * and the pending-call registry are only mutated from inside an action, so
 * the queue itself is the concurrency control.
 */

import { toError } from "../errors.js";

/** A unit of serialized work. Must not block. */
export type Action = () => void;

export type ErrorHook = (label: string, error: Error) => void;

interface QueuedAction {
  label: string;
  run: Action;
}

export class SerialDispatcher {
  readonly #queue: QueuedAction[] = [];
  readonly #onError: ErrorHook;
  readonly #onHookError: ErrorHook;
  readonly #idleWaiters: Array<() => void> = [];
  #scheduled = false;
  #draining = false;
  #processed = 0;

  /**
   * `onError` receives anything an action throws; draining continues.
   * `onHookError` receives what `onError` itself throws.
   */
  constructor(onError: ErrorHook, onHookError: ErrorHook) {
    this.#onError = onError;
    this.#onHookError = onHookError;
  }

  /** Actions waiting to run. */
  get pending(): number {
    return this.#queue.length;
  }

  /** True while the drain loop is running an action. */
  get draining(): boolean {
    return this.#draining;
  }

  /** Count of actions run so far. The n-th action runs as number n. */
  get processed(): number {
    return this.#processed;
  }

  /** Append an action. It runs after everything enqueued before it. */
  enqueue(label: string, run: Action): void {
    this.#queue.push({ label, run });
    // An action enqueued from inside the loop is picked up by the same drain.
    if (this.#draining || this.#scheduled) return;
    this.#scheduled = true;
    queueMicrotask(() => this.#drain());
  }

  /** Resolves once the queue is empty and nothing is running. */
  idle(): Promise<void> {
    if (!this.#scheduled && !this.#draining && this.#queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.#idleWaiters.push(resolve);
    });
  }

  #drain(): void {
    this.#scheduled = false;
    this.#draining = true;
    try {
      let next = this.#queue.shift();
      while (next) {
        this.#processed++;
        try {
          next.run();
        } catch (err) {
          this.#report(next.label, toError(err));
        }
        next = this.#queue.shift();
      }
    } finally {
      this.#draining = false;
    }

    const waiters = this.#idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }

  #report(label: string, error: Error): void {
    try {
      this.#onError(label, error);
    } catch (hookErr) {
      this.#onHookError(label, toError(hookErr));
    }
  }
}
