/**
 * packages/core/src/event/async.ts - Completion queue for asynchronous messages.
 *
 * Why: Widgets may start work that finishes later (a file load, a search).
 * Results never touch focus or grab state directly: a settled promise only
 * appends `(id, message)` to this queue and wakes the event loop; the flush
 * replays queued results on the UI side.
 */

import type { Logger } from "../debug/logger.js";
import { describeThrown } from "../errors.js";
import type { Id } from "../id/id.js";
import { Erased } from "./messages.js";

/**
 * Runs a task away from the dispatch path. The default defers to a
 * microtask; hosts may substitute a worker pool.
 */
export type Spawner = <T>(task: () => T | Promise<T>) => Promise<T>;

export const microtaskSpawner: Spawner = (task) => Promise.resolve().then(task);

export type AsyncCompletion = Readonly<{ id: Id; msg: Erased }>;

export class AsyncQueue {
  private readonly ready: AsyncCompletion[] = [];
  private inFlight = 0;

  constructor(
    private readonly logger: Logger,
    private readonly wake: () => void,
  ) {}

  /** Promises started and not yet settled. */
  get pending(): number {
    return this.inFlight;
  }

  get readyCount(): number {
    return this.ready.length;
  }

  /**
   * Track `promise`; its value becomes a message for `id`. A rejection is
   * logged and dropped.
   */
  push(id: Id, promise: Promise<object>): void {
    this.inFlight++;
    void promise.then(
      (value) => {
        this.inFlight--;
        this.ready.push(Object.freeze({ id, msg: value instanceof Erased ? value : new Erased(value) }));
        this.wake();
      },
      (err: unknown) => {
        this.inFlight--;
        this.logger.warn(`async message for ${id.toString()} rejected: ${describeThrown(err)}`);
      },
    );
  }

  /** Remove and return every settled result, oldest first. */
  takeReady(): AsyncCompletion[] {
    return this.ready.splice(0);
  }
}
