/**
 * packages/core/src/event/timers.ts - Scheduled and frame-aligned wake-ups.
 *
 * Why: Widgets ask for a Timer event after a delay (caret blink, menu delay,
 * kinetic scroll). Requests for the same (id, handle) pair merge into one
 * entry, so repeated requests during a burst of input never pile up.
 */

import { UiError } from "../errors.js";
import type { Id } from "../id/id.js";

/**
 * Names one timer of a widget.
 *
 * When two requests share a handle, `earliest` keeps the earlier fire time;
 * otherwise the later one wins.
 */
export class TimerHandle {
  readonly code: number;
  readonly earliest: boolean;

  constructor(code: number, earliest: boolean) {
    if (!Number.isInteger(code) || code < 0) {
      throw new UiError("TRELLIS_INVALID_STATE", `TimerHandle: code must be a non-negative integer`);
    }
    this.code = code;
    this.earliest = earliest;
  }

  equals(other: TimerHandle): boolean {
    return this.code === other.code && this.earliest === other.earliest;
  }

  toString(): string {
    return `TimerHandle(${String(this.code)}${this.earliest ? ", earliest" : ""})`;
  }
}

export type TimerEntry = Readonly<{
  time: number;
  id: Id;
  handle: TimerHandle;
}>;

type MutableEntry = {
  time: number;
  readonly id: Id;
  readonly handle: TimerHandle;
  readonly seq: number;
};

export type TimerRequestResult = "added" | "updated" | "kept";

/**
 * Timer entries kept sorted latest-first, so the next to fire sits at the end.
 * Equal fire times fire in request order.
 */
export class TimerQueue {
  private readonly entries: MutableEntry[] = [];
  private readonly frameUpdates = new Map<string, Readonly<{ id: Id; handle: TimerHandle }>>();
  private seq = 0;

  /** Schedule `handle` on `id` at absolute time `time`, merging duplicates. */
  request(id: Id, handle: TimerHandle, time: number): TimerRequestResult {
    const existing = this.entries.find((e) => e.id.equals(id) && e.handle.equals(handle));
    if (existing !== undefined) {
      const keep = handle.earliest ? existing.time <= time : existing.time >= time;
      if (keep) return "kept";
      existing.time = time;
      this.sort();
      return "updated";
    }
    this.entries.push({ time, id, handle, seq: this.seq++ });
    this.sort();
    return "added";
  }

  /** Fire time of the stored entry for `(id, handle)`, if any. */
  lookup(id: Id, handle: TimerHandle): number | undefined {
    return this.entries.find((e) => e.id.equals(id) && e.handle.equals(handle))?.time;
  }

  /** Earliest pending fire time. */
  nextResume(): number | undefined {
    return this.entries[this.entries.length - 1]?.time;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Remove and return every entry due at `now`, in firing order. */
  takeDue(now: number): TimerEntry[] {
    const due: TimerEntry[] = [];
    for (;;) {
      const last = this.entries[this.entries.length - 1];
      if (last === undefined || last.time > now) break;
      this.entries.pop();
      due.push(Object.freeze({ time: last.time, id: last.id, handle: last.handle }));
    }
    return due;
  }

  requestFrame(id: Id, handle: TimerHandle): void {
    this.frameUpdates.set(`${id.toString()}/${String(handle.code)}`, Object.freeze({ id, handle }));
  }

  hasFrameUpdates(): boolean {
    return this.frameUpdates.size > 0;
  }

  /** Consume the frame-aligned set; called once per rendered frame. */
  takeFrameUpdates(): Array<Readonly<{ id: Id; handle: TimerHandle }>> {
    const out = [...this.frameUpdates.values()];
    this.frameUpdates.clear();
    return out;
  }

  private sort(): void {
    this.entries.sort((a, b) => b.time - a.time || b.seq - a.seq);
  }
}
