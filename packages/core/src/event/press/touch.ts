/**
 * packages/core/src/event/press/touch.ts - Per-finger grabs.
 *
 * Why: Each touch identifier owns at most one grab, independent of the
 * others. Drag grabs sample velocity for kinetic scrolling; pan grabs feed
 * the shared pan set.
 */

import type { Id } from "../../id/id.js";
import { type GrabMode, type Vec2, isPanMode } from "../types.js";
import { type PanSlot, VelocitySampler } from "./pan.js";

export const MAX_TOUCHES = 10;
/** Drag grabs that can sample velocity at once. */
export const VELOCITY_LEN = 2;

export type TouchGrab = {
  readonly touchId: number;
  readonly startId: Id;
  depress: Id | undefined;
  /** Widget currently under the finger. */
  over: Id | undefined;
  lastPosition: Vec2;
  mode: GrabMode;
  pan: PanSlot | undefined;
  velocity: VelocitySampler | undefined;
};

const MODE_RANK: Readonly<Record<GrabMode, number>> = Object.freeze({
  click: 0,
  drag: 1,
  panOnly: 2,
  panRotate: 3,
  panScale: 4,
  panFull: 5,
});

export function strongerMode(a: GrabMode, b: GrabMode): GrabMode {
  return MODE_RANK[a] >= MODE_RANK[b] ? a : b;
}

export class TouchState {
  readonly grabs: TouchGrab[] = [];
  private readonly samplers: VelocitySampler[] = Array.from(
    { length: VELOCITY_LEN },
    () => new VelocitySampler(),
  );

  get(touchId: number): TouchGrab | undefined {
    return this.grabs.find((g) => g.touchId === touchId);
  }

  indexOf(touchId: number): number {
    return this.grabs.findIndex((g) => g.touchId === touchId);
  }

  isFull(): boolean {
    return this.grabs.length >= MAX_TOUCHES;
  }

  /** A free velocity sampler, cleared, or undefined when all are taken. */
  claimSampler(): VelocitySampler | undefined {
    for (const sampler of this.samplers) {
      if (this.grabs.some((g) => g.velocity === sampler)) continue;
      sampler.clear();
      return sampler;
    }
    return undefined;
  }

  removeAt(index: number): TouchGrab | undefined {
    const [grab] = this.grabs.splice(index, 1);
    return grab;
  }

  /**
   * Point a click grab's depress target at `over` while it lies inside the
   * grabbing widget. Returns whether the target changed.
   */
  static updateClickDepress(grab: TouchGrab): boolean {
    if (grab.mode !== "click") return false;
    const next =
      grab.over !== undefined && grab.startId.isAncestorOf(grab.over) ? grab.startId : undefined;
    if (next === grab.depress || (next !== undefined && next.equals(grab.depress))) return false;
    grab.depress = next;
    return true;
  }

  static isPan(grab: TouchGrab): boolean {
    return isPanMode(grab.mode);
  }
}
