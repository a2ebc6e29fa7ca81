/**
 * packages/core/src/event/press/pan.ts - Pan grabs and the per-frame transform.
 *
 * Why: A pan grab accumulates pointer motion and delivers it once per frame
 * as a complex-number transform (new = alpha * old + delta), so content can
 * follow one finger (translate) or two (rotate and scale). Each grab holds
 * one slot per pointer; only the first two slots feed the transform.
 */

import type { Id } from "../../id/id.js";
import { type GrabMode, type Vec2, VEC2_ZERO, vec2 } from "../types.js";

/** Simultaneous pan grabs (distinct widgets). */
export const MAX_PANS = 2;
/** Pointers per pan grab that contribute to the transform. */
export const MAX_PAN_POINTERS = 2;

export const PAN_IDENTITY_ALPHA: Vec2 = Object.freeze({ x: 1, y: 0 });

/* --- Complex arithmetic over Vec2 (re = x, im = y) --- */

export function cAdd(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x + b.x, a.y + b.y);
}

export function cSub(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x - b.x, a.y - b.y);
}

export function cMul(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x * b.x - a.y * b.y, a.x * b.y + a.y * b.x);
}

export function cDiv(a: Vec2, b: Vec2): Vec2 {
  const d = b.x * b.x + b.y * b.y;
  return vec2((a.x * b.x + a.y * b.y) / d, (a.y * b.x - a.x * b.y) / d);
}

export function cScale(a: Vec2, k: number): Vec2 {
  return vec2(a.x * k, a.y * k);
}

export function sumSquare(a: Vec2): number {
  return a.x * a.x + a.y * a.y;
}

export type PanTransform = Readonly<{ alpha: Vec2; delta: Vec2 }>;

/**
 * Transform mapping old pointer positions `p1`, `p2` onto new ones `q1`,
 * `q2`. With a single pointer, or in panOnly mode, only translation applies.
 */
export function panTransform(
  mode: GrabMode,
  p1: Vec2,
  q1: Vec2,
  second?: Readonly<{ p2: Vec2; q2: Vec2 }>,
): PanTransform {
  if (mode === "panOnly" || second === undefined) {
    return Object.freeze({ alpha: PAN_IDENTITY_ALPHA, delta: cSub(q1, p1) });
  }
  const { p2, q2 } = second;
  const pd = cSub(p2, p1);
  const qd = cSub(q2, q1);

  let alpha: Vec2;
  switch (mode) {
    case "panFull":
      alpha = cDiv(qd, pd);
      break;
    case "panScale":
      alpha = vec2(Math.sqrt(sumSquare(qd) / sumSquare(pd)), 0);
      break;
    case "panRotate": {
      const a = cDiv(qd, pd);
      alpha = cScale(a, 1 / Math.sqrt(sumSquare(a)));
      break;
    }
    default:
      alpha = PAN_IDENTITY_ALPHA;
  }

  // Average the translation implied by both pointers
  const delta = cScale(cAdd(cSub(q1, cMul(alpha, p1)), cSub(q2, cMul(alpha, p2))), 0.5);
  return Object.freeze({ alpha, delta });
}

export function isIdentityTransform(t: PanTransform): boolean {
  return t.alpha.x === 1 && t.alpha.y === 0 && t.delta.x === 0 && t.delta.y === 0;
}

export function isFiniteTransform(t: PanTransform): boolean {
  return (
    Number.isFinite(t.alpha.x) &&
    Number.isFinite(t.alpha.y) &&
    Number.isFinite(t.delta.x) &&
    Number.isFinite(t.delta.y)
  );
}

/* --- Grab bookkeeping --- */

/** One pointer's contribution: position at the last frame and now. */
export type PanSlot = {
  old: Vec2;
  cur: Vec2;
};

type PanGrab = {
  readonly id: Id;
  readonly mode: GrabMode;
  readonly slots: PanSlot[];
};

export type PanFrame = Readonly<{ id: Id; transform: PanTransform }>;

export class PanGrabs {
  private readonly grabs: PanGrab[] = [];

  get size(): number {
    return this.grabs.length;
  }

  /**
   * Join (or open) the pan grab of `id` with a pointer at `p`. Returns the
   * pointer's slot, or undefined when MAX_PANS grabs are already open.
   */
  add(id: Id, mode: GrabMode, p: Vec2): PanSlot | undefined {
    const slot: PanSlot = { old: p, cur: p };
    const existing = this.grabs.find((g) => g.id.equals(id));
    if (existing !== undefined) {
      existing.slots.push(slot);
      return slot;
    }
    if (this.grabs.length >= MAX_PANS) return undefined;
    this.grabs.push({ id, mode, slots: [slot] });
    return slot;
  }

  /** Drop a pointer; the grab closes with its last pointer. */
  remove(slot: PanSlot): void {
    for (let gi = 0; gi < this.grabs.length; gi++) {
      const grab = this.grabs[gi];
      if (grab === undefined) continue;
      const index = grab.slots.indexOf(slot);
      if (index < 0) continue;
      grab.slots.splice(index, 1);
      if (grab.slots.length === 0) {
        this.grabs.splice(gi, 1);
        return;
      }
      // A pointer moving into the active pair starts from where it is now
      const promoted = grab.slots[MAX_PAN_POINTERS - 1];
      if (index < MAX_PAN_POINTERS && promoted !== undefined) {
        promoted.old = promoted.cur;
      }
      return;
    }
  }

  /**
   * Compute and consume this frame's motion. Returns the transforms worth
   * sending: finite and not the identity.
   */
  takeFrame(): PanFrame[] {
    const out: PanFrame[] = [];
    for (const grab of this.grabs) {
      const s1 = grab.slots[0];
      if (s1 === undefined) continue;
      const s2 = grab.slots[1];
      const transform = panTransform(
        grab.mode,
        s1.old,
        s1.cur,
        s2 === undefined ? undefined : { p2: s2.old, q2: s2.cur },
      );
      for (const slot of grab.slots) slot.old = slot.cur;
      if (isFiniteTransform(transform) && !isIdentityTransform(transform)) {
        out.push(Object.freeze({ id: grab.id, transform }));
      }
    }
    return out;
  }
}

/* --- Velocity sampling --- */

const VELOCITY_SAMPLES = 8;

type VelocitySample = Readonly<{ time: number; delta: Vec2 }>;

/**
 * Recent motion of a drag grab, for kinetic scrolling after release.
 */
export class VelocitySampler {
  private readonly samples: VelocitySample[] = [];

  clear(): void {
    this.samples.length = 0;
  }

  push(time: number, delta: Vec2): void {
    this.samples.push(Object.freeze({ time, delta }));
    if (this.samples.length > VELOCITY_SAMPLES) this.samples.shift();
  }

  /** Pixels per second over the samples no older than `timeoutMs`. */
  velocity(now: number, timeoutMs: number): Vec2 {
    if (timeoutMs <= 0) return VEC2_ZERO;
    let x = 0;
    let y = 0;
    for (const s of this.samples) {
      if (now - s.time > timeoutMs) continue;
      x += s.delta.x;
      y += s.delta.y;
    }
    const perSecond = 1000 / timeoutMs;
    return vec2(x * perSecond, y * perSecond);
  }
}
