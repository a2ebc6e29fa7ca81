/**
 * packages/core/src/event/press/mouse.ts - Mouse hover, click counting and grab.
 *
 * Why: There is one mouse per window and at most one mouse grab. This module
 * keeps that state; the dispatcher decides which events it turns into.
 */

import type { Id } from "../../id/id.js";
import {
  COORD_ZERO,
  type Coord,
  type CursorIcon,
  type GrabMode,
  type MouseButton,
} from "../types.js";
import type { PanSlot } from "./pan.js";

/** Button value used when no real button applies (motion without a grab). */
export const FAKE_MOUSE_BUTTON: MouseButton = "other";

export type MouseGrab = {
  readonly button: MouseButton;
  repetitions: number;
  readonly startId: Id;
  /** Widget drawn depressed; for click grabs this follows the hover. */
  depress: Id | undefined;
  mode: GrabMode;
  /** Slot in the pan grab set, for pan modes. */
  pan: PanSlot | undefined;
};

export class MouseState {
  hover: Id | undefined;
  hoverIcon: CursorIcon = "default";
  lastCoord: Coord = COORD_ZERO;
  /** Set by cursor motion, cleared when the cursor leaves the window. */
  inWindow = false;
  grab: MouseGrab | undefined;

  private oldHoverIcon: CursorIcon = "default";
  private lastClickButton: MouseButton = FAKE_MOUSE_BUTTON;
  private lastClickRepetitions = 0;
  private lastClickTimeout = 0;

  /**
   * Count a button press. Presses of the same button before the timeout
   * runs out continue the sequence.
   */
  registerPress(button: MouseButton, now: number, timeoutMs: number): number {
    if (button !== this.lastClickButton || this.lastClickTimeout < now) {
      this.lastClickButton = button;
      this.lastClickRepetitions = 0;
    }
    this.lastClickRepetitions += 1;
    this.lastClickTimeout = now + timeoutMs;
    return this.lastClickRepetitions;
  }

  /** Motion, wheel and leaving the window end a click sequence. */
  resetRepetitions(): void {
    this.lastClickButton = FAKE_MOUSE_BUTTON;
  }

  /**
   * Point a click grab's depress target at the hover, when the hover lies in
   * the grabbing widget. Returns whether the target changed.
   */
  updateClickDepress(): boolean {
    const grab = this.grab;
    if (grab === undefined || grab.mode !== "click") return false;
    const next =
      this.hover !== undefined && grab.startId.isAncestorOf(this.hover) ? grab.startId : undefined;
    if (next === grab.depress || (next !== undefined && next.equals(grab.depress))) return false;
    grab.depress = next;
    return true;
  }

  /** The icon to apply, when it changed and no grab controls the cursor. */
  takeHoverIconChange(): CursorIcon | undefined {
    let icon: CursorIcon | undefined;
    if (this.hoverIcon !== this.oldHoverIcon && this.grab === undefined) icon = this.hoverIcon;
    this.oldHoverIcon = this.hoverIcon;
    return icon;
  }
}
