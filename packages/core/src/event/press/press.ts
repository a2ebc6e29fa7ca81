/**
 * packages/core/src/event/press/press.ts - Grab requests from a pressStart.
 *
 * Why: A widget answering `pressStart` claims the pointer with
 * `grab(press, id, mode)`, optionally sets a cursor, and completes the
 * request against the event context, which applies the grab rules.
 */

import type { Id } from "../../id/id.js";
import type { Press } from "../event.js";
import type { EventCx } from "../eventCx.js";
import type { CursorIcon, GrabMode, IsUsed } from "../types.js";

export class GrabBuilder {
  private cursor: CursorIcon | undefined;

  constructor(
    private readonly press: Press,
    private readonly id: Id,
    private readonly mode: GrabMode,
  ) {}

  withIcon(icon: CursorIcon): this {
    this.cursor = icon;
    return this;
  }

  /** Apply the grab. Returns "unused" when it conflicts with an existing grab. */
  withCx(cx: EventCx): IsUsed {
    return cx.grabPress(this.id, this.press.source, this.press.coord, this.mode, this.cursor);
  }
}

export function grab(press: Press, id: Id, mode: GrabMode): GrabBuilder {
  return new GrabBuilder(press, id, mode);
}
