/**
 * packages/core/src/event/popups.ts - Stack of open popup windows.
 *
 * Why: Popups (menus, combo lists, tooltips) stack: a later popup is taken to
 * be the child of the one below it, so closing one closes everything above
 * it. Each entry remembers the navigation focus it displaced.
 */

import type { Id, WindowId } from "../id/id.js";
import type { PopupDescriptor } from "./node.js";

export type PopupState = {
  readonly windowId: WindowId;
  desc: PopupDescriptor;
  readonly oldNavFocus: Id | undefined;
  /** Set once the platform confirms the first layout. */
  isSized: boolean;
};

export class PopupStack {
  private readonly stack: PopupState[] = [];

  get length(): number {
    return this.stack.length;
  }

  at(index: number): PopupState | undefined {
    return this.stack[index];
  }

  top(): PopupState | undefined {
    return this.stack[this.stack.length - 1];
  }

  /** The top popup, when it has been laid out. */
  topSized(): PopupState | undefined {
    const top = this.top();
    return top?.isSized === true ? top : undefined;
  }

  /** Bottom to top. */
  entries(): readonly PopupState[] {
    return this.stack;
  }

  indexOfWindow(windowId: WindowId): number {
    return this.stack.findIndex((p) => p.windowId === windowId);
  }

  push(state: PopupState): void {
    this.stack.push(state);
  }

  removeAt(index: number): PopupState | undefined {
    const [state] = this.stack.splice(index, 1);
    return state;
  }

  confirmSized(windowId: WindowId): boolean {
    let found = false;
    for (const p of this.stack) {
      if (p.windowId !== windowId) continue;
      p.isSized = true;
      found = true;
    }
    return found;
  }

  /** Whether `id` opened one of the popups. */
  isParent(id: Id): boolean {
    return this.stack.some((p) => p.desc.parent.equals(id));
  }

  /**
   * How many popups, counted from the top, do not cover `id`. The count
   * stops at the first popup whose subtree holds `id`; with no `id` every
   * popup counts.
   */
  countNonAncestorsOf(id: Id | undefined): number {
    let n = 0;
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const p = this.stack[i];
      if (p === undefined) continue;
      if (id !== undefined && p.desc.id.isAncestorOf(id)) break;
      n++;
    }
    return n;
  }
}
