/**
 * packages/core/src/event/focus.ts - Navigation, selection, key and IME focus.
 *
 * Why: Four focus concepts nest: key focus implies selection focus, which
 * implies navigation focus. Requests are staged here and committed by the
 * flush (navigation first, then selection), so a burst of requests within
 * one frame settles on a single transition.
 */

import type { Id } from "../id/id.js";
import type { FocusSource, ImePurpose, NavAdvance, Rect } from "./types.js";

/* --- Staged transitions --- */

export type PendingNavFocus =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "set"; target: Id | undefined; source: FocusSource }>
  | Readonly<{ kind: "next"; target: Id | undefined; advance: NavAdvance; source: FocusSource }>;

export type PendingSelFocus =
  | Readonly<{ kind: "idle" }>
  | Readonly<{
      kind: "staged";
      target: Id | undefined;
      keyFocus: boolean;
      ime: ImePurpose | undefined;
      source: FocusSource;
    }>;

export const NAV_NONE: PendingNavFocus = Object.freeze({ kind: "none" });
export const SEL_IDLE: PendingSelFocus = Object.freeze({ kind: "idle" });

/** Target of a staged transition, if it names one. */
export function pendingTarget(p: PendingNavFocus | PendingSelFocus): Id | undefined {
  return p.kind === "none" || p.kind === "idle" ? undefined : p.target;
}

/* --- Committed state --- */

export class FocusState {
  nav: Id | undefined;
  /** Receives commands nobody else used. First registrant per configure wins. */
  fallback: Id | undefined;
  sel: Id | undefined;
  /** Qualifies `sel`; meaningless without it. */
  keyFocus = false;
  ime: ImePurpose | undefined;
  imeFocus = false;
  imeCursorArea: Rect | undefined;

  pendingNav: PendingNavFocus = NAV_NONE;
  pendingSel: PendingSelFocus = SEL_IDLE;

  keyFocusId(): Id | undefined {
    return this.keyFocus ? this.sel : undefined;
  }

  imeFocusId(): Id | undefined {
    return this.imeFocus ? this.sel : undefined;
  }

  takePendingNav(): PendingNavFocus {
    const p = this.pendingNav;
    this.pendingNav = NAV_NONE;
    return p;
  }

  takePendingSel(): PendingSelFocus {
    const p = this.pendingSel;
    this.pendingSel = SEL_IDLE;
    return p;
  }
}
