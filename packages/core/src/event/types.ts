/**
 * packages/core/src/event/types.ts - Value types shared by the event core.
 */

/* --- Geometry --- */

/** Integer pixel coordinate in window space. */
export type Coord = Readonly<{ x: number; y: number }>;

/** Floating-point vector; also used as a complex number (re = x, im = y). */
export type Vec2 = Readonly<{ x: number; y: number }>;

export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export const COORD_ZERO: Coord = Object.freeze({ x: 0, y: 0 });
export const VEC2_ZERO: Vec2 = Object.freeze({ x: 0, y: 0 });

export function coord(x: number, y: number): Coord {
  return Object.freeze({ x, y });
}

export function vec2(x: number, y: number): Vec2 {
  return Object.freeze({ x, y });
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}

/* --- Keyboard --- */

export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

export const EMPTY_MODS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export function isEmptyMods(m: Modifiers): boolean {
  return !m.shift && !m.ctrl && !m.alt && !m.meta;
}

export function isOnlyAlt(m: Modifiers): boolean {
  return m.alt && !m.shift && !m.ctrl && !m.meta;
}

/**
 * Logical key: a named key ("Enter", "ArrowLeft", "F3", using the W3C
 * `KeyboardEvent.key` names) or the character the key produces.
 */
export type Key =
  | Readonly<{ kind: "named"; name: string }>
  | Readonly<{ kind: "character"; text: string }>;

/** Physical key position, using W3C `KeyboardEvent.code` names ("KeyA"). */
export type PhysicalKey = string;

export function namedKey(name: string): Key {
  return Object.freeze({ kind: "named", name });
}

export function charKey(text: string): Key {
  return Object.freeze({ kind: "character", text });
}

export function keyToString(key: Key): string {
  return key.kind === "named" ? key.name : key.text;
}

export function sameKey(a: Key, b: Key): boolean {
  if (a.kind === "named") return b.kind === "named" && a.name === b.name;
  return b.kind === "character" && a.text === b.text;
}

export type KeyState = "pressed" | "released";

export type KeyEvent = Readonly<{
  logicalKey: Key;
  physicalKey: PhysicalKey;
  state: KeyState;
  repeat: boolean;
  text?: string;
}>;

/* --- Pointer --- */

export type MouseButton = "left" | "right" | "middle" | "back" | "forward" | "other";

export type CursorIcon =
  | "default"
  | "pointer"
  | "text"
  | "grab"
  | "grabbing"
  | "move"
  | "crosshair"
  | "wait"
  | "not-allowed"
  | "ew-resize"
  | "ns-resize";

/**
 * How a grab reacts to motion.
 *
 * - click: only the final pressEnd is delivered; the depress target follows
 *   whether the pointer is still over the grabbing widget.
 * - drag: motion arrives as pressMove events.
 * - pan modes: motion accumulates into per-frame pan transforms.
 */
export type GrabMode = "click" | "drag" | "panOnly" | "panRotate" | "panScale" | "panFull";

export function isPanMode(mode: GrabMode): boolean {
  return mode === "panOnly" || mode === "panRotate" || mode === "panScale" || mode === "panFull";
}

/* --- Focus --- */

/** What caused a focus change. Widgets may respond differently to each. */
export type FocusSource = "pointer" | "key" | "synthetic";

/**
 * Direction of a structural navigation search.
 *
 * `allowFocus` (true when a reference widget exists) lets the search return
 * the reference itself when it is navigable and was not previously focused.
 */
export type NavAdvance =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "forward"; allowFocus: boolean }>
  | Readonly<{ kind: "reverse"; allowFocus: boolean }>;

export type ImePurpose = "normal" | "password" | "terminal";

export type Ime =
  | Readonly<{ kind: "enabled" }>
  | Readonly<{ kind: "preedit"; text: string; cursor: readonly [number, number] | undefined }>
  | Readonly<{ kind: "commit"; text: string }>
  | Readonly<{ kind: "deleteSurrounding"; beforeBytes: number; afterBytes: number }>
  | Readonly<{ kind: "disabled" }>;

/* --- Scrolling --- */

export type ScrollDelta =
  | Readonly<{ kind: "lines"; x: number; y: number }>
  | Readonly<{ kind: "pixels"; x: number; y: number }>;

/**
 * Side value a widget sets while handling an event to ask its ancestors to
 * scroll. Scroll views act on it as the dispatch unwinds.
 */
export type Scroll =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "scrolled" }>
  | Readonly<{ kind: "offset"; delta: Vec2 }>
  | Readonly<{ kind: "rect"; rect: Rect }>;

export const SCROLL_NONE: Scroll = Object.freeze({ kind: "none" });

/* --- Handler results --- */

/** Whether a handler consumed an event. */
export type IsUsed = "used" | "unused";

export const USED: IsUsed = "used";
export const UNUSED: IsUsed = "unused";

/* --- Actions --- */

/**
 * Window-level actions accumulated during dispatch and taken by the flush.
 * Bit flags: combine with `|`.
 */
export type Action = number;

export const ACTION_EMPTY = 0;
export const ACTION_REDRAW = 1 << 0;
export const ACTION_RESIZE = 1 << 1;
export const ACTION_REGION_MOVED = 1 << 2;
export const ACTION_SET_RECT = 1 << 3;
export const ACTION_SCROLLED = 1 << 4;
export const ACTION_RECONFIGURE = 1 << 5;
export const ACTION_UPDATE = 1 << 6;
export const ACTION_CLOSE = 1 << 7;
export const ACTION_EXIT = 1 << 8;

export function hasAction(action: Action, flag: Action): boolean {
  return (action & flag) === flag;
}
