/**
 * packages/core/src/event/event.ts - Events delivered to widgets.
 *
 * Why: One tagged union covers everything a widget's `handleEvent` may see,
 * whether it came from the platform, from a grab, from a timer or from a
 * focus change. Widgets switch on `kind`.
 */

import type { Id, WindowId } from "../id/id.js";
import type { Command } from "./command.js";
import type { TimerHandle } from "./timers.js";
import type {
  Coord,
  FocusSource,
  GrabMode,
  Ime,
  KeyEvent,
  MouseButton,
  PhysicalKey,
  ScrollDelta,
  Vec2,
} from "./types.js";

/**
 * Where a press came from.
 *
 * For mouse presses `repetitions` counts clicks in a row (2 for a double
 * click). Cursor motion forwarded to a popup without a grab uses button
 * "other" and 0 repetitions.
 */
export type PressSource =
  | Readonly<{ kind: "mouse"; button: MouseButton; repetitions: number }>
  | Readonly<{ kind: "touch"; touchId: number }>;

export function mouseSource(button: MouseButton, repetitions: number): PressSource {
  return Object.freeze({ kind: "mouse", button, repetitions });
}

export function touchSource(touchId: number): PressSource {
  return Object.freeze({ kind: "touch", touchId });
}

/** Left mouse button or any touch. */
export function isPrimarySource(source: PressSource): boolean {
  return source.kind === "touch" || source.button === "left";
}

export function isSecondarySource(source: PressSource): boolean {
  return source.kind === "mouse" && source.button === "right";
}

export function sourceRepetitions(source: PressSource): number {
  return source.kind === "mouse" ? source.repetitions : 1;
}

/**
 * A press, with the widget currently under the pointer (`id`) and the
 * current coordinate.
 */
export type Press = Readonly<{
  source: PressSource;
  id: Id | undefined;
  coord: Coord;
}>;

export type Event =
  | Readonly<{ kind: "command"; command: Command; code: PhysicalKey | undefined }>
  | Readonly<{ kind: "key"; event: KeyEvent; isSynthetic: boolean }>
  | Readonly<{ kind: "ime"; ime: Ime }>
  | Readonly<{ kind: "scroll"; delta: ScrollDelta }>
  /** Complex-number transform: new = alpha * old + delta. */
  | Readonly<{ kind: "pan"; alpha: Vec2; delta: Vec2 }>
  | Readonly<{ kind: "cursorMove"; press: Press }>
  | Readonly<{ kind: "pressStart"; press: Press }>
  | Readonly<{ kind: "pressMove"; press: Press; delta: Vec2 }>
  | Readonly<{ kind: "pressEnd"; press: Press; success: boolean; mode: GrabMode }>
  | Readonly<{ kind: "timer"; handle: TimerHandle }>
  | Readonly<{ kind: "popupClosed"; windowId: WindowId }>
  | Readonly<{ kind: "navFocus"; source: FocusSource }>
  | Readonly<{ kind: "lostNavFocus" }>
  | Readonly<{ kind: "selFocus"; source: FocusSource }>
  | Readonly<{ kind: "lostSelFocus" }>
  | Readonly<{ kind: "keyFocus" }>
  | Readonly<{ kind: "lostKeyFocus" }>
  | Readonly<{ kind: "imeFocus" }>
  | Readonly<{ kind: "lostImeFocus" }>
  | Readonly<{ kind: "mouseOver"; hovered: boolean }>;

export type EventKind = Event["kind"];

export function commandEvent(command: Command, code?: PhysicalKey): Event {
  return Object.freeze({ kind: "command", command, code });
}

/**
 * Whether the event still reaches a widget inside a disabled subtree.
 *
 * Events that finish something already started (grab motion, timers, focus
 * loss) pass; everything else is redirected to the disabled ancestor.
 */
export function passWhenDisabled(event: Event): boolean {
  switch (event.kind) {
    case "pan":
    case "pressMove":
    case "pressEnd":
    case "timer":
    case "popupClosed":
    case "lostNavFocus":
    case "lostSelFocus":
    case "lostKeyFocus":
    case "lostImeFocus":
      return true;
    case "mouseOver":
      return !event.hovered;
    default:
      return false;
  }
}

export function describeEvent(event: Event): string {
  switch (event.kind) {
    case "command":
      return `command(${event.command})`;
    case "key":
      return `key(${event.event.state})`;
    case "ime":
      return `ime(${event.ime.kind})`;
    case "pressEnd":
      return `pressEnd(${event.mode}, success=${String(event.success)})`;
    case "timer":
      return `timer(${event.handle.toString()})`;
    case "navFocus":
    case "selFocus":
      return `${event.kind}(${event.source})`;
    case "mouseOver":
      return `mouseOver(${String(event.hovered)})`;
    default:
      return event.kind;
  }
}
