/**
 * packages/core/src/event/accessibility.ts - Accessibility action requests.
 *
 * Why: Assistive technology asks for actions (click, focus, scroll, set a
 * value) on a widget by Id. Each request is turned into the same events and
 * messages native input produces, so widgets need no separate code path.
 */

import { type Logger, debugAssert } from "../debug/logger.js";
import type { Id } from "../id/id.js";
import type { Command } from "./command.js";
import {
  DecrementStep,
  Erased,
  IncrementStep,
  SetScrollOffset,
  SetValueF64,
  SetValueText,
} from "./messages.js";
import type { Rect, ScrollDelta, Vec2 } from "./types.js";

export type AccessAction =
  | "click"
  | "focus"
  | "blur"
  | "collapse"
  | "expand"
  | "customAction"
  | "decrement"
  | "increment"
  | "hideTooltip"
  | "showTooltip"
  | "replaceSelectedText"
  | "scrollDown"
  | "scrollLeft"
  | "scrollRight"
  | "scrollUp"
  | "scrollIntoView"
  | "scrollToPoint"
  | "setScrollOffset"
  | "setTextSelection"
  | "setSequentialFocusNavigationStartingPoint"
  | "setValue"
  | "showContextMenu";

export type AccessActionData =
  | Readonly<{ kind: "value"; value: string }>
  | Readonly<{ kind: "numericValue"; value: number }>
  | Readonly<{ kind: "scrollToPoint"; point: Vec2 }>
  | Readonly<{ kind: "setScrollOffset"; offset: Vec2 }>;

export type AccessActionRequest = Readonly<{
  target: Id;
  action: AccessAction;
  data?: AccessActionData;
}>;

export type AccessEffect =
  | Readonly<{ kind: "ignore" }>
  | Readonly<{ kind: "command"; command: Command }>
  | Readonly<{ kind: "focus" }>
  | Readonly<{ kind: "scroll"; delta: ScrollDelta }>
  | Readonly<{ kind: "message"; msg: Erased }>
  | Readonly<{ kind: "scrollRect"; rect: Rect }>;

const IGNORE: AccessEffect = Object.freeze({ kind: "ignore" });

function lines(x: number, y: number): AccessEffect {
  return Object.freeze<AccessEffect>({ kind: "scroll", delta: { kind: "lines", x, y } });
}

function message(msg: object): AccessEffect {
  return Object.freeze({ kind: "message", msg: new Erased(msg) });
}

/**
 * What a request does to the target. `rect` is the target's rectangle, used
 * by scrollIntoView. A payload that does not fit its action is ignored.
 */
export function resolveAccessAction(
  request: AccessActionRequest,
  rect: Rect | undefined,
  logger: Logger,
): AccessEffect {
  const data = request.data;
  const mismatch = (): AccessEffect => {
    debugAssert(logger, false, `access action ${request.action}: unexpected data ${data?.kind ?? "none"}`);
    return IGNORE;
  };

  switch (request.action) {
    case "click":
      return { kind: "command", command: "activate" };
    case "focus":
      return { kind: "focus" };
    case "increment":
      return message(new IncrementStep());
    case "decrement":
      return message(new DecrementStep());
    case "scrollUp":
      return lines(0, -1);
    case "scrollDown":
      return lines(0, 1);
    case "scrollLeft":
      return lines(-1, 0);
    case "scrollRight":
      return lines(1, 0);
    case "scrollIntoView":
      if (data !== undefined) return mismatch();
      return rect === undefined ? IGNORE : { kind: "scrollRect", rect };
    case "scrollToPoint":
      if (data?.kind !== "scrollToPoint") return mismatch();
      return { kind: "scrollRect", rect: { x: data.point.x, y: data.point.y, w: 0, h: 0 } };
    case "setScrollOffset":
      if (data?.kind !== "setScrollOffset") return mismatch();
      return message(new SetScrollOffset(data.offset.x, data.offset.y));
    case "setValue":
      if (data?.kind === "value") return message(new SetValueText(data.value));
      if (data?.kind === "numericValue") return message(new SetValueF64(data.value));
      return mismatch();
    default:
      return IGNORE;
  }
}
