/**
 * packages/core/src/event/command.ts - Abstract keyboard commands.
 *
 * Why: Widgets react to commands (activate, copy, navNext) rather than raw
 * keys, so the shortcut table decides which keystroke means what and the same
 * widget code serves accessibility requests and synthetic sends.
 */

export const COMMANDS = [
  "escape",
  "activate",
  "enter",
  "space",
  "tab",
  "viewUp",
  "viewDown",
  "left",
  "right",
  "up",
  "down",
  "wordLeft",
  "wordRight",
  "home",
  "end",
  "docHome",
  "docEnd",
  "pageUp",
  "pageDown",
  "snapshot",
  "scrollLock",
  "pause",
  "insert",
  "delete",
  "delBack",
  "delWord",
  "delWordBack",
  "deselect",
  "selectAll",
  "find",
  "findReplace",
  "findNext",
  "findPrevious",
  "bold",
  "italic",
  "underline",
  "link",
  "cut",
  "copy",
  "paste",
  "undo",
  "redo",
  "new",
  "open",
  "save",
  "print",
  "navNext",
  "navPrevious",
  "navParent",
  "navDown",
  "tabNew",
  "tabNext",
  "tabPrevious",
  "help",
  "rename",
  "refresh",
  "debug",
  "spellCheck",
  "contextMenu",
  "menu",
  "fullscreen",
  "close",
  "exit",
] as const;

export type Command = (typeof COMMANDS)[number];

const COMMAND_SET: ReadonlySet<string> = new Set(COMMANDS);

export function isCommand(v: unknown): v is Command {
  return typeof v === "string" && COMMAND_SET.has(v);
}

/**
 * Commands offered to the selection-focus holder even without key focus.
 */
export function suitableForSelFocus(cmd: Command): boolean {
  return cmd === "escape" || cmd === "cut" || cmd === "copy" || cmd === "deselect";
}

export type Direction = "left" | "right" | "up" | "down";

export function commandDirection(cmd: Command): Direction | undefined {
  switch (cmd) {
    case "left":
    case "right":
    case "up":
    case "down":
      return cmd;
    default:
      return undefined;
  }
}
