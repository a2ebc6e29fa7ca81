/**
 * packages/core/src/event/keys.ts - Keyboard routing helpers.
 */

import type { Id } from "../id/id.js";
import { type Command, suitableForSelFocus } from "./command.js";
import type { Key, KeyEvent, Modifiers } from "./types.js";

export function isNamedKey(key: Key, name: string): boolean {
  return key.kind === "named" && key.name === name;
}

export type CommandRouting = Readonly<{
  sel: Id | undefined;
  keyFocus: boolean;
  nav: Id | undefined;
  popup: Id | undefined;
  fallback: Id | undefined;
  root: Id;
  mods: Modifiers;
}>;

/**
 * Widgets offered a matched command, in order, each at most once:
 * selection holder, navigation holder, top popup, then the fallback (or the
 * root when none is registered).
 */
export function commandTargets(cmd: Command, r: CommandRouting): Id[] {
  const out: Id[] = [];
  const offer = (id: Id | undefined): void => {
    if (id === undefined || out.some((o) => o.equals(id))) return;
    out.push(id);
  };
  if (r.keyFocus || suitableForSelFocus(cmd)) offer(r.sel);
  if (!r.mods.alt) offer(r.nav);
  offer(r.popup);
  offer(r.fallback ?? r.root);
  return out;
}

function isControlText(text: string): boolean {
  for (const ch of text) {
    const c = ch.codePointAt(0) ?? 0;
    if (c < 0x20 || c === 0x7f) return true;
  }
  return false;
}

/**
 * Whether a key event's text must not be inserted: command chords and
 * control characters (Backspace, Escape, Tab) produce no input.
 */
export function shouldDropKeyText(event: KeyEvent, mods: Modifiers): boolean {
  if (event.text === undefined) return false;
  return mods.ctrl || mods.alt || mods.meta || isControlText(event.text);
}

/** The event without its text. */
export function withoutText(event: KeyEvent): KeyEvent {
  return Object.freeze({
    logicalKey: event.logicalKey,
    physicalKey: event.physicalKey,
    state: event.state,
    repeat: event.repeat,
  });
}
