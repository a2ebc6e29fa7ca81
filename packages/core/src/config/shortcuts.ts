/**
 * packages/core/src/config/shortcuts.ts - Keyboard shortcut table.
 *
 * Why: Maps (modifiers, key) pairs to Commands. Bindings are written as
 * human-readable strings like "ctrl+shift+z" and parsed once when the table is
 * built. Unmodified named keys (Enter, arrows, Escape) map to commands through
 * a second table so they match with or without Shift.
 *
 * Format examples:
 *   - Named key: "f1", "escape", "arrowleft"
 *   - With modifiers: "alt+f4", "ctrl+a", "shift+ctrl+z"
 */

import { readFileSync } from "node:fs";
import { UiError } from "../errors.js";
import { type Command, isCommand } from "../event/command.js";
import { type Key, type Modifiers, charKey, keyToString, namedKey } from "../event/types.js";

export type ShortcutParseErrorCode = "EMPTY_BINDING" | "INVALID_KEY" | "INVALID_MODIFIER";

export type ShortcutParseError = Readonly<{
  code: ShortcutParseErrorCode;
  detail: string;
}>;

export type ParsedShortcut = Readonly<{
  key: Key;
  mods: Modifiers;
}>;

export type ParseShortcutResult =
  | Readonly<{ ok: true; value: ParsedShortcut }>
  | Readonly<{ ok: false; error: ShortcutParseError }>;

/** Raw table form: binding string to command name. */
export type ShortcutTable = Readonly<{
  namedKeys: Readonly<Record<string, string>>;
  bindings: Readonly<Record<string, string>>;
}>;

type ModifierName = "shift" | "ctrl" | "alt" | "meta";

const MODIFIER_ALIASES: ReadonlyMap<string, ModifierName> = new Map([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["option", "alt"],
  ["meta", "meta"],
  ["super", "meta"],
  ["cmd", "meta"],
  ["command", "meta"],
]);

const KEY_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  esc: "Escape",
  return: "Enter",
  up: "ArrowUp",
  down: "ArrowDown",
  left: "ArrowLeft",
  right: "ArrowRight",
  pgup: "PageUp",
  pgdn: "PageDown",
  del: "Delete",
  ins: "Insert",
});

function buildNamedKeyIndex(namedKeys: Readonly<Record<string, string>>): Map<string, string> {
  const index = new Map<string, string>();
  for (const name of Object.keys(namedKeys)) {
    index.set(name.toLowerCase(), name);
  }
  for (let n = 1; n <= 24; n++) {
    index.set(`f${String(n)}`, `F${String(n)}`);
  }
  for (const [alias, name] of Object.entries(KEY_ALIASES)) {
    index.set(alias, name);
  }
  return index;
}

function modsKey(mods: Modifiers): string {
  return `${mods.shift ? "S" : "-"}${mods.ctrl ? "C" : "-"}${mods.alt ? "A" : "-"}${mods.meta ? "M" : "-"}`;
}

function keyIndex(key: Key): string {
  return key.kind === "named" ? `n:${key.name}` : `c:${key.text.toLowerCase()}`;
}

function parseWith(text: string, named: ReadonlyMap<string, string>): ParseShortcutResult {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: { code: "EMPTY_BINDING", detail: "empty binding" } };
  }

  const pieces = trimmed.split("+");
  const seen = new Set<ModifierName>();
  let key: Key | undefined;

  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i] ?? "";
    const isLast = i === pieces.length - 1;
    if (piece.length === 0) {
      // "ctrl++" binds the plus key itself
      if (isLast && i > 0 && pieces[i - 1] === "") {
        key = charKey("+");
        break;
      }
      if (isLast || pieces[i + 1] !== "") {
        return {
          ok: false,
          error: { code: "INVALID_KEY", detail: `empty component in "${text}"` },
        };
      }
      continue;
    }

    const lower = piece.toLowerCase();
    const modifier = MODIFIER_ALIASES.get(lower);
    if (modifier !== undefined && !isLast) {
      if (seen.has(modifier)) {
        return {
          ok: false,
          error: { code: "INVALID_MODIFIER", detail: `duplicate modifier "${piece}" in "${text}"` },
        };
      }
      seen.add(modifier);
      continue;
    }
    if (!isLast) {
      return {
        ok: false,
        error: { code: "INVALID_MODIFIER", detail: `"${piece}" is not a valid modifier in "${text}"` },
      };
    }
    if (modifier !== undefined) {
      return {
        ok: false,
        error: {
          code: "INVALID_KEY",
          detail: `modifier "${piece}" cannot be the final key in "${text}"`,
        },
      };
    }

    const name = named.get(lower);
    if (name !== undefined) {
      key = namedKey(name);
    } else if ([...piece].length === 1) {
      key = charKey(lower);
    } else {
      return {
        ok: false,
        error: { code: "INVALID_KEY", detail: `unknown key "${piece}" in "${text}"` },
      };
    }
  }

  if (key === undefined) {
    return { ok: false, error: { code: "INVALID_KEY", detail: `no key found in "${text}"` } };
  }

  const mods: Modifiers = Object.freeze({
    shift: seen.has("shift"),
    ctrl: seen.has("ctrl"),
    alt: seen.has("alt"),
    meta: seen.has("meta"),
  });
  return { ok: true, value: Object.freeze({ key, mods }) };
}

/**
 * Matches keystrokes against a parsed shortcut table.
 */
export class Shortcuts {
  private readonly byMods: ReadonlyMap<string, ReadonlyMap<string, Command>>;
  private readonly namedCommands: ReadonlyMap<string, Command>;
  private readonly namedIndex: ReadonlyMap<string, string>;

  private constructor(
    byMods: ReadonlyMap<string, ReadonlyMap<string, Command>>,
    namedCommands: ReadonlyMap<string, Command>,
    namedIndex: ReadonlyMap<string, string>,
  ) {
    this.byMods = byMods;
    this.namedCommands = namedCommands;
    this.namedIndex = namedIndex;
  }

  /**
   * Build from a raw table. Throws UiError on the first invalid entry.
   */
  static fromTable(table: ShortcutTable): Shortcuts {
    const namedCommands = new Map<string, Command>();
    for (const [name, cmd] of Object.entries(table.namedKeys)) {
      if (!isCommand(cmd)) {
        throw new UiError(
          "TRELLIS_INVALID_SHORTCUT",
          `Shortcuts: unknown command "${cmd}" for key "${name}"`,
        );
      }
      namedCommands.set(name, cmd);
    }

    const namedIndex = buildNamedKeyIndex(table.namedKeys);
    const byMods = new Map<string, Map<string, Command>>();
    for (const [binding, cmd] of Object.entries(table.bindings)) {
      if (!isCommand(cmd)) {
        throw new UiError(
          "TRELLIS_INVALID_SHORTCUT",
          `Shortcuts: unknown command "${cmd}" for binding "${binding}"`,
        );
      }
      const parsed = parseWith(binding, namedIndex);
      if (!parsed.ok) {
        throw new UiError(
          "TRELLIS_INVALID_SHORTCUT",
          `Shortcuts: ${parsed.error.code}: ${parsed.error.detail}`,
        );
      }
      const mk = modsKey(parsed.value.mods);
      let map = byMods.get(mk);
      if (map === undefined) {
        map = new Map();
        byMods.set(mk, map);
      }
      map.set(keyIndex(parsed.value.key), cmd);
    }

    return new Shortcuts(byMods, namedCommands, namedIndex);
  }

  /** Parse a binding string using this table's key names. */
  parse(text: string): ParseShortcutResult {
    return parseWith(text, this.namedIndex);
  }

  /**
   * Find the command bound to `key` under `mods`.
   *
   * Exact modifier sets are tried first. Failing that, when no modifier other
   * than Shift is held, named keys map through the unmodified-key table.
   */
  tryMatch(mods: Modifiers, key: Key): Command | undefined {
    const exact = this.byMods.get(modsKey(mods))?.get(keyIndex(key));
    if (exact !== undefined) return exact;
    if (mods.ctrl || mods.alt || mods.meta) return undefined;
    if (key.kind !== "named") return undefined;
    return this.namedCommands.get(key.name);
  }

  /** Number of modifier-qualified bindings. */
  get size(): number {
    let n = 0;
    for (const map of this.byMods.values()) n += map.size;
    return n;
  }
}

function readRecord(value: unknown, field: string): Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new UiError("TRELLIS_INVALID_SHORTCUT", `Shortcuts: "${field}" must be an object`);
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "string") {
      throw new UiError("TRELLIS_INVALID_SHORTCUT", `Shortcuts: "${field}.${k}" must be a string`);
    }
    out[k] = v;
  }
  return out;
}

/**
 * Validate an untyped table (e.g. parsed JSON).
 */
export function readShortcutTable(raw: unknown): ShortcutTable {
  if (typeof raw !== "object" || raw === null) {
    throw new UiError("TRELLIS_INVALID_SHORTCUT", "Shortcuts: table must be an object");
  }
  const namedKeys = readRecord(Reflect.get(raw, "namedKeys"), "namedKeys");
  const bindings = readRecord(Reflect.get(raw, "bindings"), "bindings");
  return Object.freeze({ namedKeys, bindings });
}

let defaults: Shortcuts | undefined;

/**
 * The built-in table, loaded from shortcuts.json on first use.
 */
export function defaultShortcuts(): Shortcuts {
  if (defaults === undefined) {
    const text = readFileSync(new URL("./shortcuts.json", import.meta.url), "utf8");
    const raw: unknown = JSON.parse(text);
    defaults = Shortcuts.fromTable(readShortcutTable(raw));
  }
  return defaults;
}

/** Parse a binding against the built-in key names. */
export function parseShortcut(text: string): ParseShortcutResult {
  return defaultShortcuts().parse(text);
}

export function describeShortcut(shortcut: ParsedShortcut): string {
  const parts: string[] = [];
  if (shortcut.mods.shift) parts.push("shift");
  if (shortcut.mods.ctrl) parts.push("ctrl");
  if (shortcut.mods.alt) parts.push("alt");
  if (shortcut.mods.meta) parts.push("meta");
  parts.push(keyToString(shortcut.key));
  return parts.join("+");
}
