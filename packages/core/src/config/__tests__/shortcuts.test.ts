import { assert, describe, test } from "@trellis-ui/testkit";
import { UiError } from "../../errors.js";
import { EMPTY_MODS, type Modifiers, charKey, namedKey } from "../../event/types.js";
import {
  Shortcuts,
  defaultShortcuts,
  describeShortcut,
  parseShortcut,
  readShortcutTable,
} from "../shortcuts.js";

function mods(m: Partial<Modifiers>): Modifiers {
  return { ...EMPTY_MODS, ...m };
}

describe("default shortcuts", () => {
  const table = defaultShortcuts();

  test("modifier bindings match exactly", () => {
    assert.equal(table.tryMatch(mods({ ctrl: true }), charKey("z")), "undo");
    assert.equal(table.tryMatch(mods({ ctrl: true, shift: true }), charKey("z")), "redo");
    assert.equal(table.tryMatch(mods({ alt: true }), namedKey("F4")), "close");
    assert.equal(table.tryMatch(mods({ ctrl: true }), namedKey("Tab")), "tabNext");
  });

  test("character keys match case-insensitively", () => {
    assert.equal(table.tryMatch(mods({ ctrl: true }), charKey("A")), "selectAll");
  });

  test("named keys fall back to the unmodified table with or without shift", () => {
    assert.equal(table.tryMatch(EMPTY_MODS, namedKey("Tab")), "tab");
    assert.equal(table.tryMatch(mods({ shift: true }), namedKey("Tab")), "tab");
    assert.equal(table.tryMatch(EMPTY_MODS, namedKey("Escape")), "escape");
    assert.equal(table.tryMatch(EMPTY_MODS, namedKey("Backspace")), "delBack");
  });

  test("the fallback does not apply under ctrl, alt or meta", () => {
    assert.equal(table.tryMatch(mods({ alt: true }), namedKey("Tab")), undefined);
    assert.equal(table.tryMatch(mods({ meta: true }), namedKey("Enter")), undefined);
  });

  test("plain characters are not shortcuts", () => {
    assert.equal(table.tryMatch(EMPTY_MODS, charKey("a")), undefined);
  });

  test("returns the same instance on every call", () => {
    assert.equal(defaultShortcuts(), table);
  });
});

describe("parseShortcut", () => {
  test("accepts aliases and normalises the description", () => {
    const parsed = parseShortcut("Shift+Ctrl+Z");
    assert.equal(parsed.ok, true);
    if (!parsed.ok) return;
    assert.equal(describeShortcut(parsed.value), "shift+ctrl+z");

    const esc = parseShortcut("esc");
    assert.equal(esc.ok && describeShortcut(esc.value), "Escape");

    const opt = parseShortcut("option+f4");
    assert.equal(opt.ok && describeShortcut(opt.value), "alt+F4");
  });

  test("binds the plus key with a doubled separator", () => {
    const parsed = parseShortcut("ctrl++");
    assert.equal(parsed.ok && describeShortcut(parsed.value), "ctrl++");
  });

  test("reports error codes", () => {
    const code = (text: string): string | undefined => {
      const r = parseShortcut(text);
      return r.ok ? undefined : r.error.code;
    };
    assert.equal(code("   "), "EMPTY_BINDING");
    assert.equal(code("ctrl+ctrl+a"), "INVALID_MODIFIER");
    assert.equal(code("hyper+a"), "INVALID_MODIFIER");
    assert.equal(code("ctrl"), "INVALID_KEY");
    assert.equal(code("ctrl+bogus"), "INVALID_KEY");
  });
});

describe("Shortcuts.fromTable", () => {
  test("rejects unknown commands", () => {
    assert.throws(
      () => Shortcuts.fromTable({ namedKeys: {}, bindings: { "ctrl+a": "launch" } }),
      (err: unknown) => err instanceof UiError && err.code === "TRELLIS_INVALID_SHORTCUT",
    );
    assert.throws(() => Shortcuts.fromTable({ namedKeys: { Tab: "jump" }, bindings: {} }), UiError);
  });

  test("rejects unparsable bindings", () => {
    assert.throws(() => Shortcuts.fromTable({ namedKeys: {}, bindings: { "ctrl+": "copy" } }), UiError);
  });

  test("a custom table replaces the defaults", () => {
    const t = Shortcuts.fromTable({ namedKeys: { Enter: "activate" }, bindings: { "alt+x": "cut" } });
    assert.equal(t.size, 1);
    assert.equal(t.tryMatch(mods({ alt: true }), charKey("x")), "cut");
    assert.equal(t.tryMatch(EMPTY_MODS, namedKey("Enter")), "activate");
    assert.equal(t.tryMatch(mods({ ctrl: true }), charKey("c")), undefined);
  });
});

describe("readShortcutTable", () => {
  test("validates the raw shape", () => {
    assert.throws(() => readShortcutTable(null), UiError);
    assert.throws(() => readShortcutTable({ namedKeys: {}, bindings: [] }), UiError);
    assert.throws(() => readShortcutTable({ namedKeys: { Tab: 1 }, bindings: {} }), UiError);
    const table = readShortcutTable({ namedKeys: { Tab: "tab" }, bindings: {} });
    assert.deepEqual(table.namedKeys, { Tab: "tab" });
  });
});
