import { assert, describe, test } from "@trellis-ui/testkit";
import { Id } from "../../id/id.js";
import { TestInputBuilder, TestNode, createTestWindow, keyEvent } from "../../testing/index.js";
import type { Journal } from "../../testing/index.js";
import { commandTargets, shouldDropKeyText, withoutText } from "../keys.js";
import { ACTION_CLOSE, EMPTY_MODS, USED, UNUSED, charKey, namedKey } from "../types.js";

/**
 * root
 *  ├─ A #0   access key "A"
 *  ├─ B #1   access key "b", navigable
 *  └─ P #2   overlay with its own alt-bypass layer
 *      └─ M #2.0   access key "b"
 */
function keyboardTree(opts: { eatKeys?: boolean } = {}) {
  const journal: Journal = [];
  const a = new TestNode("A", {
    journal,
    onConfigure: (cx, node) => cx.addAccelKeys(node.id, [charKey("A")]),
  });
  const b = new TestNode("B", {
    navigable: true,
    journal,
    onConfigure: (cx, node) => cx.addAccelKeys(node.id, [charKey("b")]),
    onEvent: (_cx, event) => (event.kind === "key" && opts.eatKeys === true ? USED : UNUSED),
  });
  const m = new TestNode("M", {
    journal,
    onConfigure: (cx, node) => cx.addAccelKeys(node.id, [charKey("b")]),
  });
  const p = new TestNode("P", {
    overlay: true,
    children: [m],
    onConfigure: (cx, node) => cx.newAccelLayer(node.id, true),
  });
  const root = new TestNode("root", { children: [a, b, p] });
  return { root, a, b, p, m, journal };
}

describe("access keys", () => {
  test("Alt+key activates, focuses and depresses the bound widget", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);

    new TestInputBuilder().modifiers({ alt: true }).key("b", "pressed").applyTo(win);
    assert.equal(win.showAccessLabels(), true);
    assert.deepEqual(t.journal, ["B:command(activate)"]);
    assert.equal(win.isDepressed(t.b.id), true);
    const cmd = t.b.events.at(-1);
    assert.equal(cmd?.kind === "command" ? cmd.code : undefined, "KeyB");

    new TestInputBuilder().key("b", "released").applyTo(win);
    assert.equal(win.isDepressed(t.b.id), false);
    win.flushPending();
    assert.equal(win.hasNavFocus(t.b.id), true);
  });

  test("bindings match case-insensitively and need Alt", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);

    new TestInputBuilder().pressKey("a").applyTo(win);
    assert.deepEqual(t.journal, []);

    new TestInputBuilder().modifiers({ alt: true }).pressKey("a").applyTo(win);
    assert.deepEqual(t.journal, ["A:command(activate)"]);
  });

  test("an open popup's layer shadows the window and takes bare keys", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);
    win.addPopup({ id: t.p.id, parent: t.b.id });

    new TestInputBuilder().modifiers({ alt: true }).pressKey("b").applyTo(win);
    new TestInputBuilder().modifiers({}).pressKey("b").applyTo(win);
    assert.deepEqual(t.journal, ["M:command(activate)", "M:command(activate)"]);
    assert.equal(win.popupCount(), 1);
  });

  test("a key bound outside the popup closes it", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);
    win.addPopup({ id: t.p.id, parent: t.b.id });

    new TestInputBuilder().modifiers({ alt: true }).pressKey("a").applyTo(win);
    assert.deepEqual(t.journal, ["A:command(activate)"]);
    assert.equal(win.popupCount(), 0);
  });
});

describe("key focus", () => {
  test("the key focus holder sees keys first, with text", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);
    win.requestCharFocus(t.b.id, "key");
    win.flushPending();
    t.journal.length = 0;

    new TestInputBuilder().pressKey("x").applyTo(win);
    assert.deepEqual(t.journal, ["B:key(pressed)", "B:key(released)"]);
    const first = t.b.events.at(-2);
    assert.equal(first?.kind === "key" ? first.event.text : undefined, "x");
  });

  test("chords lose their text and fall through to shortcuts", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);
    win.requestCharFocus(t.b.id, "key");
    win.flushPending();
    t.journal.length = 0;

    new TestInputBuilder().modifiers({ ctrl: true }).key("c", "pressed").applyTo(win);
    assert.deepEqual(t.journal, ["B:key(pressed)", "B:command(copy)"]);
    const key = t.b.events.at(-2);
    assert.equal(key?.kind === "key" ? "text" in key.event : undefined, false);
  });

  test("a used key is not routed further", () => {
    const t = keyboardTree({ eatKeys: true });
    const { win } = createTestWindow(t.root);
    win.requestCharFocus(t.b.id, "key");
    win.flushPending();
    t.journal.length = 0;

    new TestInputBuilder().pressKey("Tab").applyTo(win);
    win.flushPending();
    assert.deepEqual(t.journal, ["B:key(pressed)", "B:key(released)"]);
    assert.equal(win.hasNavFocus(t.b.id), true);
  });

  test("synthetic keys reach the holder but start nothing", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);

    new TestInputBuilder().key("Tab", "pressed", { isSynthetic: true }).applyTo(win);
    win.flushPending();
    assert.equal(win.navFocus(), undefined);
  });
});

describe("commands", () => {
  test("commands go to the navigation focus, but not under Alt", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);
    win.setNavFocus(t.b.id, "key");
    win.flushPending();
    t.journal.length = 0;

    new TestInputBuilder().pressKey("Enter").applyTo(win);
    new TestInputBuilder().modifiers({ alt: true }).pressKey("ArrowLeft").applyTo(win);
    assert.deepEqual(t.journal, ["B:command(enter)"]);
  });

  test("an unused exit reaches the platform", () => {
    const t = keyboardTree();
    const { win, runner } = createTestWindow(t.root);

    new TestInputBuilder().modifiers({ ctrl: true }).pressKey("q").applyTo(win);
    assert.equal(runner.callsOf("exit").length, 1);

    win.exit();
    win.flushPending();
    assert.equal(runner.callsOf("exit").length, 2);
  });

  test("Alt+F4 closes the window", () => {
    const t = keyboardTree();
    const { win } = createTestWindow(t.root);
    new TestInputBuilder().modifiers({ alt: true }).pressKey("F4").applyTo(win);
    assert.equal(win.peekAction() & ACTION_CLOSE, ACTION_CLOSE);
  });
});

describe("commandTargets", () => {
  const id = (...path: number[]) => Id.fromPath(path);
  const base = {
    sel: undefined,
    keyFocus: false,
    nav: undefined,
    popup: undefined,
    fallback: undefined,
    root: Id.ROOT,
    mods: EMPTY_MODS,
  };
  const names = (ids: Id[]) => ids.map((i) => i.toString());

  test("falls back to the root", () => {
    assert.deepEqual(names(commandTargets("tab", base)), ["#"]);
  });

  test("selection comes first for key focus or selection commands", () => {
    const r = { ...base, sel: id(1), nav: id(2), fallback: id(3) };
    assert.deepEqual(names(commandTargets("enter", r)), ["#2", "#3"]);
    assert.deepEqual(names(commandTargets("copy", r)), ["#1", "#2", "#3"]);
    assert.deepEqual(names(commandTargets("enter", { ...r, keyFocus: true })), ["#1", "#2", "#3"]);
  });

  test("each widget is offered once and Alt skips navigation", () => {
    const r = { ...base, sel: id(1), keyFocus: true, nav: id(1), popup: id(4) };
    assert.deepEqual(names(commandTargets("left", r)), ["#1", "#4", "#"]);
    const alt = { ...r, sel: undefined, mods: { ...EMPTY_MODS, alt: true } };
    assert.deepEqual(names(commandTargets("left", alt)), ["#4", "#"]);
  });
});

describe("key text", () => {
  test("control characters and chords drop text", () => {
    const plain = keyEvent(charKey("a"), "pressed");
    assert.equal(shouldDropKeyText(plain, EMPTY_MODS), false);
    assert.equal(shouldDropKeyText(plain, { ...EMPTY_MODS, ctrl: true }), true);
    assert.equal(shouldDropKeyText(keyEvent(namedKey("Backspace"), "pressed", { text: "\b" }), EMPTY_MODS), true);
    assert.equal(shouldDropKeyText(keyEvent(namedKey("Shift"), "pressed"), { ...EMPTY_MODS, ctrl: true }), false);
    assert.equal(withoutText(plain).text, undefined);
  });
});
