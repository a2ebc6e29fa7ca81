import { assert, describe, test } from "@trellis-ui/testkit";
import { TestInputBuilder, TestNode, createTestWindow } from "../../testing/index.js";
import type { Journal } from "../../testing/index.js";
import { type Event, mouseSource } from "../event.js";
import type { EventCx } from "../eventCx.js";
import { grab } from "../press/press.js";
import { ACTION_REDRAW, type IsUsed, UNUSED, USED, coord } from "../types.js";

type Tree = Readonly<{ root: TestNode; a: TestNode; b: TestNode; journal: Journal }>;

function twoButtons(opts: { fallbackA?: boolean } = {}): Tree {
  const journal: Journal = [];
  const a = new TestNode("A", {
    rect: { x: 0, y: 0, w: 50, h: 50 },
    navigable: true,
    journal,
    onConfigure: (cx, node) => {
      if (opts.fallbackA === true) cx.registerNavFallback(node.id);
    },
  });
  const b = new TestNode("B", { rect: { x: 50, y: 0, w: 50, h: 50 }, navigable: true, journal });
  const root = new TestNode("root", { children: [a, b] });
  return { root, a, b, journal };
}

describe("navigation focus", () => {
  test("a Tab with no focus is offered to the fallback first", () => {
    const { root, a, journal } = twoButtons({ fallbackA: true });
    const { win } = createTestWindow(root);
    assert.equal(win.navFallback()?.toString(), "#0");

    new TestInputBuilder().pressKey("Tab").applyTo(win);
    assert.deepEqual(journal, ["A:command(tab)"]);

    win.flushPending();
    assert.deepEqual(journal, ["A:command(tab)", "A:navFocus(key)"]);
    assert.equal(win.hasNavFocus(a.id), true);
  });

  test("a fallback that uses Tab stops the focus move", () => {
    const journal: Journal = [];
    const a = new TestNode("A", {
      navigable: true,
      journal,
      onConfigure: (cx, node) => cx.registerNavFallback(node.id),
      onEvent: (_cx, event) => (event.kind === "command" ? USED : UNUSED),
    });
    const { win } = createTestWindow(new TestNode("root", { children: [a] }));

    new TestInputBuilder().pressKey("Tab").applyTo(win);
    win.flushPending();
    assert.deepEqual(journal, ["A:command(tab)"]);
    assert.equal(win.navFocus(), undefined);
  });

  test("only the first fallback registration counts", () => {
    const a = new TestNode("A", { onConfigure: (cx, node) => cx.registerNavFallback(node.id) });
    const b = new TestNode("B", { onConfigure: (cx, node) => cx.registerNavFallback(node.id) });
    const { win } = createTestWindow(new TestNode("root", { children: [a, b] }));
    assert.equal(win.navFallback()?.toString(), "#0");
  });

  test("Tab and Shift+Tab wrap around", () => {
    const { root, a, b } = twoButtons();
    const { win } = createTestWindow(root);

    new TestInputBuilder().pressKey("Tab").applyTo(win);
    win.flushPending();
    assert.equal(win.hasNavFocus(a.id), true);

    new TestInputBuilder().modifiers({ shift: true }).pressKey("Tab").applyTo(win);
    win.flushPending();
    assert.equal(win.hasNavFocus(b.id), true);

    new TestInputBuilder().modifiers({}).pressKey("Tab").applyTo(win);
    win.flushPending();
    assert.equal(win.hasNavFocus(a.id), true);
  });

  test("repeating setNavFocus before the flush notifies once", () => {
    const { root, a, journal } = twoButtons();
    const { win } = createTestWindow(root);

    win.setNavFocus(a.id, "key");
    win.setNavFocus(a.id, "key");
    win.flushPending();
    assert.deepEqual(journal, ["A:navFocus(key)"]);

    win.setNavFocus(a.id, "pointer");
    win.flushPending();
    assert.deepEqual(journal, ["A:navFocus(key)"]);
  });

  test("focus moves notify the old holder first", () => {
    const { root, a, b, journal } = twoButtons();
    const { win } = createTestWindow(root);
    win.setNavFocus(a.id, "key");
    win.flushPending();
    journal.length = 0;

    win.setNavFocus(b.id, "pointer");
    win.flushPending();
    assert.deepEqual(journal, ["A:lostNavFocus", "B:navFocus(pointer)"]);
  });

  test("disabled widgets and disabled windows refuse focus", () => {
    const first = twoButtons();
    const w1 = createTestWindow(first.root).win;
    w1.setDisabled(first.a.id, true);
    w1.setNavFocus(first.a.id, "key");
    w1.flushPending();
    assert.equal(w1.navFocus(), undefined);

    const second = twoButtons();
    const w2 = createTestWindow(second.root, { config: { navFocus: false } }).win;
    w2.setNavFocus(second.a.id, "key");
    new TestInputBuilder().pressKey("Tab").applyTo(w2);
    w2.flushPending();
    assert.equal(w2.navFocus(), undefined);
    assert.deepEqual(second.journal, []);
  });

  test("clicking a navigable widget focuses it", () => {
    const { root, b } = twoButtons();
    const { win } = createTestWindow(root);
    new TestInputBuilder().click(60, 10).applyTo(win);
    win.flushPending();
    assert.equal(win.hasNavFocus(b.id), true);
    assert.deepEqual(b.eventKinds().slice(-1), ["navFocus"]);
  });
});

describe("selection and key focus", () => {
  test("char focus brings navigation and selection focus along", () => {
    const { root, b, journal } = twoButtons();
    const { win } = createTestWindow(root);

    win.requestCharFocus(b.id, "key");
    win.flushPending();
    assert.deepEqual(journal, ["B:navFocus(synthetic)", "B:selFocus(key)", "B:keyFocus"]);
    assert.equal(win.hasKeyFocus(b.id), true);
    assert.equal(win.hasCharFocus(b.id), true);
    assert.equal(win.hasSelFocus(b.id), true);
  });

  test("moving selection releases key focus on the old holder", () => {
    const { root, a, b, journal } = twoButtons();
    const { win } = createTestWindow(root);
    win.requestCharFocus(b.id, "key");
    win.flushPending();
    journal.length = 0;

    win.requestSelFocus(a.id, "pointer");
    win.flushPending();
    assert.deepEqual(journal, [
      "B:lostKeyFocus",
      "B:lostSelFocus",
      "B:lostNavFocus",
      "A:navFocus(synthetic)",
      "A:selFocus(pointer)",
    ]);
    assert.equal(win.hasKeyFocus(a.id), false);
  });

  test("moving navigation elsewhere clears selection", () => {
    const { root, a, b, journal } = twoButtons();
    const { win } = createTestWindow(root);
    win.requestSelFocus(b.id, "pointer");
    win.flushPending();
    journal.length = 0;

    win.setNavFocus(a.id, "key");
    win.flushPending();
    assert.deepEqual(journal, ["B:lostNavFocus", "A:navFocus(key)", "B:lostSelFocus"]);
    assert.equal(win.selFocus(), undefined);
  });

  test("IME focus is granted, used and cancelled", () => {
    const { root, b, journal } = twoButtons();
    const { win, runner } = createTestWindow(root);

    win.requestCharFocus(b.id, "key", "normal");
    win.flushPending();
    assert.deepEqual(journal.slice(-2), ["B:keyFocus", "B:imeFocus"]);
    assert.equal(win.hasImeFocus(b.id), true);

    win.setImeCursorArea(b.id, { x: 1, y: 2, w: 3, h: 4 });
    win.handleInput({ kind: "ime", ime: { kind: "commit", text: "é" } });
    assert.equal(journal.at(-1), "B:ime(commit)");

    win.cancelImeFocus(b.id);
    win.flushPending();
    assert.equal(journal.at(-1), "B:lostImeFocus");
    assert.equal(win.hasImeFocus(b.id), false);
    assert.equal(win.hasKeyFocus(b.id), true);
    assert.deepEqual(
      runner.callsOf("setImeAllowed").map((c) => c.allowed),
      [true, false],
    );
    assert.deepEqual(runner.callsOf("setImeCursorArea").map((c) => c.rect), [{ x: 1, y: 2, w: 3, h: 4 }]);
  });
});

describe("disabling a focused, grabbing widget", () => {
  const dragOnPress = (cx: EventCx, event: Event, node: TestNode): IsUsed =>
    event.kind === "pressStart" ? grab(event.press, node.id, "drag").withCx(cx) : UNUSED;

  test("clears focus and grab at once with a single redraw", () => {
    const journal: Journal = [];
    const d = new TestNode("D", {
      rect: { x: 0, y: 0, w: 50, h: 50 },
      navigable: true,
      journal,
      onEvent: dragOnPress,
    });
    const { win, runner } = createTestWindow(new TestNode("root", { children: [d] }));

    win.requestSelFocus(d.id, "pointer");
    win.flushPending();
    new TestInputBuilder().moveTo(10, 10).press().applyTo(win);
    win.flushPending();
    assert.equal(win.hasGrab(mouseSource("left", 1)), true);
    assert.equal(win.hasNavFocus(d.id), true);
    assert.equal(win.hasSelFocus(d.id), true);
    journal.length = 0;
    runner.calls.length = 0;

    win.setDisabled(d.id, true);
    assert.equal(win.navFocus(), undefined);
    assert.equal(win.selFocus(), undefined);
    assert.equal(win.hasGrab(mouseSource("left", 1)), false);
    assert.equal(win.peekAction(), ACTION_REDRAW);
    assert.equal(win.isDisabled(d.id), true);

    win.flushPending();
    assert.deepEqual(journal, ["D:lostSelFocus", "D:lostNavFocus", "D:pressEnd(drag, success=false)"]);
    assert.deepEqual(runner.callsOf("setCursorIcon").map((c) => c.icon), ["default"]);
  });

  test("a cancelled press reports where the pointer was", () => {
    const d = new TestNode("D", { rect: { x: 0, y: 0, w: 50, h: 50 }, onEvent: dragOnPress });
    const { win } = createTestWindow(new TestNode("root", { children: [d] }));
    new TestInputBuilder().moveTo(10, 10).press().moveTo(20, 30).applyTo(win);
    d.clearEvents();

    win.setDisabled(d.id, true);
    win.flushPending();
    const end = d.events[0];
    assert.equal(end?.kind, "pressEnd");
    if (end?.kind !== "pressEnd") return;
    assert.deepEqual(end.press.coord, coord(20, 30));
    assert.equal(end.press.id?.toString(), "#0");
  });
});
