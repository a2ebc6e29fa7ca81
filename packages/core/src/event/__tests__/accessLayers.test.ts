import { assert, describe, test } from "@trellis-ui/testkit";
import { Id } from "../../id/id.js";
import { createMemoryLogger } from "../../testing/index.js";
import { AccessLayers } from "../accessLayers.js";
import { EMPTY_MODS, charKey, namedKey } from "../types.js";

const ALT = { ...EMPTY_MODS, alt: true };
const id = (...path: number[]) => Id.fromPath(path);

function layers() {
  const log = createMemoryLogger();
  const access = new AccessLayers(log.logger);
  access.newLayer(Id.ROOT, false);
  access.newLayer(id(1), true);
  return { access, log };
}

describe("AccessLayers", () => {
  test("keys bind in the deepest enclosing layer", () => {
    const { access } = layers();
    assert.equal(access.nearest(id(0, 3))?.toString(), "#");
    assert.equal(access.nearest(id(1, 0))?.toString(), "#1");
    assert.equal(access.nearest(id(1))?.toString(), "#1");

    assert.equal(access.addKeys(id(1, 0), [charKey("s")]), 1);
    assert.equal(access.lookup(id(1), charKey("s"), ALT)?.toString(), "#1.0");
    assert.equal(access.lookup(Id.ROOT, charKey("s"), ALT), undefined);
  });

  test("the first binding of a key wins, case-insensitively", () => {
    const { access } = layers();
    assert.equal(access.addKeys(id(0), [charKey("F"), namedKey("F5")]), 2);
    assert.equal(access.addKeys(id(2), [charKey("f"), charKey("g")]), 1);
    assert.equal(access.lookup(Id.ROOT, charKey("f"), ALT)?.toString(), "#0");
    assert.equal(access.lookup(Id.ROOT, namedKey("F5"), ALT)?.toString(), "#0");
    assert.equal(access.lookup(Id.ROOT, charKey("G"), ALT)?.toString(), "#2");
  });

  test("only Alt matches, or no modifier in an alt-bypass layer", () => {
    const { access } = layers();
    access.addKeys(id(0), [charKey("a")]);
    access.addKeys(id(1, 0), [charKey("b")]);

    assert.equal(access.lookup(Id.ROOT, charKey("a"), EMPTY_MODS), undefined);
    assert.equal(access.lookup(Id.ROOT, charKey("a"), { ...ALT, ctrl: true }), undefined);
    assert.equal(access.lookup(id(1), charKey("b"), EMPTY_MODS)?.toString(), "#1.0");
    assert.equal(access.lookup(id(1), charKey("b"), { ...EMPTY_MODS, shift: true }), undefined);
    assert.equal(access.lookup(id(7), charKey("b"), ALT), undefined);
  });

  test("binding outside every layer is reported and ignored", () => {
    const log = createMemoryLogger();
    const access = new AccessLayers(log.logger);
    access.newLayer(id(1), false);

    assert.equal(access.addKeys(id(0), [charKey("x")]), 0);
    assert.deepEqual(log.messages("error"), ["assertion failed: no access layer encloses #0"]);
  });

  test("clear drops every layer", () => {
    const { access } = layers();
    assert.equal(access.size, 2);
    assert.equal(access.has(id(1)), true);
    access.clear();
    assert.equal(access.size, 0);
    assert.equal(access.nearest(id(0)), undefined);
  });
});
