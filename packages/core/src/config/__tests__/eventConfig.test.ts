import { assert, describe, test } from "@trellis-ui/testkit";
import { UiError } from "../../errors.js";
import { EMPTY_MODS } from "../../event/types.js";
import { DEFAULT_EVENT_CONFIG, isPanEnabledWith, resolveEventConfig } from "../eventConfig.js";

describe("resolveEventConfig", () => {
  test("no input yields the frozen defaults", () => {
    assert.equal(resolveEventConfig(undefined), DEFAULT_EVENT_CONFIG);
    assert.equal(Object.isFrozen(DEFAULT_EVENT_CONFIG), true);
  });

  test("overrides only the given fields", () => {
    const c = resolveEventConfig({ menuDelayMs: 100, mousePan: "always", navFocus: false });
    assert.equal(c.menuDelayMs, 100);
    assert.equal(c.mousePan, "always");
    assert.equal(c.navFocus, false);
    assert.equal(c.doubleClickTimeoutMs, DEFAULT_EVENT_CONFIG.doubleClickTimeoutMs);
    assert.equal(Object.isFrozen(c), true);
  });

  test("rejects out-of-range values", () => {
    assert.throws(() => resolveEventConfig({ menuDelayMs: -1 }), UiError);
    assert.throws(() => resolveEventConfig({ menuDelayMs: 1.5 }), UiError);
    assert.throws(() => resolveEventConfig({ kineticDecayMul: 0 }), UiError);
    assert.throws(() => resolveEventConfig({ panDistThresh: Number.NaN }), UiError);
  });
});

describe("isPanEnabledWith", () => {
  test("follows the modifier policy", () => {
    const alt = { ...EMPTY_MODS, alt: true };
    assert.equal(isPanEnabledWith("never", alt), false);
    assert.equal(isPanEnabledWith("withAlt", alt), true);
    assert.equal(isPanEnabledWith("withCtrl", alt), false);
    assert.equal(isPanEnabledWith("always", EMPTY_MODS), true);
  });
});
