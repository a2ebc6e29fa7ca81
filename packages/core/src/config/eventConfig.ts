/**
 * packages/core/src/config/eventConfig.ts - Event handling configuration.
 *
 * Why: Thresholds, delays and feature switches the event core reads but never
 * writes. Hosts pass a partial config; every field is validated once here and
 * the resolved object is frozen.
 */

import { invalidConfig } from "../errors.js";
import { type LogLevel, isLogLevel } from "../debug/logger.js";
import type { Modifiers } from "../event/types.js";

/** When the mouse may pan (drag-scroll) content instead of selecting. */
export type MousePan = "never" | "withAlt" | "withCtrl" | "always";

const MOUSE_PAN_VALUES: readonly MousePan[] = Object.freeze([
  "never",
  "withAlt",
  "withCtrl",
  "always",
]);

export function isPanEnabledWith(policy: MousePan, mods: Modifiers): boolean {
  switch (policy) {
    case "never":
      return false;
    case "withAlt":
      return mods.alt;
    case "withCtrl":
      return mods.ctrl;
    case "always":
      return true;
  }
}

export type EventConfig = Readonly<{
  /** Enable keyboard navigation focus (Tab and friends). */
  navFocus: boolean;
  /** Delay before opening a menu on hover. */
  menuDelayMs: number;
  /** Delay before a held touch starts text selection. */
  touchSelectDelayMs: number;
  /** Window in which a repeated press counts as a double (triple...) click. */
  doubleClickTimeoutMs: number;
  /** Samples older than this are ignored when estimating pointer velocity. */
  kineticTimeoutMs: number;
  /** Kinetic scrolling: multiplicative decay per second. */
  kineticDecayMul: number;
  /** Kinetic scrolling: subtractive decay, pixels per second squared. */
  kineticDecaySub: number;
  /** Kinetic scrolling: extra decay while a grab holds the content. */
  kineticGrabSub: number;
  /** Scroll distance of one wheel line, in em. */
  scrollDistEm: number;
  /** Motion (pixels) before a press turns into a pan. */
  panDistThresh: number;
  mousePan: MousePan;
  mouseTextPan: MousePan;
  /** Let wheel events act on widgets like sliders and spinners. */
  mouseWheelActions: boolean;
  /** Clicking a widget gives it navigation focus. */
  mouseNavFocus: boolean;
  /** Touching a widget gives it navigation focus. */
  touchNavFocus: boolean;
  logLevel: LogLevel;
}>;

export type EventConfigInput = Partial<EventConfig>;

export const DEFAULT_EVENT_CONFIG: EventConfig = Object.freeze({
  navFocus: true,
  menuDelayMs: 250,
  touchSelectDelayMs: 1000,
  doubleClickTimeoutMs: 1000,
  kineticTimeoutMs: 50,
  kineticDecayMul: 0.625,
  kineticDecaySub: 200,
  kineticGrabSub: 10000,
  scrollDistEm: 4.5,
  panDistThresh: 2.1,
  mousePan: "withCtrl",
  mouseTextPan: "withAlt",
  mouseWheelActions: true,
  mouseNavFocus: true,
  touchNavFocus: true,
  logLevel: "warn",
});

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) throw invalidConfig(`${name} must be a non-negative integer`);
  return v;
}

function requireNonNegativeFinite(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) throw invalidConfig(`${name} must be a finite number >= 0`);
  return v;
}

function requireUnitFraction(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0 || v > 1) throw invalidConfig(`${name} must be in (0, 1]`);
  return v;
}

function requireMousePan(name: string, v: string): MousePan {
  const found = MOUSE_PAN_VALUES.find((p) => p === v);
  if (found === undefined) {
    throw invalidConfig(`${name} must be one of ${MOUSE_PAN_VALUES.join(", ")}`);
  }
  return found;
}

function requireBoolean(name: string, v: boolean): boolean {
  if (typeof v !== "boolean") throw invalidConfig(`${name} must be a boolean`);
  return v;
}

export function resolveEventConfig(config: EventConfigInput | undefined): EventConfig {
  if (!config) return DEFAULT_EVENT_CONFIG;
  const d = DEFAULT_EVENT_CONFIG;

  const logLevel = config.logLevel ?? d.logLevel;
  if (!isLogLevel(logLevel)) throw invalidConfig(`logLevel "${String(logLevel)}" is not a log level`);

  return Object.freeze({
    navFocus: config.navFocus === undefined ? d.navFocus : requireBoolean("navFocus", config.navFocus),
    menuDelayMs:
      config.menuDelayMs === undefined
        ? d.menuDelayMs
        : requireNonNegativeInt("menuDelayMs", config.menuDelayMs),
    touchSelectDelayMs:
      config.touchSelectDelayMs === undefined
        ? d.touchSelectDelayMs
        : requireNonNegativeInt("touchSelectDelayMs", config.touchSelectDelayMs),
    doubleClickTimeoutMs:
      config.doubleClickTimeoutMs === undefined
        ? d.doubleClickTimeoutMs
        : requireNonNegativeInt("doubleClickTimeoutMs", config.doubleClickTimeoutMs),
    kineticTimeoutMs:
      config.kineticTimeoutMs === undefined
        ? d.kineticTimeoutMs
        : requireNonNegativeInt("kineticTimeoutMs", config.kineticTimeoutMs),
    kineticDecayMul:
      config.kineticDecayMul === undefined
        ? d.kineticDecayMul
        : requireUnitFraction("kineticDecayMul", config.kineticDecayMul),
    kineticDecaySub:
      config.kineticDecaySub === undefined
        ? d.kineticDecaySub
        : requireNonNegativeFinite("kineticDecaySub", config.kineticDecaySub),
    kineticGrabSub:
      config.kineticGrabSub === undefined
        ? d.kineticGrabSub
        : requireNonNegativeFinite("kineticGrabSub", config.kineticGrabSub),
    scrollDistEm:
      config.scrollDistEm === undefined
        ? d.scrollDistEm
        : requireNonNegativeFinite("scrollDistEm", config.scrollDistEm),
    panDistThresh:
      config.panDistThresh === undefined
        ? d.panDistThresh
        : requireNonNegativeFinite("panDistThresh", config.panDistThresh),
    mousePan:
      config.mousePan === undefined ? d.mousePan : requireMousePan("mousePan", config.mousePan),
    mouseTextPan:
      config.mouseTextPan === undefined
        ? d.mouseTextPan
        : requireMousePan("mouseTextPan", config.mouseTextPan),
    mouseWheelActions:
      config.mouseWheelActions === undefined
        ? d.mouseWheelActions
        : requireBoolean("mouseWheelActions", config.mouseWheelActions),
    mouseNavFocus:
      config.mouseNavFocus === undefined
        ? d.mouseNavFocus
        : requireBoolean("mouseNavFocus", config.mouseNavFocus),
    touchNavFocus:
      config.touchNavFocus === undefined
        ? d.touchNavFocus
        : requireBoolean("touchNavFocus", config.touchNavFocus),
    logLevel,
  });
}
