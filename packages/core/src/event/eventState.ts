/**
 * packages/core/src/event/eventState.ts - Per-window event state.
 *
 * Why: Everything the dispatcher remembers between platform events lives
 * here: disabled subtrees, focus, hover and grabs, popups, access layers,
 * timers and the queues drained by the flush. Widgets mutate it only through
 * the request methods below; requests that need the widget tree are staged
 * and committed by the flush.
 */

import { type EventConfig, isPanEnabledWith, resolveEventConfig } from "../config/eventConfig.js";
import type { EventConfigInput } from "../config/eventConfig.js";
import { type Shortcuts, defaultShortcuts } from "../config/shortcuts.js";
import { type Logger, createConsoleLogger, debugAssert } from "../debug/logger.js";
import { Id, type WindowId, sameId } from "../id/id.js";
import { AccessLayers } from "./accessLayers.js";
import { AsyncQueue } from "./async.js";
import type { Command } from "./command.js";
import { type Event, type PressSource, mouseSource, touchSource } from "./event.js";
import { FocusState, NAV_NONE, type PendingNavFocus, SEL_IDLE, pendingTarget } from "./focus.js";
import type { Erased } from "./messages.js";
import { PopupStack } from "./popups.js";
import { MouseState } from "./press/mouse.js";
import { PanGrabs } from "./press/pan.js";
import { TouchState } from "./press/touch.js";
import { type TimerHandle, TimerQueue } from "./timers.js";
import {
  ACTION_EMPTY,
  ACTION_RECONFIGURE,
  ACTION_REDRAW,
  ACTION_UPDATE,
  type Action,
  type CursorIcon,
  EMPTY_MODS,
  type FocusSource,
  type ImePurpose,
  type Key,
  type Modifiers,
  type PhysicalKey,
  type Vec2,
  VEC2_ZERO,
  coord,
  isPanMode,
} from "./types.js";

export type EventStateOptions = Readonly<{
  config?: EventConfigInput;
  shortcuts?: Shortcuts;
  logger?: Logger;
  /** Milliseconds on a monotonic scale. */
  clock?: () => number;
  windowId?: WindowId;
  /** Id given to the window's root node. */
  rootId?: Id;
}>;

export type PendingUpdate = Readonly<{ id: Id; reconfigure: boolean }>;

export type AddressedEvent = Readonly<{ id: Id; event: Event }>;

export class EventState {
  readonly config: EventConfig;
  readonly shortcuts: Shortcuts;
  readonly logger: Logger;
  readonly clock: () => number;
  readonly windowId: WindowId;
  readonly rootId: Id;

  /* --- Input state --- */
  protected readonly disabled: Id[] = [];
  protected hasWindowFocus = true;
  protected mods: Modifiers = EMPTY_MODS;
  protected readonly focus = new FocusState();
  protected readonly mouse = new MouseState();
  protected readonly touch = new TouchState();
  protected readonly pans = new PanGrabs();
  protected readonly keyDepress = new Map<PhysicalKey, Id>();
  protected readonly accessLayers: AccessLayers;

  /* --- Popups --- */
  protected readonly popups = new PopupStack();
  protected readonly popupRemoved: Array<Readonly<{ id: Id; windowId: WindowId }>> = [];

  /* --- Deferred work --- */
  protected readonly timers = new TimerQueue();
  protected readonly sendQueue: Array<Readonly<{ id: Id; msg: Erased }>> = [];
  protected readonly pendingCmds: Array<Readonly<{ id: Id; cmd: Command }>> = [];
  protected readonly asyncQueue: AsyncQueue;
  protected pendingUpdate: PendingUpdate | undefined;
  /** Notifications raised outside a traversal, sent first by the flush. */
  protected readonly pendingEvents: AddressedEvent[] = [];
  protected pendingImeAllowed: boolean | undefined;
  protected cursorResetPending = false;
  protected actions: Action = ACTION_EMPTY;

  constructor(options: EventStateOptions = {}) {
    this.config = resolveEventConfig(options.config);
    this.shortcuts = options.shortcuts ?? defaultShortcuts();
    this.logger = options.logger ?? createConsoleLogger("event", this.config.logLevel);
    this.clock = options.clock ?? (() => performance.now());
    this.windowId = options.windowId ?? 0;
    this.rootId = options.rootId ?? Id.ROOT;
    this.accessLayers = new AccessLayers(this.logger);
    this.asyncQueue = new AsyncQueue(this.logger, () => this.wakeLoop());
  }

  /** Revive an idle event loop. Needs a runner; a bare state has none. */
  protected wakeLoop(): void {}

  /* --- Queries --- */

  /** True when `id` or one of its ancestors is disabled. */
  isDisabled(id: Id): boolean {
    return this.disabled.some((d) => d.isAncestorOf(id));
  }

  windowHasFocus(): boolean {
    return this.hasWindowFocus;
  }

  modifiers(): Modifiers {
    return this.mods;
  }

  /** Access-key labels are drawn while Alt is held. */
  showAccessLabels(): boolean {
    return this.mods.alt;
  }

  navFocus(): Id | undefined {
    return this.focus.nav;
  }

  hasNavFocus(id: Id): boolean {
    return id.equals(this.focus.nav);
  }

  selFocus(): Id | undefined {
    return this.focus.sel;
  }

  hasSelFocus(id: Id): boolean {
    return id.equals(this.focus.sel);
  }

  hasKeyFocus(id: Id): boolean {
    return id.equals(this.focus.keyFocusId());
  }

  /** Same as `hasKeyFocus`: character input goes to the key focus holder. */
  hasCharFocus(id: Id): boolean {
    return this.hasKeyFocus(id);
  }

  hasImeFocus(id: Id): boolean {
    return id.equals(this.focus.imeFocusId());
  }

  navFallback(): Id | undefined {
    return this.focus.fallback;
  }

  hover(): Id | undefined {
    return this.mouse.hover;
  }

  isHovered(id: Id): boolean {
    return id.equals(this.mouse.hover);
  }

  isHoveredRecursive(id: Id): boolean {
    const hover = this.mouse.hover;
    return hover !== undefined && id.isAncestorOf(hover);
  }

  /**
   * Whether `id` is drawn pressed: held by a key, the depress target of a
   * mouse or touch grab, or the parent of an open popup.
   */
  isDepressed(id: Id): boolean {
    for (const held of this.keyDepress.values()) {
      if (held.equals(id)) return true;
    }
    if (id.equals(this.mouse.grab?.depress)) return true;
    if (this.touch.grabs.some((g) => id.equals(g.depress))) return true;
    return this.popups.isParent(id);
  }

  /** Whether `source` currently owns a grab. */
  hasGrab(source: PressSource): boolean {
    if (source.kind === "mouse") return this.mouse.grab !== undefined;
    return this.touch.get(source.touchId) !== undefined;
  }

  /** Number of open popups. */
  popupCount(): number {
    return this.popups.length;
  }

  /* --- Disabling --- */

  /**
   * Enable or disable the subtree at `id`.
   *
   * Disabling takes effect at once: focus held inside the subtree is cleared
   * (holders are notified by the next flush), staged focus into it is
   * dropped and grabs started inside it are cancelled.
   */
  setDisabled(id: Id, disabled: boolean): void {
    const index = this.disabled.findIndex((d) => d.equals(id));
    if (!disabled) {
      if (index < 0) return;
      this.disabled.splice(index, 1);
      this.actions |= ACTION_REDRAW;
      return;
    }
    if (index >= 0) return;
    this.disabled.push(id);
    this.cancelFocusWithin(id);
    this.cancelGrabsWithin(id);
    for (const [code, held] of this.keyDepress) {
      if (id.isAncestorOf(held)) this.keyDepress.delete(code);
    }
    this.actions |= ACTION_REDRAW;
  }

  private cancelFocusWithin(id: Id): void {
    const f = this.focus;
    const sel = f.sel;
    if (sel !== undefined && id.isAncestorOf(sel)) {
      if (f.imeFocus) {
        f.imeFocus = false;
        this.pendingImeAllowed = false;
        this.pendingEvents.push({ id: sel, event: { kind: "lostImeFocus" } });
      }
      if (f.keyFocus) this.pendingEvents.push({ id: sel, event: { kind: "lostKeyFocus" } });
      this.pendingEvents.push({ id: sel, event: { kind: "lostSelFocus" } });
      f.sel = undefined;
      f.keyFocus = false;
      f.ime = undefined;
    }

    const selTarget = pendingTarget(f.pendingSel);
    if (selTarget !== undefined && id.isAncestorOf(selTarget)) f.pendingSel = SEL_IDLE;
    const navTarget = pendingTarget(f.pendingNav);
    if (navTarget !== undefined && id.isAncestorOf(navTarget)) f.pendingNav = NAV_NONE;

    const nav = f.nav;
    if (nav !== undefined && id.isAncestorOf(nav)) {
      f.nav = undefined;
      this.pendingEvents.push({ id: nav, event: { kind: "lostNavFocus" } });
    }
  }

  private cancelGrabsWithin(id: Id): void {
    const grab = this.mouse.grab;
    if (grab !== undefined && id.isAncestorOf(grab.startId)) {
      if (grab.pan !== undefined) this.pans.remove(grab.pan);
      // Pan grabs end without a pressEnd, with or without a pan slot
      if (!isPanMode(grab.mode)) {
        this.pendingEvents.push({
          id: grab.startId,
          event: {
            kind: "pressEnd",
            press: {
              source: mouseSource(grab.button, grab.repetitions),
              id: this.mouse.hover,
              coord: this.mouse.lastCoord,
            },
            success: false,
            mode: grab.mode,
          },
        });
      }
      this.mouse.grab = undefined;
      this.cursorResetPending = true;
    }

    for (let i = this.touch.grabs.length - 1; i >= 0; i--) {
      const t = this.touch.grabs[i];
      if (t === undefined || !id.isAncestorOf(t.startId)) continue;
      if (t.pan !== undefined) this.pans.remove(t.pan);
      if (!isPanMode(t.mode)) {
        this.pendingEvents.push({
          id: t.startId,
          event: {
            kind: "pressEnd",
            press: {
              source: touchSource(t.touchId),
              id: t.over,
              coord: coord(Math.round(t.lastPosition.x), Math.round(t.lastPosition.y)),
            },
            success: false,
            mode: t.mode,
          },
        });
      }
      this.touch.removeAt(i);
    }
  }

  /* --- Navigation focus --- */

  /**
   * Give navigation focus to `id`. Committed by the flush; repeating the
   * request before then changes nothing.
   */
  setNavFocus(id: Id, source: FocusSource): void {
    if (!this.config.navFocus || this.isDisabled(id)) return;
    this.stageNavSet(id, source);
  }

  clearNavFocus(): void {
    this.stageNavSet(undefined, "synthetic");
  }

  private stageNavSet(target: Id | undefined, source: FocusSource): void {
    const p = this.focus.pendingNav;
    if (p.kind === "set" && sameId(p.target, target)) return;
    if (p.kind === "none" && sameId(this.focus.nav, target)) return;
    this.focus.pendingNav = Object.freeze({ kind: "set", target, source });
  }

  /**
   * Move navigation focus to the next navigable widget after `target` (or
   * the current focus), or before it with `reverse`. A given `target` may
   * itself receive focus.
   */
  nextNavFocus(target: Id | undefined, reverse: boolean, source: FocusSource): void {
    const allowFocus = target !== undefined;
    this.focus.pendingNav = Object.freeze<PendingNavFocus>({
      kind: "next",
      target,
      advance: reverse ? { kind: "reverse", allowFocus } : { kind: "forward", allowFocus },
      source,
    });
  }

  /**
   * Register `id` to receive commands nobody else used. Only the first
   * registration after a full configure counts.
   */
  registerNavFallback(id: Id): void {
    if (this.focus.fallback !== undefined) return;
    this.logger.debug(`register_nav_fallback: id=${id.toString()}`);
    this.focus.fallback = id;
  }

  /* --- Selection, key and IME focus --- */

  requestSelFocus(target: Id, source: FocusSource): void {
    if (this.isDisabled(target)) return;
    this.focus.pendingSel = Object.freeze({
      kind: "staged",
      target,
      keyFocus: false,
      ime: undefined,
      source,
    });
  }

  /**
   * Request character input for `target`; implies selection and navigation
   * focus. With `ime`, the platform input method is enabled as well.
   */
  requestCharFocus(target: Id, source: FocusSource, ime?: ImePurpose): void {
    if (this.isDisabled(target)) return;
    this.focus.pendingSel = Object.freeze({ kind: "staged", target, keyFocus: true, ime, source });
  }

  /** Drop IME focus held by `id`; key focus stays. */
  cancelImeFocus(id: Id): void {
    if (!this.hasImeFocus(id)) return;
    this.focus.imeFocus = false;
    this.focus.ime = undefined;
    this.pendingImeAllowed = false;
    this.pendingEvents.push({ id, event: { kind: "lostImeFocus" } });
  }

  /* --- Access keys --- */

  newAccelLayer(id: Id, altBypass: boolean): void {
    this.accessLayers.newLayer(id, altBypass);
  }

  addAccelKeys(id: Id, keys: readonly Key[]): void {
    this.accessLayers.addKeys(id, keys);
  }

  /** Show `id` depressed while the physical key `code` is held. */
  depressWithKey(id: Id, code: PhysicalKey): void {
    const held = this.keyDepress.get(code);
    if (held !== undefined && held.equals(id)) return;
    this.keyDepress.set(code, id);
    this.actions |= ACTION_REDRAW;
  }

  /* --- Timers --- */

  /** Schedule a `timer` event for `id` after `delayMs`. */
  requestTimer(id: Id, handle: TimerHandle, delayMs: number): void {
    const time = this.clock() + delayMs;
    const result = this.timers.request(id, handle, time);
    this.logger.trace(
      `request_timer: id=${id.toString()}, ${handle.toString()}, delay=${String(delayMs)}ms, ${result}`,
    );
  }

  /** Schedule a `timer` event for `id` before the next frame is drawn. */
  requestFrameTimer(id: Id, handle: TimerHandle): void {
    debugAssert(this.logger, handle.earliest, "frame timers should use an earliest handle");
    this.timers.requestFrame(id, handle);
  }

  /* --- Grabs --- */

  /**
   * Point the depress target of `source`'s grab at `target`. Returns whether
   * it changed.
   */
  setGrabDepress(source: PressSource, target: Id | undefined): boolean {
    const grab = source.kind === "mouse" ? this.mouse.grab : this.touch.get(source.touchId);
    if (grab === undefined || sameId(grab.depress, target)) return false;
    grab.depress = target;
    this.actions |= ACTION_REDRAW;
    return true;
  }

  /* --- Pointer configuration --- */

  setHoverCursor(icon: CursorIcon): void {
    this.mouse.hoverIcon = icon;
  }

  /** Whether a press from `source` may pan content. */
  configEnablePan(source: PressSource): boolean {
    if (source.kind === "touch") return true;
    return source.button === "left" && isPanEnabledWith(this.config.mousePan, this.mods);
  }

  configEnableMouseTextPan(): boolean {
    return isPanEnabledWith(this.config.mouseTextPan, this.mods);
  }

  /** Whether motion `dist` has left the pan dead zone. */
  configTestPanThresh(dist: Vec2): boolean {
    return Math.max(Math.abs(dist.x), Math.abs(dist.y)) >= this.config.panDistThresh;
  }

  /** Recent velocity of a drag-mode touch grab, pixels per second. */
  touchVelocity(touchId: number): Vec2 {
    const sampler = this.touch.get(touchId)?.velocity;
    if (sampler === undefined) return VEC2_ZERO;
    return sampler.velocity(this.clock(), this.config.kineticTimeoutMs);
  }

  /* --- Actions and deferred requests --- */

  /**
   * Raise `flags`. RECONFIGURE and UPDATE are scoped to `id` and become a
   * pending update of its subtree.
   */
  action(id: Id, flags: Action): void {
    if ((flags & ACTION_RECONFIGURE) !== 0) this.requestUpdate(id, true);
    else if ((flags & ACTION_UPDATE) !== 0) this.requestUpdate(id, false);
    this.actions |= flags & ~(ACTION_RECONFIGURE | ACTION_UPDATE);
  }

  windowAction(flags: Action): void {
    this.actions |= flags;
  }

  redraw(): void {
    this.actions |= ACTION_REDRAW;
  }

  /**
   * Ask for an update (or reconfigure) of `id`'s subtree. Requests within
   * one frame merge into their common ancestor.
   */
  requestUpdate(id: Id, reconfigure = false): void {
    const prev = this.pendingUpdate;
    this.pendingUpdate =
      prev === undefined
        ? { id, reconfigure }
        : { id: prev.id.commonAncestor(id), reconfigure: prev.reconfigure || reconfigure };
  }

  /** Queue `cmd` for `id`, sent by the next flush. */
  sendCommand(id: Id, cmd: Command): void {
    this.pendingCmds.push({ id, cmd });
  }

  /** Queue an exit request, offered to the root first. */
  exit(): void {
    this.sendCommand(this.rootId, "exit");
  }

  /** Remove and return accumulated actions. */
  takeAction(): Action {
    const a = this.actions;
    this.actions = ACTION_EMPTY;
    return a;
  }

  /** Accumulated actions, without taking them. */
  peekAction(): Action {
    return this.actions;
  }
}
