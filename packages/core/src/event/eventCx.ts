/**
 * packages/core/src/event/eventCx.ts - Event dispatch context.
 *
 * Why: Widgets receive this context in every handler. It extends the event
 * state with the operations that need the widget tree or the platform:
 * dispatch along an Id path, message replay, popups, grabs and the commit
 * of staged focus changes.
 *
 * Dispatch runs from the target back up to the root. At each node on the way
 * up: the child's result, then `handleScroll` when a scroll request is
 * pending, then `handleEvent` while the event is still unused, then
 * `handleMessages` while messages remain above the base. A traversal started
 * inside another saves and restores the outer traversal's state, so nested
 * sends cannot observe or consume the outer one's messages.
 */

import { describeThrown } from "../errors.js";
import { type Id, type WindowId, sameId } from "../id/id.js";
import { type Spawner, microtaskSpawner } from "./async.js";
import { type Event, type PressSource, describeEvent, mouseSource, passWhenDisabled } from "./event.js";
import { type EventStateOptions, EventState } from "./eventState.js";
import { Erased, MessageStack } from "./messages.js";
import {
  type AppData,
  type Node,
  type PopupDescriptor,
  type Runner,
  findNode,
  findPath,
  navNext,
} from "./node.js";
import type { PendingSelFocus } from "./focus.js";
import { TouchState, strongerMode } from "./press/touch.js";
import {
  ACTION_CLOSE,
  ACTION_REDRAW,
  type Coord,
  type CursorIcon,
  type FocusSource,
  type GrabMode,
  type IsUsed,
  type NavAdvance,
  type Rect,
  SCROLL_NONE,
  type Scroll,
  UNUSED,
  USED,
  isPanMode,
  vec2,
} from "./types.js";

export type EventCxOptions = EventStateOptions &
  Readonly<{
    root: Node;
    runner: Runner;
    appData: AppData;
    spawner?: Spawner;
  }>;

type TraversalState = Readonly<{
  base: number;
  lastChild: Id | undefined;
  scroll: Scroll;
  targetDisabled: boolean;
}>;

export class EventCx extends EventState {
  readonly root: Node;
  readonly runner: Runner;
  readonly appData: AppData;
  readonly messages = new MessageStack();
  private readonly spawner: Spawner;

  /* --- Traversal state --- */
  private depth = 0;
  private lastChildId: Id | undefined;
  private scrollRequest: Scroll = SCROLL_NONE;
  private targetDisabled = false;

  constructor(options: EventCxOptions) {
    super(options);
    this.root = options.root;
    this.runner = options.runner;
    this.appData = options.appData;
    this.spawner = options.spawner ?? microtaskSpawner;
  }

  protected override wakeLoop(): void {
    this.callRunner("wake", (r) => r.waker().wake());
  }

  /**
   * Call into the platform. A failure is logged and treated as if the
   * operation had no effect.
   */
  protected callRunner<T>(what: string, f: (runner: Runner) => T): T | undefined {
    try {
      return f(this.runner);
    } catch (err: unknown) {
      this.logger.warn(`runner.${what} failed: ${describeThrown(err)}`);
      return undefined;
    }
  }

  /* --- Traversal queries --- */

  /** The child through which the current event arrived, if any. */
  lastChild(): Id | undefined {
    return this.lastChildId;
  }

  /**
   * True while the current event was redirected from inside a disabled
   * subtree to its outermost disabled ancestor.
   */
  targetIsDisabled(): boolean {
    return this.targetDisabled;
  }

  /** Ask ancestors to scroll; they see the request as the dispatch unwinds. */
  setScroll(scroll: Scroll): void {
    this.scrollRequest = scroll;
  }

  scroll(): Scroll {
    return this.scrollRequest;
  }

  private saveTraversal(): TraversalState {
    return {
      base: this.messages.getBase(),
      lastChild: this.lastChildId,
      scroll: this.scrollRequest,
      targetDisabled: this.targetDisabled,
    };
  }

  private beginTraversal(): TraversalState {
    const saved = this.saveTraversal();
    this.depth += 1;
    this.messages.setBase();
    this.lastChildId = undefined;
    this.scrollRequest = SCROLL_NONE;
    this.targetDisabled = false;
    return saved;
  }

  private endTraversal(saved: TraversalState): void {
    if (this.depth > 1 && this.messages.hasAny()) this.offerToApp(this.messages.splitAboveBase());
    this.messages.restoreBase(saved.base);
    this.lastChildId = saved.lastChild;
    this.scrollRequest = saved.scroll;
    this.targetDisabled = saved.targetDisabled;
    this.depth -= 1;
    if (this.depth === 0) this.finishTraversal();
  }

  private finishTraversal(): void {
    if (this.messages.resetAndHasAny()) this.offerToApp(this.messages);
  }

  /**
   * Offer leftovers to the application until it stops touching the stack,
   * then report what is left.
   */
  private offerToApp(messages: MessageStack): void {
    let ops: number;
    do {
      ops = messages.getOpCount();
      const result = this.appData.handleMessages(messages);
      if (typeof result === "number") this.actions |= result;
    } while (messages.hasAny() && messages.getOpCount() !== ops);
    messages.drain(this.logger);
  }

  private outermostDisabled(id: Id): Id | undefined {
    let found: Id | undefined;
    for (const d of this.disabled) {
      if (!d.isAncestorOf(id)) continue;
      if (found === undefined || d.depth < found.depth) found = d;
    }
    return found;
  }

  /* --- Dispatch --- */

  /**
   * Send `event` to `id` and bubble it towards the root. Returns whether a
   * handler used it. Unresolvable targets are dropped.
   */
  sendEvent(id: Id, event: Event): IsUsed {
    const saved = this.beginTraversal();
    let target = id;
    if (!passWhenDisabled(event)) {
      const disabled = this.outermostDisabled(id);
      if (disabled !== undefined) {
        target = disabled;
        this.targetDisabled = true;
      }
    }
    this.logger.trace(`send_event: id=${target.toString()}, event=${describeEvent(event)}`);

    let used: IsUsed = UNUSED;
    const path = findPath(this.root, target);
    if (path === undefined) {
      this.logger.trace(`send_event: ${target.toString()} not found; dropped`);
    } else {
      used = this.unwindEvent(path, 0, event);
    }
    this.endTraversal(saved);
    return used;
  }

  private unwindEvent(path: readonly Node[], index: number, event: Event): IsUsed {
    const node = path[index];
    if (node === undefined) return UNUSED;
    const child = path[index + 1];
    let used: IsUsed = UNUSED;
    if (child !== undefined) {
      used = this.unwindEvent(path, index + 1, event);
      this.lastChildId = child.id;
      if (this.scrollRequest.kind !== "none") node.handleScroll?.(this, this.scrollRequest);
    } else {
      this.lastChildId = undefined;
    }
    const skip = child === undefined && this.targetDisabled;
    if (used === UNUSED && !skip && node.handleEvent) used = node.handleEvent(this, event);
    if (this.messages.hasAny()) node.handleMessages?.(this);
    return used;
  }

  /** Deliver `msg` to `id` and its ancestors as if `id` had pushed it. */
  replay(id: Id, msg: Erased): void {
    const saved = this.beginTraversal();
    this.messages.pushErased(msg);
    this.logger.trace(`replay: id=${id.toString()}, msg=${msg.toString()}`);
    this.unwindReplay(id);
    this.endTraversal(saved);
  }

  /** Replay a scroll request as if the widget at `id` had raised it. */
  replayScroll(id: Id, scroll: Scroll): void {
    const saved = this.beginTraversal();
    this.scrollRequest = scroll;
    this.logger.trace(`replay_scroll: id=${id.toString()}, scroll=${scroll.kind}`);
    this.unwindReplay(id);
    this.endTraversal(saved);
  }

  private unwindReplay(id: Id): void {
    const path = findPath(this.root, id);
    if (path === undefined) {
      this.logger.trace(`replay: ${id.toString()} not found; dropped`);
      return;
    }
    this.lastChildId = undefined;
    if (this.messages.hasAny()) path.at(-1)?.handleMessages?.(this);
    for (let i = path.length - 2; i >= 0; i--) {
      const node = path[i];
      const child = path[i + 1];
      if (node === undefined || child === undefined) continue;
      this.lastChildId = child.id;
      if (this.scrollRequest.kind !== "none") node.handleScroll?.(this, this.scrollRequest);
      if (this.messages.hasAny()) node.handleMessages?.(this);
    }
  }

  /* --- Messages --- */

  /** Push a message for the current traversal's ancestors. */
  push(msg: object): void {
    this.messages.push(msg);
  }

  pushErased(msg: Erased): void {
    this.messages.pushErased(msg);
  }

  /**
   * Send `msg` to `id`. Delivered at once when the current traversal has no
   * messages or scroll request outstanding; otherwise queued for the flush.
   */
  send(id: Id, msg: object): void {
    const erased = msg instanceof Erased ? msg : new Erased(msg);
    if (!this.messages.hasAny() && this.scrollRequest.kind === "none") {
      this.replay(id, erased);
    } else {
      this.sendQueue.push({ id, msg: erased });
    }
  }

  /** Queue `msg` for `id`, delivered by the next flush. */
  sendDeferred(id: Id, msg: object): void {
    this.sendQueue.push({ id, msg: msg instanceof Erased ? msg : new Erased(msg) });
  }

  /** Deliver the settled value of `promise` to `id` as a message. */
  pushAsync(id: Id, promise: Promise<object>): void {
    this.asyncQueue.push(id, promise);
  }

  /** Run `task` through the spawner and deliver its result to `id`. */
  pushSpawn(id: Id, task: () => object | Promise<object>): void {
    this.asyncQueue.push(id, this.spawner(task));
  }

  /* --- Clipboard and IME --- */

  getClipboard(): string | undefined {
    return this.callRunner("getClipboard", (r) => r.getClipboard());
  }

  setClipboard(content: string): void {
    this.callRunner("setClipboard", (r) => r.setClipboard(content));
  }

  getPrimary(): string | undefined {
    return this.callRunner("getPrimary", (r) => r.getPrimary());
  }

  setPrimary(content: string): void {
    this.callRunner("setPrimary", (r) => r.setPrimary(content));
  }

  /** Report the caret area of the IME focus holder. */
  setImeCursorArea(id: Id, rect: Rect): void {
    if (!this.hasImeFocus(id)) return;
    this.focus.imeCursorArea = rect;
    this.callRunner("setImeCursorArea", (r) => r.setImeCursorArea(rect));
  }

  /* --- Popups --- */

  /**
   * Open a popup. With `setFocus`, the current navigation focus is cleared
   * and restored when the popup closes. Returns undefined when the platform
   * refuses.
   */
  addPopup(desc: PopupDescriptor, setFocus = false): WindowId | undefined {
    const windowId = this.callRunner("addPopup", (r) => r.addPopup(this.windowId, desc));
    if (windowId === undefined) return undefined;
    let oldNavFocus: Id | undefined;
    if (setFocus) {
      oldNavFocus = this.focus.nav;
      this.clearNavFocus();
    }
    this.popups.push({ windowId, desc, oldNavFocus, isSized: false });
    this.actions |= ACTION_REDRAW;
    return windowId;
  }

  /** Move or resize an open popup. The descriptor's `id` must not change. */
  repositionPopup(windowId: WindowId, desc: PopupDescriptor): void {
    const state = this.popups.at(this.popups.indexOfWindow(windowId));
    if (state === undefined) return;
    if (!state.desc.id.equals(desc.id)) {
      this.logger.error(`reposition_popup: descriptor id changed for window ${String(windowId)}`);
      return;
    }
    this.callRunner("repositionPopup", (r) => r.repositionPopup(windowId, desc));
    state.desc = desc;
  }

  /** The platform laid out the popup for the first time. */
  confirmPopupIsSized(windowId: WindowId): void {
    this.popups.confirmSized(windowId);
  }

  /**
   * Close the popup at `index`, closing those above it first. Navigation
   * focus saved by `addPopup` is restored.
   */
  closePopup(index: number): void {
    while (this.popups.length > index + 1) this.closePopup(this.popups.length - 1);
    const state = this.popups.removeAt(index);
    if (state === undefined) return;
    if (state.isSized) this.popupRemoved.push({ id: state.desc.id, windowId: state.windowId });
    if (state.oldNavFocus !== undefined) {
      this.setNavFocus(state.oldNavFocus, "synthetic");
    } else {
      const nav = this.focus.nav;
      if (nav !== undefined && state.desc.id.isAncestorOf(nav)) this.clearNavFocus();
    }
    this.actions |= ACTION_REDRAW;
    this.callRunner("closeWindow", (r) => r.closeWindow(state.windowId));
  }

  /**
   * Close popups from the top down until one covers `id`. With no `id`,
   * close them all.
   */
  closeNonAncestorsOf(id: Id | undefined): void {
    const n = this.popups.countNonAncestorsOf(id);
    for (let i = 0; i < n; i++) this.closePopup(this.popups.length - 1);
  }

  /** Close a popup by window id, or ask the platform to close another window. */
  closeWindow(windowId: WindowId): void {
    const index = this.popups.indexOfWindow(windowId);
    if (index >= 0) {
      this.closePopup(index);
      return;
    }
    this.callRunner("closeWindow", (r) => r.closeWindow(windowId));
  }

  /** An unused close request: close the top popup, else this window. */
  handleClose(): void {
    const top = this.popups.length - 1;
    if (top >= 0) {
      this.closePopup(top);
      return;
    }
    this.actions |= ACTION_CLOSE;
  }

  /**
   * Send `event` to the top popup (or to `id` inside it). An unused event
   * closes that popup and the next one is tried; without popups it goes to
   * `id`.
   */
  protected sendPopupFirst(id: Id | undefined, event: Event): void {
    for (let state = this.popups.top(); state !== undefined; state = this.popups.top()) {
      const target = id !== undefined && state.desc.id.isAncestorOf(id) ? id : state.desc.id;
      if (this.sendEvent(target, event) === USED) return;
      this.closePopup(this.popups.length - 1);
    }
    if (id !== undefined) this.sendEvent(id, event);
  }

  /* --- Grabs --- */

  /**
   * Grab `source` for `id`. Subsequent motion and the release go to `id`
   * according to `mode`. Returns "unused" when the request conflicts with an
   * existing grab of the same source.
   */
  grabPress(
    id: Id,
    source: PressSource,
    at: Coord,
    mode: GrabMode,
    cursor?: CursorIcon,
  ): IsUsed {
    const pan = isPanMode(mode);
    const position = vec2(at.x, at.y);
    if (source.kind === "mouse") {
      const grab = this.mouse.grab;
      if (grab !== undefined) {
        if (!grab.startId.equals(id) || grab.button !== source.button || isPanMode(grab.mode) !== pan) {
          return UNUSED;
        }
        grab.repetitions = source.repetitions;
        grab.depress = id;
        grab.mode = mode;
      } else {
        this.mouse.grab = {
          button: source.button,
          repetitions: source.repetitions,
          startId: id,
          depress: id,
          mode,
          pan: pan ? this.pans.add(id, mode, position) : undefined,
        };
      }
    } else {
      const existing = this.touch.get(source.touchId);
      if (existing !== undefined) {
        if (!existing.startId.equals(id) || TouchState.isPan(existing) !== pan) return UNUSED;
        existing.depress = id;
        existing.over = id;
        existing.lastPosition = position;
        existing.mode = strongerMode(existing.mode, mode);
      } else {
        if (this.touch.isFull()) return UNUSED;
        this.touch.grabs.push({
          touchId: source.touchId,
          startId: id,
          depress: id,
          over: id,
          lastPosition: position,
          mode,
          pan: pan ? this.pans.add(id, mode, position) : undefined,
          velocity: mode === "drag" ? this.touch.claimSampler() : undefined,
        });
      }
    }

    if (cursor !== undefined) this.callRunner("setCursorIcon", (r) => r.setCursorIcon(cursor));
    this.actions |= ACTION_REDRAW;
    this.logger.trace(`grab_press: id=${id.toString()}, source=${source.kind}, mode=${mode}`);
    return USED;
  }

  /**
   * Replace any grab `id` already holds with a fresh drag grab. The old grab
   * ends silently.
   */
  grabPressUnique(id: Id, source: PressSource, at: Coord, cursor?: CursorIcon): IsUsed {
    const grab = this.mouse.grab;
    if (grab !== undefined && grab.startId.equals(id)) {
      if (grab.pan !== undefined) this.pans.remove(grab.pan);
      this.mouse.grab = undefined;
      this.cursorResetPending = true;
    }
    for (let i = this.touch.grabs.length - 1; i >= 0; i--) {
      const t = this.touch.grabs[i];
      if (t === undefined || !t.startId.equals(id)) continue;
      if (t.pan !== undefined) this.pans.remove(t.pan);
      this.touch.removeAt(i);
    }
    return this.grabPress(id, source, at, "drag", cursor);
  }

  /** Change the cursor shown during `id`'s mouse grab. */
  updateGrabCursor(id: Id, icon: CursorIcon): void {
    if (this.mouse.grab?.startId.equals(id) !== true) return;
    this.callRunner("setCursorIcon", (r) => r.setCursorIcon(icon));
  }

  /**
   * End the mouse grab. Pan grabs end silently; others receive pressEnd.
   */
  protected removeMouseGrab(success: boolean): void {
    const grab = this.mouse.grab;
    if (grab === undefined) return;
    this.mouse.grab = undefined;
    this.logger.trace(`remove_mouse_grab: id=${grab.startId.toString()}, success=${String(success)}`);
    if (grab.pan !== undefined) {
      this.pans.remove(grab.pan);
    } else if (!isPanMode(grab.mode)) {
      this.sendEvent(grab.startId, {
        kind: "pressEnd",
        press: {
          source: mouseSource(grab.button, grab.repetitions),
          id: this.mouse.hover,
          coord: this.mouse.lastCoord,
        },
        success,
        mode: grab.mode,
      });
    }
    this.callRunner("setCursorIcon", (r) => r.setCursorIcon(this.mouse.hoverIcon));
    this.actions |= ACTION_REDRAW;
  }

  /* --- Focus commit --- */

  /** Where navigation searches run: the top sized popup, else the window. */
  protected navSearchRoot(): Node {
    const popup = this.popups.topSized();
    if (popup === undefined) return this.root;
    return findNode(this.root, popup.desc.id) ?? this.root;
  }

  protected navSearch(root: Node, focus: Id | undefined, advance: NavAdvance): Id | undefined {
    return navNext(root, focus, advance, { isDisabled: (id) => this.isDisabled(id), logger: this.logger });
  }

  /** Commit navigation focus: notify the old and new holders. */
  protected setNavFocusImpl(target: Id | undefined, source: FocusSource): void {
    if (sameId(target, this.focus.nav) || !this.config.navFocus) return;
    if (target !== undefined && this.isDisabled(target)) return;

    const sel = this.focus.sel;
    if (sel !== undefined && !sel.equals(target) && this.focus.pendingSel.kind === "idle") {
      this.focus.pendingSel = {
        kind: "staged",
        target: undefined,
        keyFocus: false,
        ime: undefined,
        source: "synthetic",
      };
    }

    const old = this.focus.nav;
    this.focus.nav = target;
    this.logger.debug(
      `set_nav_focus: ${old?.toString() ?? "none"} -> ${target?.toString() ?? "none"} (${source})`,
    );
    this.actions |= ACTION_REDRAW;
    if (old !== undefined) this.sendEvent(old, { kind: "lostNavFocus" });
    if (target !== undefined) this.sendEvent(target, { kind: "navFocus", source });
  }

  /** Run a staged navigation search and commit its result. */
  protected nextNavFocusImpl(target: Id | undefined, advance: NavAdvance, source: FocusSource): void {
    const nav = this.focus.nav;
    let adv = advance;
    if (target !== undefined && target.equals(nav)) {
      if (adv.kind === "none") return;
      adv = { kind: adv.kind, allowFocus: false };
    }
    const root = this.navSearchRoot();
    const focus = target ?? nav;
    let found = this.navSearch(root, focus, adv);
    if (found === undefined && focus !== undefined && adv.kind !== "none") {
      found = this.navSearch(root, undefined, adv);
    }
    if (found === undefined && adv.kind === "none") return;
    this.setNavFocusImpl(found, source);
  }

  protected commitPendingNav(): void {
    const p = this.focus.takePendingNav();
    if (p.kind === "set") this.setNavFocusImpl(p.target, p.source);
    else if (p.kind === "next") this.nextNavFocusImpl(p.target, p.advance, p.source);
  }

  protected commitPendingSel(): void {
    const p = this.focus.takePendingSel();
    if (p.kind === "staged") this.setSelFocusImpl(p);
  }

  private grantInputFocus(target: Id, p: Extract<PendingSelFocus, { kind: "staged" }>): void {
    const f = this.focus;
    if (p.keyFocus && !f.keyFocus) {
      f.keyFocus = true;
      this.sendEvent(target, { kind: "keyFocus" });
    }
    if (p.ime !== undefined && f.keyFocus && !f.imeFocus) {
      f.ime = p.ime;
      f.imeFocus = true;
      this.callRunner("setImeAllowed", (r) => r.setImeAllowed(true));
      this.sendEvent(target, { kind: "imeFocus" });
    }
  }

  /** Commit selection (and key, IME) focus. */
  private setSelFocusImpl(p: Extract<PendingSelFocus, { kind: "staged" }>): void {
    const f = this.focus;
    const target = p.target;
    if (target !== undefined && this.isDisabled(target)) return;

    if (sameId(target, f.sel)) {
      if (target !== undefined) this.grantInputFocus(target, p);
      return;
    }

    const old = f.sel;
    if (old !== undefined) {
      if (f.imeFocus) {
        f.imeFocus = false;
        this.callRunner("setImeAllowed", (r) => r.setImeAllowed(false));
        this.sendEvent(old, { kind: "lostImeFocus" });
      }
      if (f.keyFocus) {
        f.keyFocus = false;
        this.sendEvent(old, { kind: "lostKeyFocus" });
      }
      this.sendEvent(old, { kind: "lostSelFocus" });
    }

    f.sel = target;
    f.keyFocus = false;
    f.ime = undefined;
    this.actions |= ACTION_REDRAW;
    if (target === undefined) return;

    if (!target.equals(f.nav)) this.setNavFocusImpl(target, "synthetic");
    this.sendEvent(target, { kind: "selFocus", source: p.source });
    this.grantInputFocus(target, p);
  }
}
