/**
 * packages/core/src/event/window.ts - Platform input and the per-frame flush.
 *
 * Why: The host feeds one window's platform events through `handleInput`,
 * fires due timers with `updateTimers`, and calls `flushPending` once per
 * loop iteration. The flush commits everything staged during dispatch in a
 * fixed order (updates, then navigation, then selection, then queued sends)
 * and hands the accumulated actions back to the host.
 */

import { UiError } from "../errors.js";
import type { Id, WindowId } from "../id/id.js";
import { type AccessActionRequest, resolveAccessAction } from "./accessibility.js";
import { commandEvent, mouseSource, touchSource } from "./event.js";
import { EventCx } from "./eventCx.js";
import { ConfigCx } from "./configCx.js";
import { commandTargets, isNamedKey, shouldDropKeyText, withoutText } from "./keys.js";
import { findNode, probeTree } from "./node.js";
import { FAKE_MOUSE_BUTTON } from "./press/mouse.js";
import { TouchState } from "./press/touch.js";
import {
  ACTION_REDRAW,
  ACTION_REGION_MOVED,
  type Action,
  type Coord,
  type Ime,
  type KeyEvent,
  type Key,
  type Modifiers,
  type MouseButton,
  type PhysicalKey,
  type ScrollDelta,
  UNUSED,
  USED,
  type Vec2,
  coord,
  vec2,
} from "./types.js";

export type TouchPhase = "started" | "moved" | "ended" | "cancelled";

/** Input from the platform, already translated to window coordinates. */
export type PlatformEvent =
  | Readonly<{ kind: "cursorMoved"; position: Coord }>
  | Readonly<{ kind: "cursorLeft" }>
  | Readonly<{ kind: "mouseInput"; state: "pressed" | "released"; button: MouseButton }>
  | Readonly<{ kind: "mouseWheel"; delta: ScrollDelta }>
  | Readonly<{ kind: "touch"; phase: TouchPhase; touchId: number; position: Vec2 }>
  | Readonly<{ kind: "keyboard"; event: KeyEvent; isSynthetic: boolean }>
  | Readonly<{ kind: "modifiersChanged"; modifiers: Modifiers }>
  | Readonly<{ kind: "ime"; ime: Ime }>
  | Readonly<{ kind: "focused"; focused: boolean }>;

function toCoord(p: Vec2): Coord {
  return coord(Math.round(p.x), Math.round(p.y));
}

export class EventWindow extends EventCx {
  private closed = false;

  private assertOpen(what: string): void {
    if (this.closed) {
      throw new UiError("TRELLIS_INVALID_STATE", `EventWindow.${what}: window is closed`);
    }
  }

  /* --- Configuration --- */

  /**
   * Assign Ids to the whole tree and let every widget register itself.
   * Access layers and the navigation fallback start over; popups, hover,
   * focus and grabs pointing at Ids that no longer resolve are dropped.
   */
  fullConfigure(): void {
    this.assertOpen("fullConfigure");
    this.logger.debug(`full_configure: window=${String(this.windowId)}`);
    this.accessLayers.clear();
    this.focus.fallback = undefined;
    this.newAccelLayer(this.rootId, false);
    new ConfigCx(this).configure(this.root, this.rootId);
    this.dropStaleIds();
    this.actions |= ACTION_REGION_MOVED;
  }

  private resolves(id: Id): boolean {
    return findNode(this.root, id) !== undefined;
  }

  private dropStaleIds(): void {
    for (let i = this.popups.length - 1; i >= 0; i--) {
      const desc = this.popups.at(i)?.desc;
      if (desc === undefined || (this.resolves(desc.id) && this.resolves(desc.parent))) continue;
      this.logger.debug(`full_configure: closing popup over stale ${desc.id.toString()}`);
      this.closePopup(i);
    }
    if (this.mouse.hover !== undefined && !this.resolves(this.mouse.hover)) {
      this.mouse.hover = undefined;
      this.mouse.hoverIcon = "default";
      this.actions |= ACTION_REDRAW;
    }
    for (const [code, held] of this.keyDepress) {
      if (this.resolves(held)) continue;
      this.keyDepress.delete(code);
      this.actions |= ACTION_REDRAW;
    }
    const f = this.focus;
    if (f.nav !== undefined && !this.resolves(f.nav)) f.nav = undefined;
    if (f.sel !== undefined && !this.resolves(f.sel)) {
      if (f.imeFocus) this.pendingImeAllowed = false;
      f.sel = undefined;
      f.keyFocus = false;
      f.ime = undefined;
      f.imeFocus = false;
    }
    const grab = this.mouse.grab;
    if (grab !== undefined && !this.resolves(grab.startId)) {
      if (grab.pan !== undefined) this.pans.remove(grab.pan);
      this.mouse.grab = undefined;
      this.cursorResetPending = true;
    }
    for (let i = this.touch.grabs.length - 1; i >= 0; i--) {
      const t = this.touch.grabs[i];
      if (t === undefined || this.resolves(t.startId)) continue;
      if (t.pan !== undefined) this.pans.remove(t.pan);
      this.touch.removeAt(i);
    }
  }

  /* --- Input --- */

  handleInput(event: PlatformEvent): void {
    this.assertOpen("handleInput");
    switch (event.kind) {
      case "cursorMoved":
        this.cursorMoved(event.position);
        return;
      case "cursorLeft":
        this.cursorLeft();
        return;
      case "mouseInput":
        if (event.state === "pressed") this.mousePressed(event.button);
        else this.mouseReleased(event.button);
        return;
      case "mouseWheel":
        this.mouse.resetRepetitions();
        if (this.mouse.hover !== undefined) {
          this.sendEvent(this.mouse.hover, { kind: "scroll", delta: event.delta });
        }
        return;
      case "touch":
        this.handleTouch(event.phase, event.touchId, event.position);
        return;
      case "keyboard":
        this.handleKeyboard(event.event, event.isSynthetic);
        return;
      case "modifiersChanged":
        if (event.modifiers.alt !== this.mods.alt) this.actions |= ACTION_REDRAW;
        this.mods = event.modifiers;
        return;
      case "ime":
        this.handleIme(event.ime);
        return;
      case "focused":
        this.hasWindowFocus = event.focused;
        if (event.focused) this.actions |= ACTION_REDRAW;
        else this.closeNonAncestorsOf(undefined);
        return;
    }
  }

  /** Deepest widget under `at`; open popups are tried first, top down. */
  private probe(at: Coord): Id | undefined {
    const entries = this.popups.entries();
    for (let i = entries.length - 1; i >= 0; i--) {
      const popup = entries[i];
      if (popup === undefined) continue;
      const node = findNode(this.root, popup.desc.id);
      const hit = node === undefined ? undefined : probeTree(node, at);
      if (hit !== undefined) return hit;
    }
    return probeTree(this.root, at);
  }

  /**
   * While popups are open only widgets inside one of them may be hovered, so
   * a press beside the popups dismisses them without reaching the window.
   */
  private setHover(target: Id | undefined): void {
    const id = target === undefined || this.insideAnyPopup(target) ? target : undefined;
    const old = this.mouse.hover;
    if (old === undefined ? id === undefined : old.equals(id)) return;
    this.logger.trace(`set_hover: ${old?.toString() ?? "none"} -> ${id?.toString() ?? "none"}`);
    this.mouse.hover = id;
    this.mouse.hoverIcon = "default";
    this.actions |= ACTION_REDRAW;
    if (old !== undefined) this.sendEvent(old, { kind: "mouseOver", hovered: false });
    if (id !== undefined) this.sendEvent(id, { kind: "mouseOver", hovered: true });
  }

  private insideAnyPopup(id: Id): boolean {
    const entries = this.popups.entries();
    return entries.length === 0 || entries.some((p) => p.desc.id.isAncestorOf(id));
  }

  private cursorMoved(position: Coord): void {
    this.mouse.resetRepetitions();
    const prev = this.mouse.lastCoord;
    this.mouse.lastCoord = position;
    this.mouse.inWindow = true;
    const hover = this.probe(position);
    this.setHover(hover);

    const grab = this.mouse.grab;
    if (grab !== undefined) {
      if (grab.mode === "drag") {
        this.sendEvent(grab.startId, {
          kind: "pressMove",
          press: { source: mouseSource(grab.button, grab.repetitions), id: hover, coord: position },
          delta: vec2(position.x - prev.x, position.y - prev.y),
        });
      } else if (grab.pan !== undefined) {
        grab.pan.cur = vec2(position.x, position.y);
      } else if (this.mouse.updateClickDepress()) {
        this.actions |= ACTION_REDRAW;
      }
      return;
    }

    const top = this.popups.top();
    if (top !== undefined) {
      this.sendEvent(top.desc.id, {
        kind: "cursorMove",
        press: { source: mouseSource(FAKE_MOUSE_BUTTON, 0), id: hover, coord: position },
      });
    }
  }

  private cursorLeft(): void {
    this.mouse.resetRepetitions();
    this.mouse.inWindow = false;
    if (this.mouse.grab !== undefined) return;
    this.mouse.lastCoord = coord(-1, -1);
    this.setHover(undefined);
  }

  private mousePressed(button: MouseButton): void {
    const repetitions = this.mouse.registerPress(
      button,
      this.clock(),
      this.config.doubleClickTimeoutMs,
    );
    const grab = this.mouse.grab;
    if (grab !== undefined) {
      // A press of the grabbing button means its release was lost
      this.removeMouseGrab(grab.button === button);
    }

    const hover = this.mouse.hover;
    if (hover !== undefined && this.config.mouseNavFocus) {
      const nav = this.navSearch(this.root, hover, { kind: "none" });
      if (nav !== undefined) this.setNavFocus(nav, "pointer");
    }

    this.sendPopupFirst(hover, {
      kind: "pressStart",
      press: { source: mouseSource(button, repetitions), id: hover, coord: this.mouse.lastCoord },
    });
  }

  private mouseReleased(button: MouseButton): void {
    if (this.mouse.grab?.button === button) this.removeMouseGrab(true);
  }

  private handleTouch(phase: TouchPhase, touchId: number, position: Vec2): void {
    const at = toCoord(position);
    const source = touchSource(touchId);
    switch (phase) {
      case "started": {
        const over = this.probe(at);
        this.closeNonAncestorsOf(over);
        if (over === undefined) return;
        if (this.config.touchNavFocus) {
          const nav = this.navSearch(this.root, over, { kind: "none" });
          if (nav !== undefined) this.setNavFocus(nav, "pointer");
        }
        this.sendEvent(over, { kind: "pressStart", press: { source, id: over, coord: at } });
        return;
      }
      case "moved": {
        const grab = this.touch.get(touchId);
        if (grab === undefined) return;
        const delta = vec2(position.x - grab.lastPosition.x, position.y - grab.lastPosition.y);
        grab.lastPosition = position;
        grab.velocity?.push(this.clock(), delta);
        grab.over = this.probe(at);
        if (grab.mode === "drag") {
          this.sendEvent(grab.startId, {
            kind: "pressMove",
            press: { source, id: grab.over, coord: at },
            delta,
          });
        } else if (grab.pan !== undefined) {
          grab.pan.cur = position;
        } else if (TouchState.updateClickDepress(grab)) {
          this.actions |= ACTION_REDRAW;
        }
        return;
      }
      case "ended":
      case "cancelled": {
        const index = this.touch.indexOf(touchId);
        const grab = this.touch.grabs[index];
        if (grab === undefined) return;
        if (!TouchState.isPan(grab)) {
          this.sendEvent(grab.startId, {
            kind: "pressEnd",
            press: { source, id: grab.over, coord: at },
            success: phase === "ended",
            mode: grab.mode,
          });
        }
        // The handler may have replaced the grab
        const current = this.touch.indexOf(touchId);
        const removed = current < 0 ? undefined : this.touch.removeAt(current);
        if (removed?.pan !== undefined) this.pans.remove(removed.pan);
        if (removed?.depress !== undefined) this.actions |= ACTION_REDRAW;
        return;
      }
    }
  }

  /* --- Keyboard --- */

  private handleKeyboard(event: KeyEvent, isSynthetic: boolean): void {
    const holder = this.focus.keyFocusId();
    let used = UNUSED;
    if (holder !== undefined) {
      const ev = shouldDropKeyText(event, this.mods) ? withoutText(event) : event;
      used = this.sendEvent(holder, { kind: "key", event: ev, isSynthetic });
    }

    if (event.state === "released") {
      if (this.keyDepress.delete(event.physicalKey)) this.actions |= ACTION_REDRAW;
      return;
    }
    if (used === UNUSED && !isSynthetic) this.startKeyEvent(event.logicalKey, event.physicalKey);
  }

  /** Route a key nobody with key focus used: shortcuts, access keys, Tab, Escape. */
  private startKeyEvent(key: Key, code: PhysicalKey): void {
    const cmd = this.shortcuts.tryMatch(this.mods, key);
    if (cmd !== undefined) {
      const targets = commandTargets(cmd, {
        sel: this.focus.sel,
        keyFocus: this.focus.keyFocus,
        nav: this.focus.nav,
        popup: this.popups.topSized()?.desc.id,
        fallback: this.focus.fallback,
        root: this.rootId,
        mods: this.mods,
      });
      for (const id of targets) {
        if (this.sendEvent(id, commandEvent(cmd, code)) === USED) return;
      }
      if (cmd === "exit") {
        this.callRunner("exit", (r) => r.exit());
        return;
      }
      if (cmd === "close") {
        this.handleClose();
        return;
      }
    }

    if (this.activateAccessKey(key, code)) return;

    const plain = !this.mods.ctrl && !this.mods.alt && !this.mods.meta;
    if (plain && isNamedKey(key, "Tab")) {
      this.nextNavFocus(undefined, this.mods.shift, "key");
    } else if (isNamedKey(key, "Escape") && this.popups.length > 0) {
      this.closePopup(this.popups.length - 1);
    }
  }

  private activateAccessKey(key: Key, code: PhysicalKey): boolean {
    const layers: Id[] = [];
    const entries = this.popups.entries();
    for (let i = entries.length - 1; i >= 0; i--) {
      const popup = entries[i];
      if (popup !== undefined) layers.push(popup.desc.id);
    }
    layers.push(this.rootId);

    for (const layer of layers) {
      const id = this.accessLayers.lookup(layer, key, this.mods);
      if (id === undefined) continue;
      this.closeNonAncestorsOf(id);
      const nav = this.navSearch(this.root, id, { kind: "none" });
      if (nav !== undefined) this.setNavFocus(nav, "key");
      this.depressWithKey(id, code);
      this.sendEvent(id, commandEvent("activate", code));
      return true;
    }
    return false;
  }

  private handleIme(ime: Ime): void {
    const holder = this.focus.imeFocusId();
    if (holder === undefined) return;
    this.sendEvent(holder, { kind: "ime", ime });
    if (ime.kind === "disabled") this.focus.imeFocus = false;
  }

  /* --- Timers and frames --- */

  /** Fire every timer due now. Returns how many fired. */
  updateTimers(): number {
    this.assertOpen("updateTimers");
    const due = this.timers.takeDue(this.clock());
    for (const entry of due) {
      this.logger.trace(`timer: id=${entry.id.toString()}, ${entry.handle.toString()}`);
      this.sendEvent(entry.id, { kind: "timer", handle: entry.handle });
    }
    return due.length;
  }

  /** Fire frame-aligned timers; call once per drawn frame. */
  frameUpdate(): void {
    this.assertOpen("frameUpdate");
    for (const { id, handle } of this.timers.takeFrameUpdates()) {
      this.sendEvent(id, { kind: "timer", handle });
    }
  }

  /** When the loop should next wake for a timer. */
  nextResume(): number | undefined {
    return this.timers.nextResume();
  }

  /* --- Flush --- */

  /**
   * Commit everything staged since the last flush and return the
   * accumulated actions.
   */
  flushPending(): Action {
    this.assertOpen("flushPending");

    for (const { id, windowId } of this.popupRemoved.splice(0)) {
      this.sendEvent(id, { kind: "popupClosed", windowId });
    }
    for (let next = this.pendingEvents.shift(); next !== undefined; next = this.pendingEvents.shift()) {
      this.sendEvent(next.id, next.event);
    }
    if (this.mouse.updateClickDepress()) this.actions |= ACTION_REDRAW;
    for (const grab of this.touch.grabs) {
      if (TouchState.updateClickDepress(grab)) this.actions |= ACTION_REDRAW;
    }
    for (const { id, transform } of this.pans.takeFrame()) {
      this.sendEvent(id, { kind: "pan", alpha: transform.alpha, delta: transform.delta });
    }

    const update = this.pendingUpdate;
    this.pendingUpdate = undefined;
    if (update !== undefined) this.runUpdate(update.id, update.reconfigure);

    this.commitPendingNav();
    this.commitPendingSel();

    for (const { id, cmd } of this.pendingCmds.splice(0)) {
      if (this.sendEvent(id, commandEvent(cmd)) === USED) continue;
      if (cmd === "exit") this.callRunner("exit", (r) => r.exit());
      else if (cmd === "close") this.handleClose();
    }
    for (let next = this.sendQueue.shift(); next !== undefined; next = this.sendQueue.shift()) {
      this.replay(next.id, next.msg);
    }
    for (const { id, msg } of this.asyncQueue.takeReady()) {
      this.replay(id, msg);
    }

    if ((this.actions & ACTION_REGION_MOVED) !== 0) {
      if (this.mouse.inWindow) this.setHover(this.probe(this.mouse.lastCoord));
      for (const grab of this.touch.grabs) {
        grab.over = this.probe(toCoord(grab.lastPosition));
      }
      this.actions = (this.actions & ~ACTION_REGION_MOVED) | ACTION_REDRAW;
    }

    if (this.mouse.grab === undefined) {
      const changed = this.mouse.takeHoverIconChange();
      const icon = this.cursorResetPending ? this.mouse.hoverIcon : changed;
      if (icon !== undefined) this.callRunner("setCursorIcon", (r) => r.setCursorIcon(icon));
      this.cursorResetPending = false;
    }
    const imeAllowed = this.pendingImeAllowed;
    if (imeAllowed !== undefined) {
      this.pendingImeAllowed = undefined;
      this.callRunner("setImeAllowed", (r) => r.setImeAllowed(imeAllowed));
    }

    return this.takeAction();
  }

  private runUpdate(id: Id, reconfigure: boolean): void {
    const node = findNode(this.root, id);
    if (node === undefined) {
      this.logger.trace(`update: ${id.toString()} not found; dropped`);
      return;
    }
    const cx = new ConfigCx(this);
    if (reconfigure) {
      cx.configure(node, id);
      this.actions |= ACTION_REGION_MOVED;
    } else {
      cx.update(node);
    }
  }

  /* --- Accessibility --- */

  /** Apply an accessibility action request as if it were native input. */
  handleAccessAction(request: AccessActionRequest): void {
    this.assertOpen("handleAccessAction");
    const node = findNode(this.root, request.target);
    const effect = resolveAccessAction(request, node?.rect, this.logger);
    switch (effect.kind) {
      case "ignore":
        return;
      case "command":
        this.sendEvent(request.target, commandEvent(effect.command));
        return;
      case "focus":
        this.setNavFocus(request.target, "synthetic");
        return;
      case "scroll":
        this.sendEvent(request.target, { kind: "scroll", delta: effect.delta });
        return;
      case "message":
        this.replay(request.target, effect.msg);
        return;
      case "scrollRect":
        this.replayScroll(request.target, { kind: "rect", rect: effect.rect });
        return;
    }
  }

  /* --- Lifecycle --- */

  /** The application was suspended: close every popup and tell the app. */
  suspended(): void {
    this.assertOpen("suspended");
    this.closeNonAncestorsOf(undefined);
    this.appData.suspended?.();
  }

  /** Close every popup. Later calls other than `close` throw. */
  close(): void {
    if (this.closed) return;
    this.closeNonAncestorsOf(undefined);
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Window id of the popup at `index`, bottom first. */
  popupWindowId(index: number): WindowId | undefined {
    return this.popups.at(index)?.windowId;
  }
}
