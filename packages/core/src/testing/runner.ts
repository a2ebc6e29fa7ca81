/**
 * packages/core/src/testing/runner.ts - Recording platform double.
 *
 * Why: Window tests assert on what the core asked the platform to do. Every
 * call is recorded in order; popup window ids are handed out sequentially.
 * Setting `failWith` makes every call throw, to exercise failure handling.
 */

import type { WindowId } from "../id/id.js";
import type { PopupDescriptor, Runner, Waker, WindowSpec } from "../event/node.js";
import type { CursorIcon, Rect } from "../event/types.js";

export type RunnerCall =
  | Readonly<{ kind: "addPopup"; parent: WindowId; desc: PopupDescriptor; windowId: WindowId }>
  | Readonly<{ kind: "repositionPopup"; windowId: WindowId; desc: PopupDescriptor }>
  | Readonly<{ kind: "addWindow"; title: string; windowId: WindowId }>
  | Readonly<{ kind: "closeWindow"; windowId: WindowId }>
  | Readonly<{ kind: "exit" }>
  | Readonly<{ kind: "setCursorIcon"; icon: CursorIcon }>
  | Readonly<{ kind: "setImeAllowed"; allowed: boolean }>
  | Readonly<{ kind: "setImeCursorArea"; rect: Rect }>;

export class FakeRunner implements Runner {
  readonly calls: RunnerCall[] = [];
  clipboard: string | undefined;
  primary: string | undefined;
  wakeCount = 0;
  /** When set, every method throws this error. */
  failWith: Error | undefined;
  private nextWindowId = 100;

  private check(): void {
    if (this.failWith !== undefined) throw this.failWith;
  }

  addPopup(parent: WindowId, desc: PopupDescriptor): WindowId {
    this.check();
    const windowId = this.nextWindowId++;
    this.calls.push({ kind: "addPopup", parent, desc, windowId });
    return windowId;
  }

  repositionPopup(windowId: WindowId, desc: PopupDescriptor): void {
    this.check();
    this.calls.push({ kind: "repositionPopup", windowId, desc });
  }

  addWindow(spec: WindowSpec): WindowId {
    this.check();
    const windowId = this.nextWindowId++;
    this.calls.push({ kind: "addWindow", title: spec.title, windowId });
    return windowId;
  }

  closeWindow(windowId: WindowId): void {
    this.check();
    this.calls.push({ kind: "closeWindow", windowId });
  }

  exit(): void {
    this.check();
    this.calls.push({ kind: "exit" });
  }

  getClipboard(): string | undefined {
    this.check();
    return this.clipboard;
  }

  setClipboard(content: string): void {
    this.check();
    this.clipboard = content;
  }

  getPrimary(): string | undefined {
    this.check();
    return this.primary;
  }

  setPrimary(content: string): void {
    this.check();
    this.primary = content;
  }

  setCursorIcon(icon: CursorIcon): void {
    this.check();
    this.calls.push({ kind: "setCursorIcon", icon });
  }

  setImeAllowed(allowed: boolean): void {
    this.check();
    this.calls.push({ kind: "setImeAllowed", allowed });
  }

  setImeCursorArea(rect: Rect): void {
    this.check();
    this.calls.push({ kind: "setImeCursorArea", rect });
  }

  waker(): Waker {
    return {
      wake: () => {
        this.wakeCount++;
      },
    };
  }

  /** Recorded calls of one kind. */
  callsOf<K extends RunnerCall["kind"]>(kind: K): Array<Extract<RunnerCall, { kind: K }>> {
    const out: Array<Extract<RunnerCall, { kind: K }>> = [];
    for (const call of this.calls) {
      if (isCall(call, kind)) out.push(call);
    }
    return out;
  }
}

function isCall<K extends RunnerCall["kind"]>(
  call: RunnerCall,
  kind: K,
): call is Extract<RunnerCall, { kind: K }> {
  return call.kind === kind;
}
