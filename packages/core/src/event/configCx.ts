/**
 * packages/core/src/event/configCx.ts - Context for configure and update passes.
 *
 * Why: Configure assigns Ids and lets widgets register with the event state
 * (navigation fallback, access keys, disabled flags, timers). Widgets only
 * see this narrow surface during those passes, never the dispatcher.
 */

import type { Id } from "../id/id.js";
import type { EventState } from "./eventState.js";
import { type Node, configureTree, updateTree } from "./node.js";
import type { TimerHandle } from "./timers.js";
import type { Key } from "./types.js";

export class ConfigCx {
  constructor(readonly state: EventState) {}

  /** Configure `node` and its subtree under `id`. */
  configure(node: Node, id: Id): void {
    configureTree(this, node, id);
  }

  update(node: Node): void {
    updateTree(this, node);
  }

  isDisabled(id: Id): boolean {
    return this.state.isDisabled(id);
  }

  setDisabled(id: Id, disabled: boolean): void {
    this.state.setDisabled(id, disabled);
  }

  registerNavFallback(id: Id): void {
    this.state.registerNavFallback(id);
  }

  newAccelLayer(id: Id, altBypass: boolean): void {
    this.state.newAccelLayer(id, altBypass);
  }

  addAccelKeys(id: Id, keys: readonly Key[]): void {
    this.state.addAccelKeys(id, keys);
  }

  requestTimer(id: Id, handle: TimerHandle, delayMs: number): void {
    this.state.requestTimer(id, handle, delayMs);
  }

  requestFrameTimer(id: Id, handle: TimerHandle): void {
    this.state.requestFrameTimer(id, handle);
  }
}
