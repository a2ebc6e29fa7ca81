/**
 * packages/core/src/event/node.ts - Collaborator interfaces of the event core.
 *
 * Why: The core never sees concrete widget types. It reaches the tree through
 * the small `Node` capability interface and the host platform through
 * `Runner`, so layout, drawing and windowing stay outside it. The helpers
 * here walk a Node tree by Id: lookup, hit-testing, configure and update
 * passes, and the structural search behind keyboard navigation.
 */

import type { Logger } from "../debug/logger.js";
import type { Id, WindowId } from "../id/id.js";
import type { ConfigCx } from "./configCx.js";
import type { Event } from "./event.js";
import type { EventCx } from "./eventCx.js";
import type { MessageStack } from "./messages.js";
import type { Action, Coord, CursorIcon, IsUsed, NavAdvance, Rect, Scroll } from "./types.js";

/**
 * A widget as seen by the event core.
 *
 * `id` is assigned by the configure pass: the root receives the window's root
 * Id and child `i` receives `parent.makeChild(i)`.
 */
export interface Node {
  id: Id;
  /** Children in key order; index `i` is the child with key `i`. */
  children(): readonly Node[];
  /** Rectangle in window coordinates, used by the default hit test. */
  readonly rect?: Rect;
  /**
   * Content shown in a popup window. Skipped by hit tests and navigation
   * searches of the parent window; reached through the popup stack instead.
   */
  readonly overlay?: boolean;
  navigable?(): boolean;
  /** Custom hit test. The default tests `rect` and then children, last first. */
  probe?(coord: Coord): Id | undefined;
  configure?(cx: ConfigCx): void;
  update?(cx: ConfigCx): void;
  handleEvent?(cx: EventCx, event: Event): IsUsed;
  handleMessages?(cx: EventCx): void;
  handleScroll?(cx: EventCx, scroll: Scroll): void;
}

/** Placement request for a popup window. `id` names the popup's node. */
export type PopupDescriptor = Readonly<{
  id: Id;
  /** The widget that opened the popup; shown depressed while it is open. */
  parent: Id;
  rect?: Rect;
}>;

export type WindowSpec = Readonly<{
  title: string;
  root: Node;
}>;

export type Waker = Readonly<{
  wake: () => void;
}>;

/**
 * Platform services. Methods may throw; the core logs the failure at warn
 * level and carries on as if the operation had no effect.
 */
export interface Runner {
  addPopup(parent: WindowId, desc: PopupDescriptor): WindowId;
  repositionPopup(id: WindowId, desc: PopupDescriptor): void;
  addWindow(spec: WindowSpec): WindowId;
  closeWindow(id: WindowId): void;
  exit(): void;
  getClipboard(): string | undefined;
  setClipboard(content: string): void;
  getPrimary(): string | undefined;
  setPrimary(content: string): void;
  setCursorIcon(icon: CursorIcon): void;
  setImeAllowed(allowed: boolean): void;
  setImeCursorArea(rect: Rect): void;
  waker(): Waker;
}

/** The application's top-level message hook. */
export interface AppData {
  /** Called with messages no widget consumed. May return actions to apply. */
  handleMessages(messages: MessageStack): Action | void;
  suspended?(): void;
}

/* --- Tree walks --- */

/**
 * Resolve `id` to its node, or undefined when the path does not exist or
 * leads to a node configured under another Id.
 */
export function findNode(root: Node, id: Id): Node | undefined {
  return findPath(root, id)?.at(-1);
}

/**
 * Nodes from `root` down to `id`, inclusive. Undefined when unresolvable.
 */
export function findPath(root: Node, id: Id): Node[] | undefined {
  if (!root.id.isAncestorOf(id)) return undefined;
  const path: Node[] = [root];
  let node = root;
  for (const key of id.iterKeysAfter(root.id)) {
    const child = node.children()[key];
    if (child === undefined) return undefined;
    path.push(child);
    node = child;
  }
  return node.id.equals(id) ? path : undefined;
}

function contains(rect: Rect, c: Coord): boolean {
  return c.x >= rect.x && c.y >= rect.y && c.x < rect.x + rect.w && c.y < rect.y + rect.h;
}

/**
 * Deepest Id under `coord` within `node`. Overlay children are skipped; an
 * overlay node probed directly is searched normally.
 */
export function probeTree(node: Node, coord: Coord): Id | undefined {
  if (node.probe) return node.probe(coord);
  if (node.rect !== undefined && !contains(node.rect, coord)) return undefined;
  const children = node.children();
  for (let i = children.length - 1; i >= 0; i--) {
    const child = children[i];
    if (child === undefined || child.overlay === true) continue;
    const hit = probeTree(child, coord);
    if (hit !== undefined) return hit;
  }
  return node.id;
}

/** Assign Ids and call `configure`, parents before children. */
export function configureTree(cx: ConfigCx, node: Node, id: Id): void {
  node.id = id;
  node.configure?.(cx);
  const children = node.children();
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (child !== undefined) configureTree(cx, child, id.makeChild(i));
  }
}

export function updateTree(cx: ConfigCx, node: Node): void {
  node.update?.(cx);
  for (const child of node.children()) updateTree(cx, child);
}

/* --- Navigation search --- */

export type NavSearchCx = Readonly<{
  isDisabled: (id: Id) => boolean;
  logger?: Logger;
}>;

function collectNavigable(node: Node, cx: NavSearchCx, out: Id[]): void {
  if (cx.isDisabled(node.id)) return;
  if (node.navigable?.() === true) out.push(node.id);
  for (const child of node.children()) {
    if (child.overlay === true) continue;
    collectNavigable(child, cx, out);
  }
}

/**
 * Structural navigation search within `root`.
 *
 * - none: the nearest navigable widget at or above `focus`.
 * - forward: the next navigable widget after `focus` in pre-order, or the
 *   first when `focus` is undefined. `allowFocus` admits `focus` itself.
 * - reverse: the same in reverse pre-order.
 *
 * Disabled subtrees are never entered.
 */
export function navNext(
  root: Node,
  focus: Id | undefined,
  advance: NavAdvance,
  cx: NavSearchCx,
): Id | undefined {
  cx.logger?.trace(`nav_next: focus=${focus?.toString() ?? "none"}, advance=${advance.kind}`);

  if (advance.kind === "none") {
    if (focus === undefined) return undefined;
    const path = findPath(root, focus);
    if (path === undefined) return undefined;
    let candidate: Id | undefined;
    for (const node of path) {
      if (cx.isDisabled(node.id)) break;
      if (node.navigable?.() === true) candidate = node.id;
    }
    return candidate;
  }

  const order: Id[] = [];
  collectNavigable(root, cx, order);
  if (focus === undefined) {
    return advance.kind === "forward" ? order[0] : order.at(-1);
  }

  if (advance.kind === "forward") {
    for (const id of order) {
      const c = id.compare(focus);
      if (c > 0 || (c === 0 && advance.allowFocus)) return id;
    }
    return undefined;
  }
  for (let i = order.length - 1; i >= 0; i--) {
    const id = order[i];
    if (id === undefined) continue;
    const c = id.compare(focus);
    if (c < 0 || (c === 0 && advance.allowFocus)) return id;
  }
  return undefined;
}
