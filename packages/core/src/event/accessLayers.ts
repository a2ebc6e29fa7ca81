/**
 * packages/core/src/event/accessLayers.ts - Scoped access-key bindings.
 *
 * Why: Access keys (Alt+letter) bind to the nearest enclosing layer rather
 * than a global table, so a popup's layer can shadow the window's bindings
 * for the same letter. Layers are recreated on every full configure; the
 * window root always has one.
 */

import type { Logger } from "../debug/logger.js";
import { debugAssert } from "../debug/logger.js";
import type { Id } from "../id/id.js";
import { type Key, type Modifiers, isEmptyMods, isOnlyAlt } from "./types.js";

type AccessLayer = {
  readonly id: Id;
  readonly altBypass: boolean;
  readonly keys: Map<string, Id>;
};

function bindingKey(key: Key): string {
  return key.kind === "named" ? `n:${key.name}` : `c:${key.text.toLowerCase()}`;
}

export class AccessLayers {
  private readonly layers = new Map<string, AccessLayer>();

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.layers.size;
  }

  clear(): void {
    this.layers.clear();
  }

  /**
   * Make `id` a layer root. With `altBypass`, its keys also match when no
   * modifier is held (menus opened from the keyboard).
   */
  newLayer(id: Id, altBypass: boolean): void {
    this.layers.set(id.toString(), { id, altBypass, keys: new Map() });
  }

  has(id: Id): boolean {
    return this.layers.has(id.toString());
  }

  /** The layer with the longest root path that encloses `id`. */
  nearest(id: Id): Id | undefined {
    let best: AccessLayer | undefined;
    for (const layer of this.layers.values()) {
      if (!layer.id.isAncestorOf(id)) continue;
      if (best === undefined || layer.id.depth > best.id.depth) best = layer;
    }
    return best?.id;
  }

  /**
   * Bind `keys` to `id` in its nearest layer. A key already bound in that
   * layer keeps its first binding. Returns the number of keys bound.
   */
  addKeys(id: Id, keys: readonly Key[]): number {
    const layerId = this.nearest(id);
    debugAssert(this.logger, layerId !== undefined, `no access layer encloses ${id.toString()}`);
    if (layerId === undefined) return 0;
    const layer = this.layers.get(layerId.toString());
    if (layer === undefined) return 0;
    let n = 0;
    for (const key of keys) {
      const k = bindingKey(key);
      if (layer.keys.has(k)) continue;
      layer.keys.set(k, id);
      n++;
    }
    return n;
  }

  /**
   * Resolve `key` in the layer rooted at `layerId`, when the modifiers allow
   * that layer: exactly Alt, or none for an alt-bypass layer.
   */
  lookup(layerId: Id, key: Key, mods: Modifiers): Id | undefined {
    const layer = this.layers.get(layerId.toString());
    if (layer === undefined) return undefined;
    if (!isOnlyAlt(mods) && !(layer.altBypass && isEmptyMods(mods))) return undefined;
    return layer.keys.get(bindingKey(key));
  }
}
