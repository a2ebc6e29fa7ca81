/**
 * packages/core/src/id/id.ts - Structural widget identifiers.
 *
 * Why: Widgets are addressed by their position in the tree, not by object
 * reference. An Id is the path of child indices from the window root, so
 * ancestor tests are prefix tests and Ids stay plain comparable values that
 * outlive the nodes they name. A full reconfigure may hand the same path to a
 * different widget; state keyed by Id is revalidated at that point.
 */

import { UiError } from "../errors.js";

/**
 * Path identifier of a node in the widget tree.
 *
 * Ordering is lexicographic over the path, so a parent sorts before its
 * children and siblings sort by index.
 */
export class Id {
  /** The root of every path. */
  static readonly ROOT: Id = new Id(Object.freeze([]));

  private readonly path: readonly number[];
  private readonly text: string;

  private constructor(path: readonly number[]) {
    this.path = path;
    this.text = path.length === 0 ? "#" : `#${path.join(".")}`;
  }

  /** Build an Id from an explicit child-index path. */
  static fromPath(path: readonly number[]): Id {
    for (const key of path) {
      if (!Number.isInteger(key) || key < 0) {
        throw new UiError("TRELLIS_INVALID_ID", `Id.fromPath: invalid key ${String(key)}`);
      }
    }
    return new Id(Object.freeze([...path]));
  }

  /** Parse the `#a.b.c` form produced by `toString()`. */
  static parse(text: string): Id {
    if (!text.startsWith("#")) {
      throw new UiError("TRELLIS_INVALID_ID", `Id.parse: expected leading "#" in "${text}"`);
    }
    const body = text.slice(1);
    if (body.length === 0) return Id.ROOT;
    const keys = body.split(".").map((part) => (/^\d+$/.test(part) ? Number(part) : -1));
    if (keys.some((key) => key < 0)) {
      throw new UiError("TRELLIS_INVALID_ID", `Id.parse: malformed path "${text}"`);
    }
    return Id.fromPath(keys);
  }

  get depth(): number {
    return this.path.length;
  }

  keys(): readonly number[] {
    return this.path;
  }

  isRoot(): boolean {
    return this.path.length === 0;
  }

  makeChild(key: number): Id {
    if (!Number.isInteger(key) || key < 0) {
      throw new UiError("TRELLIS_INVALID_ID", `Id.makeChild: invalid key ${String(key)}`);
    }
    return new Id(Object.freeze([...this.path, key]));
  }

  parent(): Id | undefined {
    if (this.path.length === 0) return undefined;
    return new Id(this.path.slice(0, -1));
  }

  equals(other: Id | undefined): boolean {
    return other !== undefined && this.text === other.text;
  }

  /** True when this path is a prefix of (or equal to) `other`. */
  isAncestorOf(other: Id): boolean {
    if (this.path.length > other.path.length) return false;
    for (let i = 0; i < this.path.length; i++) {
      if (this.path[i] !== other.path[i]) return false;
    }
    return true;
  }

  /** Longest shared prefix of both paths. */
  commonAncestor(other: Id): Id {
    const limit = Math.min(this.path.length, other.path.length);
    let n = 0;
    while (n < limit && this.path[n] === other.path[n]) n++;
    if (n === this.path.length) return this;
    if (n === other.path.length) return other;
    return new Id(this.path.slice(0, n));
  }

  /**
   * Keys of this path below `ancestor`; empty when `ancestor` is not a prefix.
   *
   * Views over data models use this to recover a data key from a child Id.
   */
  iterKeysAfter(ancestor: Id): readonly number[] {
    if (!ancestor.isAncestorOf(this)) return [];
    return this.path.slice(ancestor.path.length);
  }

  /** The first key below `ancestor`, if this is a strict descendant. */
  nextKeyAfter(ancestor: Id): number | undefined {
    if (!ancestor.isAncestorOf(this)) return undefined;
    return this.path[ancestor.path.length];
  }

  compare(other: Id): number {
    const limit = Math.min(this.path.length, other.path.length);
    for (let i = 0; i < limit; i++) {
      const a = this.path[i] ?? 0;
      const b = other.path[i] ?? 0;
      if (a !== b) return a < b ? -1 : 1;
    }
    return this.path.length - other.path.length;
  }

  /** Stable string key, usable in Maps and Sets. */
  toString(): string {
    return this.text;
  }
}

/** Equality over optional ids. */
export function sameId(a: Id | undefined, b: Id | undefined): boolean {
  if (a === undefined) return b === undefined;
  return a.equals(b);
}

/** Identifier the runner assigns to a platform window (main or popup). */
export type WindowId = number;
