/**
 * packages/core/src/event/messages.ts - Type-erased upward message channel.
 *
 * Why: During one dispatch a widget can push a message that its nearest
 * interested ancestor pops by type. Messages are class instances and the type
 * check is `instanceof`, so a handler only consumes what it recognises and
 * anything left over keeps bubbling.
 *
 * The stack has a base watermark. A traversal started while another one is
 * still live sets the base to the current length, so the inner traversal can
 * neither see nor pop the outer traversal's messages.
 */

import type { Logger } from "../debug/logger.js";

/** Any class whose instances can travel on the stack. */
export type MessageType<M> = abstract new (...args: never[]) => M;

function describeMessage(value: object): string {
  const name = value.constructor.name;
  let body: string;
  try {
    body = JSON.stringify(value);
  } catch {
    body = "{...}";
  }
  return body === "{}" ? name : `${name}${body}`;
}

/**
 * A message with its static type erased.
 */
export class Erased {
  readonly value: object;

  constructor(value: object) {
    this.value = value;
  }

  is<M extends object>(type: MessageType<M>): boolean {
    return this.value instanceof type;
  }

  downcast<M extends object>(type: MessageType<M>): M | undefined {
    const value = this.value;
    return value instanceof type ? value : undefined;
  }

  toString(): string {
    return describeMessage(this.value);
  }
}

/**
 * Sentinel pushed when kinetic scrolling stops. Nobody is required to handle
 * it, so teardown does not report it.
 */
export class KineticScrollEnd {}

/**
 * LIFO stack of erased messages with a base watermark.
 */
export class MessageStack {
  private readonly stack: Erased[] = [];
  private base = 0;
  private opCount = 0;

  /** Hide everything currently on the stack from `hasAny`/`tryPop`. */
  setBase(): void {
    this.base = this.stack.length;
  }

  /** Drop the watermark; report whether any message remains at all. */
  resetAndHasAny(): boolean {
    this.base = 0;
    return this.stack.length > 0;
  }

  getBase(): number {
    return this.base;
  }

  /** Restore a watermark saved with `getBase`. */
  restoreBase(base: number): void {
    this.base = Math.min(base, this.stack.length);
  }

  hasAny(): boolean {
    return this.stack.length > this.base;
  }

  get length(): number {
    return this.stack.length;
  }

  /** Incremented by every push and pop; lets callers detect handling. */
  getOpCount(): number {
    return this.opCount;
  }

  push(msg: object): void {
    this.pushErased(msg instanceof Erased ? msg : new Erased(msg));
  }

  pushErased(msg: Erased): void {
    this.opCount += 1;
    this.stack.push(msg);
  }

  /** Pop the top message if it is above the base and an instance of `type`. */
  tryPop<M extends object>(type: MessageType<M>): M | undefined {
    if (!this.hasAny()) return undefined;
    const top = this.stack[this.stack.length - 1];
    const value = top?.downcast(type);
    if (value === undefined) return undefined;
    this.stack.pop();
    this.opCount += 1;
    return value;
  }

  /** Pop the top message regardless of type, if above the base. */
  popErased(): Erased | undefined {
    if (!this.hasAny()) return undefined;
    const top = this.stack.pop();
    if (top !== undefined) this.opCount += 1;
    return top;
  }

  tryPeek<M extends object>(type: MessageType<M>): M | undefined {
    if (!this.hasAny()) return undefined;
    return this.stack[this.stack.length - 1]?.downcast(type);
  }

  /** Same as `tryPeek`: observe without consuming. */
  tryObserve<M extends object>(type: MessageType<M>): M | undefined {
    return this.tryPeek(type);
  }

  peekDebug(): string | undefined {
    if (!this.hasAny()) return undefined;
    return this.stack[this.stack.length - 1]?.toString();
  }

  /**
   * Move the messages above the base onto a new stack of their own. Used when
   * a nested traversal ends so its leftovers cannot bubble through the outer
   * traversal's path.
   */
  splitAboveBase(): MessageStack {
    const split = new MessageStack();
    for (const msg of this.stack.splice(this.base)) split.pushErased(msg);
    this.opCount += split.length;
    return split;
  }

  /**
   * Discard every remaining message, warning about each one that is not a
   * kinetic-scroll sentinel. Returns the number discarded.
   */
  drain(logger: Logger): number {
    const n = this.stack.length;
    for (const msg of this.stack.splice(0)) {
      if (msg.is(KineticScrollEnd)) continue;
      logger.warn(`unhandled message: ${msg.toString()}`);
    }
    this.base = 0;
    return n;
  }
}

/* --- Standard messages --- */

/** Activate a widget, optionally naming the physical key responsible. */
export class Activate {
  constructor(readonly code?: string) {}
}

export class IncrementStep {}

export class DecrementStep {}

export class SetValueF64 {
  constructor(readonly value: number) {}
}

export class SetValueText {
  constructor(readonly text: string) {}
}

export class ReplaceSelectedText {
  constructor(readonly text: string) {}
}

export class SetIndex {
  constructor(readonly index: number) {}
}

/** Request that a widget (e.g. a list entry) becomes selected. */
export class Select {}

export class SetScrollOffset {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}
