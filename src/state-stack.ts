/**
 * LIFO store of previously active states.
 *
 * Entries are the live instances themselves, so a restored state keeps the arguments
 * and variables it had when it was pushed. Pushing the same instance twice stores it
 * twice.
 *
 * @module
 */
import { Option } from "effect";

import type { StateInstance } from "./live.js";

export class StateStack<S extends StateInstance = StateInstance> {
  private readonly items: S[] = [];

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(state: S): void {
    this.items.push(state);
  }

  pop(): Option.Option<S> {
    return Option.fromNullable(this.items.pop());
  }

  peek(): Option.Option<S> {
    return Option.fromNullable(this.items[this.items.length - 1]);
  }

  clear(): void {
    this.items.length = 0;
  }

  /** Bottom-to-top snapshot */
  entries(): ReadonlyArray<S> {
    return [...this.items];
  }
}
