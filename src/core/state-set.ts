/**
 * Immutable, id-keyed set of states.
 *
 * States compare by id, so two distinct objects with the same id are the
 * same member. Every operation returns a new set.
 */

import type { State } from './types.js';

type StateRef = State | string;

function refId(ref: StateRef): string {
  return typeof ref === 'string' ? ref : ref.id;
}

export class StateSet implements Iterable<State> {
  private readonly byId: ReadonlyMap<string, State>;

  private constructor(byId: Map<string, State>) {
    this.byId = byId;
  }

  static readonly empty: StateSet = new StateSet(new Map());

  static of(...states: State[]): StateSet {
    return StateSet.from(states);
  }

  static from(states: Iterable<State>): StateSet {
    if (states instanceof StateSet) return states;
    const byId = new Map<string, State>();
    for (const state of states) {
      byId.set(state.id, state);
    }
    return new StateSet(byId);
  }

  get size(): number {
    return this.byId.size;
  }

  isEmpty(): boolean {
    return this.byId.size === 0;
  }

  has(ref: StateRef): boolean {
    return this.byId.has(refId(ref));
  }

  get(id: string): State | undefined {
    return this.byId.get(id);
  }

  [Symbol.iterator](): Iterator<State> {
    return this.byId.values();
  }

  values(): State[] {
    return Array.from(this.byId.values());
  }

  ids(): string[] {
    return Array.from(this.byId.keys());
  }

  union(other: Iterable<State>): StateSet {
    const byId = new Map(this.byId);
    for (const state of other) {
      byId.set(state.id, state);
    }
    return new StateSet(byId);
  }

  difference(other: Iterable<State>): StateSet {
    const remove = StateSet.from(other);
    if (remove.isEmpty()) return this;
    const byId = new Map<string, State>();
    for (const [id, state] of this.byId) {
      if (!remove.has(id)) byId.set(id, state);
    }
    return new StateSet(byId);
  }

  intersection(other: Iterable<State>): StateSet {
    const keep = StateSet.from(other);
    const byId = new Map<string, State>();
    for (const [id, state] of this.byId) {
      if (keep.has(id)) byId.set(id, state);
    }
    return new StateSet(byId);
  }

  intersects(other: Iterable<State>): boolean {
    for (const state of other) {
      if (this.byId.has(state.id)) return true;
    }
    return false;
  }

  isSubsetOf(other: StateSet): boolean {
    if (this.size > other.size) return false;
    for (const id of this.byId.keys()) {
      if (!other.has(id)) return false;
    }
    return true;
  }

  equals(other: StateSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  /**
   * Order-independent key, equal for sets with the same member ids.
   */
  key(): string {
    return JSON.stringify(this.ids().sort());
  }

  toString(): string {
    return `[${this.values()
      .map((s) => s.name)
      .join(', ')}]`;
  }
}
