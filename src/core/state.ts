/**
 * Factories and serialization helpers for elements, states and groups.
 */

import { ConfigurationError } from './errors.js';
import { StateSet } from './state-set.js';
import type { Element, Metadata, State, StateGroup } from './types.js';

export interface DefineElementOptions {
  id: string;
  name?: string;
  type?: string;
  metadata?: Metadata;
}

export interface DefineStateOptions {
  id: string;
  name?: string;
  elements?: Element[];
  group?: string;
  initialWeight?: number;
  searchCost?: number;
  blocking?: boolean;
  blocks?: Iterable<string>;
  metadata?: Metadata;
}

export interface DefineGroupOptions {
  id: string;
  name?: string;
  states: Iterable<State>;
  metadata?: Metadata;
}

function requireNonNegative(value: number, field: string, subject: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      'invalid_value',
      `${field} of "${subject}" must be a non-negative number, got ${value}`,
      subject
    );
  }
  return value;
}

/**
 * Create an element.
 */
export function defineElement(options: DefineElementOptions): Element {
  return {
    id: options.id,
    name: options.name ?? options.id,
    type: options.type ?? 'generic',
    metadata: options.metadata ?? {},
  };
}

/**
 * Create a state. Group membership is declared here and never rewired later.
 */
export function defineState(options: DefineStateOptions): State {
  const state: State = {
    id: options.id,
    name: options.name ?? options.id,
    elements: [...(options.elements ?? [])],
    initialWeight: requireNonNegative(options.initialWeight ?? 1, 'initialWeight', options.id),
    searchCost: requireNonNegative(options.searchCost ?? 1, 'searchCost', options.id),
    blocking: options.blocking ?? false,
    blocks: new Set(options.blocks ?? []),
    metadata: options.metadata ?? {},
  };
  return options.group ? { ...state, group: options.group } : state;
}

/**
 * Create a group. Every member must declare this group as its own.
 */
export function defineGroup(options: DefineGroupOptions): StateGroup {
  const states = StateSet.from(options.states);
  for (const state of states) {
    if (state.group !== options.id) {
      const current = state.group ? `group "${state.group}"` : 'no group';
      throw new ConfigurationError(
        'group_conflict',
        `State "${state.id}" declares ${current} and cannot join group "${options.id}"`,
        state.id
      );
    }
  }
  return {
    id: options.id,
    name: options.name ?? options.id,
    states,
    metadata: options.metadata ?? {},
  };
}

/**
 * Check whether an element belongs to a state.
 */
export function hasElement(state: State, elementId: string): boolean {
  return state.elements.some((e) => e.id === elementId);
}

/**
 * A group is atomic in a configuration when it is fully active or fully inactive.
 */
export function isGroupAtomic(group: StateGroup, active: StateSet): boolean {
  return group.states.isSubsetOf(active) || !group.states.intersects(active);
}

/**
 * Plain representation for logging and debugging.
 */
export function stateToRecord(state: State): Record<string, unknown> {
  return {
    id: state.id,
    name: state.name,
    elements: state.elements.map((e) => e.id),
    group: state.group ?? null,
    initial_weight: state.initialWeight,
    search_cost: state.searchCost,
    blocking: state.blocking,
    blocks: Array.from(state.blocks),
    metadata: state.metadata,
  };
}

export function groupToRecord(group: StateGroup): Record<string, unknown> {
  return {
    id: group.id,
    name: group.name,
    states: group.states.ids(),
    metadata: group.metadata,
  };
}
