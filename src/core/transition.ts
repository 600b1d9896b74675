/**
 * Transition definition, derived state sets and the pure projection shared
 * by the executor and the path finder.
 */

import { ConfigurationError } from './errors.js';
import { isGroupAtomic } from './state.js';
import { StateSet } from './state-set.js';
import type { Action, Metadata, State, StateGroup, Transition, Visibility } from './types.js';

export interface DefineTransitionOptions {
  id: string;
  name?: string;
  from?: Iterable<State>;
  activate?: Iterable<State>;
  exit?: Iterable<State>;
  activateGroups?: readonly StateGroup[];
  exitGroups?: readonly StateGroup[];
  action?: Action;
  incomingActions?: Record<string, Action>;
  cost?: number;
  visibility?: Visibility;
  metadata?: Metadata;
}

/**
 * Resolves a group id to its group.
 */
export type GroupLookup = (groupId: string) => StateGroup | undefined;

/**
 * Create a transition.
 *
 * @throws ConfigurationError if the cost is negative or not finite
 */
export function defineTransition(options: DefineTransitionOptions): Transition {
  const cost = options.cost ?? 1;
  if (!Number.isFinite(cost) || cost < 0) {
    throw new ConfigurationError(
      'invalid_value',
      `Cost of transition "${options.id}" must be a non-negative number, got ${cost}`,
      options.id
    );
  }

  return {
    id: options.id,
    name: options.name ?? options.id,
    fromStates: StateSet.from(options.from ?? []),
    activateStates: StateSet.from(options.activate ?? []),
    exitStates: StateSet.from(options.exit ?? []),
    activateGroups: [...(options.activateGroups ?? [])],
    exitGroups: [...(options.exitGroups ?? [])],
    action: options.action,
    incomingActions: new Map(Object.entries(options.incomingActions ?? {})),
    cost,
    visibility: options.visibility ?? 'INHERIT',
    metadata: options.metadata ?? {},
  };
}

/**
 * True if the transition is a wildcard or one of its source states is active.
 */
export function canFire(transition: Transition, active: StateSet): boolean {
  return transition.fromStates.isEmpty() || transition.fromStates.intersects(active);
}

/**
 * Explicit activations plus every member of the activated groups.
 */
export function statesToActivate(transition: Transition): StateSet {
  let states = transition.activateStates;
  for (const group of transition.activateGroups) {
    states = states.union(group.states);
  }
  return states;
}

/**
 * Explicit exits plus every member of the exited groups.
 */
export function statesToExit(transition: Transition): StateSet {
  let states = transition.exitStates;
  for (const group of transition.exitGroups) {
    states = states.union(group.states);
  }
  return states;
}

/**
 * Configuration after the transition: exits removed, then activations added.
 * No actions run.
 */
export function applyTransition(transition: Transition, active: StateSet): StateSet {
  return active.difference(statesToExit(transition)).union(statesToActivate(transition));
}

/**
 * Groups touched by the transition that would end up partially active.
 *
 * Groups are found through the transition's own group lists and, when a
 * lookup is given, through the `group` of every activated or exited state.
 */
export function findAtomicityViolations(
  transition: Transition,
  active: StateSet,
  lookup?: GroupLookup
): StateGroup[] {
  const touched = new Map<string, StateGroup>();
  for (const group of [...transition.activateGroups, ...transition.exitGroups]) {
    touched.set(group.id, group);
  }
  if (lookup) {
    for (const state of statesToActivate(transition).union(statesToExit(transition))) {
      if (!state.group || touched.has(state.group)) continue;
      const group = lookup(state.group);
      if (group) touched.set(group.id, group);
    }
  }

  const projected = applyTransition(transition, active);
  return Array.from(touched.values()).filter((group) => !isGroupAtomic(group, projected));
}

/**
 * Plain representation for logging and debugging.
 */
export function transitionToRecord(transition: Transition): Record<string, unknown> {
  return {
    id: transition.id,
    name: transition.name,
    from_states: transition.fromStates.ids(),
    activate_states: transition.activateStates.ids(),
    exit_states: transition.exitStates.ids(),
    activate_groups: transition.activateGroups.map((g) => g.id),
    exit_groups: transition.exitGroups.map((g) => g.id),
    cost: transition.cost,
    visibility: transition.visibility,
    has_action: transition.action !== undefined,
    incoming_actions: Array.from(transition.incomingActions.keys()),
    metadata: transition.metadata,
  };
}
