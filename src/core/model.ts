/**
 * Model registry: resolves id references between elements, states, groups
 * and transitions in one place.
 *
 * Group membership is decided once, inside `build()`, so states never have
 * their `group` rewritten after construction.
 */

import { ConfigurationError } from './errors.js';
import {
  defineElement,
  defineGroup,
  defineState,
  type DefineElementOptions,
  type DefineStateOptions,
} from './state.js';
import { StateSet } from './state-set.js';
import { defineTransition, type DefineTransitionOptions } from './transition.js';
import type { Element, Metadata, State, StateGroup, Transition } from './types.js';

export interface StateDefinition extends Omit<DefineStateOptions, 'elements'> {
  /** Element ids. */
  elements?: string[];
}

export interface GroupDefinition {
  id: string;
  name?: string;
  /** Member state ids. States may also join by declaring `group`. */
  states?: string[];
  metadata?: Metadata;
}

export interface TransitionDefinition
  extends Omit<DefineTransitionOptions, 'from' | 'activate' | 'exit' | 'activateGroups' | 'exitGroups'> {
  from?: string[];
  activate?: string[];
  exit?: string[];
  activateGroups?: string[];
  exitGroups?: string[];
}

/**
 * A built, read-only model.
 */
export class StateModel {
  readonly name: string;
  readonly initial: StateSet;
  private readonly stateIndex: ReadonlyMap<string, State>;
  private readonly groupIndex: ReadonlyMap<string, StateGroup>;
  private readonly transitionIndex: ReadonlyMap<string, Transition>;
  private readonly elementIndex: ReadonlyMap<string, Element>;

  constructor(parts: {
    name: string;
    elements: Map<string, Element>;
    states: Map<string, State>;
    groups: Map<string, StateGroup>;
    transitions: Map<string, Transition>;
    initial: StateSet;
  }) {
    this.name = parts.name;
    this.elementIndex = parts.elements;
    this.stateIndex = parts.states;
    this.groupIndex = parts.groups;
    this.transitionIndex = parts.transitions;
    this.initial = parts.initial;
  }

  get elements(): Element[] {
    return Array.from(this.elementIndex.values());
  }

  get states(): State[] {
    return Array.from(this.stateIndex.values());
  }

  get groups(): StateGroup[] {
    return Array.from(this.groupIndex.values());
  }

  get transitions(): Transition[] {
    return Array.from(this.transitionIndex.values());
  }

  state(id: string): State {
    const state = this.stateIndex.get(id);
    if (!state) {
      throw new ConfigurationError('unknown_reference', `Unknown state: ${id}`, id);
    }
    return state;
  }

  group(id: string): StateGroup {
    const group = this.groupIndex.get(id);
    if (!group) {
      throw new ConfigurationError('unknown_reference', `Unknown group: ${id}`, id);
    }
    return group;
  }

  transition(id: string): Transition {
    const transition = this.transitionIndex.get(id);
    if (!transition) {
      throw new ConfigurationError('unknown_reference', `Unknown transition: ${id}`, id);
    }
    return transition;
  }

  findGroup(id: string): StateGroup | undefined {
    return this.groupIndex.get(id);
  }

  groupOf(stateId: string): StateGroup | undefined {
    const groupId = this.stateIndex.get(stateId)?.group;
    return groupId ? this.groupIndex.get(groupId) : undefined;
  }

  /**
   * Resolve state ids into a set.
   */
  select(ids: Iterable<string>): StateSet {
    return StateSet.from(Array.from(ids, (id) => this.state(id)));
  }
}

function assertUnique(seen: Set<string>, id: string, kind: string): void {
  if (seen.has(id)) {
    throw new ConfigurationError('duplicate_id', `Duplicate ${kind} id: ${id}`, id);
  }
  seen.add(id);
}

function resolveAll<T>(
  ids: string[] | undefined,
  index: Map<string, T>,
  kind: string,
  owner: string
): T[] {
  return (ids ?? []).map((id) => {
    const value = index.get(id);
    if (value === undefined) {
      throw new ConfigurationError(
        'unknown_reference',
        `${owner} references unknown ${kind}: ${id}`,
        id
      );
    }
    return value;
  });
}

/**
 * Collects definitions and builds a consistent `StateModel`.
 *
 * @example
 * ```typescript
 * const model = new StateModelBuilder('editor')
 *   .state({ id: 'login' })
 *   .state({ id: 'menu' })
 *   .transition({ id: 'sign-in', from: ['login'], activate: ['menu'], exit: ['login'] })
 *   .initial(['login'])
 *   .build();
 * ```
 */
export class StateModelBuilder {
  private readonly elementDefs: DefineElementOptions[] = [];
  private readonly stateDefs: StateDefinition[] = [];
  private readonly groupDefs: GroupDefinition[] = [];
  private readonly transitionDefs: TransitionDefinition[] = [];
  private initialIds: string[] = [];

  constructor(private readonly name: string = 'model') {}

  element(definition: DefineElementOptions): this {
    this.elementDefs.push(definition);
    return this;
  }

  state(definition: StateDefinition): this {
    this.stateDefs.push(definition);
    return this;
  }

  group(definition: GroupDefinition): this {
    this.groupDefs.push(definition);
    return this;
  }

  transition(definition: TransitionDefinition): this {
    this.transitionDefs.push(definition);
    return this;
  }

  initial(stateIds: string[]): this {
    this.initialIds = [...stateIds];
    return this;
  }

  /**
   * @throws ConfigurationError on duplicate ids, unknown references or a
   *   state claimed by two groups
   */
  build(): StateModel {
    const elements = new Map<string, Element>();
    for (const def of this.elementDefs) {
      if (elements.has(def.id)) {
        throw new ConfigurationError('duplicate_id', `Duplicate element id: ${def.id}`, def.id);
      }
      elements.set(def.id, defineElement(def));
    }

    const stateIds = new Set<string>();
    for (const def of this.stateDefs) assertUnique(stateIds, def.id, 'state');
    const groupIds = new Set<string>();
    for (const def of this.groupDefs) assertUnique(groupIds, def.id, 'group');

    const membership = this.resolveMembership(stateIds, groupIds);

    const states = new Map<string, State>();
    for (const def of this.stateDefs) {
      states.set(
        def.id,
        defineState({
          ...def,
          group: membership.get(def.id),
          elements: resolveAll(def.elements, elements, 'element', `State "${def.id}"`),
        })
      );
    }

    const groups = new Map<string, StateGroup>();
    for (const def of this.groupDefs) {
      const members = Array.from(states.values()).filter((s) => s.group === def.id);
      groups.set(
        def.id,
        defineGroup({ id: def.id, name: def.name, states: members, metadata: def.metadata })
      );
    }

    const transitions = new Map<string, Transition>();
    for (const def of this.transitionDefs) {
      if (transitions.has(def.id)) {
        throw new ConfigurationError('duplicate_id', `Duplicate transition id: ${def.id}`, def.id);
      }
      const owner = `Transition "${def.id}"`;
      for (const stateId of Object.keys(def.incomingActions ?? {})) {
        resolveAll([stateId], states, 'state', owner);
      }
      transitions.set(
        def.id,
        defineTransition({
          ...def,
          from: resolveAll(def.from, states, 'state', owner),
          activate: resolveAll(def.activate, states, 'state', owner),
          exit: resolveAll(def.exit, states, 'state', owner),
          activateGroups: resolveAll(def.activateGroups, groups, 'group', owner),
          exitGroups: resolveAll(def.exitGroups, groups, 'group', owner),
        })
      );
    }

    const initial = StateSet.from(resolveAll(this.initialIds, states, 'state', 'Initial set'));

    return new StateModel({ name: this.name, elements, states, groups, transitions, initial });
  }

  /**
   * Map each grouped state id to its single group id.
   */
  private resolveMembership(stateIds: Set<string>, groupIds: Set<string>): Map<string, string> {
    const membership = new Map<string, string>();

    const claim = (stateId: string, groupId: string): void => {
      const current = membership.get(stateId);
      if (current !== undefined && current !== groupId) {
        throw new ConfigurationError(
          'group_conflict',
          `State "${stateId}" already belongs to group "${current}" and cannot join "${groupId}"`,
          stateId
        );
      }
      membership.set(stateId, groupId);
    };

    for (const group of this.groupDefs) {
      for (const stateId of group.states ?? []) {
        if (!stateIds.has(stateId)) {
          throw new ConfigurationError(
            'unknown_reference',
            `Group "${group.id}" references unknown state: ${stateId}`,
            stateId
          );
        }
        claim(stateId, group.id);
      }
    }

    for (const state of this.stateDefs) {
      if (!state.group) continue;
      if (!groupIds.has(state.group)) {
        throw new ConfigurationError(
          'unknown_reference',
          `State "${state.id}" references unknown group: ${state.group}`,
          state.group
        );
      }
      claim(state.id, state.group);
    }

    return membership;
  }
}
