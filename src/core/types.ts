/**
 * Core type definitions for states, groups and transitions.
 */

import type { StateSet } from './state-set.js';

/**
 * Free-form metadata carried by every model entity.
 */
export type Metadata = Record<string, unknown>;

/**
 * Atomic named unit that states are composed of.
 */
export interface Element {
  readonly id: string;
  name: string;
  type: string;
  metadata: Metadata;
}

/**
 * A named state. Several states can be active at the same time.
 *
 * Identity is the `id`; every other field is payload.
 */
export interface State {
  readonly id: string;
  name: string;
  elements: Element[];
  /** Id of the one group this state belongs to, if any. */
  readonly group?: string;
  /** Weight used when picking an initial state at random. */
  initialWeight: number;
  searchCost: number;
  /** While active, vetoes activations outside its own group. */
  blocking: boolean;
  /** Ids of states that cannot be activated while this state is active. */
  blocks: ReadonlySet<string>;
  metadata: Metadata;
}

/**
 * States that activate and deactivate as one unit.
 */
export interface StateGroup {
  readonly id: string;
  name: string;
  readonly states: StateSet;
  metadata: Metadata;
}

/**
 * Side-effecting step run by a transition.
 * Returning `false` or throwing counts as a failure.
 */
export type Action = () => boolean | void;

/**
 * What happens to the surviving source states after a transition.
 */
export type Visibility = 'SHOW_SOURCE' | 'HIDE_SOURCE' | 'INHERIT';

/**
 * Declarative description of a change to the active-state set.
 */
export interface Transition {
  readonly id: string;
  name: string;
  /** Required source states (any one suffices). Empty = wildcard. */
  readonly fromStates: StateSet;
  readonly activateStates: StateSet;
  readonly exitStates: StateSet;
  readonly activateGroups: readonly StateGroup[];
  readonly exitGroups: readonly StateGroup[];
  readonly action?: Action;
  /** Incoming actions keyed by the id of the activated state. */
  readonly incomingActions: ReadonlyMap<string, Action>;
  readonly cost: number;
  readonly visibility: Visibility;
  metadata: Metadata;
}

/**
 * Phases of transition execution, in order.
 */
export type TransitionPhase =
  | 'VALIDATE'
  | 'OUTGOING'
  | 'ACTIVATE'
  | 'INCOMING'
  | 'EXIT'
  | 'VISIBILITY'
  | 'CLEANUP';

export const TRANSITION_PHASES: readonly TransitionPhase[] = [
  'VALIDATE',
  'OUTGOING',
  'ACTIVATE',
  'INCOMING',
  'EXIT',
  'VISIBILITY',
  'CLEANUP',
];

/**
 * Outcome of a single phase.
 */
export interface PhaseResult {
  phase: TransitionPhase;
  success: boolean;
  message: string;
  data: Metadata;
}

/**
 * Advisory visibility changes computed by the VISIBILITY phase.
 */
export interface VisibilityChange {
  show: StateSet;
  hide: StateSet;
}

/**
 * Result of executing a complete transition.
 *
 * The caller commits `activated` / `deactivated` to its own active set;
 * nothing is committed by the executor.
 */
export interface TransitionResult {
  success: boolean;
  phases: PhaseResult[];
  activated: StateSet;
  deactivated: StateSet;
  visibility: VisibilityChange;
  /** Unexpected error caught during cleanup. */
  error?: Error;
  metadata: Metadata;
}
