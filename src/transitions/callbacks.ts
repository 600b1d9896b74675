/**
 * Collaborator interfaces consumed by the executor and the path finder,
 * and a map-backed callback registry.
 */

import type { Action } from '../core/types.js';

/**
 * Source of outgoing and incoming actions keyed by transition and state id.
 */
export interface CallbackRegistry {
  outgoing(transitionId: string): Action | undefined;
  incoming(transitionId: string, stateId: string): Action | undefined;
}

/**
 * Map-backed `CallbackRegistry`.
 */
export class TransitionCallbacks implements CallbackRegistry {
  private readonly outgoingActions = new Map<string, Action>();
  private readonly incomingActions = new Map<string, Map<string, Action>>();

  registerOutgoing(transitionId: string, action: Action): this {
    this.outgoingActions.set(transitionId, action);
    return this;
  }

  registerIncoming(transitionId: string, stateId: string, action: Action): this {
    let byState = this.incomingActions.get(transitionId);
    if (!byState) {
      byState = new Map();
      this.incomingActions.set(transitionId, byState);
    }
    byState.set(stateId, action);
    return this;
  }

  outgoing(transitionId: string): Action | undefined {
    return this.outgoingActions.get(transitionId);
  }

  incoming(transitionId: string, stateId: string): Action | undefined {
    return this.incomingActions.get(transitionId)?.get(stateId);
  }

  clear(): void {
    this.outgoingActions.clear();
    this.incomingActions.clear();
  }
}

/**
 * Supplies the cost the path finder uses for a transition.
 */
export interface CostProvider {
  getDynamicCost(transitionId: string, baseCost: number): number;
}

/**
 * Receives the outcome of every executed transition.
 */
export interface ExecutionObserver {
  record(transitionId: string, success: boolean, elapsedMs: number): void;
}
