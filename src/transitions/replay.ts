/**
 * Execute a planned path one transition at a time.
 */

import { StateSet } from '../core/state-set.js';
import type { State, TransitionResult } from '../core/types.js';
import type { Path } from '../graph/pathfinder.js';
import type { CallbackRegistry } from './callbacks.js';
import { commitResult, type TransitionExecutor } from './executor.js';

export interface ReplayResult {
  success: boolean;
  /** Active set after the last committed transition. */
  active: StateSet;
  results: TransitionResult[];
  /** Index in `path.transitions` of the transition that failed. */
  failedAt?: number;
}

/**
 * Each successful step is committed before the next one runs. The replay
 * stops at the first failure and leaves that step uncommitted.
 */
export function replayPath(
  executor: TransitionExecutor,
  path: Path,
  active: Iterable<State>,
  callbacks?: CallbackRegistry
): ReplayResult {
  let current = StateSet.from(active);
  const results: TransitionResult[] = [];

  for (const [index, transition] of path.transitions.entries()) {
    const result = executor.execute(transition, current, callbacks);
    results.push(result);
    if (!result.success) {
      return { success: false, active: current, results, failedAt: index };
    }
    current = commitResult(current, result);
  }

  return { success: true, active: current, results };
}
