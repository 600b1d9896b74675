/**
 * Phased transition execution.
 *
 * VALIDATE → OUTGOING → ACTIVATE → INCOMING → EXIT → VISIBILITY → CLEANUP
 *
 * The executor works on a copy of the caller's active set and returns the
 * delta in the result. Committing it is up to the caller; a failed result
 * carries empty deltas, so there is nothing to roll back.
 */

import { toError } from '../core/errors.js';
import type { StateModel } from '../core/model.js';
import { StateSet } from '../core/state-set.js';
import {
  applyTransition,
  canFire,
  findAtomicityViolations,
  statesToActivate,
  statesToExit,
} from '../core/transition.js';
import type {
  Action,
  PhaseResult,
  State,
  Transition,
  TransitionPhase,
  TransitionResult,
  VisibilityChange,
} from '../core/types.js';
import { createNoOpLogger, type Logger } from '../logging/logger.js';
import type { CallbackRegistry, ExecutionObserver } from './callbacks.js';
import { STRICT, describePolicy, evaluateIncoming, type SuccessPolicy } from './policy.js';

export interface ExecutorOptions {
  policy?: SuccessPolicy;
  /** Default callbacks, used when `execute` is not given its own. */
  callbacks?: CallbackRegistry;
  /** Reported to after every execution. */
  observer?: ExecutionObserver;
  /** Enables the group atomicity check during validation. */
  model?: StateModel;
  logger?: Logger;
  /** Milliseconds; defaults to `performance.now`. */
  clock?: () => number;
}

interface ActionOutcome {
  ok: boolean;
  error?: string;
}

interface Execution {
  transition: Transition;
  active: StateSet;
  callbacks: CallbackRegistry | undefined;
  phases: PhaseResult[];
  activated: StateSet;
  deactivated: StateSet;
  visibility: VisibilityChange;
  incomingFailures: number;
}

function runAction(action: Action | undefined): ActionOutcome {
  if (!action) return { ok: true };
  try {
    return { ok: action() !== false };
  } catch (thrown) {
    return { ok: false, error: toError(thrown).message };
  }
}

function noVisibilityChange(): VisibilityChange {
  return { show: StateSet.empty, hide: StateSet.empty };
}

/**
 * Apply a successful result's delta to an active set.
 */
export function commitResult(active: Iterable<State>, result: TransitionResult): StateSet {
  if (!result.success) return StateSet.from(active);
  return StateSet.from(active).difference(result.deactivated).union(result.activated);
}

/**
 * First phase that reported failure, if any.
 */
export function getFailedPhase(result: TransitionResult): TransitionPhase | undefined {
  return result.phases.find((p) => !p.success)?.phase;
}

export class TransitionExecutor {
  readonly policy: SuccessPolicy;
  private readonly callbacks: CallbackRegistry | undefined;
  private readonly observer: ExecutionObserver | undefined;
  private readonly model: StateModel | undefined;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: ExecutorOptions = {}) {
    this.policy = options.policy ?? STRICT;
    this.callbacks = options.callbacks;
    this.observer = options.observer;
    this.model = options.model;
    this.logger = options.logger ?? createNoOpLogger();
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Structural pre-flight check; runs no actions.
   */
  canExecute(transition: Transition, active: Iterable<State>): boolean {
    return this.rejectionReason(transition, StateSet.from(active)) === undefined;
  }

  /**
   * Active set the transition would produce, without running anything.
   */
  project(transition: Transition, active: Iterable<State>): StateSet {
    return applyTransition(transition, StateSet.from(active));
  }

  /**
   * Run a transition through every phase. Never throws.
   */
  execute(
    transition: Transition,
    active: Iterable<State>,
    callbacks: CallbackRegistry | undefined = this.callbacks
  ): TransitionResult {
    const execution: Execution = {
      transition,
      active: StateSet.from(active),
      callbacks,
      phases: [],
      activated: StateSet.empty,
      deactivated: StateSet.empty,
      visibility: noVisibilityChange(),
      incomingFailures: 0,
    };

    let startedAt: number | undefined;
    let elapsedMs = 0;
    let passed = false;
    let error: Error | undefined;
    try {
      startedAt = this.clock();
      passed = this.runPhases(execution);
    } catch (thrown) {
      error = toError(thrown);
    }
    if (startedAt !== undefined) {
      try {
        elapsedMs = this.clock() - startedAt;
      } catch (thrown) {
        error ??= toError(thrown);
      }
    }

    // Recorded without logging; the outcome report traces it.
    execution.phases.push(
      error
        ? cleanupFailure(error)
        : { phase: 'CLEANUP', success: true, message: 'Cleanup completed', data: {} }
    );

    const success = passed && error === undefined;
    const result: TransitionResult = {
      success,
      phases: execution.phases,
      activated: success ? execution.activated : StateSet.empty,
      deactivated: success ? execution.deactivated : StateSet.empty,
      visibility: success ? execution.visibility : noVisibilityChange(),
      error,
      metadata: {
        transitionId: transition.id,
        policy: describePolicy(this.policy),
        incomingFailures: execution.incomingFailures,
        elapsedMs,
      },
    };

    this.report(result, transition.id, elapsedMs);
    return result;
  }

  /**
   * Why validation would reject the transition, or undefined if it passes.
   */
  rejectionReason(transition: Transition, active: StateSet): string | undefined {
    if (!canFire(transition, active)) {
      return 'No source state of the transition is active';
    }

    const activating = statesToActivate(transition);

    for (const state of active) {
      if (state.blocking) {
        const sharesGroup =
          state.group !== undefined && activating.values().some((s) => s.group === state.group);
        if (!sharesGroup) {
          return `Blocked by active state "${state.name}"`;
        }
      }
      for (const blockedId of state.blocks) {
        if (activating.has(blockedId)) {
          return `Active state "${state.name}" blocks activation of "${blockedId}"`;
        }
      }
    }

    if (this.model) {
      const model = this.model;
      const violations = findAtomicityViolations(transition, active, (id) => model.findGroup(id));
      if (violations.length > 0) {
        return `Group atomicity violated: ${violations.map((g) => g.id).join(', ')}`;
      }
    }

    return undefined;
  }

  private runPhases(execution: Execution): boolean {
    const { transition, active, callbacks } = execution;

    const reason = this.rejectionReason(transition, active);
    this.record(
      execution,
      reason
        ? { phase: 'VALIDATE', success: false, message: reason, data: {} }
        : { phase: 'VALIDATE', success: true, message: 'All preconditions satisfied', data: {} }
    );
    if (reason) return false;

    const outgoing = runAction(callbacks?.outgoing(transition.id) ?? transition.action);
    this.record(execution, {
      phase: 'OUTGOING',
      success: outgoing.ok,
      message: outgoing.ok ? 'Outgoing action completed' : 'Outgoing action failed',
      data: outgoing.error ? { error: outgoing.error } : {},
    });
    if (!outgoing.ok) return false;

    execution.activated = statesToActivate(transition);
    this.record(execution, {
      phase: 'ACTIVATE',
      success: true,
      message: `Activated ${execution.activated.size} states`,
      data: { activated: execution.activated.ids() },
    });

    if (!this.runIncoming(execution)) return false;

    execution.deactivated = statesToExit(transition);
    this.record(execution, {
      phase: 'EXIT',
      success: true,
      message: `Deactivated ${execution.deactivated.size} states`,
      data: { deactivated: execution.deactivated.ids() },
    });

    execution.visibility = this.resolveVisibility(transition, execution.deactivated);
    this.record(execution, {
      phase: 'VISIBILITY',
      success: true,
      message: `Visibility ${transition.visibility}`,
      data: {
        show: execution.visibility.show.ids(),
        hide: execution.visibility.hide.ids(),
      },
    });

    return true;
  }

  /**
   * Every activated state's incoming action runs once; failures do not
   * short-circuit the loop.
   */
  private runIncoming(execution: Execution): boolean {
    const { transition, callbacks, activated } = execution;
    const succeeded: string[] = [];
    const failed: string[] = [];
    const errors: Record<string, string> = {};

    for (const state of activated) {
      const action =
        callbacks?.incoming(transition.id, state.id) ?? transition.incomingActions.get(state.id);
      const outcome = runAction(action);
      if (outcome.ok) {
        succeeded.push(state.id);
      } else {
        failed.push(state.id);
        if (outcome.error) errors[state.id] = outcome.error;
      }
    }

    execution.incomingFailures = failed.length;
    const ok = evaluateIncoming(this.policy, activated.size, failed.length);
    this.record(execution, {
      phase: 'INCOMING',
      success: ok,
      message: `${succeeded.length}/${activated.size} incoming actions succeeded`,
      data: { successful: succeeded, failed, errors, policy: describePolicy(this.policy) },
    });
    return ok;
  }

  private resolveVisibility(transition: Transition, exiting: StateSet): VisibilityChange {
    const survivors = transition.fromStates.difference(exiting);
    switch (transition.visibility) {
      case 'SHOW_SOURCE':
        return { show: survivors, hide: StateSet.empty };
      case 'HIDE_SOURCE':
        return { show: StateSet.empty, hide: survivors };
      case 'INHERIT':
        return noVisibilityChange();
    }
  }

  private record(execution: Execution, result: PhaseResult): void {
    execution.phases.push(result);
    this.logger.debug(`${result.phase} ${result.success ? 'passed' : 'failed'}`, {
      transitionId: execution.transition.id,
      message: result.message,
    });
  }

  /**
   * Log the outcome and notify the observer. Logger or observer failures
   * do not change the result; they are listed in `metadata.reportingErrors`.
   */
  private report(result: TransitionResult, transitionId: string, elapsedMs: number): void {
    const failures: string[] = [];
    const attempt = (source: string, step: () => void): Error | undefined => {
      try {
        step();
        return undefined;
      } catch (thrown) {
        const error = toError(thrown);
        failures.push(`${source}: ${error.message}`);
        return error;
      }
    };

    attempt('logger', () => this.logOutcome(result, transitionId, elapsedMs));

    const observer = this.observer;
    if (observer) {
      const failed = attempt('observer', () =>
        observer.record(transitionId, result.success, elapsedMs)
      );
      if (failed) {
        attempt('logger', () =>
          this.logger.error('Execution observer failed', { transitionId, error: failed.message })
        );
      }
    }

    if (failures.length > 0) {
      result.metadata['reportingErrors'] = failures;
    }
  }

  private logOutcome(result: TransitionResult, transitionId: string, elapsedMs: number): void {
    const cleanup = result.phases[result.phases.length - 1];
    if (cleanup) {
      this.logger.debug(`CLEANUP ${cleanup.success ? 'passed' : 'failed'}`, {
        transitionId,
        message: cleanup.message,
      });
    }
    if (result.success) {
      this.logger.info('Transition succeeded', { transitionId, elapsedMs });
    } else {
      this.logger.warn('Transition failed', {
        transitionId,
        phase: getFailedPhase(result),
        error: result.error?.message,
      });
    }
  }
}

function cleanupFailure(error: Error): PhaseResult {
  return {
    phase: 'CLEANUP',
    success: false,
    message: `Unexpected error: ${error.message}`,
    data: { error: error.name },
  };
}
