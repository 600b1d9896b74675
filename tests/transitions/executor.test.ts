/**
 * Tests for phased transition execution.
 */

import { describe, it, expect, vi } from 'vitest';
import { StateModelBuilder } from '../../src/core/model.js';
import { defineState } from '../../src/core/state.js';
import { StateSet } from '../../src/core/state-set.js';
import { defineTransition } from '../../src/core/transition.js';
import type { Action, State, TransitionPhase } from '../../src/core/types.js';
import { createMockLogger } from '../../src/logging/testing.js';
import { TransitionCallbacks } from '../../src/transitions/callbacks.js';
import {
  TransitionExecutor,
  commitResult,
  getFailedPhase,
} from '../../src/transitions/executor.js';
import {
  LENIENT,
  STRICT,
  evaluateIncoming,
  threshold,
} from '../../src/transitions/policy.js';

const login = defineState({ id: 'login', name: 'Login' });
const home = defineState({ id: 'home', name: 'Home' });
const inbox = defineState({ id: 'inbox', name: 'Inbox' });
const settings = defineState({ id: 'settings', name: 'Settings' });

const signIn = defineTransition({
  id: 'sign-in',
  from: [login],
  activate: [home, inbox],
  exit: [login],
});

function phasesOf(phases: { phase: TransitionPhase }[]): TransitionPhase[] {
  return phases.map((p) => p.phase);
}

/** Small deterministic PRNG so property runs are reproducible. */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('TransitionExecutor', () => {
  it('should run every phase in order on success', () => {
    const executor = new TransitionExecutor();
    const result = executor.execute(signIn, [login]);

    expect(result.success).toBe(true);
    expect(phasesOf(result.phases)).toEqual([
      'VALIDATE',
      'OUTGOING',
      'ACTIVATE',
      'INCOMING',
      'EXIT',
      'VISIBILITY',
      'CLEANUP',
    ]);
    expect(result.phases.every((p) => p.success)).toBe(true);
    expect(result.activated.ids()).toEqual(['home', 'inbox']);
    expect(result.deactivated.ids()).toEqual(['login']);
    expect(result.metadata).toMatchObject({
      transitionId: 'sign-in',
      policy: 'strict',
      incomingFailures: 0,
    });
  });

  it('should not modify the caller active set', () => {
    const active = StateSet.of(login);
    const result = new TransitionExecutor().execute(signIn, active);

    expect(active.ids()).toEqual(['login']);
    expect(commitResult(active, result).ids()).toEqual(['home', 'inbox']);
  });

  it('should fail validation when no source state is active', () => {
    const result = new TransitionExecutor().execute(signIn, [home]);

    expect(result.success).toBe(false);
    expect(phasesOf(result.phases)).toEqual(['VALIDATE', 'CLEANUP']);
    expect(result.phases[0]?.message).toBe('No source state of the transition is active');
    expect(getFailedPhase(result)).toBe('VALIDATE');
    expect(result.activated.isEmpty()).toBe(true);
    expect(result.deactivated.isEmpty()).toBe(true);
  });

  it('should stop after a failed outgoing action', () => {
    const incoming = vi.fn(() => true);
    const transition = defineTransition({
      id: 'sign-in',
      from: [login],
      activate: [home],
      action: () => false,
      incomingActions: { home: incoming },
    });
    const result = new TransitionExecutor().execute(transition, [login]);

    expect(result.success).toBe(false);
    expect(phasesOf(result.phases)).toEqual(['VALIDATE', 'OUTGOING', 'CLEANUP']);
    expect(result.phases[1]?.message).toBe('Outgoing action failed');
    expect(incoming).not.toHaveBeenCalled();
  });

  it('should record the message of a throwing outgoing action', () => {
    const transition = defineTransition({
      id: 'sign-in',
      from: [login],
      action: () => {
        throw new Error('network down');
      },
    });
    const result = new TransitionExecutor().execute(transition, [login]);

    expect(result.phases[1]?.data).toEqual({ error: 'network down' });
    expect(result.error).toBeUndefined();
  });

  it('should run every incoming action even after one fails', () => {
    const calls: string[] = [];
    const action =
      (id: string, ok: boolean): Action =>
      () => {
        calls.push(id);
        return ok;
      };
    const transition = defineTransition({
      id: 'open-all',
      activate: [home, inbox, settings],
      incomingActions: {
        home: action('home', false),
        inbox: () => {
          calls.push('inbox');
          throw new Error('no mail');
        },
        settings: action('settings', true),
      },
    });
    const result = new TransitionExecutor().execute(transition, []);
    const incoming = result.phases.find((p) => p.phase === 'INCOMING');

    expect(calls).toEqual(['home', 'inbox', 'settings']);
    expect(result.success).toBe(false);
    expect(incoming?.message).toBe('1/3 incoming actions succeeded');
    expect(incoming?.data).toEqual({
      successful: ['settings'],
      failed: ['home', 'inbox'],
      errors: { inbox: 'no mail' },
      policy: 'strict',
    });
    expect(phasesOf(result.phases)).toEqual([
      'VALIDATE',
      'OUTGOING',
      'ACTIVATE',
      'INCOMING',
      'CLEANUP',
    ]);
    expect(result.metadata['incomingFailures']).toBe(2);
  });

  it('should accept incoming failures under a lenient policy', () => {
    const transition = defineTransition({
      id: 'open',
      activate: [home],
      incomingActions: { home: () => false },
    });
    const result = new TransitionExecutor({ policy: LENIENT }).execute(transition, []);

    expect(result.success).toBe(true);
    expect(result.activated.ids()).toEqual(['home']);
  });

  it('should agree with the policy law for random outcomes', () => {
    const random = mulberry32(42);
    const pool: State[] = Array.from({ length: 6 }, (_, i) => defineState({ id: `s${i}` }));
    const seen = new Set<string>();

    for (let run = 0; run < 300; run++) {
      const count = Math.floor(random() * pool.length);
      const activated = pool.slice(0, count);
      const outcomes = activated.map(() => random() < 0.5);
      const incomingActions: Record<string, Action> = {};
      activated.forEach((state, i) => {
        incomingActions[state.id] = () => outcomes[i] === true;
      });
      const failed = outcomes.filter((ok) => !ok).length;

      const minimum = Math.round(random() * 100) / 100;
      const pick = random();
      const policy = pick < 1 / 3 ? STRICT : pick < 2 / 3 ? LENIENT : threshold(minimum);
      seen.add(policy.kind);

      const expected =
        policy.kind === 'strict'
          ? failed === 0
          : policy.kind === 'lenient' || count === 0 || (count - failed) / count >= minimum;

      const result = new TransitionExecutor({ policy }).execute(
        defineTransition({ id: `run-${run}`, activate: activated, incomingActions }),
        []
      );

      expect(result.success).toBe(expected);
      expect(result.success).toBe(evaluateIncoming(policy, count, failed));
    }

    expect(seen).toEqual(new Set(['strict', 'lenient', 'threshold']));
  });

  it('should prefer registered callbacks over inline actions', () => {
    const inline = vi.fn(() => true);
    const registered = vi.fn(() => true);
    const outgoing = vi.fn(() => true);
    const transition = defineTransition({
      id: 'open',
      activate: [home, inbox],
      incomingActions: { home: inline, inbox: inline },
    });
    const callbacks = new TransitionCallbacks()
      .registerOutgoing('open', outgoing)
      .registerIncoming('open', 'home', registered);

    new TransitionExecutor({ callbacks }).execute(transition, []);

    expect(outgoing).toHaveBeenCalledTimes(1);
    expect(registered).toHaveBeenCalledTimes(1);
    expect(inline).toHaveBeenCalledTimes(1);
  });

  it('should use callbacks passed to execute over the default registry', () => {
    const fallback = vi.fn(() => true);
    const explicit = vi.fn(() => false);
    const transition = defineTransition({ id: 'open', activate: [home] });
    const executor = new TransitionExecutor({
      callbacks: new TransitionCallbacks().registerOutgoing('open', fallback),
    });

    const result = executor.execute(
      transition,
      [],
      new TransitionCallbacks().registerOutgoing('open', explicit)
    );

    expect(result.success).toBe(false);
    expect(explicit).toHaveBeenCalledTimes(1);
    expect(fallback).not.toHaveBeenCalled();
  });

  describe('blocking', () => {
    const modal = defineState({ id: 'modal', name: 'Modal', blocking: true, group: 'dialog' });
    const confirm = defineState({ id: 'confirm', name: 'Confirm', group: 'dialog' });

    it('should veto activations outside the blocking state group', () => {
      const openSettings = defineTransition({ id: 'open-settings', activate: [settings] });
      const result = new TransitionExecutor().execute(openSettings, [home, modal]);

      expect(result.success).toBe(false);
      expect(result.phases[0]).toMatchObject({
        phase: 'VALIDATE',
        success: false,
        message: 'Blocked by active state "Modal"',
      });
    });

    it('should allow activations inside the blocking state group', () => {
      const openConfirm = defineTransition({ id: 'open-confirm', activate: [confirm] });
      expect(new TransitionExecutor().canExecute(openConfirm, [modal])).toBe(true);
    });

    it('should refuse a transition activating a state the modal blocks', () => {
      const main = defineState({ id: 'main', name: 'Main' });
      const toolbar = defineState({ id: 'toolbar', name: 'Toolbar' });
      const blocker = defineState({
        id: 'modal',
        name: 'Modal',
        blocking: true,
        blocks: ['toolbar'],
      });
      const showToolbar = defineTransition({ id: 'show-toolbar', activate: [toolbar] });

      expect(new TransitionExecutor().canExecute(showToolbar, [main, blocker])).toBe(false);
    });

    it('should veto explicitly blocked states', () => {
      const editor = defineState({ id: 'editor', name: 'Editor', blocks: ['settings'] });
      const openSettings = defineTransition({ id: 'open-settings', activate: [settings] });
      const executor = new TransitionExecutor();

      expect(executor.rejectionReason(openSettings, StateSet.of(editor))).toBe(
        'Active state "Editor" blocks activation of "settings"'
      );
    });
  });

  it('should reject partial group activation when given a model', () => {
    const model = new StateModelBuilder()
      .state({ id: 'left', group: 'panels' })
      .state({ id: 'right', group: 'panels' })
      .group({ id: 'panels' })
      .transition({ id: 'half', activate: ['left'] })
      .transition({ id: 'whole', activateGroups: ['panels'] })
      .build();
    const executor = new TransitionExecutor({ model });

    const half = executor.execute(model.transition('half'), []);
    expect(half.phases[0]?.message).toBe('Group atomicity violated: panels');
    expect(executor.execute(model.transition('whole'), []).success).toBe(true);
    expect(new TransitionExecutor().execute(model.transition('half'), []).success).toBe(true);
  });

  describe('visibility', () => {
    const source = defineState({ id: 'list', name: 'List' });
    const detail = defineState({ id: 'detail', name: 'Detail' });

    it('should show surviving source states', () => {
      const transition = defineTransition({
        id: 'open-detail',
        from: [source, login],
        activate: [detail],
        exit: [login],
        visibility: 'SHOW_SOURCE',
      });
      const result = new TransitionExecutor().execute(transition, [source]);

      expect(result.visibility.show.ids()).toEqual(['list']);
      expect(result.visibility.hide.isEmpty()).toBe(true);
    });

    it('should hide surviving source states', () => {
      const transition = defineTransition({
        id: 'open-detail',
        from: [source],
        activate: [detail],
        visibility: 'HIDE_SOURCE',
      });
      const result = new TransitionExecutor().execute(transition, [source]);

      expect(result.visibility.hide.ids()).toEqual(['list']);
      expect(result.phases[5]?.message).toBe('Visibility HIDE_SOURCE');
    });

    it('should change nothing when inheriting', () => {
      const result = new TransitionExecutor().execute(signIn, [login]);
      expect(result.visibility.show.isEmpty()).toBe(true);
      expect(result.visibility.hide.isEmpty()).toBe(true);
    });
  });

  it('should capture unexpected errors and fail cleanup', () => {
    const logger = createMockLogger();
    const throwingLogger = {
      ...logger,
      debug: (message: string) => {
        if (message === 'ACTIVATE passed') throw new Error('log sink closed');
      },
    };
    const result = new TransitionExecutor({ logger: throwingLogger }).execute(signIn, [login]);

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('log sink closed');
    expect(phasesOf(result.phases)).toEqual(['VALIDATE', 'OUTGOING', 'ACTIVATE', 'CLEANUP']);
    expect(result.phases[3]).toMatchObject({
      success: false,
      message: 'Unexpected error: log sink closed',
    });
    expect(result.activated.isEmpty()).toBe(true);
    expect(logger.hasLoggedAt('WARN', 'Transition failed')).toBe(true);
  });

  describe('reporting failures', () => {
    function brokenLogger(breaks: (level: string, message: string) => boolean) {
      const logger = createMockLogger();
      const wrap =
        (level: string, log: (message: string) => void) =>
        (message: string): void => {
          if (breaks(level, message)) throw new Error('sink closed');
          log(message);
        };
      return {
        debug: wrap('DEBUG', (m) => logger.debug(m)),
        info: wrap('INFO', (m) => logger.info(m)),
        warn: wrap('WARN', (m) => logger.warn(m)),
        error: wrap('ERROR', (m) => logger.error(m)),
      };
    }

    it('should return the result when logging cleanup throws', () => {
      const logger = brokenLogger((_, message) => message.startsWith('CLEANUP'));
      const result = new TransitionExecutor({ logger }).execute(signIn, [login]);

      expect(result.success).toBe(true);
      expect(result.phases[6]).toMatchObject({ phase: 'CLEANUP', success: true });
      expect(result.activated.ids()).toEqual(['home', 'inbox']);
      expect(result.metadata['reportingErrors']).toEqual(['logger: sink closed']);
    });

    it('should return the result when the failure warning throws', () => {
      const logger = brokenLogger((level) => level === 'WARN');
      const result = new TransitionExecutor({ logger }).execute(signIn, [home]);

      expect(result.success).toBe(false);
      expect(phasesOf(result.phases)).toEqual(['VALIDATE', 'CLEANUP']);
      expect(result.metadata['reportingErrors']).toEqual(['logger: sink closed']);
    });

    it('should still notify the observer when logging throws', () => {
      const logger = brokenLogger((level) => level === 'INFO');
      const observer = { record: vi.fn() };
      new TransitionExecutor({ logger, observer }).execute(signIn, [login]);

      expect(observer.record).toHaveBeenCalledTimes(1);
    });

    it('should list both failures when the observer and its error log throw', () => {
      const logger = brokenLogger((level) => level === 'ERROR');
      const observer = {
        record: () => {
          throw new Error('stats unavailable');
        },
      };
      const result = new TransitionExecutor({ logger, observer }).execute(signIn, [login]);

      expect(result.success).toBe(true);
      expect(result.metadata['reportingErrors']).toEqual([
        'observer: stats unavailable',
        'logger: sink closed',
      ]);
    });

    it('should fail the transition when the clock throws', () => {
      let calls = 0;
      const clock = (): number => {
        calls += 1;
        if (calls > 1) throw new Error('clock stopped');
        return 0;
      };
      const result = new TransitionExecutor({ clock }).execute(signIn, [login]);

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe('clock stopped');
      expect(result.phases.at(-1)).toMatchObject({
        phase: 'CLEANUP',
        success: false,
        message: 'Unexpected error: clock stopped',
      });
      expect(result.activated.isEmpty()).toBe(true);
      expect(result.metadata['elapsedMs']).toBe(0);
    });
  });

  it('should report each execution to the observer', () => {
    let now = 0;
    const observer = { record: vi.fn() };
    const executor = new TransitionExecutor({ observer, clock: () => (now += 5) });

    executor.execute(signIn, [login]);
    executor.execute(signIn, [home]);

    expect(observer.record).toHaveBeenNthCalledWith(1, 'sign-in', true, 5);
    expect(observer.record).toHaveBeenNthCalledWith(2, 'sign-in', false, 5);
  });

  it('should log observer failures without failing the transition', () => {
    const logger = createMockLogger();
    const observer = {
      record: () => {
        throw new Error('stats unavailable');
      },
    };
    const result = new TransitionExecutor({ observer, logger }).execute(signIn, [login]);

    expect(result.success).toBe(true);
    expect(logger.getCallsAtLevel('ERROR')).toEqual([
      {
        level: 'ERROR',
        message: 'Execution observer failed',
        data: { transitionId: 'sign-in', error: 'stats unavailable' },
      },
    ]);
  });

  it('should project without running actions', () => {
    const action = vi.fn(() => true);
    const transition = defineTransition({ id: 't', from: [login], activate: [home], action });

    expect(new TransitionExecutor().project(transition, [login]).ids()).toEqual(['login', 'home']);
    expect(action).not.toHaveBeenCalled();
  });
});
