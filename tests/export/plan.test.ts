/**
 * Tests for plan and result export.
 */

import { describe, it, expect } from 'vitest';
import { defineState } from '../../src/core/state.js';
import { StateSet } from '../../src/core/state-set.js';
import { defineTransition } from '../../src/core/transition.js';
import { exportComplexity, exportPlan, exportResult, pathToRecord } from '../../src/export/plan.js';
import { estimateComplexity } from '../../src/graph/complexity.js';
import type { Path } from '../../src/graph/pathfinder.js';
import { TransitionExecutor } from '../../src/transitions/executor.js';

const login = defineState({ id: 'login', name: 'Login' });
const home = defineState({ id: 'home', name: 'Home' });
const inbox = defineState({ id: 'inbox', name: 'Inbox' });

const signIn = defineTransition({
  id: 'sign-in',
  name: 'Sign in',
  from: [login],
  activate: [home],
  exit: [login],
});
const openInbox = defineTransition({
  id: 'open-inbox',
  name: 'Open inbox',
  from: [home],
  activate: [inbox],
  cost: 0.5,
});

const path: Path = {
  states: [StateSet.of(login), StateSet.of(home), StateSet.of(home, inbox)],
  transitions: [signIn, openInbox],
  targets: StateSet.of(home, inbox),
  totalCost: 1.5,
};

describe('exportPlan', () => {
  it('should render a step table', () => {
    expect(exportPlan(path, { title: 'Mail plan' })).toBe(
      [
        '# Mail plan',
        '',
        '**Targets:** Home, Inbox',
        '',
        '**2 steps, total cost 1.50**',
        '',
        'Start: Login',
        '',
        '| # | Transition | Cost | Active after |',
        '|---|------------|------|--------------|',
        '| 1 | Sign in | 1 | Home |',
        '| 2 | Open inbox | 0.50 | Home, Inbox |',
        '',
      ].join('\n')
    );
  });

  it('should show ids when asked', () => {
    const output = exportPlan(path, { showIds: true });
    expect(output.split('\n')[2]).toBe('**Targets:** Home (home), Inbox (inbox)');
  });

  it('should describe an empty path', () => {
    const empty: Path = {
      states: [StateSet.of(home)],
      transitions: [],
      targets: StateSet.of(home),
      totalCost: 0,
    };
    const lines = exportPlan(empty).split('\n');

    expect(lines[0]).toBe('# Plan');
    expect(lines[4]).toBe('**0 steps, total cost 0**');
    expect(lines[8]).toBe('All targets are already active.');
  });
});

describe('pathToRecord', () => {
  it('should list ids', () => {
    expect(pathToRecord(path)).toEqual({
      targets: ['home', 'inbox'],
      total_cost: 1.5,
      transitions: ['sign-in', 'open-inbox'],
      states: [['login'], ['home'], ['home', 'inbox']],
    });
  });
});

describe('exportResult', () => {
  it('should print one line per phase', () => {
    const result = new TransitionExecutor().execute(signIn, [home]);
    expect(exportResult(result)).toBe(
      '✗ VALIDATE No source state of the transition is active\n✓ CLEANUP Cleanup completed'
    );
  });
});

describe('exportComplexity', () => {
  it('should print the report', () => {
    const lines = exportComplexity(estimateComplexity(2, 1)).split('\n');
    expect(lines).toEqual([
      'States: 2',
      'Targets: 1',
      'State configurations: 4',
      'Target progress configurations: 2',
      'Total search space: 8',
      'Complexity: O(V * 2^k) where V=2, k=1',
      'Single target: O(V), Multi: O(V * 2^1)',
      'Practical: yes',
    ]);
  });
});
