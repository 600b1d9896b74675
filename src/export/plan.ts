/**
 * Plan export - renders paths, execution results and complexity reports as
 * Markdown or plain records.
 */

import type { ComplexityReport } from '../graph/complexity.js';
import type { Path } from '../graph/pathfinder.js';
import type { TransitionResult } from '../core/types.js';
import type { StateSet } from '../core/state-set.js';

export interface PlanExportOptions {
  title?: string;
  /** Show state ids next to names. */
  showIds?: boolean;
}

function formatStates(states: StateSet, showIds: boolean): string {
  if (states.isEmpty()) return '∅';
  return states
    .values()
    .map((s) => (showIds && s.id !== s.name ? `${s.name} (${s.id})` : s.name))
    .join(', ');
}

function formatCost(cost: number): string {
  return Number.isInteger(cost) ? String(cost) : cost.toFixed(2);
}

/**
 * Markdown description of a path.
 */
export function exportPlan(path: Path, options: PlanExportOptions = {}): string {
  const showIds = options.showIds ?? false;
  const lines: string[] = [];

  lines.push(`# ${options.title ?? 'Plan'}`);
  lines.push('');
  lines.push(`**Targets:** ${formatStates(path.targets, showIds)}`);
  lines.push('');

  const steps = path.transitions.length;
  lines.push(
    `**${steps} ${steps === 1 ? 'step' : 'steps'}, total cost ${formatCost(path.totalCost)}**`
  );
  lines.push('');

  const start = path.states[0];
  if (start) {
    lines.push(`Start: ${formatStates(start, showIds)}`);
    lines.push('');
  }

  if (steps > 0) {
    lines.push('| # | Transition | Cost | Active after |');
    lines.push('|---|------------|------|--------------|');
    path.transitions.forEach((transition, index) => {
      const after = path.states[index + 1];
      lines.push(
        `| ${index + 1} | ${transition.name} | ${formatCost(transition.cost)} | ${
          after ? formatStates(after, showIds) : ''
        } |`
      );
    });
    lines.push('');
  } else {
    lines.push('All targets are already active.');
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Plain representation of a path, for JSON output.
 */
export function pathToRecord(path: Path): Record<string, unknown> {
  return {
    targets: path.targets.ids(),
    total_cost: path.totalCost,
    transitions: path.transitions.map((t) => t.id),
    states: path.states.map((s) => s.ids()),
  };
}

/**
 * One line per phase: `✓ VALIDATE All preconditions satisfied`.
 */
export function exportResult(result: TransitionResult): string {
  const lines = result.phases.map(
    (phase) => `${phase.success ? '✓' : '✗'} ${phase.phase} ${phase.message}`
  );
  if (result.error) {
    lines.push(`error: ${result.error.message}`);
  }
  return lines.join('\n');
}

export function exportComplexity(report: ComplexityReport): string {
  return [
    `States: ${report.numStates}`,
    `Targets: ${report.numTargets}`,
    `State configurations: ${report.stateConfigurations}`,
    `Target progress configurations: ${report.targetProgressConfigurations}`,
    `Total search space: ${report.totalSearchSpace}`,
    `Complexity: ${report.complexityClass}`,
    report.comparisonToSingleTarget,
    `Practical: ${report.practical ? 'yes' : 'no'}`,
  ].join('\n');
}
