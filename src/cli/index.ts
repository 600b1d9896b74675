#!/usr/bin/env node
/**
 * stateweave CLI - inspect models, plan paths and replay them.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  parsePartialSettings,
  resolveSettings,
  settingsFromEnv,
  toSuccessPolicy,
  type Settings,
} from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';
import { isGroupAtomic } from '../core/state.js';
import { transitionToRecord } from '../core/transition.js';
import { estimateComplexity } from '../graph/complexity.js';
import { MultiTargetPathFinder } from '../graph/pathfinder.js';
import { exportComplexity, exportPlan, exportResult, pathToRecord } from '../export/plan.js';
import { createScopedLogger } from '../logging/logger.js';
import { findModelFile, loadModelFile, type LoadedModel } from '../storage/files.js';
import { TransitionExecutor } from '../transitions/executor.js';
import { ReliabilityTracker } from '../transitions/reliability.js';
import { replayPath } from '../transitions/replay.js';

interface SearchCommandOptions {
  to: string;
  from?: string;
  strategy?: string;
  maxNodes?: string;
  maxDuration?: string;
  format: string;
}

interface RunCommandOptions extends SearchCommandOptions {
  policy?: string;
  threshold?: string;
}

const program = new Command();

program
  .name('stateweave')
  .description('Plan and execute transitions between sets of active states')
  .version('0.1.0')
  .option('--log-level <level>', 'Log level (DEBUG, INFO, WARN, ERROR, SILENT)');

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function splitIds(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((id) => id.trim())
    .filter(Boolean);
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function load(file: string | undefined): LoadedModel {
  const filePath = file ?? findModelFile();
  if (!filePath) {
    fail('No stateweave.yaml found in this directory or its parents');
  }
  return loadModelFile(filePath);
}

/**
 * Flags are validated like every other settings layer and win over it.
 */
function settingsFor(loaded: LoadedModel, flags: Record<string, unknown>): Settings {
  const globalOptions = program.opts<{ logLevel?: string }>();
  const overrides = parsePartialSettings(
    { ...flags, logLevel: globalOptions.logLevel?.toUpperCase() },
    'command-line flags'
  );
  return resolveSettings(loaded.settings, settingsFromEnv(), overrides);
}

function searchFlags(options: SearchCommandOptions): Record<string, unknown> {
  return {
    strategy: options.strategy,
    maxExpandedNodes: toNumber(options.maxNodes),
    maxDurationMs: toNumber(options.maxDuration),
  };
}

function withConfigurationErrors(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      fail(error.message);
    }
    throw error;
  }
}

function plan(loaded: LoadedModel, settings: Settings, options: SearchCommandOptions) {
  const { model } = loaded;
  const targets = model.select(splitIds(options.to));
  const start = options.from ? model.select(splitIds(options.from)) : model.initial;
  if (targets.isEmpty()) fail('No targets given (use --to)');

  const finder = new MultiTargetPathFinder(model.transitions, {
    strategy: settings.strategy,
    limits: {
      maxExpandedNodes: settings.maxExpandedNodes,
      maxDurationMs: settings.maxDurationMs,
    },
    logger: createScopedLogger('search', settings.logLevel),
  });
  return { start, outcome: finder.search(start, targets) };
}

// Validate command
program
  .command('validate [file]')
  .description('Load a model file and check it for consistency')
  .action((file: string | undefined) =>
    withConfigurationErrors(() => {
      const { model, source } = load(file);
      console.log(chalk.green(`Model "${model.name}" is valid`));
      console.log(chalk.gray(`File: ${source}`));
      console.log(
        `${model.states.length} states, ${model.groups.length} groups, ${model.transitions.length} transitions`
      );

      const broken = model.groups.filter((g) => !isGroupAtomic(g, model.initial));
      if (broken.length > 0) {
        fail(`Initial states split groups: ${broken.map((g) => g.id).join(', ')}`);
      }
    })
  );

// List command
program
  .command('list <kind> [file]')
  .description('List states, groups or transitions of a model')
  .action((kind: string, file: string | undefined) =>
    withConfigurationErrors(() => {
      const { model } = load(file);

      switch (kind) {
        case 'states':
          for (const state of model.states) {
            const flags = [
              state.group ? `group=${state.group}` : '',
              state.blocking ? 'blocking' : '',
              model.initial.has(state) ? 'initial' : '',
            ].filter(Boolean);
            console.log(
              `${chalk.cyan(state.id)} - ${state.name}${flags.length ? chalk.gray(` [${flags.join(', ')}]`) : ''}`
            );
          }
          return;
        case 'groups':
          for (const group of model.groups) {
            console.log(`${chalk.cyan(group.id)} - ${group.name}: ${group.states.ids().join(', ')}`);
          }
          return;
        case 'transitions':
          for (const transition of model.transitions) {
            const record = transitionToRecord(transition);
            console.log(
              `${chalk.cyan(transition.id)} - ${transition.name} ${chalk.gray(
                `(cost ${transition.cost}, from ${JSON.stringify(record.from_states)})`
              )}`
            );
          }
          return;
        default:
          fail(`Unknown kind: ${kind}. Must be one of: states, groups, transitions`);
      }
    })
  );

// Path command
program
  .command('path [file]')
  .description('Find the cheapest transition sequence visiting every target state')
  .requiredOption('--to <ids>', 'Comma-separated target state IDs')
  .option('--from <ids>', 'Comma-separated start state IDs (default: model initial states)')
  .option('-s, --strategy <strategy>', 'Search strategy (bfs, dijkstra, astar)')
  .option('--max-nodes <n>', 'Abort after expanding this many search nodes')
  .option('--max-duration <ms>', 'Abort after this many milliseconds')
  .option('-f, --format <format>', 'Output format (markdown, json)', 'markdown')
  .action((file: string | undefined, options: SearchCommandOptions) =>
    withConfigurationErrors(() => {
      const loaded = load(file);
      const settings = settingsFor(loaded, searchFlags(options));
      const { outcome } = plan(loaded, settings, options);

      if (outcome.status === 'aborted') {
        fail(`Search aborted (${outcome.reason}) after ${outcome.expandedNodes} nodes`);
      }
      if (outcome.status === 'unreachable') {
        console.log(chalk.yellow('No path reaches all targets'));
        process.exit(2);
      }

      if (options.format === 'json') {
        console.log(JSON.stringify(pathToRecord(outcome.path), null, 2));
        return;
      }
      if (options.format !== 'markdown') {
        fail(`Unknown format: ${options.format}`);
      }
      console.log(exportPlan(outcome.path, { title: `${loaded.model.name} plan` }));
      console.log(chalk.gray(`${outcome.expandedNodes} nodes expanded (${settings.strategy})`));
    })
  );

// Run command
program
  .command('run [file]')
  .description('Find a path and replay it through the executor')
  .requiredOption('--to <ids>', 'Comma-separated target state IDs')
  .option('--from <ids>', 'Comma-separated start state IDs (default: model initial states)')
  .option('-s, --strategy <strategy>', 'Search strategy (bfs, dijkstra, astar)')
  .option('--max-nodes <n>', 'Abort after expanding this many search nodes')
  .option('--max-duration <ms>', 'Abort after this many milliseconds')
  .option('-p, --policy <policy>', 'Success policy (strict, lenient, threshold)')
  .option('--threshold <value>', 'Threshold for the threshold policy (0-1)')
  .option('-f, --format <format>', 'Output format (markdown, json)', 'markdown')
  .action((file: string | undefined, options: RunCommandOptions) =>
    withConfigurationErrors(() => {
      const loaded = load(file);
      const settings = settingsFor(loaded, {
        ...searchFlags(options),
        policy: options.policy,
        threshold: toNumber(options.threshold),
      });
      const { start, outcome } = plan(loaded, settings, options);
      if (outcome.status !== 'found') {
        fail(outcome.status === 'aborted' ? 'Search aborted' : 'No path reaches all targets');
      }

      const tracker = new ReliabilityTracker();
      const executor = new TransitionExecutor({
        policy: toSuccessPolicy(settings),
        model: loaded.model,
        observer: tracker,
        logger: createScopedLogger('executor', settings.logLevel),
      });
      const replay = replayPath(executor, outcome.path, start);

      if (options.format === 'json') {
        console.log(
          JSON.stringify(
            {
              success: replay.success,
              failed_at: replay.failedAt ?? null,
              active: replay.active.ids(),
              summary: tracker.summary(),
            },
            null,
            2
          )
        );
      } else {
        replay.results.forEach((result, index) => {
          const transition = outcome.path.transitions[index];
          console.log(chalk.cyan(`${index + 1}. ${transition?.name ?? '?'}`));
          console.log(exportResult(result));
          console.log();
        });
        console.log(`Active: ${replay.active.toString()}`);
      }

      if (!replay.success) {
        console.error(chalk.red(`Replay failed at step ${(replay.failedAt ?? 0) + 1}`));
        process.exit(1);
      }
    })
  );

// Complexity command
program
  .command('complexity <states> <targets>')
  .description('Report the theoretical search space size')
  .action((states: string, targets: string) => {
    const numStates = Number(states);
    const numTargets = Number(targets);
    if (!Number.isInteger(numStates) || numStates < 0) fail(`Invalid state count: ${states}`);
    if (!Number.isInteger(numTargets) || numTargets < 0) fail(`Invalid target count: ${targets}`);

    const report = estimateComplexity(numStates, numTargets);
    console.log(exportComplexity(report));
    if (!report.practical) {
      console.log(chalk.yellow('Warning: target count is beyond the practical search range'));
    }
  });

program.parse();
