/**
 * Multi-target pathfinding: the cheapest transition sequence from a start
 * configuration that visits every target state at least once.
 *
 * The search space is (active states × targets reached). Targets stay
 * reached after they are exited again, so the same configuration can be
 * revisited with more progress. With k targets the space is up to
 * V × 2^k nodes, where V is the number of reachable configurations.
 *
 * Successors are computed with `applyTransition` only; no actions run and
 * the blocking rules of the executor are not applied.
 */

import { toError } from '../core/errors.js';
import { StateSet } from '../core/state-set.js';
import { applyTransition, canFire, statesToActivate } from '../core/transition.js';
import type { State, Transition } from '../core/types.js';
import { createNoOpLogger, type Logger } from '../logging/logger.js';
import type { CostProvider } from '../transitions/callbacks.js';
import { PriorityQueue } from './priority-queue.js';

export type SearchStrategy = 'bfs' | 'dijkstra' | 'astar';

export const SEARCH_STRATEGIES: readonly SearchStrategy[] = ['bfs', 'dijkstra', 'astar'];

export interface SearchLimits {
  /** Stop after expanding this many nodes. */
  maxExpandedNodes?: number;
  /** Stop after this many milliseconds. */
  maxDurationMs?: number;
}

export interface PathFinderOptions {
  strategy?: SearchStrategy;
  costProvider?: CostProvider;
  limits?: SearchLimits;
  logger?: Logger;
  /** Milliseconds; defaults to `performance.now`. */
  clock?: () => number;
}

/**
 * A path through the state space.
 *
 * `states[0]` is the start configuration and `states[i + 1]` the
 * configuration after `transitions[i]`.
 */
export interface Path {
  states: StateSet[];
  transitions: Transition[];
  targets: StateSet;
  totalCost: number;
}

export type SearchOutcome =
  | { status: 'found'; path: Path; expandedNodes: number }
  | { status: 'unreachable'; expandedNodes: number }
  | { status: 'aborted'; reason: 'node_limit' | 'time_limit'; expandedNodes: number };

interface PathNode {
  active: StateSet;
  reached: StateSet;
  /** Arena index of the parent, -1 for the root. */
  parent: number;
  transition: Transition | undefined;
  cost: number;
  depth: number;
  key: string;
}

interface QueueEntry {
  priority: number;
  sequence: number;
  index: number;
}

interface SearchContext {
  targets: StateSet;
  costs: Map<string, number>;
  nodes: PathNode[];
  startedAt: number;
  expanded: number;
}

function nodeKey(active: StateSet, reached: StateSet): string {
  return `${active.key()}|${reached.key()}`;
}

/**
 * True if every target appears in at least one configuration of the path.
 */
export function isComplete(path: Path): boolean {
  let visited = StateSet.empty;
  for (const states of path.states) {
    visited = visited.union(states);
  }
  return path.targets.isSubsetOf(visited);
}

export class MultiTargetPathFinder {
  readonly strategy: SearchStrategy;
  private readonly transitions: readonly Transition[];
  private readonly ordinal = new Map<string, number>();
  private readonly bySource = new Map<string, Transition[]>();
  private readonly wildcards: Transition[] = [];
  private readonly costProvider: CostProvider | undefined;
  private readonly limits: SearchLimits;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(transitions: readonly Transition[], options: PathFinderOptions = {}) {
    this.transitions = transitions;
    this.strategy = options.strategy ?? 'bfs';
    this.costProvider = options.costProvider;
    this.limits = options.limits ?? {};
    this.logger = options.logger ?? createNoOpLogger();
    this.clock = options.clock ?? (() => performance.now());

    transitions.forEach((transition, index) => {
      this.ordinal.set(transition.id, index);
      if (transition.fromStates.isEmpty()) {
        this.wildcards.push(transition);
        return;
      }
      for (const state of transition.fromStates) {
        const list = this.bySource.get(state.id) ?? [];
        list.push(transition);
        this.bySource.set(state.id, list);
      }
    });
  }

  /**
   * Transitions that can fire from `active`, in declaration order.
   */
  availableTransitions(active: Iterable<State>): Transition[] {
    const current = StateSet.from(active);
    const found = new Map<string, Transition>();
    for (const state of current) {
      for (const transition of this.bySource.get(state.id) ?? []) {
        found.set(transition.id, transition);
      }
    }
    for (const transition of this.wildcards) {
      found.set(transition.id, transition);
    }
    return Array.from(found.values())
      .filter((t) => canFire(t, current))
      .sort((a, b) => (this.ordinal.get(a.id) ?? 0) - (this.ordinal.get(b.id) ?? 0));
  }

  /**
   * Cheapest path visiting every target, or null when there is none or the
   * search hit its limits.
   */
  findPathToAll(
    current: Iterable<State>,
    targets: Iterable<State>,
    strategy: SearchStrategy = this.strategy
  ): Path | null {
    const outcome = this.search(current, targets, strategy);
    switch (outcome.status) {
      case 'found':
        return outcome.path;
      case 'unreachable':
        return null;
      case 'aborted':
        this.logger.warn('Search aborted', {
          reason: outcome.reason,
          expandedNodes: outcome.expandedNodes,
        });
        return null;
    }
  }

  /**
   * Run a search and report how it ended.
   */
  search(
    current: Iterable<State>,
    targets: Iterable<State>,
    strategy: SearchStrategy = this.strategy
  ): SearchOutcome {
    const start = StateSet.from(current);
    const targetSet = StateSet.from(targets);

    if (targetSet.isSubsetOf(start)) {
      return {
        status: 'found',
        path: { states: [start], transitions: [], targets: targetSet, totalCost: 0 },
        expandedNodes: 0,
      };
    }

    const reached = targetSet.intersection(start);
    const context: SearchContext = {
      targets: targetSet,
      costs: this.resolveCosts(),
      nodes: [
        {
          active: start,
          reached,
          parent: -1,
          transition: undefined,
          cost: 0,
          depth: 0,
          key: nodeKey(start, reached),
        },
      ],
      startedAt: this.clock(),
      expanded: 0,
    };

    this.logger.debug('Search started', {
      strategy,
      targets: targetSet.ids(),
      start: start.ids(),
    });

    const outcome =
      strategy === 'bfs'
        ? this.breadthFirst(context)
        : this.bestFirst(context, strategy === 'astar' ? this.heuristic(context) : () => 0);

    this.logger.debug('Search finished', {
      strategy,
      status: outcome.status,
      expandedNodes: outcome.expandedNodes,
    });
    return outcome;
  }

  private breadthFirst(context: SearchContext): SearchOutcome {
    const queue: number[] = [0];
    const seen = new Set<string>([context.nodes[0]?.key ?? '']);

    for (let head = 0; head < queue.length; head++) {
      const exceeded = this.limitExceeded(context);
      if (exceeded) return { status: 'aborted', reason: exceeded, expandedNodes: context.expanded };

      const index = queue[head] ?? 0;
      const node = this.node(context, index);
      context.expanded++;

      if (node.reached.size === context.targets.size) {
        return this.found(context, node);
      }

      for (const transition of this.availableTransitions(node.active)) {
        const child = this.successor(context, index, node, transition);
        if (seen.has(child.key)) continue;
        seen.add(child.key);
        context.nodes.push(child);
        queue.push(context.nodes.length - 1);
      }
    }

    return { status: 'unreachable', expandedNodes: context.expanded };
  }

  /**
   * Dijkstra (zero heuristic) or A*. Improved entries are pushed again and
   * stale ones skipped when popped.
   */
  private bestFirst(context: SearchContext, heuristic: (node: PathNode) => number): SearchOutcome {
    let sequence = 0;
    const queue = new PriorityQueue<QueueEntry>(
      (a, b) => a.priority - b.priority || a.sequence - b.sequence
    );
    const closed = new Set<string>();
    const bestCost = new Map<string, number>();

    const root = this.node(context, 0);
    bestCost.set(root.key, 0);
    queue.push({ priority: heuristic(root), sequence: sequence++, index: 0 });

    for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
      const index = entry.index;
      const node = this.node(context, index);
      if (closed.has(node.key)) continue;

      const exceeded = this.limitExceeded(context);
      if (exceeded) return { status: 'aborted', reason: exceeded, expandedNodes: context.expanded };

      closed.add(node.key);
      context.expanded++;

      if (node.reached.size === context.targets.size) {
        return this.found(context, node);
      }

      for (const transition of this.availableTransitions(node.active)) {
        const child = this.successor(context, index, node, transition);
        if (closed.has(child.key)) continue;
        const previous = bestCost.get(child.key);
        if (previous !== undefined && previous <= child.cost) continue;

        bestCost.set(child.key, child.cost);
        context.nodes.push(child);
        queue.push({
          priority: child.cost + heuristic(child),
          sequence: sequence++,
          index: context.nodes.length - 1,
        });
      }
    }

    return { status: 'unreachable', expandedNodes: context.expanded };
  }

  /**
   * Admissible and consistent for any non-negative costs: at least
   * ceil(remaining / maxGain) more transitions are needed, each costing at
   * least the cheapest transition, where maxGain is the most targets a
   * single transition activates.
   */
  private heuristic(context: SearchContext): (node: PathNode) => number {
    let maxGain = 0;
    let minCost = Number.POSITIVE_INFINITY;
    for (const transition of this.transitions) {
      maxGain = Math.max(maxGain, statesToActivate(transition).intersection(context.targets).size);
      minCost = Math.min(minCost, context.costs.get(transition.id) ?? transition.cost);
    }
    if (maxGain === 0 || !Number.isFinite(minCost)) return () => 0;

    return (node) => {
      const remaining = context.targets.size - node.reached.size;
      return Math.ceil(remaining / maxGain) * minCost;
    };
  }

  private successor(
    context: SearchContext,
    parentIndex: number,
    parent: PathNode,
    transition: Transition
  ): PathNode {
    const active = applyTransition(transition, parent.active);
    const reached = parent.reached.union(context.targets.intersection(active));
    return {
      active,
      reached,
      parent: parentIndex,
      transition,
      cost: parent.cost + (context.costs.get(transition.id) ?? transition.cost),
      depth: parent.depth + 1,
      key: nodeKey(active, reached),
    };
  }

  /**
   * Effective cost of every transition, consulting the cost provider once
   * per search. Invalid provider costs, and providers that throw, fall back
   * to the base cost.
   */
  private resolveCosts(): Map<string, number> {
    const costs = new Map<string, number>();
    for (const transition of this.transitions) {
      costs.set(transition.id, this.costOf(transition));
    }
    return costs;
  }

  private costOf(transition: Transition): number {
    if (!this.costProvider) return transition.cost;

    let dynamic: number;
    try {
      dynamic = this.costProvider.getDynamicCost(transition.id, transition.cost);
    } catch (thrown) {
      this.logger.warn('Cost provider failed', {
        transitionId: transition.id,
        error: toError(thrown).message,
      });
      return transition.cost;
    }

    if (Number.isFinite(dynamic) && dynamic >= 0) return dynamic;
    this.logger.warn('Ignoring invalid dynamic cost', {
      transitionId: transition.id,
      cost: dynamic,
    });
    return transition.cost;
  }

  private limitExceeded(context: SearchContext): 'node_limit' | 'time_limit' | undefined {
    const { maxExpandedNodes, maxDurationMs } = this.limits;
    if (maxExpandedNodes !== undefined && context.expanded >= maxExpandedNodes) {
      return 'node_limit';
    }
    if (maxDurationMs !== undefined && this.clock() - context.startedAt > maxDurationMs) {
      return 'time_limit';
    }
    return undefined;
  }

  private node(context: SearchContext, index: number): PathNode {
    const node = context.nodes[index];
    if (!node) {
      throw new RangeError(`Search node index out of range: ${index}`);
    }
    return node;
  }

  private found(context: SearchContext, goal: PathNode): SearchOutcome {
    const states: StateSet[] = [];
    const transitions: Transition[] = [];
    for (let current: PathNode | undefined = goal; current; ) {
      states.push(current.active);
      if (current.transition) transitions.push(current.transition);
      current = current.parent >= 0 ? this.node(context, current.parent) : undefined;
    }
    states.reverse();
    transitions.reverse();

    return {
      status: 'found',
      path: { states, transitions, targets: context.targets, totalCost: goal.cost },
      expandedNodes: context.expanded,
    };
  }
}
