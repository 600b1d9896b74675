/**
 * stateweave - transitions between sets of simultaneously active states,
 * and paths that visit several target states.
 *
 * @packageDocumentation
 */

export type {
  Action,
  Element,
  Metadata,
  PhaseResult,
  State,
  StateGroup,
  Transition,
  TransitionPhase,
  TransitionResult,
  Visibility,
  VisibilityChange,
} from './core/types.js';
export { TRANSITION_PHASES } from './core/types.js';
export { StateSet } from './core/state-set.js';
export { ConfigurationError, type ConfigurationProblem } from './core/errors.js';
export {
  defineElement,
  defineGroup,
  defineState,
  groupToRecord,
  hasElement,
  isGroupAtomic,
  stateToRecord,
} from './core/state.js';
export {
  applyTransition,
  canFire,
  defineTransition,
  findAtomicityViolations,
  statesToActivate,
  statesToExit,
  transitionToRecord,
  type GroupLookup,
} from './core/transition.js';
export {
  StateModel,
  StateModelBuilder,
  type GroupDefinition,
  type StateDefinition,
  type TransitionDefinition,
} from './core/model.js';

export {
  TransitionCallbacks,
  type CallbackRegistry,
  type CostProvider,
  type ExecutionObserver,
} from './transitions/callbacks.js';
export {
  LENIENT,
  STRICT,
  describePolicy,
  evaluateIncoming,
  threshold,
  type SuccessPolicy,
} from './transitions/policy.js';
export {
  TransitionExecutor,
  commitResult,
  getFailedPhase,
  type ExecutorOptions,
} from './transitions/executor.js';
export {
  ReliabilityTracker,
  successRate,
  type ReliabilitySummary,
  type TransitionStats,
} from './transitions/reliability.js';
export { replayPath, type ReplayResult } from './transitions/replay.js';

export {
  MultiTargetPathFinder,
  SEARCH_STRATEGIES,
  isComplete,
  type Path,
  type PathFinderOptions,
  type SearchLimits,
  type SearchOutcome,
  type SearchStrategy,
} from './graph/pathfinder.js';
export { estimateComplexity, type ComplexityReport } from './graph/complexity.js';

export { exportPlan, exportResult, exportComplexity, pathToRecord } from './export/plan.js';
export {
  MODEL_FILE,
  buildModel,
  findModelFile,
  loadModelFile,
  parseModel,
  type LoadedModel,
} from './storage/files.js';
export {
  DEFAULT_SETTINGS,
  resolveSettings,
  settingsFromEnv,
  toSuccessPolicy,
  type Settings,
} from './config/index.js';
export {
  createNoOpLogger,
  createScopedLogger,
  type Logger,
  type LogLevel,
} from './logging/logger.js';
