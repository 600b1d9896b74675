/**
 * Errors raised while building a model.
 *
 * Execution and search never throw these; they report failures through
 * their results instead.
 */

export type ConfigurationProblem =
  | 'duplicate_id'
  | 'unknown_reference'
  | 'group_conflict'
  | 'invalid_value'
  | 'invalid_file';

/**
 * Error thrown when a model definition is inconsistent.
 */
export class ConfigurationError extends Error {
  readonly code = 'STATEWEAVE_CONFIGURATION';
  readonly problem: ConfigurationProblem;
  readonly subject: string | undefined;

  constructor(problem: ConfigurationProblem, message: string, subject?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.problem = problem;
    this.subject = subject;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new Error(String(thrown));
}
