/**
 * Theoretical size of the multi-target search space, for monitoring only.
 */

/** Target counts above this are usually impractical to search. */
export const PRACTICAL_TARGET_LIMIT = 10;

export interface ComplexityReport {
  numStates: number;
  numTargets: number;
  /** 2^n: every state active or not. */
  stateConfigurations: number;
  /** 2^k: every target reached or not. */
  targetProgressConfigurations: number;
  totalSearchSpace: number;
  complexityClass: string;
  comparisonToSingleTarget: string;
  exponentialInTargets: true;
  practical: boolean;
}

export function estimateComplexity(numStates: number, numTargets: number): ComplexityReport {
  if (!Number.isInteger(numStates) || numStates < 0) {
    throw new RangeError(`numStates must be a non-negative integer, got ${numStates}`);
  }
  if (!Number.isInteger(numTargets) || numTargets < 0) {
    throw new RangeError(`numTargets must be a non-negative integer, got ${numTargets}`);
  }

  const stateConfigurations = 2 ** numStates;
  const targetProgressConfigurations = 2 ** numTargets;

  return {
    numStates,
    numTargets,
    stateConfigurations,
    targetProgressConfigurations,
    totalSearchSpace: stateConfigurations * targetProgressConfigurations,
    complexityClass: `O(V * 2^k) where V=${numStates}, k=${numTargets}`,
    comparisonToSingleTarget: `Single target: O(V), Multi: O(V * 2^${numTargets})`,
    exponentialInTargets: true,
    practical: numTargets <= PRACTICAL_TARGET_LIMIT,
  };
}
