/**
 * Success policies: turn per-state incoming outcomes into one verdict.
 */

export type SuccessPolicy =
  | { kind: 'strict' }
  | { kind: 'lenient' }
  | { kind: 'threshold'; threshold: number };

export type SuccessPolicyKind = SuccessPolicy['kind'];

export const STRICT: SuccessPolicy = { kind: 'strict' };
export const LENIENT: SuccessPolicy = { kind: 'lenient' };

/**
 * Succeeds when at least `threshold` (0..1) of the incoming actions succeed.
 */
export function threshold(value: number): SuccessPolicy {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`Success threshold must be between 0 and 1, got ${value}`);
  }
  return { kind: 'threshold', threshold: value };
}

/**
 * Decide whether the incoming phase succeeded.
 *
 * An empty activation always succeeds.
 */
export function evaluateIncoming(policy: SuccessPolicy, activated: number, failed: number): boolean {
  if (activated === 0) return true;

  switch (policy.kind) {
    case 'strict':
      return failed === 0;
    case 'lenient':
      return true;
    case 'threshold':
      return (activated - failed) / activated >= policy.threshold;
  }
}

export function describePolicy(policy: SuccessPolicy): string {
  return policy.kind === 'threshold' ? `threshold(${policy.threshold})` : policy.kind;
}
