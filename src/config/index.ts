/**
 * Settings for the executor, the path finder and logging.
 *
 * Layers, lowest precedence first: defaults, model file `settings`,
 * environment, explicit overrides (CLI flags).
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { LOG_LEVELS } from '../logging/logger.js';
import { LENIENT, STRICT, threshold, type SuccessPolicy } from '../transitions/policy.js';

export const LogLevelSchema = z.enum(LOG_LEVELS);
export const StrategySchema = z.enum(['bfs', 'dijkstra', 'astar']);
export const PolicySchema = z.enum(['strict', 'lenient', 'threshold']);

export const SettingsSchema = z.object({
  logLevel: LogLevelSchema,
  strategy: StrategySchema,
  policy: PolicySchema,
  /** Fraction of incoming actions that must succeed under the threshold policy. */
  threshold: z.number().min(0).max(1),
  maxExpandedNodes: z.number().int().positive().optional(),
  maxDurationMs: z.number().positive().optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const PartialSettingsSchema = SettingsSchema.partial();

export type PartialSettings = z.infer<typeof PartialSettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  logLevel: 'WARN',
  strategy: 'dijkstra',
  policy: 'strict',
  threshold: 0.8,
};

const ENV_KEYS = {
  logLevel: 'STATEWEAVE_LOG_LEVEL',
  strategy: 'STATEWEAVE_STRATEGY',
  policy: 'STATEWEAVE_POLICY',
  threshold: 'STATEWEAVE_THRESHOLD',
  maxExpandedNodes: 'STATEWEAVE_MAX_NODES',
  maxDurationMs: 'STATEWEAVE_MAX_DURATION_MS',
} as const;

const EnvSettingsSchema = z.object({
  logLevel: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(LogLevelSchema)
    .optional(),
  strategy: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(StrategySchema)
    .optional(),
  policy: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(PolicySchema)
    .optional(),
  threshold: z.coerce.number().min(0).max(1).optional(),
  maxExpandedNodes: z.coerce.number().int().positive().optional(),
  maxDurationMs: z.coerce.number().positive().optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read settings from environment variables. Unset variables are omitted.
 *
 * @throws ConfigurationError if a variable holds an invalid value
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): PartialSettings {
  const raw: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const result = EnvSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'invalid_value',
      `Invalid environment settings: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

/**
 * Validate a partial settings object, e.g. the `settings` block of a model file.
 *
 * @throws ConfigurationError if a value is invalid
 */
export function parsePartialSettings(input: unknown, source: string): PartialSettings {
  const result = PartialSettingsSchema.strict().safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      'invalid_value',
      `Invalid settings in ${source}: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

/**
 * Merge layers over the defaults; later layers win.
 */
export function resolveSettings(...layers: PartialSettings[]): Settings {
  const merged = layers.reduce<Settings>(
    (acc, layer) => ({
      logLevel: layer.logLevel ?? acc.logLevel,
      strategy: layer.strategy ?? acc.strategy,
      policy: layer.policy ?? acc.policy,
      threshold: layer.threshold ?? acc.threshold,
      maxExpandedNodes: layer.maxExpandedNodes ?? acc.maxExpandedNodes,
      maxDurationMs: layer.maxDurationMs ?? acc.maxDurationMs,
    }),
    DEFAULT_SETTINGS
  );
  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      'invalid_value',
      `Invalid settings: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

export function toSuccessPolicy(settings: Settings): SuccessPolicy {
  switch (settings.policy) {
    case 'strict':
      return STRICT;
    case 'lenient':
      return LENIENT;
    case 'threshold':
      return threshold(settings.threshold);
  }
}
