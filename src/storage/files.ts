/**
 * YAML model files.
 *
 * ```yaml
 * name: workspace
 * initial: [login]
 * states:
 *   - { id: login, name: Login }
 *   - { id: toolbar, group: panels }
 * groups:
 *   - { id: panels, name: Panels }
 * transitions:
 *   - { id: sign-in, from: [login], activate_groups: [panels], exit: [login] }
 * ```
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, toError } from '../core/errors.js';
import { StateModelBuilder, type StateModel } from '../core/model.js';
import { parsePartialSettings, type PartialSettings } from '../config/index.js';

/**
 * Default model file name.
 */
export const MODEL_FILE = 'stateweave.yaml';

const Ids = z.array(z.string().min(1));
const MetadataSchema = z.record(z.unknown());

const ElementSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    type: z.string().optional(),
    metadata: MetadataSchema.optional(),
  })
  .strict();

const StateSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    elements: Ids.optional(),
    group: z.string().min(1).optional(),
    initial_weight: z.number().nonnegative().optional(),
    search_cost: z.number().nonnegative().optional(),
    blocking: z.boolean().optional(),
    blocks: Ids.optional(),
    metadata: MetadataSchema.optional(),
  })
  .strict();

const GroupSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    states: Ids.optional(),
    metadata: MetadataSchema.optional(),
  })
  .strict();

const TransitionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    from: Ids.optional(),
    activate: Ids.optional(),
    exit: Ids.optional(),
    activate_groups: Ids.optional(),
    exit_groups: Ids.optional(),
    cost: z.number().nonnegative().optional(),
    visibility: z.enum(['SHOW_SOURCE', 'HIDE_SOURCE', 'INHERIT']).optional(),
    metadata: MetadataSchema.optional(),
  })
  .strict();

export const ModelFileSchema = z
  .object({
    name: z.string().optional(),
    initial: Ids.optional(),
    settings: z.unknown().optional(),
    elements: z.array(ElementSchema).optional(),
    states: z.array(StateSchema),
    groups: z.array(GroupSchema).optional(),
    transitions: z.array(TransitionSchema).optional(),
  })
  .strict();

export type ModelFile = z.infer<typeof ModelFileSchema>;

export interface LoadedModel {
  model: StateModel;
  settings: PartialSettings;
  source: string;
}

/**
 * Find the nearest model file by walking up from `startDir`.
 */
export function findModelFile(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, MODEL_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

/**
 * Build a model from a parsed model-file document.
 *
 * @throws ConfigurationError if the document or the model it describes is invalid
 */
export function buildModel(document: unknown, source: string): LoadedModel {
  const result = ModelFileSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('invalid_file', `Invalid model file ${source}: ${issues}`, source);
  }
  const file = result.data;

  const builder = new StateModelBuilder(file.name ?? 'model');
  for (const element of file.elements ?? []) {
    builder.element(element);
  }
  for (const state of file.states) {
    builder.state({
      id: state.id,
      name: state.name,
      elements: state.elements,
      group: state.group,
      initialWeight: state.initial_weight,
      searchCost: state.search_cost,
      blocking: state.blocking,
      blocks: state.blocks,
      metadata: state.metadata,
    });
  }
  for (const group of file.groups ?? []) {
    builder.group(group);
  }
  for (const transition of file.transitions ?? []) {
    builder.transition({
      id: transition.id,
      name: transition.name,
      from: transition.from,
      activate: transition.activate,
      exit: transition.exit,
      activateGroups: transition.activate_groups,
      exitGroups: transition.exit_groups,
      cost: transition.cost,
      visibility: transition.visibility,
      metadata: transition.metadata,
    });
  }
  builder.initial(file.initial ?? []);

  return {
    model: builder.build(),
    settings: parsePartialSettings(file.settings, source),
    source,
  };
}

/**
 * Parse YAML text into a model.
 */
export function parseModel(content: string, source = '<inline>'): LoadedModel {
  let document: unknown;
  try {
    document = parse(content);
  } catch (thrown) {
    throw new ConfigurationError(
      'invalid_file',
      `Cannot parse ${source}: ${toError(thrown).message}`,
      source
    );
  }
  return buildModel(document, source);
}

/**
 * Load a model from a YAML file.
 */
export function loadModelFile(filePath: string): LoadedModel {
  if (!existsSync(filePath)) {
    throw new ConfigurationError('invalid_file', `Model file not found: ${filePath}`, filePath);
  }
  return parseModel(readFileSync(filePath, 'utf-8'), filePath);
}
