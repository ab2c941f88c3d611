/**
 * Wires a ready-to-run orchestrator from configuration overrides. Every call
 * builds fresh collaborators and storage, so concurrent runs share nothing.
 */

import { z } from 'zod';
import { createCollaborators, type Collaborators, type VideoCompositor } from './collaborators';
import { Config, type PipelineConfig, type PipelineConfigOverrides } from './config';
import { PipelineOrchestrator } from './orchestrator';
import { StorageTool } from './tools/storage';

export interface Pipeline {
  config: PipelineConfig;
  storage: StorageTool;
  orchestrator: PipelineOrchestrator;
}

export interface PipelineWiring {
  /** Replaces the production collaborators entirely. */
  collaborators?: Collaborators;
  compositor?: VideoCompositor;
}

export function createPipeline(overrides: PipelineConfigOverrides = {}, wiring: PipelineWiring = {}): Pipeline {
  const config = Config.getPipelineConfig(overrides);
  const storage = new StorageTool({
    backend: config.storage.backend,
    local_root: config.storage.local_root,
  });

  const orchestrator = new PipelineOrchestrator({
    config,
    storage,
    collaborators: wiring.collaborators ?? createCollaborators(config, storage, { compositor: wiring.compositor }),
  });

  return { config, storage, orchestrator };
}

const keywordList = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : value.split(',')))
  .transform(list => list.map(k => k.trim()).filter(Boolean));

/**
 * Options shared by the HTTP endpoint and the CLI.
 */
export const RunOptionsSchema = z.object({
  clip_index: z.number().int().min(0).optional(),
  clip_rank: z.number().int().min(1).optional(),
  clip_max: z.number().int().min(1).optional(),
  whitelist_keywords: keywordList.optional(),
  blacklist_keywords: keywordList.optional(),
  output_dir: z.string().min(1).optional(),
  save_analysis: z.boolean().optional(),
  save_clips: z.boolean().optional(),
  strict: z.boolean().optional(),
  enhance: z.boolean().optional(),
  intensity: z.enum(['subtle', 'balanced', 'expressive']).optional(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

export function overridesFromOptions(options: RunOptions): PipelineConfigOverrides {
  const overrides: PipelineConfigOverrides = {
    scoring: {},
    output: {},
    parsing: {},
    enhancement: {},
  };

  if (options.clip_max !== undefined) overrides.scoring = { ...overrides.scoring, max_clips: options.clip_max };
  if (options.whitelist_keywords) overrides.scoring = { ...overrides.scoring, whitelist: options.whitelist_keywords };
  if (options.blacklist_keywords) overrides.scoring = { ...overrides.scoring, blacklist: options.blacklist_keywords };
  if (options.output_dir) overrides.output = { ...overrides.output, output_dir: options.output_dir };
  if (options.save_analysis !== undefined) overrides.output = { ...overrides.output, save_analysis: options.save_analysis };
  if (options.save_clips !== undefined) overrides.output = { ...overrides.output, save_clips: options.save_clips };
  if (options.strict) overrides.parsing = { strictness: 'strict' };
  if (options.enhance !== undefined) overrides.enhancement = { ...overrides.enhancement, enabled: options.enhance };
  if (options.intensity) overrides.enhancement = { ...overrides.enhancement, intensity: options.intensity };

  return overrides;
}
