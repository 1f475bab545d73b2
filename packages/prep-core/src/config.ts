import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const name = z.string().min(1);

const common = {
  inputDir: name,
  testPrefix: name.default('test-cipher-'),
  cipherField: name.default('ciphertext'),
  plainField: name.default('plaintext'),
};

/** Separate train and test output directories, files picked by name prefix */
export const PairsConfigSchema = z.object({
  mode: z.literal('pairs'),
  ...common,
  trainOut: name.default('train'),
  testOut: name.default('test'),
  prefix: name.default('data'),
});

/** One output directory, validation records drawn at random from the training files */
export const SplitConfigSchema = z.object({
  mode: z.literal('split'),
  ...common,
  outDir: name.default('data-bin'),
  validRatio: z.number().min(0).max(1).default(0.1),
  seed: z.string().default('cipherprep'),
});

export const PipelineConfigSchema = z.discriminatedUnion('mode', [PairsConfigSchema, SplitConfigSchema]);

export type PairsConfig = z.infer<typeof PairsConfigSchema>;
export type SplitConfig = z.infer<typeof SplitConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface RecordFields { cipherField: string; plainField: string; }

export const DEFAULT_FIELDS: RecordFields = { cipherField: 'ciphertext', plainField: 'plaintext' };

/**
 * Apply defaults and validate
 * @throws ConfigError naming the first invalid field
 */
export function resolveConfig(input: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (parsed.success) {
    const config = parsed.data;
    // both splits write <prefix>.src/.tgt, one would truncate the other
    if (config.mode === 'pairs' && path.resolve(config.trainOut) === path.resolve(config.testOut)) {
      throw new ConfigError('must differ from trainOut', 'testOut');
    }
    return config;
  }
  const issue = parsed.error.issues[0];
  const field = issue.path.join('.');
  throw new ConfigError(issue.message, field || undefined);
}
