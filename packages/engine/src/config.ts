import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import type { HeuristicWeights, SearchConfig } from './types.js';

const weightsSchema = z
  .object({
    growthBase: z.number().int().min(2),
    threatFactor: z.number().int().min(1),
  })
  .partial();

export const searchConfigSchema = z
  .object({
    maxDepth: z.number().int().min(1).nullable(),
    timeBudgetMs: z.number().int().min(0).nullable(),
    pruning: z.boolean(),
    moveOrdering: z.boolean(),
    weights: weightsSchema,
  })
  .partial()
  .strict();

export type SearchConfigInput = z.input<typeof searchConfigSchema>;

export const defaultWeights = (): HeuristicWeights => ({
  growthBase: 4,
  threatFactor: 1,
});

export const defaultSearchConfig = (): SearchConfig => ({
  maxDepth: null,
  timeBudgetMs: null,
  pruning: true,
  moveOrdering: true,
  weights: defaultWeights(),
});

/**
 * Play-time policy: exhaustive on 3x3, shallow and time-capped on anything larger.
 */
export function autoSearchConfig(size: number): SearchConfig {
  if (size === 3) {
    return defaultSearchConfig();
  }
  return { ...defaultSearchConfig(), maxDepth: 3, timeBudgetMs: 200 };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : 'config'}: ${issue.message}`)
    .join('; ');
}

export function validateSearchConfig(config: SearchConfigInput): { ok: true } | { ok: false; reason: string } {
  const parsed = searchConfigSchema.safeParse(config);
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) };
  }
  return { ok: true };
}

export function resolveSearchConfig(config: SearchConfigInput = {}): SearchConfig {
  const parsed = searchConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid search config: ${describeIssues(parsed.error)}`);
  }
  const input = parsed.data;
  const defaults = defaultSearchConfig();
  return {
    maxDepth: input.maxDepth ?? defaults.maxDepth,
    timeBudgetMs: input.timeBudgetMs ?? defaults.timeBudgetMs,
    pruning: input.pruning ?? defaults.pruning,
    moveOrdering: input.moveOrdering ?? defaults.moveOrdering,
    weights: {
      growthBase: input.weights?.growthBase ?? defaults.weights.growthBase,
      threatFactor: input.weights?.threatFactor ?? defaults.weights.threatFactor,
    },
  };
}
