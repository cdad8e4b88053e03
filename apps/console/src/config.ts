import { parseArgs } from 'node:util';
import { z } from 'zod';
import { autoSearchConfig, InvalidConfigError, resolveSearchConfig, type SearchConfig } from '@gridline/engine';

export const PlayerKind = z.enum(['human', 'random', 'smart']);
export type PlayerKind = z.infer<typeof PlayerKind>;

export const Command = z.enum(['play', 'compare', 'match']);
export type Command = z.infer<typeof Command>;

// Blank env values count as unset.
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const intOption = (min: number) => z.preprocess(blankAsUnset, z.coerce.number().int().min(min).optional());

export const AppConfigSchema = z.object({
  command: Command.default('play'),
  size: z.preprocess(blankAsUnset, z.coerce.number().int().min(3).default(3)),
  x: z.preprocess(blankAsUnset, PlayerKind.default('human')),
  o: z.preprocess(blankAsUnset, PlayerKind.default('smart')),
  maxDepth: intOption(1),
  timeBudgetMs: intOption(0),
  moveDelayMs: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(500)),
  quiet: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Flags win over environment variables; anything left unset falls back to the
 * schema defaults.
 */
export function loadAppConfig(argv: string[], env: NodeJS.ProcessEnv): AppConfig {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      size: { type: 'string' },
      x: { type: 'string' },
      o: { type: 'string' },
      depth: { type: 'string' },
      time: { type: 'string' },
      delay: { type: 'string' },
      quiet: { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  const parsed = AppConfigSchema.safeParse({
    command: positionals[0],
    size: values.size ?? env.TTT_SIZE,
    x: values.x ?? env.TTT_X,
    o: values.o ?? env.TTT_O,
    maxDepth: values.depth ?? env.TTT_MAX_DEPTH,
    timeBudgetMs: values.time ?? env.TTT_TIME_BUDGET_MS,
    moveDelayMs: values.delay ?? env.TTT_MOVE_DELAY_MS,
    quiet: values.quiet ?? false,
  });
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(`Invalid options: ${reason}`);
  }
  return parsed.data;
}

export function searchConfigFor(config: Pick<AppConfig, 'size' | 'maxDepth' | 'timeBudgetMs'>): SearchConfig {
  const base = autoSearchConfig(config.size);
  return resolveSearchConfig({
    ...base,
    maxDepth: config.maxDepth ?? base.maxDepth,
    timeBudgetMs: config.timeBudgetMs ?? base.timeBudgetMs,
  });
}
