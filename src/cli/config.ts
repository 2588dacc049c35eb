import { z } from 'zod';

export const LOG_LEVELS = ['quiet', 'normal', 'verbose', 'debug'] as const;

/** Environment as `process.env` exposes it. */
export type Env = Readonly<Record<string, string | undefined>>;

/** Options shared by every command. */
export interface GlobalFlags {
  readonly databaseUrl?: string;
  readonly table?: string;
  readonly logLevel?: string;
}

export interface RegenerateFlags {
  readonly pageSize?: string;
  readonly checkpoint?: string;
  readonly strategy?: string;
  readonly maxRetries?: string;
  readonly retryDelay?: string;
}

export interface SeedFlags {
  readonly count?: string;
  readonly batchSize?: string;
}

const globalSchema = z.object({
  databaseUrl: z.string().min(1).default('sqlite:rowsweep.sqlite'),
  table: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier')
    .default('tickets'),
  logLevel: z.enum(LOG_LEVELS).default('normal'),
});

const regenerateSchema = globalSchema.extend({
  pageSize: z.coerce.number().int().positive().default(1000),
  checkpoint: z.string().min(1).default('.rowsweep/checkpoint.json'),
  strategy: z.enum(['offset', 'keyset']).default('keyset'),
  maxRetries: z.coerce.number().int().nonnegative().default(3),
  retryDelayMs: z.coerce.number().nonnegative().default(500),
});

const seedSchema = globalSchema.extend({
  count: z.coerce.number().int().nonnegative().default(1_000_000),
  batchSize: z.coerce.number().int().positive().default(1000),
});

export type GlobalConfig = z.infer<typeof globalSchema>;
export type RegenerateConfig = z.infer<typeof regenerateSchema>;
export type SeedConfig = z.infer<typeof seedSchema>;

/** Flag and environment variable behind each setting, used in error messages. */
const SOURCES: Readonly<Record<string, string>> = {
  databaseUrl: '--database-url / DATABASE_URL',
  table: '--table / ROWSWEEP_TABLE',
  logLevel: '--log-level / ROWSWEEP_LOG_LEVEL',
  pageSize: '--page-size / ROWSWEEP_PAGE_SIZE',
  checkpoint: '--checkpoint / ROWSWEEP_CHECKPOINT',
  strategy: '--strategy / ROWSWEEP_STRATEGY',
  maxRetries: '--max-retries / ROWSWEEP_MAX_RETRIES',
  retryDelayMs: '--retry-delay / ROWSWEEP_RETRY_DELAY_MS',
  count: '--count',
  batchSize: '--batch-size',
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function resolveGlobalConfig(flags: GlobalFlags, env: Env): GlobalConfig {
  return validate(globalSchema, globalInput(flags, env));
}

/** Merge flags over environment variables and validate. */
export function resolveRegenerateConfig(flags: GlobalFlags & RegenerateFlags, env: Env): RegenerateConfig {
  return validate(regenerateSchema, {
    ...globalInput(flags, env),
    pageSize: pick(flags.pageSize, env['ROWSWEEP_PAGE_SIZE']),
    checkpoint: pick(flags.checkpoint, env['ROWSWEEP_CHECKPOINT']),
    strategy: pick(flags.strategy, env['ROWSWEEP_STRATEGY']),
    maxRetries: pick(flags.maxRetries, env['ROWSWEEP_MAX_RETRIES']),
    retryDelayMs: pick(flags.retryDelay, env['ROWSWEEP_RETRY_DELAY_MS']),
  });
}

export function resolveSeedConfig(flags: GlobalFlags & SeedFlags, env: Env): SeedConfig {
  return validate(seedSchema, {
    ...globalInput(flags, env),
    count: pick(flags.count),
    batchSize: pick(flags.batchSize),
  });
}

function globalInput(flags: GlobalFlags, env: Env): Record<string, string | undefined> {
  return {
    databaseUrl: pick(flags.databaseUrl, env['DATABASE_URL']),
    table: pick(flags.table, env['ROWSWEEP_TABLE']),
    logLevel: pick(flags.logLevel, env['ROWSWEEP_LOG_LEVEL'])?.toLowerCase(),
  };
}

/** First value that is set; an empty environment variable counts as unset. */
function pick(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value !== '');
}

function validate<T extends z.ZodTypeAny>(schema: T, input: Record<string, string | undefined>): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? '');
      return `${SOURCES[key] ?? key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
