import chalk from 'chalk';
import { Command } from 'commander';
import { PageCommitError } from '../domain/errors/PageCommitError.js';
import type { CliContext, Tone } from './CliContext.js';
import { ConsoleLogger, consoleSink, parseLogLevel } from './logger.js';
import type { LogSink } from './logger.js';
import { ProgressLine } from './ProgressLine.js';
import type { LineStream } from './ProgressLine.js';
import { resolveGlobalConfig, resolveRegenerateConfig, resolveSeedConfig } from './config.js';
import type { Env, GlobalFlags, RegenerateFlags, SeedFlags } from './config.js';
import { regenerateCommand } from './commands/regenerate.js';
import { seedCommand } from './commands/seed.js';
import { purgeCommand } from './commands/purge.js';

export const VERSION = '0.1.0';

/** Process surface the program runs against. `main.ts` passes the real one. */
export interface ProgramIO {
  readonly env: Env;
  /** Receives the progress line. */
  readonly stdout: LineStream;
  /** Receives log and result lines. Default: the console. */
  readonly sink?: LogSink;
  readonly signal: AbortSignal;
  readonly colorize?: boolean;
  setExitCode(code: number): void;
}

/**
 * Build the `rowsweep` command tree.
 *
 * Every command prints `Took: <seconds> sec` when it returns. Errors are
 * printed after the progress line is finalised and set exit code 1.
 */
export function buildProgram(io: ProgramIO): Command {
  const program = new Command();

  program
    .name('rowsweep')
    .description('Regenerate the token column of a large table in resumable pages')
    .version(VERSION)
    .option('--database-url <url>', 'Database URL, sqlite:<path> or postgres://… (env DATABASE_URL)')
    .option('--table <name>', 'Table to operate on (env ROWSWEEP_TABLE, default: tickets)')
    .option('--log-level <level>', 'quiet, normal, verbose or debug (env ROWSWEEP_LOG_LEVEL)');

  program
    .command('regenerate')
    .description('Replace every token with a fresh UUID, resuming after the last committed page')
    .option('--page-size <n>', 'Rows per page (env ROWSWEEP_PAGE_SIZE, default: 1000)')
    .option('--checkpoint <path|db>', 'Checkpoint file, or "db" for a table (env ROWSWEEP_CHECKPOINT)')
    .option('--strategy <offset|keyset>', 'Page fetch strategy (env ROWSWEEP_STRATEGY, default: keyset)')
    .option('--max-retries <n>', 'Retries of a failed page (env ROWSWEEP_MAX_RETRIES, default: 3)')
    .option('--retry-delay <ms>', 'Base retry delay (env ROWSWEEP_RETRY_DELAY_MS, default: 500)')
    .action(async (_options: unknown, command: Command) => {
      await run(io, command.optsWithGlobals<GlobalFlags>(), async (ctx) => {
        const config = resolveRegenerateConfig(command.optsWithGlobals<GlobalFlags & RegenerateFlags>(), io.env);
        return regenerateCommand(config, ctx);
      });
    });

  program
    .command('seed')
    .description('Insert rows with fresh tokens in bounded batches')
    .option('--count <n>', 'Rows to insert (default: 1000000)')
    .option('--batch-size <n>', 'Rows per INSERT (default: 1000)')
    .action(async (_options: unknown, command: Command) => {
      await run(io, command.optsWithGlobals<GlobalFlags>(), async (ctx) => {
        const config = resolveSeedConfig(command.optsWithGlobals<GlobalFlags & SeedFlags>(), io.env);
        return seedCommand(config, ctx);
      });
    });

  program
    .command('purge')
    .description('Delete every row of the table')
    .action(async (_options: unknown, command: Command) => {
      await run(io, command.optsWithGlobals<GlobalFlags>(), async (ctx) => {
        return purgeCommand(resolveGlobalConfig(command.optsWithGlobals<GlobalFlags>(), io.env), ctx);
      });
    });

  return program;
}

async function run(io: ProgramIO, flags: GlobalFlags, command: (ctx: CliContext) => Promise<number>): Promise<void> {
  const ctx = createContext(io, flags);
  const started = performance.now();

  try {
    const code = await command(ctx);
    ctx.print(`Took: ${((performance.now() - started) / 1000).toFixed(4)} sec`, 'success');
    io.setExitCode(code);
  } catch (error) {
    ctx.progress.finish();
    for (const line of describeError(error)) {
      (io.sink ?? consoleSink).err(paint(io, 'failure', line));
    }
    io.setExitCode(1);
  }
}

function createContext(io: ProgramIO, flags: GlobalFlags): CliContext {
  const progress = new ProgressLine(io.stdout);
  const target = io.sink ?? consoleSink;
  // log lines must not land in the middle of the progress line
  const sink: LogSink = {
    out: (line) => {
      progress.finish();
      target.out(line);
    },
    err: (line) => {
      progress.finish();
      target.err(line);
    },
  };
  const logger = new ConsoleLogger({
    level: parseLogLevel(flags.logLevel ?? io.env['ROWSWEEP_LOG_LEVEL']),
    colorize: io.colorize ?? true,
    sink,
  });

  return {
    logger,
    progress,
    signal: io.signal,
    print: (line, tone) => {
      sink.out(tone ? paint(io, tone, line) : line);
    },
  };
}

function describeError(error: unknown): string[] {
  if (error instanceof PageCommitError) {
    return [`Error: ${error.message}`, 'Run the command again to resume after the last committed page.'];
  }
  if (error instanceof Error) {
    return [`Error: ${error.message}`];
  }
  return [`Error: ${String(error)}`];
}

const TONES: Record<Tone, (text: string) => string> = {
  success: chalk.green,
  warning: chalk.yellow,
  failure: chalk.red,
};

function paint(io: ProgramIO, tone: Tone, text: string): string {
  return io.colorize === false ? text : TONES[tone](text);
}
