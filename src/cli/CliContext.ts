import type { ConsoleLogger } from './logger.js';
import type { ProgressLine } from './ProgressLine.js';

export type Tone = 'success' | 'warning' | 'failure';

/** What a command needs from the process it runs in. */
export interface CliContext {
  readonly logger: ConsoleLogger;
  readonly progress: ProgressLine;
  /** Print a result line on stdout, after finalising the progress line. */
  print(line: string, tone?: Tone): void;
  /** Aborted on SIGINT or SIGTERM. */
  readonly signal: AbortSignal;
}
