#!/usr/bin/env node
import { buildProgram } from './program.js';

const controller = new AbortController();
const onSignal = (signal: NodeJS.Signals): void => {
  controller.abort(signal);
};
process.once('SIGINT', onSignal);
process.once('SIGTERM', onSignal);

const program = buildProgram({
  env: process.env,
  stdout: process.stdout,
  signal: controller.signal,
  colorize: process.stdout.isTTY,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

try {
  await program.parseAsync(process.argv);
} finally {
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
}
