#!/usr/bin/env node
/**
 * Blueprint CLI
 *
 * Evaluates a script headlessly and prints the resulting view tree
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { InvalidArgumentError, program } from 'commander';
import type { Logger } from '../host/engine/types';
import { VERSION } from '../version';
import { runScript } from './run';

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

// Diagnostics go to stderr so stdout carries only the tree
const stderrLogger: Logger = {
  log: (...args) => console.error(...args),
  warn: (...args) => console.error(...args),
  error: (...args) => console.error(...args),
};

program
  .name('blueprint')
  .description('Blueprint CLI - Run UI scripts headlessly and inspect the view tree')
  .version(VERSION);

program
  .command('run')
  .description('Evaluate a script and print the resulting view tree')
  .argument('<script>', 'Script file path (e.g., dist/bundle.js)')
  .option('--width <n>', 'Viewport width', parseNonNegativeInt, 320)
  .option('--height <n>', 'Viewport height', parseNonNegativeInt, 240)
  .option('--ticks <n>', 'Scheduler interrupts to deliver after evaluation', parseNonNegativeInt, 1)
  .option('--timeout <ms>', 'Execution timeout per script call', parseNonNegativeInt, 5000)
  .option('--json', 'Print the tree as JSON')
  .option('--debug', 'Enable debug logging')
  .action(
    async (
      script: string,
      opts: {
        width: number;
        height: number;
        ticks: number;
        timeout: number;
        json?: boolean;
        debug?: boolean;
      }
    ) => {
      try {
        const source = await readFile(script, 'utf8');
        const result = await runScript(source, basename(script), {
          width: opts.width,
          height: opts.height,
          ticks: opts.ticks,
          timeout: opts.timeout,
          json: opts.json ?? false,
          debug: opts.debug ?? false,
          logger: stderrLogger,
        });
        console.log(result.output);
        if (!result.ok) {
          console.error('Script evaluation failed:', result.error);
          process.exitCode = 1;
        }
      } catch (error) {
        console.error('Run failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    }
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
