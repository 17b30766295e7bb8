#!/usr/bin/env -S node --import tsx
/**
 * Pipevars CLI
 *
 * Command-line interface for the pipevars resolution engine.
 * This is the main entry point for the CLI.
 *
 * Usage:
 *   pipevars resolve [options]   Resolve variables locally
 *   pipevars catalog             List standard CI context variables
 *   pipevars action              Run as a GitHub Actions step
 *   pipevars --version           Show version
 */

import { Command } from 'commander';
import { ExitCodes, describeError } from '@pipevars/engine';
import { registerActionCommand } from './commands/action.js';
import { registerCatalogCommand } from './commands/catalog.js';
import { registerResolveCommand } from './commands/resolve.js';

const VERSION = '0.1.0';

function createProgram(): Command {
  const program = new Command();

  program
    .name('pipevars')
    .description('Resolve pipeline variables from assignments, expressions and CI context')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerResolveCommand(program);
  registerCatalogCommand(program);
  registerActionCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', describeError(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exitCode = ExitCodes.INTERNAL_ERROR;
});
