/**
 * Catalog Command
 *
 * Lists the standard-context variables and the triggers they apply to.
 *
 * Usage:
 *   pipevars catalog
 *   pipevars catalog --format json
 */

import type { Command } from 'commander';
import { PipevarsEngine } from '@pipevars/engine';
import { createFormatter, isFormatterType } from '../formatters/createFormatter.js';
import type { CliCatalogOptions } from '../types/CliResolveOptions.js';
import { exitCodeFor } from './resolve.js';

export function registerCatalogCommand(program: Command): void {
  program
    .command('catalog')
    .description('List the standard CI context variables')
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--no-color', 'Disable colored output')
    .action(catalogCommand);
}

function catalogCommand(options: CliCatalogOptions): void {
  const formatter = createFormatter(isFormatterType(options.format) ? options.format : 'human', {
    noColor: !options.color,
  });

  try {
    const engine = new PipevarsEngine({ logLevel: 'warn' });
    formatter.showCatalog(engine.describeCatalog(), engine.getCatalogVersion());
  } catch (error) {
    process.exitCode = exitCodeFor(error);
    formatter.showError(error instanceof Error ? error : new Error(String(error)));
  }
}
