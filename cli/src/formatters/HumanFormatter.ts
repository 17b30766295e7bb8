/**
 * Human-Readable Formatter
 *
 * Formats a resolution for human consumption.
 * Uses symbols and colors for clear, scannable output.
 *
 * Symbols:
 * - ✔ Resolved without problems
 * - ⚠ Recovered problem (the affected value is null or skipped)
 * - ✖ Failure
 */

import chalk from 'chalk';
import {
  ErrorSeverity,
  LogLevel,
  VariableSource,
  encodeScalar,
  type CatalogDescription,
  type PipevarsError,
  type ResolutionOutcome,
  type ResolvedVariable,
} from '@pipevars/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { createCliLogger, type CliLogger } from '../utils/logger.js';

const SOURCE_LABELS: Record<VariableSource, string> = {
  [VariableSource.STATIC]: 'static',
  [VariableSource.EXPRESSION]: 'expression',
  [VariableSource.STANDARD_CONTEXT]: 'standard',
  [VariableSource.ALIAS]: 'alias',
};

/**
 * Human-readable formatter
 */
export class HumanFormatter implements Formatter {
  private options: FormatterOptions;
  private logger: CliLogger;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    // Disable chalk colors if requested
    if (options.noColor) {
      chalk.level = 0;
    }
    this.logger = createCliLogger({
      level: options.verbose ? LogLevel.DEBUG : LogLevel.INFO,
      colors: !options.noColor,
    });
  }

  showOutcome(outcome: ResolutionOutcome): void {
    const entries = [...outcome.resultSet.values()];
    const width = Math.max(4, ...entries.map(entry => entry.name.length));

    console.log();
    console.log(chalk.bold(`Variables (${entries.length}, trigger: ${outcome.trigger})`));
    console.log(chalk.cyan('─'.repeat(60)));
    for (const entry of entries) {
      console.log(this.formatEntry(entry, width, outcome.projection.shadowed.includes(entry.name)));
      if (this.options.verbose && entry.candidates.length > 1) {
        for (const candidate of entry.candidates) {
          console.log(chalk.gray(`${' '.repeat(width + 4)}${SOURCE_LABELS[candidate.source]}: ${JSON.stringify(candidate.value)}`));
        }
      }
    }
    console.log(chalk.cyan('─'.repeat(60)));

    if (outcome.diagnostics.length > 0) {
      console.log();
      console.log(chalk.bold('Diagnostics:'));
      for (const diagnostic of outcome.diagnostics) {
        console.log(this.formatDiagnostic(diagnostic));
      }
    }

    console.log();
    if (outcome.failed) {
      console.log(chalk.red.bold('✖ Resolution failed'));
    } else if (outcome.diagnostics.some(diagnostic => diagnostic.severity !== ErrorSeverity.INFO)) {
      console.log(chalk.yellow.bold('⚠ Resolved with warnings'));
    } else {
      console.log(chalk.green.bold('✔ Resolved'));
    }
  }

  showCatalog(entries: CatalogDescription[], catalogVersion: number): void {
    const width = Math.max(...entries.map(entry => entry.name.length));
    console.log(chalk.bold(`Standard context (catalog v${catalogVersion}, ${entries.length} variables)`));
    for (const entry of entries) {
      const scope = entry.appliesTo === 'all' ? '' : chalk.gray(` [${entry.appliesTo}]`);
      console.log(`  ${chalk.cyan(entry.name.padEnd(width))}  ${entry.description}${scope}`);
    }
  }

  showError(error: Error): void {
    this.logger.error('Command failed', error);

    console.error();
    console.error(chalk.red.bold('✖ Error:'), error.message);

    if (this.options.verbose && error.stack) {
      console.error();
      console.error(chalk.gray('Stack trace:'));
      console.error(chalk.gray(error.stack));
    }

    // Show error hints if available
    if ('hint' in error && typeof error.hint === 'string') {
      console.error();
      console.error(chalk.yellow('💡 Hint:'), error.hint);
    }
  }

  showWarning(message: string): void {
    this.logger.warn(message);
  }

  showInfo(message: string): void {
    this.logger.info(message);
  }

  private formatEntry(entry: ResolvedVariable, width: number, shadowed: boolean): string {
    const value = entry.value === null ? chalk.gray('null') : encodeScalar(entry.value);
    const note = shadowed ? chalk.yellow(' (shadowed)') : '';
    return `  ${entry.name.padEnd(width)}  ${value}  ${chalk.gray(SOURCE_LABELS[entry.source])}${note}`;
  }

  private formatDiagnostic(diagnostic: PipevarsError): string {
    const paint = diagnostic.severity === ErrorSeverity.INFO
      ? chalk.blue
      : diagnostic.severity === ErrorSeverity.WARNING ? chalk.yellow : chalk.red;
    const where = diagnostic.path ? ` ${chalk.gray(diagnostic.path)}` : '';
    let line = `  ${paint(diagnostic.code)}${where} ${diagnostic.message}`;
    if (this.options.verbose && diagnostic.hint) {
      line += `\n      ${chalk.yellow('hint:')} ${diagnostic.hint}`;
    }
    return line;
  }
}
