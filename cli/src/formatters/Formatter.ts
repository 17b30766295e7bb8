/**
 * Base Formatter Interface
 *
 * All formatters must implement this interface.
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * Separation of Concerns:
 * - Formatter: decides WHAT to display (outcome, catalog, messages)
 * - Logger: decides HOW CLI messages look (colors, symbols, history)
 * - Engine: never writes to the console itself; its log lines go through
 *   the sink the command installs
 */

import type { CatalogDescription, ResolutionOutcome } from '@pipevars/engine';

/**
 * Formatter options
 */
export interface FormatterOptions {
  /** Enable verbose output (candidates, hints) */
  verbose?: boolean;

  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;
}

export interface Formatter {
  /**
   * Display the result of one resolution
   */
  showOutcome(outcome: ResolutionOutcome): void;

  /**
   * Display the standard-context catalog
   */
  showCatalog(entries: CatalogDescription[], catalogVersion: number): void;

  /**
   * Display a CLI-level error (unreadable file, invalid inputs)
   */
  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
