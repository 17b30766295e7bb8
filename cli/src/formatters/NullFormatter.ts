/**
 * Null Formatter
 *
 * Produces no output. Useful for:
 * - Scripting (only care about exit code)
 * - CI/CD pipelines where the outputs are read elsewhere
 */

import type { CatalogDescription, ResolutionOutcome } from '@pipevars/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

/**
 * Null formatter that produces no output
 */
export class NullFormatter implements Formatter {
  constructor(_options: FormatterOptions = {}) {
    // No-op constructor
  }

  showOutcome(_outcome: ResolutionOutcome): void {
    // Intentionally empty - no output
  }

  showCatalog(_entries: CatalogDescription[], _catalogVersion: number): void {
    // Intentionally empty - no output
  }

  showError(_error: Error): void {
    // Intentionally empty - no output
  }

  showWarning(_message: string): void {
    // Intentionally empty - no output
  }

  showInfo(_message: string): void {
    // Intentionally empty - no output
  }
}
