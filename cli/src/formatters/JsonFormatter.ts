/**
 * JSON Formatter
 *
 * Outputs structured JSON for:
 * - Machine parsing
 * - Piping into other tools (`pipevars resolve --format json | jq .variables`)
 *
 * The outcome is one JSON document on stdout; messages go to stderr as
 * JSON lines so stdout stays parseable.
 */

import {
  PipevarsError,
  decodeResultSet,
  type CatalogDescription,
  type ResolutionOutcome,
} from '@pipevars/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

/**
 * JSON output formatter
 */
export class JsonFormatter implements Formatter {
  private options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  showOutcome(outcome: ResolutionOutcome): void {
    const document = {
      type: 'resolution.result',
      timestamp: new Date().toISOString(),
      trigger: outcome.trigger,
      failed: outcome.failed,
      variables: Object.fromEntries(decodeResultSet(outcome.projection.json)),
      sources: this.options.verbose
        ? Object.fromEntries([...outcome.resultSet.values()].map(entry => [entry.name, entry.source]))
        : undefined,
      shadowed: outcome.projection.shadowed,
      diagnostics: outcome.diagnostics.map(diagnostic => diagnostic.toSimpleObject()),
    };

    console.log(JSON.stringify(document, null, 2));
  }

  showCatalog(entries: CatalogDescription[], catalogVersion: number): void {
    console.log(JSON.stringify({ type: 'catalog', catalogVersion, variables: entries }, null, 2));
  }

  showError(error: Error): void {
    const detail = error instanceof PipevarsError
      ? error.toSimpleObject()
      : { name: error.name, message: error.message };
    console.error(JSON.stringify({ type: 'error', timestamp: new Date().toISOString(), ...detail }));
  }

  showWarning(message: string): void {
    console.error(JSON.stringify({ type: 'warning', timestamp: new Date().toISOString(), message }));
  }

  showInfo(message: string): void {
    if (this.options.verbose) {
      console.error(JSON.stringify({ type: 'info', timestamp: new Date().toISOString(), message }));
    }
  }
}
