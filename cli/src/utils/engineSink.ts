/**
 * Routes engine log entries to the active formatter
 *
 * @module utils
 */

import { LogLevel, type LogEntry, type LogSink } from '@pipevars/engine';
import type { Formatter } from '../formatters/Formatter.js';

export class CliEngineSink {
  constructor(private readonly formatter: Formatter) {}

  readonly write: LogSink = (entry: LogEntry) => {
    const text = `[${entry.source}] ${entry.message}`;
    if (entry.level === LogLevel.DEBUG || entry.level === LogLevel.INFO) {
      this.formatter.showInfo(text);
    } else {
      this.formatter.showWarning(text);
    }
  };
}
