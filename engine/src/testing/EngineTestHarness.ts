/**
 * Engine Test Harness
 *
 * Runs resolutions with captured log entries and an in-memory fetcher,
 * so tests can assert on outputs, diagnostics and what was logged.
 *
 * @module testing
 */

import { StaticContextFetcher } from '../context/ContextFetcher.js';
import type { PipevarsEngineConfig } from '../core/EngineConfig.js';
import { PipevarsEngine, type ResolutionOutcome } from '../core/PipevarsEngine.js';
import { decodeScalar } from '../output/ValueCodec.js';
import type { PipelineContext, ScalarValue } from '../types/core-types.js';
import type { LogEntry, LogLevel } from '../types/log-types.js';

/**
 * Test harness configuration
 */
export interface TestHarnessConfig extends Omit<PipevarsEngineConfig, 'logSink'> {
  /** Capture log entries */
  captureLogs?: boolean;
}

export class EngineTestHarness {
  private logs: LogEntry[] = [];
  readonly engine: PipevarsEngine;

  constructor(config: TestHarnessConfig = {}) {
    const { captureLogs = true, ...engineConfig } = config;
    this.engine = new PipevarsEngine({
      logLevel: 'debug',
      fetcher: new StaticContextFetcher(),
      ...engineConfig,
      logSink: entry => {
        if (captureLogs) this.logs.push(entry);
      },
    });
  }

  async resolve(inputs: Record<string, unknown>, context: PipelineContext): Promise<ResolutionOutcome> {
    return this.engine.resolve(inputs, context);
  }

  /**
   * Resolve and return the discrete outputs decoded back to scalars
   */
  async outputs(inputs: Record<string, unknown>, context: PipelineContext): Promise<Map<string, ScalarValue>> {
    const outcome = await this.resolve(inputs, context);
    const decoded = new Map<string, ScalarValue>();
    outcome.projection.outputs.forEach((text, name) => decoded.set(name, decodeScalar(text)));
    return decoded;
  }

  /**
   * Captured log entries, optionally only those of one level
   */
  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(entry => entry.level === level) : [...this.logs];
  }

  /**
   * Messages of captured entries
   */
  getMessages(level?: LogLevel): string[] {
    return this.getLogs(level).map(entry => entry.message);
  }

  clearLogs(): void {
    this.logs = [];
  }
}
