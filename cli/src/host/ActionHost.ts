/**
 * Action Host
 *
 * Runs one resolution as a GitHub Actions step: step inputs and the
 * workflow run come from `@actions/core` and `@actions/github`, outputs
 * and annotations go back through `@actions/core`.
 *
 * @module host
 */

import * as core from '@actions/core';
import * as github from '@actions/github';
import {
  ErrorSeverity,
  ExitCodes,
  INPUT_ALIASES,
  INVOCATION_INPUTS,
  LogLevel,
  PipevarsEngine,
  PipevarsError,
  describeError,
  parsePipelineContext,
  type LogSink,
  type PipelineContext,
  type ResolutionOutcome,
} from '@pipevars/engine';
import { renderSummaryFooter, renderSummaryRows } from '../formatters/SummaryRenderer.js';
import { OctokitContextFetcher } from './OctokitContextFetcher.js';

export const TOKEN_INPUT = 'github_token';

/**
 * Engine log lines go to the step log; debug lines only show with step
 * debugging enabled. Annotations are raised from the diagnostics instead,
 * so each problem is annotated once.
 */
export const actionLogSink: LogSink = entry => {
  const context = entry.context && Object.keys(entry.context).length > 0
    ? ` ${JSON.stringify(entry.context)}`
    : '';
  const line = `[${entry.source}] ${entry.message}${context}`;
  if (entry.level === LogLevel.DEBUG) {
    core.debug(line);
  } else {
    core.info(line);
  }
};

export class ActionHost {
  /**
   * Every input the engine reads, canonical names and aliases, as raw text
   */
  static readInputs(): Record<string, string> {
    const inputs: Record<string, string> = {};
    for (const name of INVOCATION_INPUTS) {
      for (const input of [name, ...(INPUT_ALIASES[name] ?? [])]) {
        const value = core.getInput(input);
        if (value !== '') {
          inputs[input] = value;
        }
      }
    }
    return inputs;
  }

  /**
   * The workflow run as a PipelineContext
   *
   * @throws {InvocationError} If the event payload is unusable
   */
  static readContext(): PipelineContext {
    const { context } = github;
    return parsePipelineContext({
      eventName: context.eventName,
      payload: context.payload,
      ref: context.ref,
      sha: context.sha,
      serverUrl: context.serverUrl,
      repository: process.env.GITHUB_REPOSITORY,
      workflow: context.workflow,
      actor: context.actor,
      runId: context.runId,
      runNumber: context.runNumber,
      runAttempt: process.env.GITHUB_RUN_ATTEMPT,
    }, 'the workflow run');
  }

  /**
   * Run the step and return the process exit code
   */
  static async run(): Promise<ExitCodes> {
    try {
      const context = this.readContext();
      const token = core.getInput(TOKEN_INPUT);
      const fetcher = token && context.repository
        ? OctokitContextFetcher.create(token, context.repository)
        : undefined;

      const engine = new PipevarsEngine({
        logLevel: core.isDebug() ? 'debug' : 'info',
        logSink: actionLogSink,
        fetcher,
      });
      const outcome = await engine.resolve(this.readInputs(), context);

      this.writeOutputs(outcome);
      this.annotate(outcome);
      if (outcome.invocation.logOutputs) {
        await this.writeSummary(outcome);
      }

      if (outcome.failed) {
        core.setFailed(`Resolution failed: ${outcome.diagnostics.length} diagnostic(s) and fail_on_error is set`);
        return ExitCodes.RESOLUTION_FAILED;
      }
      return ExitCodes.SUCCESS;
    } catch (error) {
      if (error instanceof PipevarsError) {
        core.setFailed(error.toString());
        return error.exitCode;
      }
      core.setFailed(`Internal error: ${describeError(error)}`);
      return ExitCodes.INTERNAL_ERROR;
    }
  }

  static writeOutputs(outcome: ResolutionOutcome): void {
    for (const [name, text] of outcome.projection.outputs) {
      core.setOutput(name, text);
    }

    if (outcome.invocation.logOutputs) {
      core.startGroup('Resolved variables');
      for (const [name, text] of outcome.projection.outputs) {
        core.info(`${name}=${text}`);
      }
      core.endGroup();
    } else {
      core.info(`Resolved ${outcome.resultSet.size} variable(s); set log_outputs to print them`);
    }
  }

  static annotate(outcome: ResolutionOutcome): void {
    for (const diagnostic of outcome.diagnostics) {
      const message = diagnostic.hint ? `${diagnostic.message} (hint: ${diagnostic.hint})` : diagnostic.message;
      const properties = { title: `pipevars ${diagnostic.code}` };
      switch (diagnostic.severity) {
        case ErrorSeverity.INFO:
          core.notice(message, properties);
          break;
        case ErrorSeverity.WARNING:
          core.warning(message, properties);
          break;
        case ErrorSeverity.ERROR:
        case ErrorSeverity.FATAL:
          core.error(message, properties);
          break;
      }
    }
  }

  static async writeSummary(outcome: ResolutionOutcome): Promise<void> {
    if (!process.env.GITHUB_STEP_SUMMARY) {
      core.debug('No step summary file; skipping the summary table');
      return;
    }
    await core.summary
      .addHeading('Resolved variables', 3)
      .addTable(renderSummaryRows(outcome))
      .addRaw(renderSummaryFooter(outcome), true)
      .write();
  }
}
