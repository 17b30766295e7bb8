/**
 * Resolve Command
 *
 * Runs one resolution locally, against an event payload from a file or
 * an empty one, and displays the result.
 *
 * Usage:
 *   pipevars resolve --static "username=alice" --jinja "greeting='hi ' ~ username"
 *   pipevars resolve --inputs-file step.yaml --event event.json --event-name pull_request
 *   pipevars resolve --jinja-file vars.txt --format json
 *   pipevars resolve --event dispatch.json --event-name workflow_dispatch --metadata records.json
 */

import type { Command } from 'commander';
import { z } from 'zod';
import {
  ExitCodes,
  PipevarsEngine,
  PipevarsError,
  StaticContextFetcher,
  parsePipelineContext,
  type PipelineContext,
} from '@pipevars/engine';
import { createFormatter, isFormatterType } from '../formatters/createFormatter.js';
import type { CliResolveOptions } from '../types/CliResolveOptions.js';
import { FileReadError, parseYamlMapping, readJsonFile, readTextFile } from '../utils/files.js';
import { CliEngineSink } from '../utils/engineSink.js';

/**
 * Register the resolve command
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve variables locally and print them')
    .option('-s, --static <assignments>', 'Static name=value lines')
    .option('--static-file <path>', 'Read static assignments from a file')
    .option('-j, --jinja <assignments>', 'Expression name=expression lines')
    .option('--jinja-file <path>', 'Read expression assignments from a file')
    .option('--var1 <expression>', 'Expression for the var1 output')
    .option('--var2 <expression>', 'Expression for the var2 output')
    .option('--var3 <expression>', 'Expression for the var3 output')
    .option('-i, --inputs-file <path>', 'YAML file of step inputs (like a step\'s with: block)')
    .option('-e, --event <path>', 'JSON file with the event payload')
    .option('--event-name <name>', 'Event that triggered the run', 'push')
    .option('--ref <ref>', 'Git ref of the run')
    .option('--sha <sha>', 'Commit SHA of the run')
    .option('--repository <owner/name>', 'Repository running the pipeline')
    .option('--metadata <path>', 'JSON file of pull request, issue and comment records for dispatch auto-detection')
    .option('--no-standard', 'Skip the standard CI context')
    .option('--fail-on-error', 'Exit non-zero when a value could not be resolved')
    .option('--strict', 'Fail on standard values that should be null for the trigger')
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--verbose', 'Show candidates, hints and engine debug logs')
    .option('--no-color', 'Disable colored output')
    .action(resolveCommand);
}

async function resolveCommand(options: CliResolveOptions): Promise<void> {
  const format = isFormatterType(options.format) ? options.format : 'human';
  const formatter = createFormatter(format, { verbose: options.verbose, noColor: !options.color });
  if (format !== options.format) {
    formatter.showWarning(`Unknown format "${options.format}", using human`);
  }

  try {
    const inputs = await buildInputs(options);
    const context = await buildContext(options);
    const fetcher = options.metadata
      ? StaticContextFetcher.fromJson(await readJsonFile(options.metadata))
      : undefined;

    const sink = new CliEngineSink(formatter);
    const engine = new PipevarsEngine({
      logLevel: options.verbose ? 'debug' : 'warn',
      logSink: sink.write,
      nullability: options.strict ? 'strict' : 'lenient',
      fetcher,
    });

    const outcome = await engine.resolve(inputs, context);
    formatter.showOutcome(outcome);
    process.exitCode = outcome.failed ? ExitCodes.RESOLUTION_FAILED : ExitCodes.SUCCESS;
  } catch (error) {
    process.exitCode = exitCodeFor(error);
    formatter.showError(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Step inputs from the inputs file, overridden by command-line flags
 */
export async function buildInputs(options: CliResolveOptions): Promise<Record<string, unknown>> {
  const inputs: Record<string, unknown> = options.inputsFile
    ? parseYamlMapping(await readTextFile(options.inputsFile), options.inputsFile)
    : {};

  const staticInputs = options.staticFile ? await readTextFile(options.staticFile) : options.static;
  const jinjaInputs = options.jinjaFile ? await readTextFile(options.jinjaFile) : options.jinja;

  if (staticInputs !== undefined) inputs.static_inputs = staticInputs;
  if (jinjaInputs !== undefined) inputs.jinja_inputs = jinjaInputs;
  if (options.var1 !== undefined) inputs.var1 = options.var1;
  if (options.var2 !== undefined) inputs.var2 = options.var2;
  if (options.var3 !== undefined) inputs.var3 = options.var3;
  if (!options.standard) inputs.standard_ci_vars = 'false';
  if (options.failOnError) inputs.fail_on_error = 'true';

  return inputs;
}

/**
 * Pipeline context from the event file and flags
 */
export async function buildContext(options: CliResolveOptions): Promise<PipelineContext> {
  const payload = options.event ? await readJsonFile(options.event) : {};
  return parsePipelineContext({
    eventName: options.eventName,
    payload,
    ref: options.ref,
    sha: options.sha,
    repository: options.repository,
    actor: process.env.USER,
  }, options.event ?? 'the command line');
}

export function exitCodeFor(error: unknown): ExitCodes {
  if (error instanceof PipevarsError) return error.exitCode;
  if (error instanceof FileReadError) return ExitCodes.FILE_ERROR;
  if (error instanceof z.ZodError) return ExitCodes.INVALID_INPUT;
  return ExitCodes.INTERNAL_ERROR;
}
