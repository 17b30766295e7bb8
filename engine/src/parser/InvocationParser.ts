/**
 * Invocation Parser
 *
 * Validates the step's own input declarations with a zod schema and turns
 * them into a typed InvocationConfig. This is the only place where a parse
 * failure is fatal: a malformed boolean or number here means the run cannot
 * know what it was asked to do.
 *
 * Inputs arrive as strings from the host. Values loaded from a YAML file
 * may be native booleans or numbers; they are stringified first so both
 * paths share one set of rules.
 *
 * @module parser
 */

import { z } from 'zod';
import { InvocationError } from '../errors/InputErrors.js';

/**
 * Accepted boolean literals (YAML 1.2 core schema, as runners accept them)
 */
const TRUE_VALUES = ['true', 'True', 'TRUE'];
const FALSE_VALUES = ['false', 'False', 'FALSE'];

/**
 * Legacy input names, by canonical name. The canonical name wins when both
 * are non-empty.
 */
export const INPUT_ALIASES: Readonly<Record<string, readonly string[]>> = {
  log_outputs: ['non_sensitive'],
  standard_ci_vars: ['standard_vars'],
};

/**
 * Names of every input the engine reads (canonical names)
 */
export const INVOCATION_INPUTS = [
  'static_inputs',
  'jinja_inputs',
  'var1',
  'var2',
  'var3',
  'standard_ci_vars',
  'log_outputs',
  'auto_detect',
  'fail_on_error',
  'fetch_timeout_ms',
] as const;

export type InvocationInputName = (typeof INVOCATION_INPUTS)[number];

/**
 * Typed invocation
 */
export interface InvocationConfig {
  staticInputs: string;
  jinjaInputs: string;
  /** `var1`..`var3` expressions; absent when the input was empty */
  expressions: {
    var1?: string;
    var2?: string;
    var3?: string;
  };
  standardCiVars: boolean;
  logOutputs: boolean;
  autoDetect: boolean;
  failOnError: boolean;
  fetchTimeoutMs: number;
}

const rawValue = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform(value => (value === null ? undefined : String(value)))
  .optional();

function booleanInput(defaultValue: boolean) {
  return rawValue.transform((value, ctx) => {
    const trimmed = value?.trim() ?? '';
    if (trimmed === '') return defaultValue;
    if (TRUE_VALUES.includes(trimmed)) return true;
    if (FALSE_VALUES.includes(trimmed)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expected boolean',
      params: { kind: 'boolean', received: trimmed },
    });
    return z.NEVER;
  });
}

function integerInput(defaultValue: number) {
  return rawValue.transform((value, ctx) => {
    const trimmed = value?.trim() ?? '';
    if (trimmed === '') return defaultValue;
    if (/^\d+$/.test(trimmed) && Number(trimmed) > 0) return Number(trimmed);
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expected positive integer',
      params: { kind: 'number', received: trimmed },
    });
    return z.NEVER;
  });
}

const textInput = rawValue.transform(value => value ?? '');

const expressionInput = rawValue.transform(value => {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? undefined : trimmed;
});

export const InvocationSchema = z.object({
  static_inputs: textInput,
  jinja_inputs: textInput,
  var1: expressionInput,
  var2: expressionInput,
  var3: expressionInput,
  standard_ci_vars: booleanInput(true),
  log_outputs: booleanInput(false),
  auto_detect: booleanInput(true),
  fail_on_error: booleanInput(false),
  fetch_timeout_ms: integerInput(10000),
});

export class InvocationParser {
  /**
   * Parse raw inputs into an InvocationConfig
   *
   * @param raw - Input name to raw value (canonical or alias names)
   * @throws {InvocationError} If an input has an invalid value
   */
  static parse(raw: Record<string, unknown>): InvocationConfig {
    const { values, suppliedAs } = this.applyAliases(raw);
    const parsed = InvocationSchema.safeParse(values);

    if (!parsed.success) {
      throw this.transformZodError(parsed.error, values, suppliedAs);
    }

    const data = parsed.data;
    return {
      staticInputs: data.static_inputs,
      jinjaInputs: data.jinja_inputs,
      expressions: {
        var1: data.var1,
        var2: data.var2,
        var3: data.var3,
      },
      standardCiVars: data.standard_ci_vars,
      logOutputs: data.log_outputs,
      autoDetect: data.auto_detect,
      failOnError: data.fail_on_error,
      fetchTimeoutMs: data.fetch_timeout_ms,
    };
  }

  /**
   * Fold alias inputs into their canonical names (canonical first)
   */
  static applyAliases(raw: Record<string, unknown>): {
    values: Record<string, unknown>;
    suppliedAs: Record<string, string>;
  } {
    const values: Record<string, unknown> = {};
    const suppliedAs: Record<string, string> = {};

    for (const name of INVOCATION_INPUTS) {
      const sources = [name, ...(INPUT_ALIASES[name] ?? [])];
      for (const source of sources) {
        const value = raw[source];
        if (value !== undefined && value !== null && String(value).trim() !== '') {
          values[name] = value;
          suppliedAs[name] = source;
          break;
        }
      }
    }

    return { values, suppliedAs };
  }

  private static transformZodError(
    error: z.ZodError,
    values: Record<string, unknown>,
    suppliedAs: Record<string, string>
  ): InvocationError {
    const issue = error.issues[0];
    const key = String(issue?.path[0] ?? 'inputs');
    const input = suppliedAs[key] ?? key;
    const received = String(values[key] ?? '');

    if (issue?.code === z.ZodIssueCode.custom) {
      const kind: unknown = issue.params?.kind;
      if (kind === 'boolean') {
        return InvocationError.invalidBoolean(input, received);
      }
      if (kind === 'number') {
        return InvocationError.invalidNumber(input, received);
      }
    }

    return InvocationError.invalidShape(input, issue?.message ?? error.message);
  }
}
