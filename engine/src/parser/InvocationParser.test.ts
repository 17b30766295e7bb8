import { describe, expect, it } from 'vitest';
import { InvocationError } from '../errors/InputErrors.js';
import { PipevarsErrorCode } from '../errors/ErrorCodes.js';
import { InvocationParser } from './InvocationParser.js';

describe('InvocationParser', () => {
  it('applies defaults to empty inputs', () => {
    expect(InvocationParser.parse({})).toEqual({
      staticInputs: '',
      jinjaInputs: '',
      expressions: { var1: undefined, var2: undefined, var3: undefined },
      standardCiVars: true,
      logOutputs: false,
      autoDetect: true,
      failOnError: false,
      fetchTimeoutMs: 10000,
    });
  });

  it('accepts the YAML boolean spellings', () => {
    expect(InvocationParser.parse({ log_outputs: 'True' }).logOutputs).toBe(true);
    expect(InvocationParser.parse({ log_outputs: 'TRUE' }).logOutputs).toBe(true);
    expect(InvocationParser.parse({ standard_ci_vars: 'False' }).standardCiVars).toBe(false);
    expect(InvocationParser.parse({ fail_on_error: true }).failOnError).toBe(true);
  });

  it('rejects an invalid boolean', () => {
    let caught: unknown;
    try {
      InvocationParser.parse({ log_outputs: 'yes' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvocationError);
    expect(caught instanceof InvocationError ? caught.code : null).toBe(PipevarsErrorCode.INVOCATION_INVALID_BOOLEAN);
    expect(caught instanceof InvocationError ? caught.message : null).toBe('Input "log_outputs" must be a boolean, received "yes"');
  });

  it('names the alias the user wrote in errors', () => {
    expect(() => InvocationParser.parse({ non_sensitive: 'maybe' })).toThrow(
      'Input "non_sensitive" must be a boolean, received "maybe"'
    );
  });

  it('reads legacy aliases', () => {
    const invocation = InvocationParser.parse({ non_sensitive: 'true', standard_vars: 'false' });
    expect(invocation.logOutputs).toBe(true);
    expect(invocation.standardCiVars).toBe(false);
  });

  it('prefers the canonical name over its alias', () => {
    const invocation = InvocationParser.parse({ log_outputs: 'false', non_sensitive: 'true' });
    expect(invocation.logOutputs).toBe(false);
  });

  it('treats blank expressions as absent', () => {
    const invocation = InvocationParser.parse({ var1: '  ', var2: " 'x' " });
    expect(invocation.expressions).toEqual({ var1: undefined, var2: "'x'", var3: undefined });
  });

  it('parses and validates the fetch timeout', () => {
    expect(InvocationParser.parse({ fetch_timeout_ms: '2500' }).fetchTimeoutMs).toBe(2500);
    expect(() => InvocationParser.parse({ fetch_timeout_ms: 'soon' })).toThrow(InvocationError);
    expect(() => InvocationParser.parse({ fetch_timeout_ms: '0' })).toThrow(InvocationError);
  });
});
