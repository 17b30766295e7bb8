import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExitCodes, InvocationError } from '@pipevars/engine';
import type { CliResolveOptions } from '../types/CliResolveOptions.js';
import { FileReadError } from '../utils/files.js';
import { buildContext, buildInputs, exitCodeFor } from './resolve.js';

function options(overrides: Partial<CliResolveOptions> = {}): CliResolveOptions {
  return {
    eventName: 'push',
    standard: true,
    format: 'human',
    color: false,
    ...overrides,
  };
}

describe('resolve command', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipevars-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('buildInputs', () => {
    it('maps flags onto step inputs', async () => {
      const inputs = await buildInputs(options({
        static: 'username=alice',
        var2: "'x'",
        standard: false,
        failOnError: true,
      }));

      expect(inputs).toEqual({
        static_inputs: 'username=alice',
        var2: "'x'",
        standard_ci_vars: 'false',
        fail_on_error: 'true',
      });
    });

    it('lets flags override the inputs file', async () => {
      const file = join(dir, 'step.yaml');
      await writeFile(file, 'static_inputs: |\n  a=1\n  b=2\nlog_outputs: true\n');

      const inputs = await buildInputs(options({ inputsFile: file, static: 'a=3' }));

      expect(inputs).toEqual({ static_inputs: 'a=3', log_outputs: true });
    });

    it('reads assignments from files', async () => {
      const file = join(dir, 'vars.txt');
      await writeFile(file, "greeting='hi'\n");

      const inputs = await buildInputs(options({ jinjaFile: file }));

      expect(inputs).toEqual({ jinja_inputs: "greeting='hi'\n" });
    });

    it('rejects an inputs file that is not a mapping', async () => {
      const file = join(dir, 'step.yaml');
      await writeFile(file, '- a\n- b\n');

      await expect(buildInputs(options({ inputsFile: file }))).rejects.toBeInstanceOf(FileReadError);
    });
  });

  describe('buildContext', () => {
    it('uses an empty payload without an event file', async () => {
      const context = await buildContext(options({ ref: 'refs/heads/main' }));

      expect(context.eventName).toBe('push');
      expect(context.payload).toEqual({});
      expect(context.ref).toBe('refs/heads/main');
    });

    it('reads the payload from the event file', async () => {
      const file = join(dir, 'event.json');
      await writeFile(file, JSON.stringify({ pull_request: { number: 42 } }));

      const context = await buildContext(options({ event: file, eventName: 'pull_request' }));

      expect(context.payload).toEqual({ pull_request: { number: 42 } });
    });

    it('rejects a payload that is not an object', async () => {
      const file = join(dir, 'event.json');
      await writeFile(file, '[1, 2]');

      await expect(buildContext(options({ event: file }))).rejects.toBeInstanceOf(InvocationError);
    });
  });

  describe('exitCodeFor', () => {
    it('maps error types to exit codes', () => {
      expect(exitCodeFor(new FileReadError('x.json', 'missing'))).toBe(ExitCodes.FILE_ERROR);
      expect(exitCodeFor(InvocationError.invalidBoolean('fail_on_error', 'maybe'))).toBe(ExitCodes.INVALID_INPUT);
      expect(exitCodeFor(new Error('boom'))).toBe(ExitCodes.INTERNAL_ERROR);
    });
  });
});
