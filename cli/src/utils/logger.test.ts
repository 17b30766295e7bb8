import { describe, expect, it } from 'vitest';
import { LogLevel } from '@pipevars/engine';
import { createCliLogger } from './logger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe('CliLogger', () => {
  it('drops entries below the configured level', () => {
    const { lines, write } = capture();
    const logger = createCliLogger({ level: LogLevel.WARN, colors: false, write });

    logger.info('resolving');
    logger.warn('unknown format');

    expect(lines).toEqual(['⚠ unknown format']);
    expect(logger.getHistory()).toHaveLength(1);
  });

  it('appends context and error details', () => {
    const { lines, write } = capture();
    const logger = createCliLogger({ colors: false, write });

    logger.error('Command failed', new Error('boom'));

    expect(lines).toEqual(['✖ Command failed {"error":{"message":"boom","name":"Error"}}']);
  });

  it('writes one JSON object per entry in json format', () => {
    const { lines, write } = capture();
    const logger = createCliLogger({ format: 'json', write });

    logger.info('done', { count: 2 });

    const [line] = lines;
    expect(line).toBeDefined();
    expect(JSON.parse(line ?? '')).toMatchObject({ level: 'info', message: 'done', context: { count: 2 } });
  });
});
