/**
 * File helpers for CLI commands
 *
 * @module utils
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import YAML from 'yaml';

/**
 * A file named on the command line could not be read or parsed
 */
export class FileReadError extends Error {
  constructor(
    public readonly path: string,
    detail: string
  ) {
    super(`Cannot read ${path}: ${detail}`);
    this.name = 'FileReadError';
  }
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(resolve(path), 'utf-8');
  } catch (error) {
    throw new FileReadError(path, error instanceof Error ? error.message : String(error));
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  const text = await readTextFile(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new FileReadError(path, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse a YAML mapping (such as the `with:` block of a step)
 */
export function parseYamlMapping(text: string, path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new FileReadError(path, error instanceof Error ? error.message : String(error));
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new FileReadError(path, 'expected a mapping of input names to values');
  }
  return Object.fromEntries(Object.entries(parsed));
}
