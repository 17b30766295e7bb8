/**
 * CLI Resolve Command Options
 *
 * Command-line options for the `pipevars resolve` command.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliResolveOptions {
  /** Inline static assignments (`name=value` lines) */
  static?: string;
  /** File with static assignments */
  staticFile?: string;
  /** Inline expression assignments */
  jinja?: string;
  /** File with expression assignments */
  jinjaFile?: string;
  var1?: string;
  var2?: string;
  var3?: string;
  /** YAML file of step inputs (`static_inputs: |` etc.) */
  inputsFile?: string;

  /** JSON file with the event payload */
  event?: string;
  eventName: string;
  ref?: string;
  sha?: string;
  repository?: string;
  /** JSON file of pull request, issue and comment records for dispatch auto-detection */
  metadata?: string;

  /** `--no-standard` sets this to false */
  standard: boolean;
  failOnError?: boolean;
  /** Throw on nullability violations */
  strict?: boolean;

  format: FormatterType;
  verbose?: boolean;
  /** `--no-color` sets this to false */
  color: boolean;
}

/**
 * CLI catalog command options
 */
export interface CliCatalogOptions {
  format: FormatterType;
  /** `--no-color` sets this to false */
  color: boolean;
}
