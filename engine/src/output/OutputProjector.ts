/**
 * Output Projector
 *
 * Flattens a ResultSet into the JSON blob and the discrete string outputs.
 *
 * Reserved outputs:
 * - `all`, `custom`: the JSON blob (both names are emitted)
 * - `var1`..`var3`: the value of the matching input expression
 *
 * A user-declared name equal to a reserved output loses its discrete
 * output to the reserved one and is reported as shadowed. It still
 * appears in the JSON blob.
 *
 * @module output
 */

import { OutputCollision } from '../errors/OutputErrors.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { ResultSet } from '../types/core-types.js';
import { encodeResultSet, encodeScalar } from './ValueCodec.js';

export const JSON_OUTPUTS = ['all', 'custom'] as const;
export const EXPRESSION_OUTPUTS = ['var1', 'var2', 'var3'] as const;
export const RESERVED_OUTPUTS: readonly string[] = [...JSON_OUTPUTS, ...EXPRESSION_OUTPUTS];

export type ExpressionOutputName = (typeof EXPRESSION_OUTPUTS)[number];

export interface ProjectionOptions {
  /** Names the user declared in static or expression inputs */
  userNames: ReadonlySet<string>;
  /** `varN` outputs that were given an expression */
  suppliedExpressions: ReadonlySet<string>;
}

export interface Projection {
  /** JSON object of every resolved name */
  json: string;
  /** Output name to canonical text */
  outputs: ReadonlyMap<string, string>;
  /** User names hidden by reserved outputs */
  shadowed: string[];
  diagnostics: OutputCollision[];
}

export class OutputProjector {
  static project(resultSet: ResultSet, options: ProjectionOptions): Projection {
    const json = encodeResultSet(resultSet);
    const outputs = new Map<string, string>();

    for (const name of JSON_OUTPUTS) {
      outputs.set(name, json);
    }
    for (const name of EXPRESSION_OUTPUTS) {
      outputs.set(name, encodeScalar(resultSet.get(name)?.value ?? null));
    }

    const shadowed: string[] = [];
    for (const [name, entry] of resultSet) {
      if (!RESERVED_OUTPUTS.includes(name)) {
        outputs.set(name, encodeScalar(entry.value));
        continue;
      }
      const hidden = options.userNames.has(name)
        && (!isExpressionOutput(name) || options.suppliedExpressions.has(name));
      if (hidden) {
        shadowed.push(name);
      }
    }

    const diagnostics = shadowed.map(name => OutputCollision.shadowed(name));
    const logger = LoggerManager.tryGetLogger();
    for (const diagnostic of diagnostics) {
      logger?.warn(diagnostic.message, { code: diagnostic.code }, 'output', 'OutputProjector');
    }
    logger?.debug(`Projected ${outputs.size} output(s)`, { shadowed }, 'output', 'OutputProjector');

    return { json, outputs, shadowed, diagnostics };
  }
}

function isExpressionOutput(name: string): name is ExpressionOutputName {
  return EXPRESSION_OUTPUTS.some(output => output === name);
}
