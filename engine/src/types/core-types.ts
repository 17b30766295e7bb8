/**
 * Core types shared across the resolution engine.
 *
 * @module types
 */

/**
 * A resolved value. Standard-context values are strings, booleans or null;
 * expressions may also produce numbers.
 */
export type ScalarValue = string | number | boolean | null;

/**
 * Where a resolved value came from
 */
export enum VariableSource {
  STATIC = 'static',
  EXPRESSION = 'expression',
  STANDARD_CONTEXT = 'standard_context',
  ALIAS = 'alias',
}

/**
 * Category of event that started the pipeline run
 */
export enum TriggerType {
  PULL_REQUEST = 'pull_request',
  COMMENT = 'comment',
  ISSUE = 'issue',
  PUSH = 'push',
  WORKFLOW_DISPATCH = 'workflow_dispatch',
  SCHEDULE = 'schedule',
  OTHER = 'other',
}

/**
 * One `name=value` line as written by the user
 */
export interface RawAssignment {
  name: string;
  rawValue: string;
  /** 1-based line number inside its input block */
  line: number;
}

/**
 * A single candidate value for an output name
 */
export interface Candidate {
  value: ScalarValue;
  source: VariableSource;
  /** Name the candidate was declared under (differs from the output name for aliases) */
  declaredAs: string;
}

/**
 * Final value of one output name
 */
export interface ResolvedVariable {
  name: string;
  value: ScalarValue;
  source: VariableSource;
  /** Every candidate considered, in precedence order */
  candidates: readonly Candidate[];
}

/**
 * Ordered, read-only mapping of output name to resolved variable
 */
export type ResultSet = ReadonlyMap<string, ResolvedVariable>;

/**
 * JSON-compatible value (event payloads, expression values)
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * JSON object
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Explicit, read-only description of the pipeline run.
 * Built by the host (from the runner environment) or by tests; the engine
 * never reads process state itself.
 */
export interface PipelineContext {
  /** Event name as reported by the host (e.g. `pull_request`, `schedule`) */
  eventName: string;
  /** Event payload */
  payload: JsonObject;
  ref?: string;
  sha?: string;
  /** Base URL of the hosting server (e.g. `https://github.com`) */
  serverUrl?: string;
  /** `owner/name` of the repository running the pipeline */
  repository?: string;
  workflow?: string;
  actor?: string;
  runId?: string;
  runNumber?: string;
  runAttempt?: string;
}
