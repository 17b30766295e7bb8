/**
 * Standard-Context Resolver
 *
 * Evaluates the catalog against an explicit PipelineContext. Definitions
 * are processed in catalog order; each resolved value is visible to later
 * definitions as `vars.<name>`.
 *
 * Scope roots:
 * - `event`   the event payload
 * - `context` eventName, triggerType, ref, sha, serverUrl, repository,
 *             workflow, actor, runId, runNumber, runAttempt
 * - `vars`    values resolved so far
 *
 * A value produced outside a definition's `appliesTo` triggers is a
 * NullabilityViolation: thrown in strict mode, otherwise recorded and the
 * value replaced by null.
 *
 * @module context
 */

import { NullabilityViolation } from '../errors/ContextErrors.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { JsonObject, JsonValue, PipelineContext, ScalarValue, TriggerType } from '../types/core-types.js';
import { detectTrigger } from './PipelineContext.js';
import {
  appliesTo,
  loadBuiltinCatalog,
  templatePaths,
  type CatalogDefinition,
  type CatalogSource,
  type StandardCatalog,
  type TransformName,
} from './StandardCatalog.js';

export type NullabilityMode = 'strict' | 'lenient';

export interface StandardResolution {
  trigger: TriggerType;
  /** Name to value, in catalog order */
  values: Map<string, ScalarValue>;
  /** Violations coerced to null (lenient mode only) */
  violations: NullabilityViolation[];
}

/**
 * Catalog entry as listed by `pipevars catalog`
 */
export interface CatalogDescription {
  name: string;
  description: string;
  appliesTo: string;
}

export interface StandardContextResolverOptions {
  catalog?: StandardCatalog;
  nullability?: NullabilityMode;
}

/**
 * Raw value during resolution; payload objects may appear before a
 * transform turns them into a scalar
 */
type RawValue = JsonValue | undefined;

export class StandardContextResolver {
  private readonly catalog: StandardCatalog;
  private readonly nullability: NullabilityMode;

  constructor(options: StandardContextResolverOptions = {}) {
    this.catalog = options.catalog ?? loadBuiltinCatalog();
    this.nullability = options.nullability ?? 'lenient';
  }

  get catalogVersion(): number {
    return this.catalog.catalogVersion;
  }

  /**
   * Names of every standard variable, in catalog order
   */
  names(): string[] {
    return this.catalog.variables.map(definition => definition.name);
  }

  describeCatalog(): CatalogDescription[] {
    return this.catalog.variables.map(definition => ({
      name: definition.name,
      description: definition.description,
      appliesTo: definition.appliesTo === '*' ? 'all' : definition.appliesTo.join(', '),
    }));
  }

  /**
   * Resolve every definition
   *
   * @param overlay - Values that replace the sources of the named definitions
   * @throws {NullabilityViolation} In strict mode
   */
  resolve(context: PipelineContext, overlay: ReadonlyMap<string, ScalarValue> = new Map()): StandardResolution {
    const logger = LoggerManager.tryGetLogger();
    const trigger = detectTrigger(context.eventName);
    const values = new Map<string, ScalarValue>();
    const violations: NullabilityViolation[] = [];

    const vars: JsonObject = {};
    const root: JsonObject = {
      event: context.payload,
      context: {
        eventName: context.eventName,
        triggerType: trigger,
        ...definedFields(context),
      },
      vars,
    };

    for (const definition of this.catalog.variables) {
      let value = overlay.has(definition.name)
        ? overlay.get(definition.name) ?? null
        : this.evaluate(definition, root);

      if (value !== null && !appliesTo(definition, trigger)) {
        const violation = new NullabilityViolation(definition.name, trigger, value, this.nullability === 'strict');
        if (this.nullability === 'strict') {
          throw violation;
        }
        logger?.warn(violation.message, { code: violation.code }, 'context', 'StandardContextResolver');
        violations.push(violation);
        value = null;
      }

      values.set(definition.name, value);
      vars[definition.name] = value;
    }

    logger?.debug(`Resolved ${values.size} standard variable(s)`, {
      trigger,
      catalogVersion: this.catalog.catalogVersion,
      overlaid: [...overlay.keys()],
    }, 'context', 'StandardContextResolver');

    return { trigger, values, violations };
  }

  private evaluate(definition: CatalogDefinition, root: JsonObject): ScalarValue {
    let raw: RawValue = null;
    for (const source of definition.sources) {
      const candidate = evaluateSource(source, root);
      if (candidate !== null && candidate !== undefined) {
        raw = candidate;
        break;
      }
    }

    if (definition.transform) {
      raw = applyTransform(definition.transform, raw);
    }
    return toScalar(raw);
  }
}

function definedFields(context: PipelineContext): JsonObject {
  const fields: JsonObject = {};
  for (const key of ['ref', 'sha', 'serverUrl', 'repository', 'workflow', 'actor', 'runId', 'runNumber', 'runAttempt'] as const) {
    const value = context[key];
    if (value !== undefined && value !== '') {
      fields[key] = value;
    }
  }
  return fields;
}

function evaluateSource(source: CatalogSource, root: JsonObject): RawValue {
  if ('literal' in source) {
    return source.literal;
  }

  if ('differs' in source) {
    const [left, right] = source.differs.map(path => toScalar(lookupPath(root, path)));
    return left === null || right === null ? null : left !== right;
  }

  if (source.requires !== undefined && !isPresent(lookupPath(root, source.requires))) {
    return null;
  }

  if ('template' in source) {
    return renderTemplate(source.template, root);
  }

  const value = lookupPath(root, source.path);
  return source.transform ? applyTransform(source.transform, value) : value;
}

/**
 * Follow a dotted path; undefined when any step is missing
 */
export function lookupPath(root: JsonValue, path: string): RawValue {
  let current: RawValue = root;
  for (const segment of path.split('.')) {
    if (current === null || current === undefined || typeof current !== 'object') {
      return undefined;
    }
    if (Array.isArray(current)) {
      current = /^\d+$/.test(segment) ? current[Number(segment)] : undefined;
    } else {
      current = Object.hasOwn(current, segment) ? current[segment] : undefined;
    }
  }
  return current;
}

function renderTemplate(template: string, root: JsonObject): string | null {
  const replacements = new Map<string, string>();
  for (const path of templatePaths(template)) {
    const value = toScalar(lookupPath(root, path));
    if (value === null || value === '') {
      return null;
    }
    replacements.set(path, String(value));
  }
  return template.replace(/\{([^{}]+)\}/g, (_, path: string) => replacements.get(path) ?? '');
}

function isPresent(value: RawValue): boolean {
  return value !== null && value !== undefined && value !== '' && value !== false;
}

/**
 * Standard values are strings, booleans or null; numbers become decimal
 * text and structured values are dropped
 */
function toScalar(value: RawValue): ScalarValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  return null;
}

export function applyTransform(transform: TransformName, value: RawValue): RawValue {
  switch (transform) {
    case 'present':
      return isPresent(value);

    case 'branch-name': {
      if (typeof value !== 'string' || value === '') return null;
      if (value.startsWith('refs/heads/')) return value.slice('refs/heads/'.length);
      return value.startsWith('refs/') ? null : value;
    }

    case 'tag-name':
      return typeof value === 'string' && value.startsWith('refs/tags/') ? value.slice('refs/tags/'.length) : null;

    case 'server-origin': {
      if (typeof value !== 'string') return null;
      let url: URL;
      try {
        url = new URL(value);
      } catch {
        return null;
      }
      return url.protocol === 'http:' || url.protocol === 'https:' ? url.origin : null;
    }

    case 'owner-part':
    case 'name-part': {
      if (typeof value !== 'string') return null;
      const [owner, name] = value.split('/');
      if (!owner || !name) return null;
      return transform === 'owner-part' ? owner : name;
    }
  }
}
