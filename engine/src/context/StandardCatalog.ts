/**
 * Standard-Context Catalog
 *
 * Declarative table of the well-known variables, loaded from
 * `standard-catalog.json` and validated with zod. Each definition names
 * the trigger types it applies to and an ordered list of sources; the
 * first source that yields a non-null value wins.
 *
 * Source kinds:
 * - `{ path }`: dotted path into the scope (`event.*`, `context.*`, `vars.*`)
 * - `{ template }`: text with `{path}` placeholders, null if any is null
 * - `{ literal }`: a constant
 * - `{ differs: [a, b] }`: whether two paths hold different values
 *
 * `vars.<name>` may only reference definitions listed earlier.
 *
 * @module context
 */

import { z } from 'zod';
import { CatalogError } from '../errors/ContextErrors.js';
import { TriggerType } from '../types/core-types.js';
import catalogData from './standard-catalog.json' with { type: 'json' };

export const TRANSFORMS = ['branch-name', 'tag-name', 'present', 'server-origin', 'owner-part', 'name-part'] as const;

export type TransformName = (typeof TRANSFORMS)[number];

const TransformSchema = z.enum(TRANSFORMS);

const PathSchema = z.string().regex(/^(event|context|vars)(\.[A-Za-z0-9_-]+)+$/, 'must be a dotted path under event, context or vars');

const SourceSchema = z.union([
  z.object({ path: PathSchema, transform: TransformSchema.optional(), requires: PathSchema.optional() }).strict(),
  z.object({ template: z.string().min(1), requires: PathSchema.optional() }).strict(),
  z.object({ literal: z.string() }).strict(),
  z.object({ differs: z.tuple([PathSchema, PathSchema]) }).strict(),
]);

const DefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/),
  description: z.string(),
  appliesTo: z.union([z.literal('*'), z.array(z.nativeEnum(TriggerType)).min(1)]),
  sources: z.array(SourceSchema).min(1),
  transform: TransformSchema.optional(),
});

export const CatalogSchema = z
  .object({
    catalogVersion: z.number().int().positive(),
    variables: z.array(DefinitionSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.variables.forEach((definition, index) => {
      if (seen.has(definition.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate definition "${definition.name}"`,
          path: ['variables', index, 'name'],
        });
      }
      for (const reference of referencedVars(definition.sources)) {
        if (!seen.has(reference)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${definition.name}" references "vars.${reference}" before it is defined`,
            path: ['variables', index, 'sources'],
          });
        }
      }
      seen.add(definition.name);
    });
  });

export type CatalogSource = z.infer<typeof SourceSchema>;
export type CatalogDefinition = z.infer<typeof DefinitionSchema>;
export type StandardCatalog = z.infer<typeof CatalogSchema>;

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Paths a template refers to
 */
export function templatePaths(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map(match => match[1]);
}

function referencedVars(sources: CatalogSource[]): string[] {
  const paths = sources.flatMap(source => {
    if ('path' in source) return [source.path, ...(source.requires ? [source.requires] : [])];
    if ('template' in source) return [...templatePaths(source.template), ...(source.requires ? [source.requires] : [])];
    if ('differs' in source) return [...source.differs];
    return [];
  });
  return paths.filter(path => path.startsWith('vars.')).map(path => path.slice('vars.'.length));
}

/**
 * Validate a catalog object
 *
 * @throws {CatalogError} If the catalog does not match the schema
 */
export function parseCatalog(raw: unknown): StandardCatalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CatalogError(issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message);
  }
  return parsed.data;
}

let builtin: StandardCatalog | null = null;

/**
 * The catalog shipped with the engine (validated once)
 */
export function loadBuiltinCatalog(): StandardCatalog {
  builtin ??= parseCatalog(catalogData);
  return builtin;
}

export function appliesTo(definition: CatalogDefinition, trigger: TriggerType): boolean {
  return definition.appliesTo === '*' || definition.appliesTo.includes(trigger);
}
