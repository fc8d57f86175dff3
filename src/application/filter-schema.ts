import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

/**
 * Zod schemas for the event filter configuration.
 *
 * Two accepted shapes:
 * - a list of predicates: `[{ "attribute": "type", "op": "prefix", "value": "com.acme." }]`
 * - shorthand mapping: `{ "type": "com.acme.order.created", "source": ["a", "b"] }`
 *   (scalar → eq, array → in)
 */
export const filterOperatorSchema = z.enum([
  'eq',
  'neq',
  'in',
  'prefix',
  'suffix',
  'contains',
  'regex',
  'exists',
  'absent',
]);

export type FilterOperator = z.infer<typeof filterOperatorSchema>;

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export type FilterScalar = z.infer<typeof scalarSchema>;

export const filterModeSchema = z.enum(['all', 'any']);

export type FilterMode = z.infer<typeof filterModeSchema>;

export const filterPredicateSchema = z
  .object({
    attribute: z.string().min(1),
    op: filterOperatorSchema.optional().default('eq'),
    value: z.union([scalarSchema, z.array(scalarSchema)]).optional(),
  })
  .superRefine((p, ctx) => {
    if (p.op === 'exists' || p.op === 'absent') return;

    if (p.value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${p.op}" requires a value`, path: ['value'] });
      return;
    }
    if (p.op === 'in' && !Array.isArray(p.value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '"in" requires an array value', path: ['value'] });
      return;
    }
    if (p.op !== 'in' && Array.isArray(p.value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${p.op}" requires a scalar value`, path: ['value'] });
      return;
    }
    if (p.op === 'regex') {
      try {
        new RegExp(String(p.value));
      } catch (err: unknown) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid regex: ${err instanceof Error ? err.message : String(err)}`,
          path: ['value'],
        });
      }
    }
  });

export type FilterPredicate = z.infer<typeof filterPredicateSchema>;

const shorthandSchema = z
  .record(z.string().min(1), z.union([scalarSchema, z.array(scalarSchema)]))
  .transform((entries): FilterPredicate[] =>
    Object.entries(entries).map(([attribute, value]) => ({
      attribute,
      op: Array.isArray(value) ? 'in' : 'eq',
      value,
    })),
  );

export const filterSpecSchema = z.union([z.array(filterPredicateSchema), shorthandSchema]);

export type FilterSpec = readonly FilterPredicate[];

/**
 * Parse the filter JSON from configuration.
 *
 * Empty or missing input yields an empty filter list (matches every event).
 * Throws ConfigError on invalid JSON or an invalid predicate.
 */
export function parseFilterSpec(json: string | undefined): FilterSpec {
  if (json === undefined || json.trim() === '') return [];

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err: unknown) {
    throw new ConfigError('Filter configuration is not valid JSON', { cause: err });
  }

  const parsed = filterSpecSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid filter configuration: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
    );
  }
  return parsed.data;
}
