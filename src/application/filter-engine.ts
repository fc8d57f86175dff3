import { decodeStructured, isPlainObject, bytesToText } from '../domain/index.js';
import type { EventContext } from '../domain/index.js';
import type { FilterMode, FilterPredicate, FilterSpec } from './filter-schema.js';

const CORE_ATTRIBUTES = {
  id: (ctx: EventContext) => ctx.id,
  source: (ctx: EventContext) => ctx.source,
  type: (ctx: EventContext) => ctx.type,
  subject: (ctx: EventContext) => ctx.subject,
  time: (ctx: EventContext) => ctx.time,
  dataschema: (ctx: EventContext) => ctx.dataschema,
  datacontenttype: (ctx: EventContext) => ctx.dataContentType,
} satisfies Record<string, (ctx: EventContext) => string | undefined>;

function isCoreAttribute(name: string): name is keyof typeof CORE_ATTRIBUTES {
  return Object.hasOwn(CORE_ATTRIBUTES, name);
}

function dataValue(ctx: EventContext): unknown {
  switch (ctx.data.kind) {
    case 'absent': return undefined;
    case 'text': return ctx.data.value;
    case 'bytes': return bytesToText(ctx.data.value);
    case 'structured': return ctx.data.value;
  }
}

function walkPath(root: unknown, path: readonly string[]): unknown {
  let current = root;
  for (const key of path) {
    if (!isPlainObject(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Look up the value a predicate refers to.
 *
 * - core attribute names (`type`, `source`, …)
 * - `extensions.<name>` or a bare extension name
 * - `data` or `data.<dotted.path>` into the decoded data mapping
 */
export function lookupAttribute(ctx: EventContext, attribute: string): unknown {
  if (isCoreAttribute(attribute)) return CORE_ATTRIBUTES[attribute](ctx);

  if (attribute === 'data') return dataValue(ctx);

  if (attribute.startsWith('data.')) {
    return walkPath(decodeStructured(ctx.data), attribute.slice(5).split('.'));
  }

  const name = attribute.startsWith('extensions.') ? attribute.slice(11) : attribute;
  return Object.hasOwn(ctx.extensions, name) ? ctx.extensions[name] : undefined;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value) ?? '';
}

/**
 * Evaluate a single predicate.
 *
 * A missing attribute satisfies only `absent` and `neq`.
 */
export function matchesPredicate(ctx: EventContext, predicate: FilterPredicate): boolean {
  const actual = lookupAttribute(ctx, predicate.attribute);
  const missing = actual === undefined || actual === null;
  const text = missing ? '' : stringify(actual);
  const expected = predicate.value;

  switch (predicate.op) {
    case 'exists':   return !missing;
    case 'absent':   return missing;
    case 'neq':      return missing || text !== stringify(expected);
    case 'eq':       return !missing && text === stringify(expected);
    case 'in':       return !missing && Array.isArray(expected) && expected.some((v) => stringify(v) === text);
    case 'prefix':   return !missing && text.startsWith(stringify(expected));
    case 'suffix':   return !missing && text.endsWith(stringify(expected));
    case 'contains': return !missing && text.includes(stringify(expected));
    case 'regex':    return !missing && new RegExp(stringify(expected)).test(text);
  }
}

/**
 * Decide whether an event passes the configured filters.
 *
 * Pure: no I/O and no rendering. An empty filter list matches every event in
 * either mode.
 */
export function matchesFilters(ctx: EventContext, spec: FilterSpec, mode: FilterMode): boolean {
  if (spec.length === 0) return true;

  return mode === 'any'
    ? spec.some((predicate) => matchesPredicate(ctx, predicate))
    : spec.every((predicate) => matchesPredicate(ctx, predicate));
}
