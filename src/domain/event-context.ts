/**
 * Core domain types for an inbound CloudEvent.
 *
 * These types carry no framework dependencies. An EventContext is built
 * once per request by the normalizer and never mutated afterwards.
 */

/** Attribute names defined by the CloudEvents core specification. */
export const SPEC_ATTRIBUTES = [
  'id',
  'source',
  'type',
  'specversion',
  'subject',
  'time',
  'dataschema',
  'datacontenttype',
  'data',
] as const;

/**
 * Recipient hints that travel as first-class attributes (`ce-emailto`).
 * Reserved so they are surfaced on `recipientHints`, not `extensions`.
 */
export const RECIPIENT_ATTRIBUTES = ['emailto', 'emailcc', 'emailbcc'] as const;

export type RecipientAttribute = (typeof RECIPIENT_ATTRIBUTES)[number];

/** Names that never end up in `EventContext.extensions`. */
export const RESERVED_ATTRIBUTES: ReadonlySet<string> = new Set<string>([
  ...SPEC_ATTRIBUTES,
  ...RECIPIENT_ATTRIBUTES,
  'data_base64',
]);

/**
 * Event payload as received.
 *
 * Bytes and text may still hold JSON; callers that need a mapping go
 * through `decodeStructured()`.
 */
export type EventData =
  | { readonly kind: 'absent' }
  | { readonly kind: 'bytes'; readonly value: Uint8Array }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'structured'; readonly value: Readonly<Record<string, unknown>> };

export type Extensions = Readonly<Record<string, unknown>>;

export type RecipientHints = Readonly<Partial<Record<RecipientAttribute, unknown>>>;

export interface EventContext {
  readonly id: string;
  readonly source: string;
  readonly type: string;
  readonly subject?: string;
  readonly time?: string;
  readonly dataschema?: string;
  readonly dataContentType?: string;
  readonly data: EventData;
  readonly extensions: Extensions;
  readonly recipientHints: RecipientHints;
}

export const ABSENT: EventData = Object.freeze({ kind: 'absent' });

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/**
 * Classify a decoded JSON value.
 *
 * Objects become structured data, strings stay text, `null` is absent and
 * everything else (arrays, numbers, booleans) is kept as its JSON text.
 */
export function classifyJson(value: unknown): EventData {
  if (value === null || value === undefined) return ABSENT;
  if (isPlainObject(value)) return { kind: 'structured', value };
  if (typeof value === 'string') return { kind: 'text', value };
  return { kind: 'text', value: JSON.stringify(value) };
}

/** Best-effort UTF-8 decode; invalid sequences become U+FFFD. */
export function bytesToText(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false }).decode(bytes);
}

/**
 * Reclassify bytes or text holding a JSON object into structured data.
 *
 * Returns `null` when the payload is not (or does not decode to) a mapping.
 * Decode failures degrade to `null`; they never throw.
 */
export function decodeStructured(data: EventData): Readonly<Record<string, unknown>> | null {
  switch (data.kind) {
    case 'structured':
      return data.value;
    case 'absent':
      return null;
    case 'bytes':
      return decodeStructured({ kind: 'text', value: bytesToText(data.value) });
    case 'text': {
      const s = data.value.trim();
      if (!s.startsWith('{') || !s.endsWith('}')) return null;
      try {
        const parsed: unknown = JSON.parse(s);
        return isPlainObject(parsed) ? parsed : null;
      } catch {
        return null;
      }
    }
  }
}
