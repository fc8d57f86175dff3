import {
  RECIPIENT_ATTRIBUTES,
  RESERVED_ATTRIBUTES,
  MalformedEventError,
} from '../domain/index.js';
import type { EventContext, EventData, RecipientAttribute } from '../domain/index.js';

/**
 * Parsed CloudEvent envelope, independent of the transport it came from.
 *
 * Implemented once per transport (see interfaces/http/cloudevent-envelope.ts).
 */
export interface ParsedEnvelope {
  /** Attribute value by name, or undefined when absent. */
  get(name: string): unknown;
  /** Every attribute the envelope carries, reserved names included. */
  attributes(): Readonly<Record<string, unknown>>;
  data(): EventData;
}

function requiredString(envelope: ParsedEnvelope, name: string): string {
  const value = envelope.get(name);
  if (typeof value !== 'string' || value === '') {
    throw new MalformedEventError(`CloudEvent attribute "${name}" is required`);
  }
  return value;
}

function optionalString(envelope: ParsedEnvelope, name: string): string | undefined {
  const value = envelope.get(name);
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : String(value);
}

/**
 * Non-reserved attributes, keyed by their original name with values as
 * received.
 */
export function extensionAttributes(envelope: ParsedEnvelope): Record<string, unknown> {
  const extensions: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(envelope.attributes())) {
    if (!RESERVED_ATTRIBUTES.has(name)) {
      extensions[name] = value;
    }
  }
  return extensions;
}

/**
 * Convert a parsed envelope into an immutable EventContext.
 *
 * Throws MalformedEventError when `id`, `source` or `type` is missing.
 */
export function normalizeEvent(envelope: ParsedEnvelope): EventContext {
  const hints: Partial<Record<RecipientAttribute, unknown>> = {};
  for (const name of RECIPIENT_ATTRIBUTES) {
    const value = envelope.get(name);
    if (value !== undefined) hints[name] = value;
  }

  const ctx: EventContext = {
    id: requiredString(envelope, 'id'),
    source: requiredString(envelope, 'source'),
    type: requiredString(envelope, 'type'),
    subject: optionalString(envelope, 'subject'),
    time: optionalString(envelope, 'time'),
    dataschema: optionalString(envelope, 'dataschema'),
    dataContentType: optionalString(envelope, 'datacontenttype'),
    data: envelope.data(),
    extensions: Object.freeze(extensionAttributes(envelope)),
    recipientHints: Object.freeze(hints),
  };

  return Object.freeze(ctx);
}
