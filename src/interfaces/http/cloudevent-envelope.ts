import { z } from 'zod';
import {
  ABSENT,
  classifyJson,
  isPlainObject,
  MalformedEventError,
} from '../../domain/index.js';
import type { EventData } from '../../domain/index.js';
import type { ParsedEnvelope } from '../../application/normalize-event.js';

/** Header prefix for binary-mode attributes (`ce-id`, `ce-email_to`, …). */
export const CE_HEADER_PREFIX = 'ce-';

export const STRUCTURED_CONTENT_TYPE = 'application/cloudevents+json';

export const BATCH_CONTENT_TYPE = 'application/cloudevents-batch+json';

export type HttpHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Zod schema for a structured-mode body.
 *
 * Only `specversion` is checked here; `id`/`source`/`type` are enforced by
 * the normalizer so both modes report them the same way.
 */
const structuredEventSchema = z
  .object({
    specversion: z.string().min(1),
    data_base64: z.string().optional(),
  })
  .passthrough();

class HttpEnvelope implements ParsedEnvelope {
  constructor(
    private readonly attrs: Readonly<Record<string, unknown>>,
    private readonly payload: EventData,
  ) {}

  get(name: string): unknown {
    return Object.hasOwn(this.attrs, name) ? this.attrs[name] : undefined;
  }

  attributes(): Readonly<Record<string, unknown>> {
    return this.attrs;
  }

  data(): EventData {
    return this.payload;
  }
}

function headerValue(value: string | readonly string[] | undefined): string | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : value.join(', ');
}

/** Media type without parameters, lowercased. */
export function baseMediaType(contentType: string | undefined): string {
  return (contentType?.split(';')[0] ?? '').trim().toLowerCase();
}

export function isJsonMediaType(mediaType: string): boolean {
  return mediaType === 'application/json' || mediaType === 'text/json' || mediaType.endsWith('+json');
}

/** Binary-mode header values are percent-encoded; fall back to the raw value. */
function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function parseJsonBody(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf-8'));
  } catch (err: unknown) {
    throw new MalformedEventError('CloudEvent body is not valid JSON', { cause: err });
  }
}

function binaryData(mediaType: string, body: Buffer | undefined): EventData {
  if (body === undefined || body.length === 0) return ABSENT;
  if (isJsonMediaType(mediaType)) return classifyJson(parseJsonBody(body));
  if (mediaType.startsWith('text/')) return { kind: 'text', value: body.toString('utf-8') };
  return { kind: 'bytes', value: new Uint8Array(body) };
}

function parseBinary(headers: HttpHeaders, body: Buffer | undefined): ParsedEnvelope {
  const attrs: Record<string, unknown> = {};

  for (const [name, raw] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    const value = headerValue(raw);
    if (!lower.startsWith(CE_HEADER_PREFIX) || value === undefined) continue;

    const attribute = lower.slice(CE_HEADER_PREFIX.length);
    if (attribute !== '') attrs[attribute] = percentDecode(value);
  }

  const contentType = headerValue(headers['content-type']);
  if (contentType !== undefined) attrs['datacontenttype'] = contentType;

  return new HttpEnvelope(attrs, binaryData(baseMediaType(contentType), body));
}

function parseStructured(body: Buffer | undefined): ParsedEnvelope {
  if (body === undefined || body.length === 0) {
    throw new MalformedEventError('Structured CloudEvent body is empty');
  }

  const raw = parseJsonBody(body);
  if (!isPlainObject(raw)) {
    throw new MalformedEventError('Structured CloudEvent body must be a JSON object');
  }

  const parsed = structuredEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedEventError(
      `Invalid structured CloudEvent: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
    );
  }

  const { data, ...attrs } = parsed.data;

  let payload: EventData;
  if (parsed.data.data_base64 !== undefined) {
    payload = { kind: 'bytes', value: new Uint8Array(Buffer.from(parsed.data.data_base64, 'base64')) };
  } else {
    payload = classifyJson(data);
  }

  return new HttpEnvelope(attrs, payload);
}

/**
 * Parse an HTTP request into a CloudEvent envelope.
 *
 * - binary mode: `ce-specversion` header present, attributes in `ce-*`
 *   headers, body is the data
 * - structured mode: `application/cloudevents+json` body
 *
 * Batches and anything else are rejected with MalformedEventError.
 */
export function parseHttpEnvelope(headers: HttpHeaders, body: Buffer | undefined): ParsedEnvelope {
  const mediaType = baseMediaType(headerValue(headers['content-type']));

  if (mediaType === BATCH_CONTENT_TYPE) {
    throw new MalformedEventError('Batched CloudEvents are not supported');
  }

  if (mediaType === STRUCTURED_CONTENT_TYPE) {
    return parseStructured(body);
  }

  const specversion = headerValue(headers[`${CE_HEADER_PREFIX}specversion`]);
  if (specversion !== undefined && specversion.trim() !== '') {
    return parseBinary(headers, body);
  }

  throw new MalformedEventError('Request is not a CloudEvent (missing ce-specversion header)');
}
