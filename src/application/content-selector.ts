import { z } from 'zod';
import {
  bytesToText,
  MissingPayloadError,
  RenderError,
} from '../domain/index.js';
import type { EventContext, EventData, MessageContent } from '../domain/index.js';

/** `datacontenttype` values that route an event to raw-MIME passthrough. */
export const RAW_MIME_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'mimemultipart',
  'mime/multipart',
  'multipart/mixed',
]);

/** Mapping keys searched, in order, for a raw MIME document. */
export const RAW_MIME_KEYS = ['raw_mime', 'mime', 'message'] as const;

/** Data key holding request-scoped inline templates. */
export const INLINE_TEMPLATES_KEY = 'templates_inline_json';

export const inlineTemplatesSchema = z.object({
  subject: z.string().optional(),
  text: z.string().optional(),
  html: z.string().optional(),
});

export type InlineTemplates = z.infer<typeof inlineTemplatesSchema>;

export interface RenderedContent {
  readonly subject: string;
  readonly text?: string;
  readonly html?: string;
}

/**
 * Template collaborator.
 *
 * `overrides`, when given, replaces the configured template sources for
 * this call only.
 */
export interface TemplateRenderer {
  render(ctx: EventContext, overrides?: InlineTemplates): Promise<RenderedContent>;
}

export function isRawMimeContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return false;
  const base = (contentType.split(';')[0] ?? '').trim().toLowerCase();
  return RAW_MIME_CONTENT_TYPES.has(base);
}

/**
 * Pull the raw MIME document out of the event data.
 *
 * Throws MissingPayloadError when nothing usable is present.
 */
export function extractRawMime(data: EventData): string {
  let raw: string | undefined;

  switch (data.kind) {
    case 'bytes':
      raw = bytesToText(data.value);
      break;
    case 'text':
      raw = data.value;
      break;
    case 'structured':
      for (const key of RAW_MIME_KEYS) {
        const candidate = data.value[key];
        if (typeof candidate === 'string' && candidate.trim() !== '') {
          raw = candidate;
          break;
        }
      }
      break;
    case 'absent':
      break;
  }

  if (raw === undefined || raw.trim() === '') {
    throw new MissingPayloadError('Raw MIME event carries no message content');
  }
  return raw;
}

/**
 * Read the `Subject:` header from a raw MIME document, unfolding
 * continuation lines. Returns undefined when there is none.
 */
export function mimeSubject(raw: string): string | undefined {
  const headerBlock = raw.split(/\r?\n\r?\n/, 1)[0] ?? '';
  const unfolded = headerBlock.replace(/\r?\n[ \t]+/g, ' ');

  for (const line of unfolded.split(/\r?\n/)) {
    const match = /^subject:\s*(.*)$/i.exec(line);
    if (match) return (match[1] ?? '').trim();
  }
  return undefined;
}

/**
 * Request-scoped inline template override from structured data.
 *
 * Accepts an object or a JSON string. An invalid override is a render
 * failure for this request.
 */
export function inlineTemplateOverride(data: EventData): InlineTemplates | undefined {
  if (data.kind !== 'structured' || !Object.hasOwn(data.value, INLINE_TEMPLATES_KEY)) {
    return undefined;
  }

  let raw: unknown = data.value[INLINE_TEMPLATES_KEY];
  if (typeof raw === 'string') {
    try {
      raw = JSON.parse(raw);
    } catch (err: unknown) {
      throw new RenderError(`"${INLINE_TEMPLATES_KEY}" is not valid JSON`, { cause: err });
    }
  }

  const parsed = inlineTemplatesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RenderError(`"${INLINE_TEMPLATES_KEY}" must be an object of subject/text/html templates`);
  }
  return parsed.data;
}

/**
 * Choose between raw-MIME passthrough and templated rendering.
 *
 * Exactly one branch runs. The MIME branch never calls the renderer and
 * never falls back to templates.
 */
export async function selectContent(
  ctx: EventContext,
  renderer: TemplateRenderer,
): Promise<MessageContent> {
  if (isRawMimeContentType(ctx.dataContentType)) {
    const rawMime = extractRawMime(ctx.data);
    return {
      kind: 'raw',
      subject: mimeSubject(rawMime) ?? ctx.subject ?? ctx.type,
      rawMime,
    };
  }

  const overrides = inlineTemplateOverride(ctx.data);

  let rendered: RenderedContent;
  try {
    rendered = await renderer.render(ctx, overrides);
  } catch (err: unknown) {
    if (err instanceof RenderError) throw err;
    throw new RenderError('Template rendering failed', { cause: err });
  }

  return {
    kind: 'template',
    subject: rendered.subject,
    text: rendered.text,
    html: rendered.html,
  };
}
