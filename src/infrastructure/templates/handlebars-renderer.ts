import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import Handlebars from 'handlebars';
import { bytesToText, decodeStructured, RenderError } from '../../domain/index.js';
import type { EventContext } from '../../domain/index.js';
import type {
  InlineTemplates,
  RenderedContent,
  TemplateRenderer,
} from '../../application/content-selector.js';

type TemplatePart = 'subject' | 'text' | 'html';

const PARTS: readonly TemplatePart[] = ['subject', 'text', 'html'];

export const DEFAULT_SUBJECT_TEMPLATE = '[{{type}}] {{source}}';

export const DEFAULT_TEXT_TEMPLATE = 'CloudEvent {{id}} ({{type}}) from {{source}}\n\n{{json data}}\n';

/** Event types usable as a directory name under the templates dir. */
const SAFE_SEGMENT = /^(?!\.{1,2}$)[A-Za-z0-9._-]+$/;

export interface TemplateSources {
  readonly inline?: InlineTemplates;
  readonly directory?: string;
}

type Templates = Partial<Record<TemplatePart, string>>;

/** Values exposed to templates. */
export function renderContext(ctx: EventContext): Record<string, unknown> {
  let data: unknown = null;
  if (ctx.data.kind === 'text' || ctx.data.kind === 'bytes') {
    data = decodeStructured(ctx.data)
      ?? (ctx.data.kind === 'text' ? ctx.data.value : bytesToText(ctx.data.value));
  } else if (ctx.data.kind === 'structured') {
    data = ctx.data.value;
  }

  return {
    id: ctx.id,
    source: ctx.source,
    type: ctx.type,
    subject: ctx.subject,
    time: ctx.time,
    dataschema: ctx.dataschema,
    datacontenttype: ctx.dataContentType,
    data,
    extensions: ctx.extensions,
  };
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

/**
 * Handlebars-backed renderer.
 *
 * Lookup per part: inline templates, then `<dir>/<event type>/<part>.hbs`,
 * then `<dir>/<part>.hbs`. A request override replaces the configured
 * sources entirely. Built-in defaults fill in the subject, and the text
 * body when neither text nor html was found.
 *
 * Subject and text are rendered without HTML escaping.
 */
export class HandlebarsTemplateRenderer implements TemplateRenderer {
  private readonly hbs: typeof Handlebars;

  constructor(private readonly sources: TemplateSources = {}) {
    this.hbs = Handlebars.create();
    this.hbs.registerHelper('json', (value: unknown) =>
      value === undefined || value === null ? '' : JSON.stringify(value, null, 2),
    );
  }

  async render(ctx: EventContext, overrides?: InlineTemplates): Promise<RenderedContent> {
    const templates = overrides !== undefined
      ? { ...overrides }
      : await this.configuredTemplates(ctx.type);

    const subjectSource = templates.subject ?? DEFAULT_SUBJECT_TEMPLATE;
    const textSource = templates.text ?? (templates.html === undefined ? DEFAULT_TEXT_TEMPLATE : undefined);

    const context = renderContext(ctx);
    const subject = this.renderPart('subject', subjectSource, context)
      .replace(/[\r\n]+/g, ' ')
      .trim();

    if (subject === '') {
      throw new RenderError('Rendered subject is empty');
    }

    return {
      subject,
      text: textSource === undefined ? undefined : this.renderPart('text', textSource, context),
      html: templates.html === undefined ? undefined : this.renderPart('html', templates.html, context),
    };
  }

  private async configuredTemplates(eventType: string): Promise<Templates> {
    const templates: Templates = { ...this.sources.inline };
    const dir = this.sources.directory;
    if (dir === undefined) return templates;

    for (const part of PARTS) {
      if (templates[part] !== undefined) continue;

      const typed = SAFE_SEGMENT.test(eventType)
        ? await readOptional(join(dir, eventType, `${part}.hbs`))
        : undefined;
      const found = typed ?? await readOptional(join(dir, `${part}.hbs`));
      if (found !== undefined) templates[part] = found;
    }
    return templates;
  }

  private renderPart(part: TemplatePart, source: string, context: Record<string, unknown>): string {
    try {
      const template = this.hbs.compile(source, { noEscape: part !== 'html' });
      return template(context);
    } catch (err: unknown) {
      throw new RenderError(`Failed to render ${part} template`, { cause: err });
    }
  }
}
