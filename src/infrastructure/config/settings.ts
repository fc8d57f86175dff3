import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';
import type { Recipients } from '../../domain/index.js';
import { parseRecipients } from '../../application/recipients.js';
import { parseFilterSpec, filterModeSchema } from '../../application/filter-schema.js';
import { inlineTemplatesSchema } from '../../application/content-selector.js';
import type { InlineTemplates } from '../../application/content-selector.js';
import type { PipelineSettings } from '../../application/pipeline.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type EmailBackend = 'smtp' | 'log';

export interface SmtpSettings {
  readonly host?: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: string;
  /** Implicit TLS (usually port 465). */
  readonly secure: boolean;
  /** Refuse to send unless STARTTLS succeeds. */
  readonly requireTls: boolean;
}

export interface Settings extends PipelineSettings {
  readonly logLevel: LogLevel;
  readonly templatesDir?: string;
  readonly templatesInline?: InlineTemplates;
  readonly backend: EmailBackend;
  readonly smtp: SmtpSettings;
  readonly host: string;
  readonly port: number;
}

/** Empty env vars count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const flag = optionalString.transform((v) =>
  v === undefined ? false : ['1', 'true', 'yes', 'on'].includes(v.toLowerCase()),
);

function port(fallback: number) {
  return optionalString.pipe(
    z.coerce.number().int().min(1).max(65535).optional().default(fallback),
  );
}

/**
 * Zod schema over the raw environment.
 *
 * Unknown log levels fall back to `info`; every other invalid value is a
 * startup error.
 */
export const envSchema = z.object({
  MAILER_EMAIL_FROM: optionalString.transform((v) => v ?? 'cloudevent-mailer@localhost'),
  MAILER_EMAIL_TO: optionalString,
  MAILER_EMAIL_CC: optionalString,
  MAILER_EMAIL_BCC: optionalString,
  MAILER_DRY_RUN: flag,
  MAILER_FILTERS_JSON: optionalString,
  MAILER_FILTER_MODE: optionalString.pipe(
    z.preprocess((v) => (typeof v === 'string' ? v.toLowerCase() : v), filterModeSchema.optional().default('all')),
  ),
  MAILER_TEMPLATES_DIR: optionalString,
  MAILER_TEMPLATES_INLINE_JSON: optionalString,
  MAILER_EMAIL_BACKEND: optionalString.pipe(z.enum(['smtp', 'log']).optional().default('smtp')),
  MAILER_SMTP_HOST: optionalString,
  MAILER_SMTP_PORT: port(587),
  MAILER_SMTP_USER: optionalString,
  MAILER_SMTP_PASSWORD: optionalString,
  MAILER_SMTP_SECURE: flag,
  MAILER_SMTP_STARTTLS: flag,
  LOG_LEVEL: optionalString.pipe(
    z.preprocess((v) => (typeof v === 'string' ? v.toLowerCase() : v), z.enum(LOG_LEVELS).optional().default('info')).catch('info'),
  ),
  HOST: optionalString.transform((v) => v ?? '0.0.0.0'),
  PORT: port(8080),
});

function parseInlineTemplates(json: string | undefined): InlineTemplates | undefined {
  if (json === undefined) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err: unknown) {
    throw new ConfigError('MAILER_TEMPLATES_INLINE_JSON is not valid JSON', { cause: err });
  }

  const parsed = inlineTemplatesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('MAILER_TEMPLATES_INLINE_JSON must be an object of subject/text/html templates');
  }
  return parsed.data;
}

/**
 * Load settings from the environment.
 *
 * Called once at startup; the result is shared read-only by every request.
 * Throws ConfigError on invalid values.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  const defaults: Recipients = {
    to: parseRecipients(e.MAILER_EMAIL_TO),
    cc: parseRecipients(e.MAILER_EMAIL_CC),
    bcc: parseRecipients(e.MAILER_EMAIL_BCC),
  };

  return {
    sender: e.MAILER_EMAIL_FROM,
    defaults,
    dryRun: e.MAILER_DRY_RUN,
    filters: parseFilterSpec(e.MAILER_FILTERS_JSON),
    filterMode: e.MAILER_FILTER_MODE,
    logLevel: e.LOG_LEVEL,
    templatesDir: e.MAILER_TEMPLATES_DIR,
    templatesInline: parseInlineTemplates(e.MAILER_TEMPLATES_INLINE_JSON),
    backend: e.MAILER_EMAIL_BACKEND,
    smtp: {
      host: e.MAILER_SMTP_HOST,
      port: e.MAILER_SMTP_PORT,
      user: e.MAILER_SMTP_USER,
      password: e.MAILER_SMTP_PASSWORD,
      secure: e.MAILER_SMTP_SECURE,
      requireTls: e.MAILER_SMTP_STARTTLS,
    },
    host: e.HOST,
    port: e.PORT,
  };
}
