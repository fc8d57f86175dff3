import { describe, it, expect } from 'vitest';
import { loadSettings } from '../../src/infrastructure/config/settings.js';
import { ConfigError } from '../../src/domain/index.js';

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    const settings = loadSettings({});

    expect(settings).toEqual({
      sender: 'cloudevent-mailer@localhost',
      defaults: { to: [], cc: [], bcc: [] },
      dryRun: false,
      filters: [],
      filterMode: 'all',
      logLevel: 'info',
      templatesDir: undefined,
      templatesInline: undefined,
      backend: 'smtp',
      smtp: {
        host: undefined,
        port: 587,
        user: undefined,
        password: undefined,
        secure: false,
        requireTls: false,
      },
      host: '0.0.0.0',
      port: 8080,
    });
  });

  it('parses recipients, flags and ports', () => {
    const settings = loadSettings({
      MAILER_EMAIL_FROM: 'noreply@example.com',
      MAILER_EMAIL_TO: 'a@x.com, b@x.com,',
      MAILER_EMAIL_BCC: 'audit@x.com',
      MAILER_DRY_RUN: 'YES',
      MAILER_SMTP_HOST: 'smtp.example.com',
      MAILER_SMTP_PORT: '2525',
      MAILER_SMTP_SECURE: '1',
      PORT: '9000',
    });

    expect(settings.sender).toBe('noreply@example.com');
    expect(settings.defaults).toEqual({ to: ['a@x.com', 'b@x.com'], cc: [], bcc: ['audit@x.com'] });
    expect(settings.dryRun).toBe(true);
    expect(settings.smtp.host).toBe('smtp.example.com');
    expect(settings.smtp.port).toBe(2525);
    expect(settings.smtp.secure).toBe(true);
    expect(settings.port).toBe(9000);
  });

  it('treats blank variables as unset', () => {
    const settings = loadSettings({ MAILER_SMTP_PORT: '', MAILER_EMAIL_FROM: '  ' });
    expect(settings.smtp.port).toBe(587);
    expect(settings.sender).toBe('cloudevent-mailer@localhost');
  });

  it('parses filters and a case-insensitive filter mode', () => {
    const settings = loadSettings({
      MAILER_FILTERS_JSON: '{"type":"com.example.a"}',
      MAILER_FILTER_MODE: 'ANY',
    });

    expect(settings.filters).toEqual([{ attribute: 'type', op: 'eq', value: 'com.example.a' }]);
    expect(settings.filterMode).toBe('any');
  });

  it('parses inline templates', () => {
    const settings = loadSettings({ MAILER_TEMPLATES_INLINE_JSON: '{"subject":"S","html":"<p>H</p>"}' });
    expect(settings.templatesInline).toEqual({ subject: 'S', html: '<p>H</p>' });
  });

  it('falls back to info for an unknown log level', () => {
    expect(loadSettings({ LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
    expect(loadSettings({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
  });

  it('rejects an invalid port', () => {
    expect(() => loadSettings({ MAILER_SMTP_PORT: 'abc' })).toThrow(ConfigError);
  });

  it('rejects an unknown filter mode', () => {
    expect(() => loadSettings({ MAILER_FILTER_MODE: 'some' })).toThrow(ConfigError);
  });

  it('rejects an unknown backend', () => {
    expect(() => loadSettings({ MAILER_EMAIL_BACKEND: 'carrier-pigeon' })).toThrow(ConfigError);
  });

  it('rejects invalid inline template JSON', () => {
    expect(() => loadSettings({ MAILER_TEMPLATES_INLINE_JSON: '{' })).toThrow(
      'MAILER_TEMPLATES_INLINE_JSON is not valid JSON',
    );
  });

  it('rejects invalid filter JSON', () => {
    expect(() => loadSettings({ MAILER_FILTERS_JSON: 'not json' })).toThrow(ConfigError);
  });
});
