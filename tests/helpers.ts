import { vi } from 'vitest';
import type { BaseLogger } from 'pino';
import type { EventContext, EventData } from '../src/domain/index.js';
import type { ParsedEnvelope } from '../src/application/index.js';
import type { PipelineSettings } from '../src/application/index.js';

/**
 * Factory for test contexts with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeContext(overrides: Partial<EventContext> = {}): EventContext {
  return {
    id: overrides.id ?? 'evt-001',
    source: overrides.source ?? '/orders',
    type: overrides.type ?? 'com.example.order.created',
    subject: overrides.subject,
    time: overrides.time,
    dataschema: overrides.dataschema,
    dataContentType: overrides.dataContentType,
    data: overrides.data ?? { kind: 'absent' },
    extensions: overrides.extensions ?? {},
    recipientHints: overrides.recipientHints ?? {},
  };
}

export function structured(value: Record<string, unknown>): EventData {
  return { kind: 'structured', value };
}

export function text(value: string): EventData {
  return { kind: 'text', value };
}

export function bytes(value: string): EventData {
  return { kind: 'bytes', value: new TextEncoder().encode(value) };
}

/** In-memory envelope, as a transport adapter would produce. */
export function makeEnvelope(
  attributes: Record<string, unknown>,
  data: EventData = { kind: 'absent' },
): ParsedEnvelope {
  return {
    get: (name) => (Object.hasOwn(attributes, name) ? attributes[name] : undefined),
    attributes: () => attributes,
    data: () => data,
  };
}

export function fakeLogger() {
  return {
    level: 'info',
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as BaseLogger;
}

export function makeSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    sender: overrides.sender ?? 'alerts@example.com',
    defaults: overrides.defaults ?? { to: [], cc: [], bcc: [] },
    dryRun: overrides.dryRun ?? false,
    filters: overrides.filters ?? [],
    filterMode: overrides.filterMode ?? 'all',
  };
}
