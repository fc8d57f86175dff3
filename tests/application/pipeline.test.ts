import { describe, it, expect, vi, beforeEach } from 'vitest';
import { processEvent } from '../../src/application/pipeline.js';
import type { PipelineDeps } from '../../src/application/pipeline.js';
import {
  DeliveryError,
  MalformedEventError,
  RenderError,
} from '../../src/domain/index.js';
import type { EventData } from '../../src/domain/index.js';
import { fakeLogger, makeEnvelope, makeSettings, structured } from '../helpers.js';

const ATTRS = {
  specversion: '1.0',
  id: 'evt-100',
  source: '/orders',
  type: 'com.example.order.created',
};

function makeDeps(overrides: Partial<PipelineDeps> = {}) {
  const render = vi.fn().mockResolvedValue({ subject: 'Order created', text: 'body' });
  const send = vi.fn().mockResolvedValue(undefined);
  const deps: PipelineDeps = {
    settings: overrides.settings ?? makeSettings(),
    renderer: overrides.renderer ?? { render },
    emailClient: overrides.emailClient ?? { name: 'fake', send },
    log: overrides.log ?? fakeLogger(),
  };
  return { deps, render, send };
}

function envelope(extra: Record<string, unknown> = {}, data?: EventData) {
  return makeEnvelope({ ...ATTRS, ...extra }, data);
}

describe('processEvent', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends to recipients from the event and returns sent', async () => {
    const { deps, send } = makeDeps();

    const outcome = await processEvent(envelope({ email_to: 'a@x.com, b@y.com' }), deps);

    expect(outcome.status).toBe('sent');
    expect(send).toHaveBeenCalledOnce();
    const message = send.mock.calls[0]?.[0];
    expect(message).toMatchObject({
      subject: 'Order created',
      text: 'body',
      sender: 'alerts@example.com',
      to: ['a@x.com', 'b@y.com'],
      cc: [],
      bcc: [],
      headers: {
        'X-CloudEvent-ID': 'evt-100',
        'X-CloudEvent-Type': 'com.example.order.created',
        'X-CloudEvent-Source': '/orders',
      },
    });
  });

  it('stops at the filter without rendering or sending', async () => {
    const { deps, render, send } = makeDeps({
      settings: makeSettings({
        filters: [{ attribute: 'type', op: 'eq', value: 'com.example.order.deleted' }],
      }),
    });

    const outcome = await processEvent(envelope({ email_to: 'a@x.com' }), deps);

    expect(outcome).toEqual({ status: 'filtered' });
    expect(render).not.toHaveBeenCalled();
    expect(send).not.toHaveBeenCalled();
  });

  it('skips with no_recipients when neither event nor config names anyone', async () => {
    const { deps, send } = makeDeps();

    const outcome = await processEvent(envelope(), deps);

    expect(outcome.status).toBe('skipped');
    expect(outcome.status === 'skipped' && outcome.reason).toBe('no_recipients');
    expect(send).not.toHaveBeenCalled();
  });

  it('skips with dry_run and never calls the delivery client', async () => {
    const { deps, send } = makeDeps({ settings: makeSettings({ dryRun: true }) });

    const outcome = await processEvent(envelope({ email_to: 'a@x.com' }), deps);

    expect(outcome.status === 'skipped' && outcome.reason).toBe('dry_run');
    expect(send).not.toHaveBeenCalled();
  });

  it('uses configured recipients per field when the event omits them', async () => {
    const { deps, send } = makeDeps({
      settings: makeSettings({ defaults: { to: ['ops@x.com'], cc: ['lead@x.com'], bcc: [] } }),
    });

    await processEvent(envelope({}, structured({ email_to: 'user@x.com' })), deps);

    expect(send.mock.calls[0]?.[0]).toMatchObject({ to: ['user@x.com'], cc: ['lead@x.com'], bcc: [] });
  });

  it('forwards raw MIME without rendering', async () => {
    const { deps, render, send } = makeDeps();
    const raw = 'Subject: Raw one\r\n\r\nhello';

    const outcome = await processEvent(
      envelope({ datacontenttype: 'multipart/mixed', email_to: 'a@x.com' }, structured({ raw_mime: raw })),
      deps,
    );

    expect(outcome.status).toBe('sent');
    expect(render).not.toHaveBeenCalled();
    expect(send.mock.calls[0]?.[0]).toMatchObject({ subject: 'Raw one', rawMime: raw });
  });

  it('propagates MalformedEventError for missing required attributes', async () => {
    const { deps } = makeDeps();

    await expect(processEvent(makeEnvelope({ specversion: '1.0', id: 'x' }), deps)).rejects.toBeInstanceOf(
      MalformedEventError,
    );
  });

  it('raises RenderError and sends nothing when rendering fails', async () => {
    const send = vi.fn();
    const { deps } = makeDeps({
      renderer: { render: vi.fn().mockRejectedValue(new Error('bad template')) },
      emailClient: { name: 'fake', send },
    });

    await expect(processEvent(envelope({ email_to: 'a@x.com' }), deps)).rejects.toBeInstanceOf(RenderError);
    expect(send).not.toHaveBeenCalled();
  });

  it('wraps delivery failures in DeliveryError', async () => {
    const { deps } = makeDeps({
      emailClient: { name: 'fake', send: vi.fn().mockRejectedValue(new Error('smtp down')) },
    });

    await expect(processEvent(envelope({ email_to: 'a@x.com' }), deps)).rejects.toBeInstanceOf(DeliveryError);
  });

  it('logs the dry-run decision', async () => {
    const log = fakeLogger();
    const { deps } = makeDeps({ settings: makeSettings({ dryRun: true }), log });

    await processEvent(envelope({ email_to: 'a@x.com' }), deps);

    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ ce_id: 'evt-100', to: ['a@x.com'] }),
      'DRY RUN email (not sent)',
    );
  });
});
