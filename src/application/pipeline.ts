import type { BaseLogger } from 'pino';
import { DeliveryError } from '../domain/index.js';
import type { EventContext, EventOutcome } from '../domain/index.js';
import type { EmailClient } from '../infrastructure/email/types.js';
import { normalizeEvent } from './normalize-event.js';
import type { ParsedEnvelope } from './normalize-event.js';
import { matchesFilters } from './filter-engine.js';
import type { FilterMode, FilterSpec } from './filter-schema.js';
import { resolveAllRecipients } from './recipients.js';
import { selectContent } from './content-selector.js';
import type { TemplateRenderer } from './content-selector.js';
import { assembleMessage, decideDisposition } from './message-assembler.js';
import type { AssemblerSettings } from './message-assembler.js';

export interface PipelineSettings extends AssemblerSettings {
  readonly filters: FilterSpec;
  readonly filterMode: FilterMode;
}

/** Collaborators for one pipeline run. All are shared read-only across requests. */
export interface PipelineDeps {
  readonly settings: PipelineSettings;
  readonly renderer: TemplateRenderer;
  readonly emailClient: EmailClient;
  readonly log: BaseLogger;
}

function eventFields(ctx: EventContext): Record<string, string> {
  return { ce_id: ctx.id, ce_type: ctx.type, ce_source: ctx.source };
}

/**
 * Run one event through the pipeline.
 *
 * 1. Normalize the envelope.
 * 2. Filter gate (no rendering before it).
 * 3. Resolve recipients and select content.
 * 4. Assemble the message and decide its disposition.
 * 5. Single delivery attempt when the disposition is `send`.
 *
 * Typed PipelineErrors propagate to the caller; delivery failures are
 * wrapped in DeliveryError.
 */
export async function processEvent(
  envelope: ParsedEnvelope,
  deps: PipelineDeps,
): Promise<EventOutcome> {
  const { settings, renderer, emailClient, log } = deps;

  const ctx = normalizeEvent(envelope);
  log.info({ ...eventFields(ctx), ce_subject: ctx.subject }, 'CloudEvent received');

  if (!matchesFilters(ctx, settings.filters, settings.filterMode)) {
    log.info(eventFields(ctx), 'Event filtered out');
    return { status: 'filtered' };
  }

  const recipients = resolveAllRecipients(ctx);
  const content = await selectContent(ctx, renderer);

  const message = assembleMessage(ctx, content, recipients, settings);
  log.debug(
    { ...eventFields(ctx), subject: message.subject, to: message.to, cc: message.cc, bcc: message.bcc },
    'Prepared email message',
  );

  const disposition = decideDisposition(message, settings.dryRun);

  if (disposition.action === 'skip') {
    if (disposition.reason === 'no_recipients') {
      log.warn(eventFields(ctx), 'No recipients resolved or configured; skipping send');
    } else {
      log.info({ ...eventFields(ctx), to: message.to, subject: message.subject }, 'DRY RUN email (not sent)');
    }
    return { status: 'skipped', reason: disposition.reason, message };
  }

  try {
    await emailClient.send(message);
  } catch (err: unknown) {
    throw new DeliveryError('Email send failed', { cause: err });
  }

  log.info({ ...eventFields(ctx), to: message.to, subject: message.subject }, 'Email sent');
  return { status: 'sent', message };
}
