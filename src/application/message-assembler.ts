import { TRACE_HEADERS } from '../domain/index.js';
import type {
  Disposition,
  EventContext,
  MessageContent,
  OutboundMessage,
  RecipientList,
  Recipients,
} from '../domain/index.js';

/** Static configuration the assembler falls back to. */
export interface AssemblerSettings {
  readonly sender: string;
  readonly defaults: Recipients;
  readonly dryRun: boolean;
}

function orDefault(resolved: RecipientList, fallback: RecipientList): RecipientList {
  return Object.freeze([...(resolved.length > 0 ? resolved : fallback)]);
}

export function traceHeaders(ctx: EventContext): Record<string, string> {
  return {
    [TRACE_HEADERS.id]: ctx.id,
    [TRACE_HEADERS.type]: ctx.type,
    [TRACE_HEADERS.source]: ctx.source,
  };
}

/**
 * Build the outbound message.
 *
 * Each recipient field falls back to its configured default on its own:
 * an event that names `to` but not `cc` still gets the configured `cc`.
 */
export function assembleMessage(
  ctx: EventContext,
  content: MessageContent,
  resolved: Recipients,
  settings: AssemblerSettings,
): OutboundMessage {
  const base = {
    subject: content.subject,
    sender: settings.sender,
    to: orDefault(resolved.to, settings.defaults.to),
    cc: orDefault(resolved.cc, settings.defaults.cc),
    bcc: orDefault(resolved.bcc, settings.defaults.bcc),
    headers: Object.freeze(traceHeaders(ctx)),
  };

  const message: OutboundMessage =
    content.kind === 'raw'
      ? { ...base, rawMime: content.rawMime }
      : { ...base, text: content.text, html: content.html };

  return Object.freeze(message);
}

export function hasRecipients(message: OutboundMessage): boolean {
  return message.to.length > 0 || message.cc.length > 0 || message.bcc.length > 0;
}

/**
 * Disposition rules, in order: no recipients → skip, dry run → skip,
 * otherwise send.
 */
export function decideDisposition(message: OutboundMessage, dryRun: boolean): Disposition {
  if (!hasRecipients(message)) return { action: 'skip', reason: 'no_recipients' };
  if (dryRun) return { action: 'skip', reason: 'dry_run' };
  return { action: 'send' };
}
