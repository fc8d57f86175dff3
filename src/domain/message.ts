/** Ordered, trimmed, non-empty addresses. Duplicates are kept. */
export type RecipientList = readonly string[];

export interface Recipients {
  readonly to: RecipientList;
  readonly cc: RecipientList;
  readonly bcc: RecipientList;
}

export type RecipientField = 'email_to' | 'email_cc' | 'email_bcc';

/** Header names stamped on every outbound message. */
export const TRACE_HEADERS = {
  id: 'X-CloudEvent-ID',
  type: 'X-CloudEvent-Type',
  source: 'X-CloudEvent-Source',
} as const;

/**
 * Content chosen for a message.
 *
 * Exactly one shape: templated subject/text/html, or a raw MIME document
 * forwarded verbatim.
 */
export type MessageContent =
  | {
      readonly kind: 'template';
      readonly subject: string;
      readonly text?: string;
      readonly html?: string;
    }
  | {
      readonly kind: 'raw';
      readonly subject: string;
      readonly rawMime: string;
    };

/**
 * Fully formed outbound message.
 *
 * Built once by the assembler and frozen; delivery clients only read it.
 */
export interface OutboundMessage extends Recipients {
  readonly subject: string;
  readonly text?: string;
  readonly html?: string;
  readonly rawMime?: string;
  readonly sender: string;
  readonly headers: Readonly<Record<string, string>>;
}

export type SkipReason = 'no_recipients' | 'dry_run';

export type Disposition =
  | { readonly action: 'skip'; readonly reason: SkipReason }
  | { readonly action: 'send' };

/** Final result of processing one event. */
export type EventOutcome =
  | { readonly status: 'filtered' }
  | { readonly status: 'skipped'; readonly reason: SkipReason; readonly message: OutboundMessage }
  | { readonly status: 'sent'; readonly message: OutboundMessage };
