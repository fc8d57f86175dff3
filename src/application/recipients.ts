import { decodeStructured } from '../domain/index.js';
import type {
  EventContext,
  RecipientAttribute,
  RecipientField,
  RecipientList,
  Recipients,
} from '../domain/index.js';

/** First-class attribute carrying the same recipients as each field. */
const HINT_FOR_FIELD: Record<RecipientField, RecipientAttribute> = {
  email_to: 'emailto',
  email_cc: 'emailcc',
  email_bcc: 'emailbcc',
};

/**
 * Parse a raw recipient value.
 *
 * - null / undefined / '' → []
 * - array → each element stringified and trimmed, empties dropped
 * - string → split on ',', trimmed, empties dropped
 * - anything else → []
 */
export function parseRecipients(value: unknown): string[] {
  if (value === null || value === undefined || value === '') return [];

  if (Array.isArray(value)) {
    return value
      .map((item: unknown) => String(item).trim())
      .filter((item) => item !== '');
  }

  if (typeof value === 'string') {
    return value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part !== '');
  }

  return [];
}

/**
 * Resolve one recipient field from the event.
 *
 * Precedence: extension named `field` → first-class attribute (`emailto`)
 * → key `field` in the decoded data mapping. The first source that carries
 * the key wins even when its value parses to an empty list.
 */
export function resolveRecipients(ctx: EventContext, field: RecipientField): RecipientList {
  if (Object.hasOwn(ctx.extensions, field)) {
    return parseRecipients(ctx.extensions[field]);
  }

  const hint = HINT_FOR_FIELD[field];
  if (Object.hasOwn(ctx.recipientHints, hint)) {
    return parseRecipients(ctx.recipientHints[hint]);
  }

  const data = decodeStructured(ctx.data);
  if (data !== null && Object.hasOwn(data, field)) {
    return parseRecipients(data[field]);
  }

  return [];
}

export function resolveAllRecipients(ctx: EventContext): Recipients {
  return {
    to: resolveRecipients(ctx, 'email_to'),
    cc: resolveRecipients(ctx, 'email_cc'),
    bcc: resolveRecipients(ctx, 'email_bcc'),
  };
}
