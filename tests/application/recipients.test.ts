import { describe, it, expect } from 'vitest';
import {
  parseRecipients,
  resolveRecipients,
  resolveAllRecipients,
} from '../../src/application/recipients.js';
import { bytes, makeContext, structured, text } from '../helpers.js';

describe('parseRecipients', () => {
  it('splits, trims and drops empty segments', () => {
    expect(parseRecipients('a@x.com, b@y.com ,')).toEqual(['a@x.com', 'b@y.com']);
  });

  it('returns [] for null, undefined and empty string', () => {
    expect(parseRecipients(null)).toEqual([]);
    expect(parseRecipients(undefined)).toEqual([]);
    expect(parseRecipients('')).toEqual([]);
  });

  it('stringifies and trims array elements', () => {
    expect(parseRecipients([' a@x.com ', '', 42, '  '])).toEqual(['a@x.com', '42']);
  });

  it('returns [] for unsupported types', () => {
    expect(parseRecipients(7)).toEqual([]);
    expect(parseRecipients({ to: 'a@x.com' })).toEqual([]);
    expect(parseRecipients(true)).toEqual([]);
  });

  it('keeps duplicates and order', () => {
    expect(parseRecipients('b@y.com,a@x.com,b@y.com')).toEqual(['b@y.com', 'a@x.com', 'b@y.com']);
  });

  it('is idempotent over its own comma-joined output', () => {
    const once = parseRecipients(' a@x.com ,, b@y.com, a@x.com ');
    expect(parseRecipients(once.join(','))).toEqual(once);
  });
});

describe('resolveRecipients', () => {
  it('prefers the extension over hints and data', () => {
    const ctx = makeContext({
      extensions: { email_to: 'ext@x.com' },
      recipientHints: { emailto: 'hint@x.com' },
      data: structured({ email_to: 'data@x.com' }),
    });
    expect(resolveRecipients(ctx, 'email_to')).toEqual(['ext@x.com']);
  });

  it('uses the first-class hint when no extension is present', () => {
    const ctx = makeContext({
      recipientHints: { emailcc: 'hint@x.com, other@x.com' },
      data: structured({ email_cc: 'data@x.com' }),
    });
    expect(resolveRecipients(ctx, 'email_cc')).toEqual(['hint@x.com', 'other@x.com']);
  });

  it('falls back to a key in structured data', () => {
    const ctx = makeContext({ data: structured({ email_bcc: ['d@x.com'] }) });
    expect(resolveRecipients(ctx, 'email_bcc')).toEqual(['d@x.com']);
  });

  it('decodes JSON text data before the key lookup', () => {
    const ctx = makeContext({ data: text('{"email_to": "t@x.com"}') });
    expect(resolveRecipients(ctx, 'email_to')).toEqual(['t@x.com']);
  });

  it('decodes JSON byte data before the key lookup', () => {
    const ctx = makeContext({ data: bytes('{"email_to": ["b1@x.com", "b2@x.com"]}') });
    expect(resolveRecipients(ctx, 'email_to')).toEqual(['b1@x.com', 'b2@x.com']);
  });

  it('treats undecodable data as absent', () => {
    const ctx = makeContext({ data: text('{broken') });
    expect(resolveRecipients(ctx, 'email_to')).toEqual([]);
  });

  it('lets a present-but-empty extension win over data', () => {
    const ctx = makeContext({
      extensions: { email_to: '' },
      data: structured({ email_to: 'data@x.com' }),
    });
    expect(resolveRecipients(ctx, 'email_to')).toEqual([]);
  });

  it('returns [] when nothing names the field', () => {
    expect(resolveRecipients(makeContext(), 'email_to')).toEqual([]);
  });
});

describe('resolveAllRecipients', () => {
  it('resolves each field independently', () => {
    const ctx = makeContext({
      extensions: { email_to: 'a@x.com' },
      data: structured({ email_cc: 'c@x.com' }),
    });
    expect(resolveAllRecipients(ctx)).toEqual({ to: ['a@x.com'], cc: ['c@x.com'], bcc: [] });
  });
});
