import type { BaseLogger } from 'pino';
import type { OutboundMessage } from '../../domain/index.js';
import type { EmailClient } from './types.js';

/** Logs messages instead of sending them. */
export class LogEmailClient implements EmailClient {
  readonly name = 'log';

  constructor(private readonly log: BaseLogger) {}

  async send(message: OutboundMessage): Promise<void> {
    this.log.info(
      {
        from: message.sender,
        to: message.to,
        cc: message.cc,
        bcc: message.bcc,
        subject: message.subject,
        headers: message.headers,
        raw: message.rawMime !== undefined,
      },
      'Email (log backend)',
    );
  }
}
