import type { BaseLogger } from 'pino';
import type { Settings } from '../config/settings.js';
import type { EmailClient } from './types.js';
import { LogEmailClient } from './log-client.js';
import { SmtpEmailClient, createSmtpTransport } from './smtp-client.js';

/**
 * Pick the delivery backend from settings.
 *
 * In dry-run mode an smtp backend without a host degrades to the log
 * backend, since nothing will be sent anyway.
 */
export function createEmailClient(settings: Settings, log: BaseLogger): EmailClient {
  if (settings.backend === 'log') {
    return new LogEmailClient(log);
  }

  if (settings.smtp.host === undefined && settings.dryRun) {
    log.warn('MAILER_SMTP_HOST not set; dry run uses the log backend');
    return new LogEmailClient(log);
  }

  return new SmtpEmailClient(createSmtpTransport(settings.smtp), log);
}
