import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { BaseLogger } from 'pino';
import { ConfigError } from '../../domain/index.js';
import type { OutboundMessage } from '../../domain/index.js';
import type { SmtpSettings } from '../config/settings.js';
import type { EmailClient } from './types.js';

/** The part of a nodemailer transporter this client uses. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

/**
 * Map an outbound message onto nodemailer options.
 *
 * Raw MIME is passed through untouched with an explicit SMTP envelope,
 * since nodemailer does not read recipients out of a raw document.
 */
export function toMailOptions(message: OutboundMessage): SendMailOptions {
  if (message.rawMime !== undefined) {
    return {
      envelope: {
        from: message.sender,
        to: [...message.to, ...message.cc, ...message.bcc],
      },
      raw: message.rawMime,
    };
  }

  return {
    from: message.sender,
    to: [...message.to],
    cc: message.cc.length > 0 ? [...message.cc] : undefined,
    bcc: message.bcc.length > 0 ? [...message.bcc] : undefined,
    subject: message.subject,
    text: message.text,
    html: message.html,
    headers: { ...message.headers },
  };
}

export function createSmtpTransport(smtp: SmtpSettings): MailTransport {
  if (smtp.host === undefined) {
    throw new ConfigError('MAILER_SMTP_HOST is required for the smtp backend');
  }

  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    requireTLS: smtp.requireTls,
    auth: smtp.user !== undefined
      ? { user: smtp.user, pass: smtp.password }
      : undefined,
  });
}

export class SmtpEmailClient implements EmailClient {
  readonly name = 'smtp';

  constructor(
    private readonly transport: MailTransport,
    private readonly log: BaseLogger,
  ) {}

  async send(message: OutboundMessage): Promise<void> {
    await this.transport.sendMail(toMailOptions(message));
    this.log.debug(
      { to: message.to, cc: message.cc, bcc: message.bcc, raw: message.rawMime !== undefined },
      'SMTP handoff complete',
    );
  }
}
