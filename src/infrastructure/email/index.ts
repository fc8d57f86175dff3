export type { EmailClient } from './types.js';
export { SmtpEmailClient, createSmtpTransport, toMailOptions } from './smtp-client.js';
export type { MailTransport } from './smtp-client.js';
export { LogEmailClient } from './log-client.js';
export { createEmailClient } from './factory.js';
