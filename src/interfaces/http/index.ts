export { default as mailerPlugin } from './mailer-plugin.js';
export type { MailerServices } from './mailer-plugin.js';
export { default as eventRoutes, errorResponse } from './event-routes.js';
export type { ErrorResponse } from './event-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { parseHttpEnvelope, baseMediaType, isJsonMediaType } from './cloudevent-envelope.js';
export type { HttpHeaders } from './cloudevent-envelope.js';
