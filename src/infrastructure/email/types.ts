import type { OutboundMessage } from '../../domain/index.js';

/**
 * Delivery backend.
 *
 * One attempt per call; retries, if any, belong to the backend itself.
 * Must accept both templated and raw-MIME messages.
 */
export interface EmailClient {
  readonly name: string;
  send(message: OutboundMessage): Promise<void>;
}
