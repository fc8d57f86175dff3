import fp from 'fastify-plugin';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  DeliveryError,
  MalformedEventError,
  MissingPayloadError,
  RenderError,
} from '../../domain/index.js';
import { processEvent } from '../../application/pipeline.js';
import { parseHttpEnvelope } from './cloudevent-envelope.js';

export interface ErrorResponse {
  readonly status: number;
  readonly error: string;
}

/**
 * Map a pipeline failure onto an HTTP response.
 *
 * Malformed event / missing payload → 400, render → 500,
 * delivery → 502, anything else → 500.
 */
export function errorResponse(err: unknown): ErrorResponse {
  if (err instanceof MalformedEventError) return { status: 400, error: 'Invalid CloudEvent' };
  if (err instanceof MissingPayloadError) return { status: 400, error: 'Missing raw MIME payload' };
  if (err instanceof RenderError) return { status: 500, error: 'Template rendering failed' };
  if (err instanceof DeliveryError) return { status: 502, error: 'Email send failed' };
  return { status: 500, error: 'Internal error' };
}

function logFailure(log: FastifyBaseLogger, err: unknown, response: ErrorResponse): void {
  if (response.status === 400) {
    log.warn({ err }, response.error);
  } else {
    log.error({ err }, response.error);
  }
}

/**
 * CloudEvent receiver.
 *
 * POST /: binary or structured CloudEvent
 *   204 filtered out, 202 sent or skipped (no recipients / dry run)
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const body = Buffer.isBuffer(request.body) ? request.body : undefined;

      try {
        const envelope = parseHttpEnvelope(request.headers, body);
        const outcome = await processEvent(envelope, { ...fastify.mailer, log: request.log });

        if (outcome.status === 'filtered') {
          return reply.status(204).send();
        }
        return reply.status(202).send();
      } catch (err: unknown) {
        const response = errorResponse(err);
        logFailure(request.log, err, response);
        return reply.status(response.status).send({ error: response.error });
      }
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['mailer'],
  fastify: '5.x',
});
