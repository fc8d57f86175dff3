/**
 * Error taxonomy for the notification pipeline.
 *
 * The HTTP layer maps each class to a response status; anything that is
 * not a PipelineError is treated as unexpected.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Envelope could not be parsed, or `id`/`source`/`type` is missing. */
export class MalformedEventError extends PipelineError {
  readonly code = 'MALFORMED_EVENT';
}

/** Raw-MIME event without any usable message text. */
export class MissingPayloadError extends PipelineError {
  readonly code = 'MISSING_PAYLOAD';
}

export class RenderError extends PipelineError {
  readonly code = 'RENDER_FAILED';
}

export class DeliveryError extends PipelineError {
  readonly code = 'DELIVERY_FAILED';
}

/** Invalid deployment configuration. Raised at startup, never per request. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
