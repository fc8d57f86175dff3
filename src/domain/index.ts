export {
  SPEC_ATTRIBUTES,
  RECIPIENT_ATTRIBUTES,
  RESERVED_ATTRIBUTES,
  ABSENT,
  isPlainObject,
  classifyJson,
  bytesToText,
  decodeStructured,
} from './event-context.js';
export type {
  EventContext,
  EventData,
  Extensions,
  RecipientAttribute,
  RecipientHints,
} from './event-context.js';
export { TRACE_HEADERS } from './message.js';
export type {
  RecipientList,
  Recipients,
  RecipientField,
  MessageContent,
  OutboundMessage,
  SkipReason,
  Disposition,
  EventOutcome,
} from './message.js';
export {
  PipelineError,
  MalformedEventError,
  MissingPayloadError,
  RenderError,
  DeliveryError,
  ConfigError,
} from './errors.js';
