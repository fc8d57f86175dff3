export { normalizeEvent, extensionAttributes } from './normalize-event.js';
export type { ParsedEnvelope } from './normalize-event.js';
export { parseRecipients, resolveRecipients, resolveAllRecipients } from './recipients.js';
export { parseFilterSpec, filterSpecSchema, filterModeSchema } from './filter-schema.js';
export type { FilterSpec, FilterMode, FilterPredicate, FilterOperator } from './filter-schema.js';
export { matchesFilters, matchesPredicate, lookupAttribute } from './filter-engine.js';
export {
  selectContent,
  extractRawMime,
  isRawMimeContentType,
  inlineTemplateOverride,
  inlineTemplatesSchema,
  mimeSubject,
} from './content-selector.js';
export type { TemplateRenderer, RenderedContent, InlineTemplates } from './content-selector.js';
export { assembleMessage, decideDisposition, hasRecipients, traceHeaders } from './message-assembler.js';
export type { AssemblerSettings } from './message-assembler.js';
export { processEvent } from './pipeline.js';
export type { PipelineDeps, PipelineSettings } from './pipeline.js';
