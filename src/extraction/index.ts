export { ExtractionOrchestrator, type ExtractionDependencies } from "./orchestrator.js";
export { AgentExtractionStrategy, parseAnalysis } from "./agent.js";
export { InlineTextStrategy } from "./inline.js";
export {
  PasswordProtectedUrlStrategy,
  cookieHeader,
  type HttpFetch,
  type HttpResponse,
} from "./url.js";
export { stripBoilerplate } from "./boilerplate.js";
export {
  contentDescriptorSchema,
  parseStoredDescriptor,
  type ContentDescriptorInput,
} from "./descriptor.js";
export {
  DEFAULT_EXTRACTION_CONFIG,
  type Confidence,
  type ContentDescriptor,
  type ExtractedContent,
  type ExtractionConfig,
  type ExtractionMetadata,
  type ExtractionMethod,
  type ExtractionResult,
  type ExtractionStrategy,
} from "./types.js";
