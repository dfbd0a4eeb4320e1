// Name matching
export { normalizeText } from "./normalize.js";
export {
  sequenceRatio,
  getMatchingBlocks,
  findLongestMatch,
} from "./sequence-matcher.js";
export type { MatchingBlock } from "./sequence-matcher.js";
export { displayName, matchIdentity } from "./identity-match.js";

// Web presence
export { WebSearchAggregator, normalizeHits } from "./web-search.js";
export type {
  SearchProvider,
  ProviderFailure,
  WebSearchOutcome,
  WebSearchOptions,
} from "./web-search.js";
export {
  classifyFootprint,
  categorize,
  emptyFootprint,
  DEFAULT_FOOTPRINT_RULES,
} from "./footprint.js";
export type { FootprintRules, FootprintCategory } from "./footprint.js";

// Query templates
export { footprintQuery, addressConfirmationQuery } from "./query-templates.js";

// Pipeline
export { createInvestigationContext } from "./context.js";
export {
  RegistryLookupStep,
  IdentityMatchStep,
  LocationVerificationStep,
  ContactVerificationStep,
  WebPresenceStep,
  defaultStages,
  sequentialStages,
  formatPercent,
} from "./steps/index.js";
export type { StepRuntime, VerificationStep } from "./steps/index.js";
export { withTimeout } from "./timeout.js";
export { assembleReport, overallStatus } from "./report.js";

// Orchestrator
export { ProviderInvestigator } from "./orchestrator.js";
export type {
  InvestigationEvent,
  InvestigationEventType,
  EventCallback,
} from "./events.js";
export type {
  RegistryClient,
  GeocodingClient,
  PhoneValidationClient,
  InvestigatorClients,
} from "./clients.js";
