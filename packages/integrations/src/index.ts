// Shared HTTP helpers
export {
  fetchText,
  fetchJson,
  timeoutFromEnv,
  DEFAULT_FETCH_TIMEOUT_MS,
  USER_AGENT,
} from "./http.js";

// NPI Registry
export {
  NpiRegistryClient,
  createNpiRegistryClient,
  toIdentityRecord,
} from "./npi/client.js";
export type { NpiRegistryConfig, NpiResult } from "./npi/client.js";

// Nominatim Geocoder
export {
  NominatimGeocoder,
  createNominatimGeocoder,
  toGeoResult,
  cityStateFallback,
} from "./nominatim/client.js";
export type { NominatimConfig, NominatimPlace } from "./nominatim/client.js";

// Phone Validation
export { PhoneValidator, describeLocation } from "./phone/validator.js";
export type { PhoneValidatorConfig } from "./phone/validator.js";

// Google PSE
export { GooglePSEClient, createGooglePSEClient } from "./google-pse/client.js";
export type { GooglePSEConfig } from "./google-pse/client.js";

// DuckDuckGo HTML
export {
  DuckDuckGoClient,
  parseResultsPage,
  unwrapResultLink,
} from "./duckduckgo/client.js";
export type { DuckDuckGoConfig } from "./duckduckgo/client.js";

// Gemini Claim Extractor
export {
  GeminiClaimExtractor,
  createGeminiClaimExtractor,
  parseClaimResponse,
} from "./gemini/client.js";
export type { GeminiConfig } from "./gemini/client.js";
