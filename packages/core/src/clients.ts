import type {
  GeoResult,
  IdentityRecord,
  PhoneResult,
} from "@provider-verify/contracts";

import type { WebSearchAggregator } from "./web-search.js";

// ============================================================================
// Client Interfaces (Dependency Injection)
// ============================================================================

export interface RegistryClient {
  /** Resolves to null when the identifier is unknown; rejects on transport failure */
  resolveIdentifier(identifier: string, signal?: AbortSignal): Promise<IdentityRecord | null>;
}

export interface GeocodingClient {
  geocode(address: string, signal?: AbortSignal): Promise<GeoResult | null>;
}

export interface PhoneValidationClient {
  /** Resolves to null for empty input */
  validatePhone(raw: string): Promise<PhoneResult | null>;
}

export interface InvestigatorClients {
  registry: RegistryClient;
  geocoder: GeocodingClient;
  phoneValidator: PhoneValidationClient;
  search: WebSearchAggregator;
}
