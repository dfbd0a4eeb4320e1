// ============================================================================
// Registry Types (NPI Registry)
// ============================================================================

/**
 * Fields shared by every registry record, regardless of naming form
 */
interface IdentityRecordBase {
  /** Registry identifier (10-digit NPI) */
  identifier: string;
  /** Formatted practice location: "{line1}, {city}, {state} {zip}" */
  address: string | null;
  city: string;
  state: string;
  postalCode: string;
  /** Practice phone as published by the registry */
  phone: string | null;
  /** Primary taxonomy description */
  specialty: string;
}

export interface IndividualRecord extends IdentityRecordBase {
  kind: "individual";
  firstName: string;
  lastName: string;
  /** Credential text, e.g. "M.D." */
  credential: string;
}

export interface OrganizationRecord extends IdentityRecordBase {
  kind: "organization";
  organizationName: string;
}

/**
 * Normalized registry data. Exactly one naming form per record.
 */
export type IdentityRecord = IndividualRecord | OrganizationRecord;

// ============================================================================
// Claim Types
// ============================================================================

/**
 * Attributes asserted by an unverified source for the identity under review
 */
export interface ClaimedAttributes {
  name?: string;
  address?: string;
  phone?: string;
}

/**
 * Claim extracted from a scanned document (letterhead, card, PDF)
 */
export interface ProviderClaim {
  name: string;
  identifier?: string;
  address?: string;
  phone?: string;
  website?: string;
}

// ============================================================================
// Evidence Types
// ============================================================================

/**
 * Outcome of comparing a claimed name to the registry display name
 */
export interface MatchResult {
  /** Ratcliff/Obershelp ratio of the normalized names (0-1) */
  similarity: number;
  isMismatch: boolean;
  comparedNames: {
    claimed: string;
    registry: string;
  };
}

export type GeoMatchType = "EXACT" | "PARTIAL";

export interface AddressComponents {
  street: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
}

/**
 * Geocoder response for an address
 */
export interface GeoResult {
  lat: number;
  lon: number;
  /** Display name reported by the geocoder */
  displayName: string;
  /** EXACT when the full address resolved, PARTIAL for city/state fallback */
  matchType: GeoMatchType;
  components: AddressComponents;
}

export type PhoneResult =
  | {
      valid: true;
      original: string;
      /** National format, e.g. "(251) 555-0100" */
      formatted: string;
      e164: string;
      /** Region the number belongs to */
      areaLocation: string;
    }
  | {
      valid: false;
      original: string;
      error: string;
    };

// ============================================================================
// Web Search Types
// ============================================================================

/**
 * A normalized web search hit. `url` is never empty.
 */
export interface SearchHit {
  url: string;
  title: string;
}

/**
 * Search hit as returned by a provider, before normalization
 */
export interface RawSearchHit {
  url?: string | null;
  title?: string | null;
}

/**
 * Categorized web presence. Each url lands in exactly one bucket.
 */
export interface Footprint {
  officialSite: string | null;
  socialMedia: string[];
  directories: string[];
  otherMentions: string[];
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface InvestigatorConfig {
  /** Similarity below this is flagged as an identity mismatch (default: 0.6) */
  mismatchThreshold: number;
  /** Hits requested for the general footprint search (default: 15) */
  footprintMaxResults: number;
  /** Hits requested for the claimed-address search (default: 5) */
  addressConfirmationMaxResults: number;
  /** Upper bound for any single collaborator call (default: 20000) */
  collaboratorTimeoutMs: number;
}

export const DEFAULT_INVESTIGATOR_CONFIG: InvestigatorConfig = {
  mismatchThreshold: 0.6,
  footprintMaxResults: 15,
  addressConfirmationMaxResults: 5,
  collaboratorTimeoutMs: 20_000,
};

// ============================================================================
// Investigation State Types
// ============================================================================

export type InvestigationStatus = "PENDING" | "INVALID_IDENTIFIER" | "COMPLETE";

/**
 * Mutable state threaded through the verification steps of one investigation
 */
export interface InvestigationContext {
  readonly targetIdentifier: string;
  readonly claimed: Readonly<ClaimedAttributes>;
  status: InvestigationStatus;
  registryRecord: IdentityRecord | null;
  /** Best-available name for searching: registry display name, else the claim */
  displayName: string | null;
  matchResult: MatchResult | null;
  geoResult: GeoResult | null;
  phoneResult: PhoneResult | null;
  claimedPhoneResult: PhoneResult | null;
  webFootprint: Footprint | null;
  addressConfirmationLinks: string[] | null;
  /** Chronological audit trail */
  auditLog: string[];
}

// ============================================================================
// Result Types
// ============================================================================

export type OverallStatus = "INVALID_IDENTIFIER" | "COMPLETE" | "MISMATCH_WARNING";

export interface InvalidIdentifierReport {
  status: "INVALID_IDENTIFIER";
  auditLog: string[];
}

export interface CompletedReport {
  status: "COMPLETE";
  /** Presentational refinement of `status` */
  overallStatus: Exclude<OverallStatus, "INVALID_IDENTIFIER">;
  identifier: string;
  registryRecord: IdentityRecord;
  matchResult: MatchResult | null;
  geoResult: GeoResult | null;
  phoneResult: PhoneResult | null;
  claimedPhoneResult: PhoneResult | null;
  webFootprint: Footprint | null;
  addressConfirmationLinks: string[] | null;
  nameMismatch: boolean;
  auditLog: string[];
  /** ISO-8601 timestamp of report assembly */
  generatedAt: string;
}

/**
 * Result of a full investigation
 */
export type InvestigationReport = InvalidIdentifierReport | CompletedReport;

export {
  CollaboratorError,
  CollaboratorTimeoutError,
  describeError,
} from "./errors.js";
