import type { IdentityRecord, MatchResult } from "@provider-verify/contracts";
import { DEFAULT_INVESTIGATOR_CONFIG } from "@provider-verify/contracts";

import { normalizeText } from "./normalize.js";
import { sequenceRatio } from "./sequence-matcher.js";

/**
 * Registry display name: organization name, else "{first} {last}" trimmed
 */
export function displayName(record: IdentityRecord): string {
  if (record.kind === "organization") {
    return record.organizationName.trim();
  }
  return `${record.firstName} ${record.lastName}`.trim();
}

/**
 * Compare a claimed name against a registry record.
 *
 * Returns null when there is nothing to compare (no record, or either name
 * empty after normalization). A null result means "no claim checked", which
 * callers must keep apart from a confirmed match.
 */
export function matchIdentity(
  claimedName: string | null | undefined,
  record: IdentityRecord | null | undefined,
  threshold: number = DEFAULT_INVESTIGATOR_CONFIG.mismatchThreshold
): MatchResult | null {
  if (!record || !claimedName) {
    return null;
  }

  const registryName = displayName(record);
  const claimedNormalized = normalizeText(claimedName);
  const registryNormalized = normalizeText(registryName);

  if (!claimedNormalized || !registryNormalized) {
    return null;
  }

  const similarity = sequenceRatio(claimedNormalized, registryNormalized);

  return {
    similarity,
    isMismatch: similarity < threshold,
    comparedNames: {
      claimed: claimedName,
      registry: registryName,
    },
  };
}
