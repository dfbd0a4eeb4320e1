import type {
  ClaimedAttributes,
  InvestigationContext,
} from "@provider-verify/contracts";

/**
 * Fresh context for one investigation. Claimed attributes are copied and
 * frozen; blank values are dropped.
 */
export function createInvestigationContext(
  identifier: string,
  claimed: ClaimedAttributes = {}
): InvestigationContext {
  const claims: ClaimedAttributes = {};
  if (claimed.name?.trim()) claims.name = claimed.name.trim();
  if (claimed.address?.trim()) claims.address = claimed.address.trim();
  if (claimed.phone?.trim()) claims.phone = claimed.phone.trim();

  return {
    targetIdentifier: identifier.trim(),
    claimed: Object.freeze(claims),
    status: "PENDING",
    registryRecord: null,
    displayName: null,
    matchResult: null,
    geoResult: null,
    phoneResult: null,
    claimedPhoneResult: null,
    webFootprint: null,
    addressConfirmationLinks: null,
    auditLog: [],
  };
}
