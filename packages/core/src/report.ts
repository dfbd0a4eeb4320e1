import type {
  InvestigationContext,
  InvestigationReport,
  OverallStatus,
} from "@provider-verify/contracts";

/**
 * Project a finished context into the report handed back to callers.
 *
 * An investigation without a registry record yields only the status and the
 * audit trail; nothing else was verified.
 */
export function assembleReport(
  context: InvestigationContext,
  now: Date = new Date()
): InvestigationReport {
  const record = context.registryRecord;

  if (context.status === "INVALID_IDENTIFIER" || !record) {
    return {
      status: "INVALID_IDENTIFIER",
      auditLog: [...context.auditLog],
    };
  }

  const nameMismatch = context.matchResult?.isMismatch ?? false;

  return {
    status: "COMPLETE",
    overallStatus: nameMismatch ? "MISMATCH_WARNING" : "COMPLETE",
    identifier: context.targetIdentifier,
    registryRecord: record,
    matchResult: context.matchResult,
    geoResult: context.geoResult,
    phoneResult: context.phoneResult,
    claimedPhoneResult: context.claimedPhoneResult,
    webFootprint: context.webFootprint,
    addressConfirmationLinks: context.addressConfirmationLinks,
    nameMismatch,
    auditLog: [...context.auditLog],
    generatedAt: now.toISOString(),
  };
}

/**
 * Coarse status for display: invalid identifier, mismatch warning or complete
 */
export function overallStatus(report: InvestigationReport): OverallStatus {
  return report.status === "INVALID_IDENTIFIER"
    ? "INVALID_IDENTIFIER"
    : report.overallStatus;
}
