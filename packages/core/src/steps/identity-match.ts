import type { InvestigationContext } from "@provider-verify/contracts";

import { displayName, matchIdentity } from "../identity-match.js";
import { normalizeText } from "../normalize.js";
import { formatPercent } from "./step.js";
import type { StepRuntime, VerificationStep } from "./step.js";

/**
 * Compare the claimed name with the registry name and settle the display
 * name later steps search with. A mismatch is flagged, never fatal.
 */
export class IdentityMatchStep implements VerificationStep {
  readonly name = "identity-match";

  async execute(context: InvestigationContext, runtime: StepRuntime): Promise<void> {
    const record = context.registryRecord;
    if (!record) return;

    const claimedName = context.claimed.name;
    const registryName = displayName(record);
    context.displayName = registryName || claimedName || null;

    const result = matchIdentity(claimedName, record, runtime.config.mismatchThreshold);
    context.matchResult = result;

    if (!result) {
      const reason = normalizeText(claimedName)
        ? "registry record has no name"
        : "no claimed name supplied";
      runtime.log(`Name check skipped: ${reason}.`, "skipped");
      return;
    }

    const percent = formatPercent(result.similarity);
    if (result.isMismatch) {
      runtime.log(
        `WARNING: Identity mismatch! Claimed name (${result.comparedNames.claimed}) vs registry (${result.comparedNames.registry}) is a ${percent} match.`,
        "warning",
        { matchResult: result }
      );
    } else {
      runtime.log(`Name match confirmed (${percent}).`, "evidence", { matchResult: result });
    }
  }
}
