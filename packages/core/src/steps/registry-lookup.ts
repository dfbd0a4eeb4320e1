import type { IdentityRecord, InvestigationContext } from "@provider-verify/contracts";
import { describeError } from "@provider-verify/contracts";

import { displayName } from "../identity-match.js";
import type { StepRuntime, VerificationStep } from "./step.js";

/**
 * Resolve the identifier to a registry record.
 * No record ends the investigation with INVALID_IDENTIFIER.
 */
export class RegistryLookupStep implements VerificationStep {
  readonly name = "registry-lookup";

  async execute(context: InvestigationContext, runtime: StepRuntime): Promise<void> {
    const identifier = context.targetIdentifier;
    runtime.log(`Querying provider registry for identifier ${identifier}...`);

    let record: IdentityRecord | null = null;
    try {
      record = await runtime.call("registry", (signal) =>
        runtime.clients.registry.resolveIdentifier(identifier, signal)
      );
    } catch (error) {
      runtime.log(`Registry lookup failed: ${describeError(error)}`, "error");
    }

    if (!record) {
      context.registryRecord = null;
      context.status = "INVALID_IDENTIFIER";
      runtime.log("Identifier not found or invalid; investigation stopped.", "warning");
      return;
    }

    context.registryRecord = record;
    runtime.log(`Registry record found for ${displayName(record)}`, "evidence", { record });
  }
}
