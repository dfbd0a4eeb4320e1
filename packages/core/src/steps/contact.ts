import type { InvestigationContext, PhoneResult } from "@provider-verify/contracts";
import { describeError } from "@provider-verify/contracts";

import type { StepRuntime, VerificationStep } from "./step.js";

/**
 * Validate the registry phone and, independently, the claimed phone
 */
export class ContactVerificationStep implements VerificationStep {
  readonly name = "contact";

  async execute(context: InvestigationContext, runtime: StepRuntime): Promise<void> {
    const record = context.registryRecord;
    if (!record) return;

    context.phoneResult = await this.validate(runtime, "Registry", record.phone);
    context.claimedPhoneResult = await this.validate(runtime, "Claimed", context.claimed.phone);

    const official = context.phoneResult;
    const claimed = context.claimedPhoneResult;
    if (official?.valid && claimed?.valid) {
      if (official.e164 === claimed.e164) {
        runtime.log("Claimed phone matches the registry phone.", "evidence");
      } else {
        runtime.log(
          `Claimed phone ${claimed.formatted} differs from registry phone ${official.formatted}.`,
          "warning"
        );
      }
    }
  }

  private async validate(
    runtime: StepRuntime,
    label: "Registry" | "Claimed",
    raw: string | null | undefined
  ): Promise<PhoneResult | null> {
    const phone = raw?.trim();
    if (!phone) {
      runtime.log(`${label} phone: none supplied; validation skipped.`, "skipped");
      return null;
    }

    runtime.log(`Validating ${label.toLowerCase()} phone '${phone}'...`);

    try {
      const result = await runtime.call("phone validator", () =>
        runtime.clients.phoneValidator.validatePhone(phone)
      );

      if (!result) {
        runtime.log(`${label} phone could not be validated.`, "warning");
      } else if (result.valid) {
        runtime.log(`${label} phone valid: ${result.formatted} (${result.areaLocation}).`, "evidence", {
          phone: result,
        });
      } else {
        runtime.log(`${label} phone failed validation: ${result.error}`, "warning");
      }
      return result;
    } catch (error) {
      runtime.log(`Phone validator error: ${describeError(error)}`, "error");
      return null;
    }
  }
}
