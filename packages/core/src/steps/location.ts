import type { InvestigationContext } from "@provider-verify/contracts";
import { describeError } from "@provider-verify/contracts";

import type { StepRuntime, VerificationStep } from "./step.js";

export class LocationVerificationStep implements VerificationStep {
  readonly name = "location";

  async execute(context: InvestigationContext, runtime: StepRuntime): Promise<void> {
    const record = context.registryRecord;
    if (!record) return;

    const address = record.address?.trim();
    if (!address) {
      runtime.log("No registry address to verify; location check skipped.", "skipped");
      return;
    }

    runtime.log(`Verifying address '${address}'...`);

    try {
      const geo = await runtime.call("geocoder", (signal) =>
        runtime.clients.geocoder.geocode(address, signal)
      );
      context.geoResult = geo;

      if (geo) {
        runtime.log(`Address located. Match: ${geo.matchType}`, "evidence", { geo });
      } else {
        runtime.log("Address could not be located.", "warning");
      }
    } catch (error) {
      context.geoResult = null;
      runtime.log(`Geocoder error: ${describeError(error)}`, "error");
    }
  }
}
