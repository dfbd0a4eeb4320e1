import type { InvestigationContext } from "@provider-verify/contracts";

import { classifyFootprint } from "../footprint.js";
import type { FootprintRules } from "../footprint.js";
import { addressConfirmationQuery, footprintQuery } from "../query-templates.js";
import type { WebSearchOutcome } from "../web-search.js";
import type { StepRuntime, VerificationStep } from "./step.js";

/**
 * Search the web for the provider and categorize what comes back.
 * With a claimed address, also collect links tying the claim to it.
 */
export class WebPresenceStep implements VerificationStep {
  readonly name = "web-presence";

  constructor(private readonly rules?: FootprintRules) {}

  async execute(context: InvestigationContext, runtime: StepRuntime): Promise<void> {
    const record = context.registryRecord;
    if (!record) return;

    runtime.log("Initiating web presence search...");

    const name = context.displayName;
    const { city, state } = record;

    if (!name || !city || !state) {
      runtime.log("Insufficient data for web search (needs name, city and state); skipped.", "skipped");
    } else {
      const query = footprintQuery(name, city, state);
      const outcome = await this.runSearch(runtime, query, runtime.config.footprintMaxResults);

      if (outcome) {
        const footprint = classifyFootprint(outcome.hits, this.rules);
        context.webFootprint = footprint;

        if (footprint.officialSite) {
          runtime.log(`Found official website: ${footprint.officialSite}`, "evidence");
        }

        const socialCount = footprint.socialMedia.length;
        const directoryCount = footprint.directories.length;
        if (!footprint.officialSite && socialCount === 0 && directoryCount === 0) {
          runtime.log(
            `Web search returned no profiles (${footprint.otherMentions.length} other mention(s)).`,
            "warning",
            { footprint }
          );
        } else {
          runtime.log(
            `Web search complete. Found ${socialCount} social profile(s) and ${directoryCount} directory listing(s).`,
            "evidence",
            { footprint }
          );
        }
      }
    }

    const claimedAddress = context.claimed.address;
    if (!claimedAddress) return;

    const subject = context.claimed.name ?? name;
    if (!subject) {
      runtime.log("Address confirmation search skipped: no name to pair with the claimed address.", "skipped");
      return;
    }

    const query = addressConfirmationQuery(subject, claimedAddress);
    const outcome = await this.runSearch(
      runtime,
      query,
      runtime.config.addressConfirmationMaxResults
    );
    if (!outcome) return;

    context.addressConfirmationLinks = outcome.hits.map((hit) => hit.url);
    runtime.log(
      `Address confirmation search found ${outcome.hits.length} link(s) for '${claimedAddress}'.`,
      outcome.hits.length > 0 ? "evidence" : "warning",
      { links: context.addressConfirmationLinks }
    );
  }

  /**
   * Run a search and log provider failures. Resolves to null when every
   * provider failed, so the caller leaves its field unset.
   */
  private async runSearch(
    runtime: StepRuntime,
    query: string,
    maxResults: number
  ): Promise<WebSearchOutcome | null> {
    runtime.log(`Searching: "${query}"`);

    const outcome = await runtime.clients.search.searchWithTrace(query, maxResults, {
      timeoutMs: runtime.config.collaboratorTimeoutMs,
    });

    for (const failure of outcome.failures) {
      runtime.log(`Search provider ${failure.provider} failed: ${failure.error}`, "error");
    }

    if (
      outcome.attempted.length > 0 &&
      outcome.failures.length === outcome.attempted.length
    ) {
      runtime.log("Web search unavailable: every provider failed.", "error");
      return null;
    }

    if (outcome.provider) {
      runtime.log(`${outcome.provider} returned ${outcome.hits.length} result(s).`);
    }
    return outcome;
  }
}
