import { ContactVerificationStep } from "./contact.js";
import { IdentityMatchStep } from "./identity-match.js";
import { LocationVerificationStep } from "./location.js";
import { RegistryLookupStep } from "./registry-lookup.js";
import type { VerificationStep } from "./step.js";
import { WebPresenceStep } from "./web-presence.js";

export { ContactVerificationStep } from "./contact.js";
export { IdentityMatchStep } from "./identity-match.js";
export { LocationVerificationStep } from "./location.js";
export { RegistryLookupStep } from "./registry-lookup.js";
export { WebPresenceStep } from "./web-presence.js";
export { formatPercent } from "./step.js";
export type { StepRuntime, VerificationStep } from "./step.js";

/**
 * Stages run in order; steps inside a stage run concurrently.
 *
 * Location, contact and web presence read only the registry record, the
 * display name and the claims, and each writes its own context fields.
 */
export function defaultStages(): VerificationStep[][] {
  return [
    [new RegistryLookupStep()],
    [new IdentityMatchStep()],
    [
      new LocationVerificationStep(),
      new ContactVerificationStep(),
      new WebPresenceStep(),
    ],
  ];
}

/**
 * The same steps, one per stage
 */
export function sequentialStages(): VerificationStep[][] {
  return defaultStages().flat().map((step) => [step]);
}
