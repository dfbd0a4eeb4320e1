import type {
  InvestigationContext,
  InvestigatorConfig,
} from "@provider-verify/contracts";

import type { InvestigatorClients } from "../clients.js";
import type { InvestigationEventType } from "../events.js";

/**
 * What a step gets from the orchestrator besides the context
 */
export interface StepRuntime {
  readonly clients: InvestigatorClients;
  readonly config: InvestigatorConfig;
  /** Append to the audit log and emit a progress event */
  log(message: string, type?: InvestigationEventType, data?: unknown): void;
  /** Run a collaborator call under the configured deadline */
  call<T>(collaborator: string, operation: (signal: AbortSignal) => Promise<T>): Promise<T>;
}

/**
 * One unit of the investigation pipeline.
 *
 * A step reads and writes its own fields of the context. It catches its
 * collaborators' failures, logs them and leaves its fields null.
 */
export interface VerificationStep {
  readonly name: string;
  execute(context: InvestigationContext, runtime: StepRuntime): Promise<void>;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
