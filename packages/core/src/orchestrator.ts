/**
 * Provider Investigator - staged verification pipeline
 *
 * Stage 1: Registry lookup (short-circuits on an unknown identifier)
 * Stage 2: Identity match against the claimed name
 * Stage 3: Location, contact and web presence, run concurrently
 * Finally: Assemble the report
 */

import type {
  ClaimedAttributes,
  InvestigationContext,
  InvestigationReport,
  InvestigatorConfig,
} from "@provider-verify/contracts";
import {
  DEFAULT_INVESTIGATOR_CONFIG,
  describeError,
} from "@provider-verify/contracts";

import type { InvestigatorClients } from "./clients.js";
import { createInvestigationContext } from "./context.js";
import type {
  EventCallback,
  InvestigationEventType,
} from "./events.js";
import { assembleReport } from "./report.js";
import { defaultStages } from "./steps/index.js";
import type { StepRuntime, VerificationStep } from "./steps/index.js";
import { withTimeout } from "./timeout.js";

// ============================================================================
// Orchestrator Class
// ============================================================================

export class ProviderInvestigator {
  private readonly config: InvestigatorConfig;
  private readonly clients: InvestigatorClients;
  private readonly onEvent?: EventCallback;
  private readonly stages: VerificationStep[][];

  constructor(
    clients: InvestigatorClients,
    config?: Partial<InvestigatorConfig>,
    onEvent?: EventCallback,
    stages: VerificationStep[][] = defaultStages()
  ) {
    this.clients = clients;
    this.config = {
      mismatchThreshold:
        config?.mismatchThreshold ?? DEFAULT_INVESTIGATOR_CONFIG.mismatchThreshold,
      footprintMaxResults:
        config?.footprintMaxResults ?? DEFAULT_INVESTIGATOR_CONFIG.footprintMaxResults,
      addressConfirmationMaxResults:
        config?.addressConfirmationMaxResults ??
        DEFAULT_INVESTIGATOR_CONFIG.addressConfirmationMaxResults,
      collaboratorTimeoutMs:
        config?.collaboratorTimeoutMs ?? DEFAULT_INVESTIGATOR_CONFIG.collaboratorTimeoutMs,
    };
    this.onEvent = onEvent;
    this.stages = stages;
  }

  /**
   * Emit an event to the callback if provided
   */
  private emit(
    type: InvestigationEventType,
    message: string,
    step?: string,
    data?: unknown
  ): void {
    this.onEvent?.({ type, step, message, data });
  }

  /**
   * Main entry point: run a full investigation.
   * Resolves to a report for every outcome; collaborator failures only
   * leave gaps in the evidence.
   */
  async investigate(
    identifier: string,
    claimed: ClaimedAttributes = {}
  ): Promise<InvestigationReport> {
    const context = createInvestigationContext(identifier, claimed);

    this.record(context, "status", `Starting investigation for identifier: ${context.targetIdentifier}`);

    for (const stage of this.stages) {
      if (context.status === "INVALID_IDENTIFIER") break;
      await this.runStage(context, stage);
    }

    if (context.status === "PENDING") {
      context.status = context.registryRecord ? "COMPLETE" : "INVALID_IDENTIFIER";
    }

    if (context.status === "COMPLETE") {
      this.record(context, "status", "Investigation complete.");
    }

    return assembleReport(context);
  }

  private record(
    context: InvestigationContext,
    type: InvestigationEventType,
    message: string
  ): void {
    context.auditLog.push(message);
    this.emit(type, message);
  }

  /**
   * Run one stage. Each step buffers its audit entries; buffers are
   * appended in declared step order once the whole stage has settled.
   */
  private async runStage(
    context: InvestigationContext,
    stage: VerificationStep[]
  ): Promise<void> {
    const entries = await Promise.all(
      stage.map((step) => this.runStep(context, step))
    );

    for (const stepEntries of entries) {
      context.auditLog.push(...stepEntries);
    }
  }

  private async runStep(
    context: InvestigationContext,
    step: VerificationStep
  ): Promise<string[]> {
    const entries: string[] = [];
    const timeoutMs = this.config.collaboratorTimeoutMs;

    const runtime: StepRuntime = {
      clients: this.clients,
      config: this.config,
      log: (message, type = "status", data) => {
        entries.push(message);
        this.emit(type, message, step.name, data);
      },
      call: (collaborator, operation) =>
        withTimeout(collaborator, timeoutMs, operation),
    };

    try {
      await step.execute(context, runtime);
    } catch (error) {
      runtime.log(`Step ${step.name} failed: ${describeError(error)}`, "error");
    }

    return entries;
  }
}
