// ============================================================================
// Event Types for Progress Callbacks
// ============================================================================

export type InvestigationEventType =
  | "status"
  | "evidence"
  | "warning"
  | "skipped"
  | "error";

export interface InvestigationEvent {
  type: InvestigationEventType;
  /** Step that emitted the event, absent for orchestrator messages */
  step?: string;
  message: string;
  data?: unknown;
}

export type EventCallback = (event: InvestigationEvent) => void;
