// ============================================================================
// Collaborator Errors
// ============================================================================

/**
 * Failure raised by an external collaborator (HTTP API, SDK, parser)
 */
export class CollaboratorError extends Error {
  constructor(
    /** Collaborator that failed, e.g. "NPI Registry" */
    readonly collaborator: string,
    message: string,
    /** HTTP status when the failure came from a response */
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CollaboratorError";
  }
}

/**
 * A collaborator call exceeded its time budget
 */
export class CollaboratorTimeoutError extends CollaboratorError {
  constructor(collaborator: string, readonly timeoutMs: number) {
    super(collaborator, `${collaborator} timed out after ${timeoutMs}ms`);
    this.name = "CollaboratorTimeoutError";
  }
}

/**
 * Render any thrown value as a single line for logs
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}
