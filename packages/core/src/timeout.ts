import { CollaboratorTimeoutError } from "@provider-verify/contracts";

/**
 * Run a collaborator call with a deadline.
 *
 * The operation receives an AbortSignal that fires when the deadline passes,
 * so HTTP clients can cancel the underlying request. The returned promise
 * rejects with CollaboratorTimeoutError at the deadline even if the
 * operation ignores the signal.
 */
export async function withTimeout<T>(
  collaborator: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
