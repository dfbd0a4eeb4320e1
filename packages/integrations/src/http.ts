import type { z } from "zod";
import { CollaboratorError } from "@provider-verify/contracts";

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export const USER_AGENT = "Mozilla/5.0 (compatible; ProviderVerify/1.0)";

/**
 * Fetch a URL and return the body text, raising CollaboratorError for
 * transport failures, timeouts and non-2xx responses. The request is bounded
 * by `timeoutMs` even when the caller passes its own signal.
 */
export async function fetchText(
  collaborator: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      ...init,
      signal: signal ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]) : AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
      throw new CollaboratorError(collaborator, `${collaborator} request aborted: ${error.message}`, undefined, {
        cause: error,
      });
    }
    throw new CollaboratorError(
      collaborator,
      `${collaborator} request failed: ${error instanceof Error ? error.message : "Unknown error"}`,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    throw new CollaboratorError(
      collaborator,
      `${collaborator} API error (${response.status}): ${errorText.slice(0, 200) || response.statusText}`,
      response.status
    );
  }

  return response.text();
}

/**
 * Fetch a URL and validate its JSON body against a schema
 */
export async function fetchJson<S extends z.ZodTypeAny>(
  collaborator: string,
  url: string,
  init: RequestInit,
  schema: S,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<z.infer<S>> {
  const body = await fetchText(collaborator, url, init, timeoutMs, signal);

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new CollaboratorError(collaborator, `${collaborator} returned malformed JSON`, undefined, {
      cause: error,
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new CollaboratorError(
      collaborator,
      `${collaborator} response did not match the expected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`
    );
  }
  return parsed.data;
}

/**
 * PROVIDER_VERIFY_TIMEOUT_MS as a positive number, else undefined
 */
export function timeoutFromEnv(): number | undefined {
  const timeout = Number(process.env.PROVIDER_VERIFY_TIMEOUT_MS);
  return Number.isFinite(timeout) && timeout > 0 ? timeout : undefined;
}
