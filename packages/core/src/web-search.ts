import type { RawSearchHit, SearchHit } from "@provider-verify/contracts";
import {
  DEFAULT_INVESTIGATOR_CONFIG,
  describeError,
} from "@provider-verify/contracts";

import { withTimeout } from "./timeout.js";

// ============================================================================
// Provider Strategy
// ============================================================================

/**
 * A single web search backend (Google Programmable Search, DuckDuckGo, ...)
 */
export interface SearchProvider {
  readonly name: string;
  search(
    query: string,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<RawSearchHit[]>;
}

export interface ProviderFailure {
  provider: string;
  error: string;
}

export interface WebSearchOutcome {
  hits: SearchHit[];
  /** Provider that produced the hits, null when none did */
  provider: string | null;
  /** Providers that threw, in attempt order */
  failures: ProviderFailure[];
  /** Providers attempted, in order */
  attempted: string[];
}

export interface WebSearchOptions {
  /** Per-provider deadline in milliseconds */
  timeoutMs?: number;
}

function textField(item: object, key: "url" | "title"): string {
  const value: unknown = Reflect.get(item, key);
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Trim provider hits into {url, title}, dropping hits without a string url.
 * Items that are not objects are skipped.
 */
export function normalizeHits(raw: readonly unknown[]): SearchHit[] {
  const hits: SearchHit[] = [];

  for (const item of raw) {
    if (typeof item !== "object" || item === null) {
      continue;
    }
    const url = textField(item, "url");
    if (!url) {
      continue;
    }
    hits.push({ url, title: textField(item, "title") });
  }

  return hits;
}

// ============================================================================
// Aggregator
// ============================================================================

/**
 * Ordered fallback across search providers.
 *
 * Providers are tried one at a time; the first one that returns at least one
 * usable hit wins. A provider that throws or times out counts as zero hits.
 * Never rejects.
 */
export class WebSearchAggregator {
  private readonly providers: readonly SearchProvider[];
  private readonly timeoutMs: number;

  constructor(providers: SearchProvider[], options: WebSearchOptions = {}) {
    this.providers = [...providers];
    this.timeoutMs =
      options.timeoutMs ?? DEFAULT_INVESTIGATOR_CONFIG.collaboratorTimeoutMs;
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  /**
   * Search and return at most `maxResults` normalized hits (possibly none)
   */
  async search(
    query: string,
    maxResults: number,
    options?: WebSearchOptions
  ): Promise<SearchHit[]> {
    const outcome = await this.searchWithTrace(query, maxResults, options);
    return outcome.hits;
  }

  /**
   * Same as search(), also reporting which providers were tried and why
   * they failed
   */
  async searchWithTrace(
    query: string,
    maxResults: number,
    options?: WebSearchOptions
  ): Promise<WebSearchOutcome> {
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    const failures: ProviderFailure[] = [];
    const attempted: string[] = [];

    if (maxResults <= 0) {
      return { hits: [], provider: null, failures, attempted };
    }

    for (const provider of this.providers) {
      attempted.push(provider.name);

      let hits: SearchHit[];
      try {
        const raw: unknown = await withTimeout(provider.name, timeoutMs, (signal) =>
          provider.search(query, maxResults, signal)
        );
        hits = normalizeHits(Array.isArray(raw) ? raw : []);
      } catch (error) {
        failures.push({ provider: provider.name, error: describeError(error) });
        continue;
      }

      if (hits.length > 0) {
        return {
          hits: hits.slice(0, maxResults),
          provider: provider.name,
          failures,
          attempted,
        };
      }
    }

    return { hits: [], provider: null, failures, attempted };
  }
}
