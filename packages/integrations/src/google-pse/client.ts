import { z } from "zod";
import type { RawSearchHit } from "@provider-verify/contracts";

import { DEFAULT_FETCH_TIMEOUT_MS, fetchJson, timeoutFromEnv } from "../http.js";

/**
 * Configuration for Google Programmable Search Engine client
 */
export interface GooglePSEConfig {
  /** Google API key with Custom Search enabled */
  apiKey: string;
  /** Programmable Search Engine ID (cx) */
  searchEngineId: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Raw response structure from Google Custom Search API
 */
const GoogleSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
      })
    )
    .optional(),
});

/**
 * Google Programmable Search Engine client for web results
 */
export class GooglePSEClient {
  readonly name = "Google";

  private readonly apiKey: string;
  private readonly searchEngineId: string;
  private readonly timeoutMs: number;

  private static readonly BASE_URL = "https://www.googleapis.com/customsearch/v1";
  /** The API returns at most 10 items per request */
  private static readonly PAGE_SIZE = 10;

  constructor(config: GooglePSEConfig) {
    this.apiKey = config.apiKey;
    this.searchEngineId = config.searchEngineId;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  /**
   * Search the web, paging until `maxResults` hits or the results run out
   * @param query - Search query string (e.g., "Providence Hospital Mobile AL")
   */
  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<RawSearchHit[]> {
    const hits: RawSearchHit[] = [];

    while (hits.length < maxResults) {
      const num = Math.min(GooglePSEClient.PAGE_SIZE, maxResults - hits.length);
      const params = new URLSearchParams({
        key: this.apiKey,
        cx: this.searchEngineId,
        q: query,
        num: String(num),
        start: String(hits.length + 1),
      });

      const data = await fetchJson(
        "Google PSE",
        `${GooglePSEClient.BASE_URL}?${params.toString()}`,
        { headers: { Accept: "application/json" } },
        GoogleSearchResponseSchema,
        this.timeoutMs,
        signal
      );

      const page = this.parseResults(data);
      hits.push(...page);

      if (page.length < num) break;
    }

    return hits.slice(0, maxResults);
  }

  /**
   * Map raw items to hits. Items without a link are skipped.
   */
  private parseResults(data: z.infer<typeof GoogleSearchResponseSchema>): RawSearchHit[] {
    if (!data.items) {
      return [];
    }

    const results: RawSearchHit[] = [];

    for (const item of data.items) {
      if (!item.link) {
        continue;
      }

      results.push({
        url: item.link,
        title: item.title ?? "",
      });
    }

    return results;
  }
}

/**
 * Create a GooglePSEClient from environment variables
 */
export function createGooglePSEClient(): GooglePSEClient {
  const apiKey = process.env.GOOGLE_API_KEY;
  const searchEngineId = process.env.GOOGLE_CX;

  if (!apiKey) {
    throw new Error("GOOGLE_API_KEY environment variable is required");
  }
  if (!searchEngineId) {
    throw new Error("GOOGLE_CX environment variable is required");
  }

  return new GooglePSEClient({
    apiKey,
    searchEngineId,
    timeoutMs: timeoutFromEnv(),
  });
}
