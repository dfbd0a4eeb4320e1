import * as cheerio from "cheerio";
import type { RawSearchHit } from "@provider-verify/contracts";

import { DEFAULT_FETCH_TIMEOUT_MS, fetchText } from "../http.js";

export interface DuckDuckGoConfig {
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Browser-like User-Agent; the HTML endpoint rejects obvious bots */
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Resolve DuckDuckGo redirect links ("//duckduckgo.com/l/?uddg=...") to the
 * target url. Other links are returned absolute.
 */
export function unwrapResultLink(href: string): string {
  const trimmed = href.trim();
  if (!trimmed) return "";

  let url: URL;
  try {
    url = new URL(trimmed, "https://duckduckgo.com");
  } catch {
    return "";
  }

  if (url.hostname.endsWith("duckduckgo.com") && url.pathname === "/l/") {
    return url.searchParams.get("uddg") ?? "";
  }
  return url.toString();
}

/**
 * Extract result anchors from a DuckDuckGo HTML results page
 */
export function parseResultsPage(html: string): RawSearchHit[] {
  const $ = cheerio.load(html);
  const hits: RawSearchHit[] = [];

  $("a.result__a").each((_, el) => {
    const url = unwrapResultLink($(el).attr("href") ?? "");
    if (!url) return;
    hits.push({ url, title: $(el).text().trim() });
  });

  return hits;
}

/**
 * Scrapes the DuckDuckGo HTML endpoint. Used as the fallback provider.
 */
export class DuckDuckGoClient {
  readonly name = "DuckDuckGo";

  private readonly timeoutMs: number;
  private readonly userAgent: string;

  private static readonly ENDPOINT = "https://html.duckduckgo.com/html/";

  constructor(config: DuckDuckGoConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<RawSearchHit[]> {
    const html = await fetchText(
      "DuckDuckGo",
      DuckDuckGoClient.ENDPOINT,
      {
        method: "POST",
        headers: {
          "User-Agent": this.userAgent,
          Referer: "https://duckduckgo.com/",
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ q: query }).toString(),
      },
      this.timeoutMs,
      signal
    );

    const hits = parseResultsPage(html);
    if (hits.length === 0) {
      console.warn(`[Search] DuckDuckGo: no result anchors for "${query.slice(0, 50)}"`);
    }
    return hits.slice(0, maxResults);
  }
}
