import type { Footprint, SearchHit } from "@provider-verify/contracts";

export interface FootprintRules {
  /** Hosts (and their subdomains) counted as social profiles */
  socialDomains: readonly string[];
  /** Hosts (and their subdomains) counted as medical directories or review sites */
  directoryDomains: readonly string[];
  /** Substrings of a title or url that mark a candidate official site */
  officialKeywords: readonly string[];
}

export const DEFAULT_FOOTPRINT_RULES: FootprintRules = {
  socialDomains: [
    "linkedin.com",
    "instagram.com",
    "facebook.com",
    "twitter.com",
    "x.com",
    "youtube.com",
    "tiktok.com",
    "pinterest.com",
  ],
  directoryDomains: [
    "healthgrades.com",
    "webmd.com",
    "doximity.com",
    "vitals.com",
    "usnews.com",
    "yellowpages.com",
    "sharecare.com",
    "mapquest.com",
    "yelp.com",
    "zocdoc.com",
    "md.com",
  ],
  officialKeywords: [
    "clinic",
    "md",
    "associates",
    "heart",
    "care",
    "hospital",
    "health",
    "medical",
    "center",
    "system",
    "group",
    "dr",
    "physician",
    "surgery",
    "official",
    "home",
  ],
};

export type FootprintCategory = "social" | "directory" | "official" | "other";

const SCHEME = /^[a-z][a-z\d+.-]*:/i;

/**
 * Lower-cased host of a url; bare "host/path" urls are read as https
 */
function hostOf(url: string): string | null {
  const candidates = SCHEME.test(url) ? [url] : [url, `https://${url}`];

  for (const candidate of candidates) {
    try {
      const host = new URL(candidate).hostname.toLowerCase();
      if (host) return host;
    } catch {
      continue;
    }
  }
  return null;
}

function hostMatches(host: string | null, domains: readonly string[]): boolean {
  if (!host) return false;
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

export function emptyFootprint(): Footprint {
  return {
    officialSite: null,
    socialMedia: [],
    directories: [],
    otherMentions: [],
  };
}

/**
 * Sort search hits into official site / social / directories / other.
 *
 * Hits are taken in input order and each goes to the first category it
 * qualifies for. Only the first official-keyword hit becomes the official
 * site; later ones fall through to other mentions. Hits without a url are
 * dropped and a url already placed is not placed again.
 */
export function classifyFootprint(
  hits: readonly SearchHit[],
  rules: FootprintRules = DEFAULT_FOOTPRINT_RULES
): Footprint {
  const footprint = emptyFootprint();
  const placed = new Set<string>();

  for (const hit of hits) {
    const url = hit.url?.trim();
    if (!url || placed.has(url)) continue;
    placed.add(url);

    switch (categorize(hit, footprint.officialSite === null, rules)) {
      case "social":
        footprint.socialMedia.push(url);
        break;
      case "directory":
        footprint.directories.push(url);
        break;
      case "official":
        footprint.officialSite = url;
        break;
      case "other":
        footprint.otherMentions.push(url);
        break;
    }
  }

  return footprint;
}

/**
 * Category for a single hit, given whether the official slot is still open
 */
export function categorize(
  hit: SearchHit,
  officialSlotOpen: boolean,
  rules: FootprintRules = DEFAULT_FOOTPRINT_RULES
): FootprintCategory {
  const host = hostOf(hit.url);

  if (hostMatches(host, rules.socialDomains)) {
    return "social";
  }
  if (hostMatches(host, rules.directoryDomains)) {
    return "directory";
  }

  if (officialSlotOpen) {
    const url = hit.url.toLowerCase();
    const title = (hit.title ?? "").toLowerCase();
    if (rules.officialKeywords.some((kw) => title.includes(kw) || url.includes(kw))) {
      return "official";
    }
  }

  return "other";
}
