import { z } from "zod";
import type { AddressComponents, GeoMatchType, GeoResult } from "@provider-verify/contracts";

import { DEFAULT_FETCH_TIMEOUT_MS, fetchJson, timeoutFromEnv } from "../http.js";

/**
 * Configuration for the OpenStreetMap Nominatim geocoder
 */
export interface NominatimConfig {
  /** Identifying User-Agent, required by the Nominatim usage policy */
  userAgent: string;
  /** API root (default: https://nominatim.openstreetmap.org) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

const NominatimPlaceSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string().optional(),
  address: z
    .object({
      house_number: z.string().optional(),
      road: z.string().optional(),
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      state: z.string().optional(),
      postcode: z.string().optional(),
    })
    .optional(),
});

const NominatimResponseSchema = z.array(NominatimPlaceSchema);

export type NominatimPlace = z.infer<typeof NominatimPlaceSchema>;

/**
 * Map a Nominatim place to a GeoResult. PARTIAL matches never carry a street.
 */
export function toGeoResult(place: NominatimPlace, matchType: GeoMatchType): GeoResult {
  const address = place.address;
  const road = address?.road ?? "";
  const street = road ? `${address?.house_number ?? ""} ${road}`.trim() : null;

  const components: AddressComponents = {
    street: matchType === "EXACT" ? street : null,
    city: address?.city ?? address?.town ?? address?.village ?? null,
    state: address?.state ?? null,
    zip: address?.postcode ?? null,
  };

  return {
    lat: place.lat,
    lon: place.lon,
    displayName: place.display_name ?? "",
    matchType,
    components,
  };
}

/**
 * "123 Main St, Springfield, IL 62704" -> "Springfield, IL 62704".
 * Returns null when the address has fewer than two comma-separated parts.
 */
export function cityStateFallback(address: string): string | null {
  const parts = address.split(",");
  if (parts.length < 2) return null;
  return `${parts[parts.length - 2].trim()}, ${parts[parts.length - 1].trim()}`;
}

/**
 * Geocodes addresses with Nominatim, falling back to a city/state query
 */
export class NominatimGeocoder {
  private readonly userAgent: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: NominatimConfig) {
    this.userAgent = config.userAgent;
    this.baseUrl = config.baseUrl ?? "https://nominatim.openstreetmap.org";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  private async lookup(query: string, signal?: AbortSignal): Promise<NominatimPlace | null> {
    const params = new URLSearchParams({
      q: query,
      format: "jsonv2",
      addressdetails: "1",
      limit: "1",
    });

    const places = await fetchJson(
      "Nominatim",
      `${this.baseUrl}/search?${params.toString()}`,
      { headers: { "User-Agent": this.userAgent, Accept: "application/json" } },
      NominatimResponseSchema,
      this.timeoutMs,
      signal
    );

    return places[0] ?? null;
  }

  /**
   * Geocode a full address.
   * @returns null when neither the address nor its city/state resolve
   */
  async geocode(address: string, signal?: AbortSignal): Promise<GeoResult | null> {
    const exact = await this.lookup(address, signal);
    if (exact) {
      return toGeoResult(exact, "EXACT");
    }

    const fallback = cityStateFallback(address);
    if (!fallback) {
      return null;
    }

    console.log(`[Geocoder] Exact match failed; retrying with '${fallback}'`);
    const partial = await this.lookup(fallback, signal);
    return partial ? toGeoResult(partial, "PARTIAL") : null;
  }
}

/**
 * Create a NominatimGeocoder from environment variables
 */
export function createNominatimGeocoder(): NominatimGeocoder {
  return new NominatimGeocoder({
    userAgent: process.env.NOMINATIM_USER_AGENT || "provider-verify/1.0",
    timeoutMs: timeoutFromEnv(),
  });
}
