import { z } from "zod";
import type { IdentityRecord } from "@provider-verify/contracts";

import { DEFAULT_FETCH_TIMEOUT_MS, USER_AGENT, fetchJson, timeoutFromEnv } from "../http.js";

/**
 * Configuration for the CMS NPI Registry client
 */
export interface NpiRegistryConfig {
  /** API root (default: https://npiregistry.cms.hhs.gov/api/) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

const NpiAddressSchema = z.object({
  address_purpose: z.string().optional(),
  address_1: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postal_code: z.string().optional(),
  telephone_number: z.string().optional(),
});

const NpiResultSchema = z.object({
  number: z.union([z.string(), z.number()]).optional(),
  basic: z
    .object({
      first_name: z.string().optional(),
      last_name: z.string().optional(),
      organization_name: z.string().optional(),
      credential: z.string().optional(),
    })
    .optional(),
  addresses: z.array(NpiAddressSchema).optional(),
  taxonomies: z
    .array(
      z.object({
        desc: z.string().optional(),
        primary: z.boolean().optional(),
      })
    )
    .optional(),
});

const NpiResponseSchema = z.object({
  result_count: z.number().optional(),
  results: z.array(NpiResultSchema).optional(),
  Errors: z.array(z.object({ description: z.string().optional() })).optional(),
});

export type NpiResult = z.infer<typeof NpiResultSchema>;

const NPI_PATTERN = /^\d{10}$/;

/**
 * Convert a registry result into an IdentityRecord.
 * Uses the LOCATION address and the primary taxonomy.
 */
export function toIdentityRecord(identifier: string, result: NpiResult): IdentityRecord {
  const basic = result.basic;
  const location = (result.addresses ?? []).find((a) => a.address_purpose === "LOCATION");

  const city = location?.city ?? "";
  const state = location?.state ?? "";
  const postalCode = (location?.postal_code ?? "").slice(0, 5);
  const address = location
    ? `${location.address_1 ?? ""}, ${city}, ${state} ${postalCode}`.trim()
    : null;

  const taxonomies = result.taxonomies ?? [];
  const primary = taxonomies.find((t) => t.primary === true) ?? taxonomies[0];
  const specialty = primary?.desc || "Unknown Specialty";

  const common = {
    identifier: result.number !== undefined ? String(result.number) : identifier,
    address,
    city,
    state,
    postalCode,
    phone: location?.telephone_number || null,
    specialty,
  };

  const organizationName = basic?.organization_name?.trim();
  if (organizationName) {
    return { kind: "organization", organizationName, ...common };
  }

  return {
    kind: "individual",
    firstName: basic?.first_name ?? "",
    lastName: basic?.last_name ?? "",
    credential: basic?.credential ?? "",
    ...common,
  };
}

/**
 * CMS NPI Registry (v2.1) client
 */
export class NpiRegistryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: NpiRegistryConfig = {}) {
    this.baseUrl = config.baseUrl ?? "https://npiregistry.cms.hhs.gov/api/";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  private async query(params: Record<string, string>, signal?: AbortSignal) {
    const search = new URLSearchParams({ ...params, version: "2.1" });
    return fetchJson(
      "NPI Registry",
      `${this.baseUrl}?${search.toString()}`,
      { headers: { "User-Agent": USER_AGENT, Accept: "application/json" } },
      NpiResponseSchema,
      this.timeoutMs,
      signal
    );
  }

  /**
   * Look up a provider by NPI.
   * @returns null when the NPI is malformed or unknown
   */
  async resolveIdentifier(identifier: string, signal?: AbortSignal): Promise<IdentityRecord | null> {
    const npi = identifier.trim();
    if (!NPI_PATTERN.test(npi)) {
      return null;
    }

    const data = await this.query({ number: npi }, signal);
    const first = data.results?.[0];
    if (!first) {
      return null;
    }

    return toIdentityRecord(npi, first);
  }

  /**
   * Find an NPI from a person's name and state.
   * Several matches resolve to the first one.
   */
  async searchByName(
    firstName: string,
    lastName: string,
    state: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    const data = await this.query(
      { first_name: firstName, last_name: lastName, state },
      signal
    );

    const results = data.results ?? [];
    if (results.length === 0 || results[0].number === undefined) {
      return null;
    }

    if (results.length > 1) {
      console.warn(
        `[Registry] ${results.length} matches for ${firstName} ${lastName} (${state}); using the first`
      );
    }

    return String(results[0].number);
  }
}

/**
 * Create an NpiRegistryClient from environment variables
 */
export function createNpiRegistryClient(): NpiRegistryClient {
  return new NpiRegistryClient({
    baseUrl: process.env.NPI_REGISTRY_URL,
    timeoutMs: timeoutFromEnv(),
  });
}
