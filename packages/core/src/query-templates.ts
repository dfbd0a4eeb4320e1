/**
 * Query templates for web presence searches
 */

/**
 * General footprint query: who the provider is and where they practice
 */
export function footprintQuery(name: string, city: string, state: string): string {
  return `${name} ${city} ${state}`;
}

/**
 * Narrow query tying a claimed name to a claimed address.
 * Hits corroborate that the claimant operates at that address.
 */
export function addressConfirmationQuery(name: string, address: string): string {
  return `${name} ${address}`;
}
