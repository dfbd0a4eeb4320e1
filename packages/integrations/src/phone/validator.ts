import { ParseError, parsePhoneNumberWithError } from "libphonenumber-js";
import type { CountryCode, PhoneNumber } from "libphonenumber-js";
import type { PhoneResult } from "@provider-verify/contracts";

export interface PhoneValidatorConfig {
  /** Region assumed for numbers written without a country code (default: US) */
  defaultRegion?: CountryCode;
}

const regionNames = new Intl.DisplayNames(["en"], { type: "region" });

/**
 * English description of where a number is registered.
 * North American numbers also name their area code.
 */
export function describeLocation(phone: PhoneNumber): string {
  const region = phone.country ? regionNames.of(phone.country) ?? phone.country : "Unknown region";

  if (phone.countryCallingCode === "1") {
    return `${region}, area code ${phone.nationalNumber.slice(0, 3)}`;
  }
  return region;
}

/**
 * Parses and validates phone numbers with libphonenumber-js
 */
export class PhoneValidator {
  private readonly defaultRegion: CountryCode;

  constructor(config: PhoneValidatorConfig = {}) {
    this.defaultRegion = config.defaultRegion ?? "US";
  }

  /**
   * Validate synchronously.
   * @returns null for empty input
   */
  validate(raw: string): PhoneResult | null {
    if (!raw.trim()) {
      return null;
    }

    let phone: PhoneNumber;
    try {
      phone = parsePhoneNumberWithError(raw, this.defaultRegion);
    } catch (error) {
      if (error instanceof ParseError) {
        return { valid: false, original: raw, error: `Parse Error: ${error.message}` };
      }
      return {
        valid: false,
        original: raw,
        error: `Unexpected Error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (!phone.isValid()) {
      return { valid: false, original: raw, error: "Invalid structure or non-existent number" };
    }

    return {
      valid: true,
      original: raw,
      formatted: phone.formatNational(),
      e164: phone.number,
      areaLocation: describeLocation(phone),
    };
  }

  async validatePhone(raw: string): Promise<PhoneResult | null> {
    return this.validate(raw);
  }
}
