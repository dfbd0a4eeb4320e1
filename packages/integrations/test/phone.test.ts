import { describe, expect, it } from "vitest";

import { PhoneValidator } from "../src/phone/validator.js";

const validator = new PhoneValidator();

describe("PhoneValidator", () => {
  it("formats a valid US number", () => {
    expect(validator.validate("(251) 435-7000")).toEqual({
      valid: true,
      original: "(251) 435-7000",
      formatted: "(251) 435-7000",
      e164: "+12514357000",
      areaLocation: "United States, area code 251",
    });
  });

  it("accepts messy and international input for the same number", () => {
    expect(validator.validate("251.435.7000")).toMatchObject({ valid: true, e164: "+12514357000" });
    expect(validator.validate("+1 251 435 7000")).toMatchObject({ valid: true, e164: "+12514357000" });
  });

  it("rejects a number that cannot exist", () => {
    expect(validator.validate("12345")).toMatchObject({ valid: false, original: "12345" });
  });

  it("reports parse errors for text without digits", () => {
    const result = validator.validate("call the front desk");
    expect(result?.valid).toBe(false);
    expect(result && !result.valid ? result.error : "").toMatch(/^Parse Error: /);
  });

  it("returns null for empty input", async () => {
    expect(validator.validate("")).toBeNull();
    expect(await validator.validatePhone("   ")).toBeNull();
  });
});
