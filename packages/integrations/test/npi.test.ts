import { describe, expect, it, vi } from "vitest";
import { CollaboratorError } from "@provider-verify/contracts";

import { NpiRegistryClient, toIdentityRecord } from "../src/npi/client.js";
import { jsonResponse, requestedUrl, stubFetch, textResponse } from "./helpers.js";

const INDIVIDUAL_RESULT = {
  number: 1000000004,
  basic: { first_name: "JOHN", last_name: "SMITH", credential: "M.D." },
  addresses: [
    {
      address_purpose: "MAILING",
      address_1: "PO BOX 1",
      city: "SARALAND",
      state: "AL",
      postal_code: "365710001",
      telephone_number: "251-000-0000",
    },
    {
      address_purpose: "LOCATION",
      address_1: "100 MAIN ST",
      city: "MOBILE",
      state: "AL",
      postal_code: "366081234",
      telephone_number: "251-435-7000",
    },
  ],
  taxonomies: [
    { desc: "Family Medicine", primary: false },
    { desc: "Internal Medicine", primary: true },
  ],
};

describe("toIdentityRecord", () => {
  it("maps an individual using the practice location and primary taxonomy", () => {
    expect(toIdentityRecord("1000000004", INDIVIDUAL_RESULT)).toEqual({
      kind: "individual",
      identifier: "1000000004",
      firstName: "JOHN",
      lastName: "SMITH",
      credential: "M.D.",
      address: "100 MAIN ST, MOBILE, AL 36608",
      city: "MOBILE",
      state: "AL",
      postalCode: "36608",
      phone: "251-435-7000",
      specialty: "Internal Medicine",
    });
  });

  it("maps an organization and fills gaps", () => {
    expect(
      toIdentityRecord("1000000012", { basic: { organization_name: "PROVIDENCE HOSPITAL" } })
    ).toEqual({
      kind: "organization",
      identifier: "1000000012",
      organizationName: "PROVIDENCE HOSPITAL",
      address: null,
      city: "",
      state: "",
      postalCode: "",
      phone: null,
      specialty: "Unknown Specialty",
    });
  });

  it("falls back to the first taxonomy when none is primary", () => {
    const record = toIdentityRecord("1000000004", {
      ...INDIVIDUAL_RESULT,
      taxonomies: [{ desc: "Cardiology" }, { desc: "Pediatrics" }],
    });
    expect(record.specialty).toBe("Cardiology");
  });
});

describe("NpiRegistryClient", () => {
  it("resolves an identifier", async () => {
    const fetchMock = stubFetch(jsonResponse({ result_count: 1, results: [INDIVIDUAL_RESULT] }));
    const client = new NpiRegistryClient();

    const record = await client.resolveIdentifier(" 1000000004 ");

    expect(record?.kind).toBe("individual");
    expect(record?.identifier).toBe("1000000004");
    expect(requestedUrl(fetchMock)).toBe(
      "https://npiregistry.cms.hhs.gov/api/?number=1000000004&version=2.1"
    );
  });

  it("returns null for a malformed identifier without a request", async () => {
    const fetchMock = stubFetch();
    const client = new NpiRegistryClient();

    expect(await client.resolveIdentifier("12345")).toBeNull();
    expect(await client.resolveIdentifier("10000000AB")).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("returns null when the registry has no match", async () => {
    stubFetch(jsonResponse({ result_count: 0, results: [] }));
    expect(await new NpiRegistryClient().resolveIdentifier("0000000000")).toBeNull();
  });

  it("returns null for a registry error payload", async () => {
    stubFetch(jsonResponse({ Errors: [{ description: "CMS NPI Number is invalid" }] }));
    expect(await new NpiRegistryClient().resolveIdentifier("1234567890")).toBeNull();
  });

  it("rejects with a CollaboratorError on an HTTP failure", async () => {
    stubFetch(textResponse("Server error", 500));

    const pending = new NpiRegistryClient().resolveIdentifier("1000000004");

    await expect(pending).rejects.toBeInstanceOf(CollaboratorError);
    await expect(pending).rejects.toThrow("NPI Registry API error (500): Server error");
  });

  it("rejects on malformed JSON", async () => {
    stubFetch(textResponse("<html>maintenance</html>"));

    await expect(new NpiRegistryClient().resolveIdentifier("1000000004")).rejects.toThrow(
      "NPI Registry returned malformed JSON"
    );
  });

  it("finds an identifier by name and state", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchMock = stubFetch(
      jsonResponse({ results: [{ number: "1000000004" }, { number: "1000000020" }] })
    );

    const npi = await new NpiRegistryClient({ baseUrl: "https://registry.test/api/" }).searchByName(
      "John",
      "Smith",
      "AL"
    );

    expect(npi).toBe("1000000004");
    expect(requestedUrl(fetchMock)).toBe(
      "https://registry.test/api/?first_name=John&last_name=Smith&state=AL&version=2.1"
    );
    expect(warn).toHaveBeenCalledWith("[Registry] 2 matches for John Smith (AL); using the first");
  });

  it("returns null when a name search finds nobody", async () => {
    stubFetch(jsonResponse({ result_count: 0, results: [] }));
    expect(await new NpiRegistryClient().searchByName("Nobody", "Here", "AL")).toBeNull();
  });
});
