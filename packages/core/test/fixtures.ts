import type {
  IndividualRecord,
  OrganizationRecord,
} from "@provider-verify/contracts";

export function individualRecord(overrides: Partial<IndividualRecord> = {}): IndividualRecord {
  return {
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
    ...overrides,
  };
}

export function organizationRecord(overrides: Partial<OrganizationRecord> = {}): OrganizationRecord {
  return {
    kind: "organization",
    identifier: "1000000012",
    organizationName: "PROVIDENCE HOSPITAL",
    address: "6801 AIRPORT BLVD, MOBILE, AL 36608",
    city: "MOBILE",
    state: "AL",
    postalCode: "36608",
    phone: "251-633-1000",
    specialty: "General Acute Care Hospital",
    ...overrides,
  };
}
