import { describe, expect, it } from "vitest";

import {
  DEFAULT_FOOTPRINT_RULES,
  categorize,
  classifyFootprint,
  emptyFootprint,
} from "../src/footprint.js";

describe("categorize", () => {
  it("recognizes social hosts and their subdomains", () => {
    expect(categorize({ url: "https://www.linkedin.com/in/jsmith", title: "" }, true)).toBe("social");
    expect(categorize({ url: "https://x.com/providence", title: "" }, true)).toBe("social");
  });

  it("recognizes directory hosts before official keywords", () => {
    expect(
      categorize({ url: "https://www.healthgrades.com/physician/dr-john-smith", title: "Dr. John Smith, MD" }, true)
    ).toBe("directory");
  });

  it("matches hosts on label boundaries only", () => {
    expect(categorize({ url: "https://md.com/doctors", title: "" }, true)).toBe("directory");
    expect(categorize({ url: "https://notmd.com/page", title: "" }, false)).toBe("other");
  });

  it("claims the official slot on a keyword in title or url", () => {
    expect(categorize({ url: "https://example.org/about", title: "Mercy Clinic" }, true)).toBe("official");
    expect(categorize({ url: "https://mercyclinic.example.org", title: "" }, true)).toBe("official");
  });

  it("falls back to other once the official slot is taken", () => {
    expect(categorize({ url: "https://example.org/about", title: "Mercy Clinic" }, false)).toBe("other");
  });

  it("reads urls without a scheme as https", () => {
    expect(categorize({ url: "www.linkedin.com/in/jsmith", title: "" }, true)).toBe("social");
    expect(categorize({ url: "healthgrades.com/physician/dr-john-smith", title: "" }, true)).toBe("directory");
  });

  it("treats an unparseable url as having no host", () => {
    expect(categorize({ url: "not a url", title: "" }, true)).toBe("other");
  });
});

describe("classifyFootprint", () => {
  it("buckets a bare social url as social media", () => {
    expect(classifyFootprint([{ url: "www.linkedin.com/in/x", title: "" }])).toEqual({
      officialSite: null,
      socialMedia: ["www.linkedin.com/in/x"],
      directories: [],
      otherMentions: [],
    });
  });

  it("sorts hits into buckets in input order", () => {
    const footprint = classifyFootprint([
      { url: "https://www.facebook.com/providencehospital", title: "Providence Hospital | Facebook" },
      { url: "https://www.providencehospital.org/", title: "Providence Hospital | Mobile, AL" },
      { url: "https://www.healthgrades.com/hospital/providence", title: "Providence Hospital Ratings" },
      { url: "https://www.mercymedical.example.com/", title: "Mercy Medical" },
      { url: "https://news.example.org/story", title: "Local news" },
      { url: "https://www.yelp.com/biz/providence", title: "Providence - Yelp" },
    ]);

    expect(footprint).toEqual({
      officialSite: "https://www.providencehospital.org/",
      socialMedia: ["https://www.facebook.com/providencehospital"],
      directories: [
        "https://www.healthgrades.com/hospital/providence",
        "https://www.yelp.com/biz/providence",
      ],
      otherMentions: ["https://www.mercymedical.example.com/", "https://news.example.org/story"],
    });
  });

  it("places every url in exactly one bucket", () => {
    const hits = [
      { url: "https://www.instagram.com/a", title: "" },
      { url: "https://www.instagram.com/a", title: "" },
      { url: "https://example.org/clinic", title: "" },
      { url: "https://example.net/", title: "" },
      { url: "   ", title: "Clinic" },
    ];

    const footprint = classifyFootprint(hits);
    const placed = [
      ...(footprint.officialSite ? [footprint.officialSite] : []),
      ...footprint.socialMedia,
      ...footprint.directories,
      ...footprint.otherMentions,
    ];

    expect(placed.sort()).toEqual([
      "https://example.net/",
      "https://example.org/clinic",
      "https://www.instagram.com/a",
    ]);
  });

  it("returns an empty footprint for no hits", () => {
    expect(classifyFootprint([])).toEqual(emptyFootprint());
  });

  it("accepts custom rules", () => {
    const footprint = classifyFootprint(
      [{ url: "https://social.example/p", title: "" }],
      { ...DEFAULT_FOOTPRINT_RULES, socialDomains: ["social.example"] }
    );
    expect(footprint.socialMedia).toEqual(["https://social.example/p"]);
  });
});
