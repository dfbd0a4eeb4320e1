import { describe, expect, it, vi } from "vitest";

import { DuckDuckGoClient, parseResultsPage, unwrapResultLink } from "../src/duckduckgo/client.js";
import { stubFetch, textResponse } from "./helpers.js";

const RESULTS_PAGE = `
<html><body>
  <div class="result">
    <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fwww.mercyclinic.example%2F&amp;rut=abc">Mercy <b>Clinic</b></a>
  </div>
  <div class="result">
    <a class="result__a" href="https://www.healthgrades.com/group-directory/mercy">Mercy Clinic - Healthgrades</a>
  </div>
  <div class="result">
    <a class="result__a" href="">Empty</a>
  </div>
  <a class="result__url" href="https://ignored.example/">ignored</a>
</body></html>
`;

describe("unwrapResultLink", () => {
  it("unwraps redirect links", () => {
    expect(unwrapResultLink("//duckduckgo.com/l/?uddg=https%3A%2F%2Fa.example%2Fpath%3Fx%3D1&rut=1")).toBe(
      "https://a.example/path?x=1"
    );
  });

  it("returns direct links unchanged", () => {
    expect(unwrapResultLink("https://www.example.org/about")).toBe("https://www.example.org/about");
  });

  it("resolves relative links against duckduckgo.com", () => {
    expect(unwrapResultLink("/y.js?ad=1")).toBe("https://duckduckgo.com/y.js?ad=1");
  });

  it("returns empty for blank input", () => {
    expect(unwrapResultLink("  ")).toBe("");
  });
});

describe("parseResultsPage", () => {
  it("extracts result anchors", () => {
    expect(parseResultsPage(RESULTS_PAGE)).toEqual([
      { url: "https://www.mercyclinic.example/", title: "Mercy Clinic" },
      {
        url: "https://www.healthgrades.com/group-directory/mercy",
        title: "Mercy Clinic - Healthgrades",
      },
    ]);
  });
});

describe("DuckDuckGoClient", () => {
  it("posts the query and truncates the results", async () => {
    const fetchMock = stubFetch(textResponse(RESULTS_PAGE));

    const hits = await new DuckDuckGoClient().search("mercy clinic mobile al", 1);

    expect(hits).toEqual([{ url: "https://www.mercyclinic.example/", title: "Mercy Clinic" }]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://html.duckduckgo.com/html/");
    expect(init.method).toBe("POST");
    expect(init.body).toBe("q=mercy+clinic+mobile+al");
  });

  it("warns when the page has no results", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    stubFetch(textResponse("<html><body>No results.</body></html>"));

    expect(await new DuckDuckGoClient().search("zzzz", 5)).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[Search] DuckDuckGo: no result anchors for "zzzz"');
  });

  it("rejects when the endpoint refuses the request", async () => {
    stubFetch(textResponse("", 403));
    await expect(new DuckDuckGoClient().search("q", 5)).rejects.toThrow("DuckDuckGo API error (403): Error");
  });
});
