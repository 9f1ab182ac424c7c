import { describe, it, expect, vi, afterEach } from "vitest";
import { RankChecker, summarizeRanks } from "../server/audit/rank-checker";
import type { RankResult } from "@shared/audit-types";

function checker(serpApiKey?: string): RankChecker {
  return new RankChecker({ serpApiKey, userAgent: "test-agent", timeoutMs: 1000, delayMs: 0 });
}

function stubFetch(respond: (url: string) => Response) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => respond(String(input)));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { "content-type": "application/json" } });
}

const RESULTS_PAGE = `<html><body>
  <div class="g"><a href="https://other.org/"><h3>Other site</h3></a></div>
  <div class="g"><a href="https://example.com/pricing"><h3> Example pricing </h3></a><span class="st">Plans and prices</span></div>
  <div class="g"><a href="https://blog.example.net/post"></a></div>
</body></html>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("RankChecker with SerpAPI", () => {
  it("returns the position of the first result on the domain", async () => {
    const fetchMock = stubFetch(() =>
      json({
        organic_results: [
          { link: "https://other.org/", title: "Other" },
          { link: "https://www.example.com/page", title: "Example page", snippet: "A snippet" },
          { link: "https://example.com/second" },
        ],
      })
    );

    const result = await checker("test-secret").checkKeyword("example.com", "seo tools", { country: "de" });

    expect(result).toEqual({
      keyword: "seo tools",
      domain: "example.com",
      rank: 2,
      url: "https://www.example.com/page",
      title: "Example page",
      snippet: "A snippet",
      method: "serpapi",
    });

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.origin + requested.pathname).toBe("https://serpapi.com/search");
    expect(requested.searchParams.get("q")).toBe("seo tools");
    expect(requested.searchParams.get("gl")).toBe("de");
    expect(requested.searchParams.get("hl")).toBe("en");
    expect(requested.searchParams.get("num")).toBe("100");
    expect(requested.searchParams.get("api_key")).toBe("test-secret");
  });

  it("reports a keyword the domain does not rank for", async () => {
    stubFetch(() => json({ organic_results: [{ link: "https://other.org/" }] }));

    expect(await checker("test-secret").checkKeyword("example.com", "seo")).toEqual({
      keyword: "seo",
      domain: "example.com",
      rank: null,
      message: "Not found in top 100 results",
      method: "serpapi",
    });
  });

  it("tolerates a response without organic results", async () => {
    stubFetch(() => json({ search_metadata: {} }));
    const result = await checker("test-secret").checkKeyword("example.com", "seo");
    expect(result.rank).toBeNull();
    expect(result.message).toBe("Not found in top 100 results");
  });

  it("returns API errors as values", async () => {
    stubFetch(() => json({ error: "Invalid key" }, 401));
    const result = await checker("test-secret").checkKeyword("example.com", "seo");
    expect(result).toEqual({ keyword: "seo", domain: "example.com", rank: null, error: "API Error: 401", method: "serpapi" });
  });

  it("returns network failures as values", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("connect ECONNREFUSED");
      })
    );
    const result = await checker("test-secret").checkKeyword("example.com", "seo");
    expect(result).toEqual({
      keyword: "seo",
      domain: "example.com",
      rank: null,
      error: "connect ECONNREFUSED",
      method: "serpapi",
    });
  });
});

describe("RankChecker timeouts", () => {
  it("aborts a response body that never finishes", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            init?.signal?.addEventListener("abort", () => controller.error(new Error("Body read aborted")));
          },
        });
        return new Response(body, { status: 200 });
      })
    );
    const slow = new RankChecker({ serpApiKey: "test-secret", userAgent: "test-agent", timeoutMs: 20, delayMs: 0 });

    expect(await slow.checkKeyword("example.com", "seo")).toEqual({
      keyword: "seo",
      domain: "example.com",
      rank: null,
      error: "Body read aborted",
      method: "serpapi",
    });
  });
});

describe("RankChecker scraping results", () => {
  it("uses scraping without an API key", () => {
    expect(checker().method).toBe("scraping");
    expect(checker("test-secret").method).toBe("serpapi");
  });

  it("finds the domain among result blocks", async () => {
    const fetchMock = stubFetch(() => new Response(RESULTS_PAGE, { status: 200 }));

    expect(await checker().checkKeyword("example.com", "pricing")).toEqual({
      keyword: "pricing",
      domain: "example.com",
      rank: 2,
      url: "https://example.com/pricing",
      title: "Example pricing",
      snippet: "Plans and prices",
      method: "scraping",
    });
    expect(String(fetchMock.mock.calls[0][0])).toBe("https://www.google.com/search?q=pricing&num=50");
  });

  it("fills in a missing title and snippet", async () => {
    stubFetch(() => new Response(RESULTS_PAGE, { status: 200 }));
    const result = await checker().checkKeyword("example.net", "blog");
    expect(result.rank).toBe(3);
    expect(result.title).toBe("No title");
    expect(result.snippet).toBe("No snippet");
  });

  it("reports how many results were searched", async () => {
    stubFetch(() => new Response(RESULTS_PAGE, { status: 200 }));
    const result = await checker().checkKeyword("missing.org", "pricing");
    expect(result.message).toBe("Not found in top 3 results");
  });

  it("returns HTTP errors as values", async () => {
    stubFetch(() => new Response("rate limited", { status: 429 }));
    const result = await checker().checkKeyword("example.com", "pricing");
    expect(result.error).toBe("HTTP Error: 429");
    expect(result.rank).toBeNull();
  });
});

describe("checkKeywords", () => {
  it("checks keywords one after another in order", async () => {
    const fetchMock = stubFetch(() => json({ organic_results: [] }));
    const results = await checker("test-secret").checkKeywords("example.com", ["one", "two", "three"]);

    expect(results.map((r) => r.keyword)).toEqual(["one", "two", "three"]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe("summarizeRanks", () => {
  function result(rank: number | null): RankResult {
    return { keyword: `k${rank}`, domain: "example.com", rank, method: "serpapi" };
  }

  it("summarizes positions", () => {
    expect(summarizeRanks([result(3), result(15), result(null), result(60)])).toEqual({
      totalKeywords: 4,
      rankedKeywords: 3,
      notRanked: 1,
      top10Positions: 1,
      top50Positions: 2,
      averageRank: 26,
      bestRank: 3,
      worstRank: 60,
    });
  });

  it("has no averages when nothing ranks", () => {
    expect(summarizeRanks([result(null)])).toEqual({
      totalKeywords: 1,
      rankedKeywords: 0,
      notRanked: 1,
      top10Positions: 0,
      top50Positions: 0,
      averageRank: null,
      bestRank: null,
      worstRank: null,
    });
  });
});
