import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { crawlSite, discoverSitemapUrls, parseRobotsSitemaps, parseSitemapLocs } from "../server/audit/crawler";
import { CrawlConfigSchema } from "../server/audit/types";

vi.mock("../server/audit/url-utils", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../server/audit/url-utils")>();
  return {
    ...actual,
    checkUrlSafety: vi.fn(async (url: string) =>
      url.includes("blocked.test") ? { safe: false, reason: "Blocked host: blocked.test" } : { safe: true }
    ),
  };
});

type Route = () => Response;

function html(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
}

function text(body: string, contentType = "application/xml"): Response {
  return new Response(body, { status: 200, headers: { "content-type": contentType } });
}

function notFound(): Response {
  return new Response("not found", { status: 404 });
}

function sitemap(...locs: string[]): string {
  return `<?xml version="1.0"?><urlset>${locs.map((loc) => `<url><loc>${loc}</loc></url>`).join("")}</urlset>`;
}

function page(title: string, links: string[] = []): string {
  return `<html><head><title>${title}</title></head><body>${links
    .map((href) => `<a href="${href}">link</a>`)
    .join("\n")}</body></html>`;
}

function serve(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const route = routes[url];
    return route ? route() : notFound();
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function config(overrides: Record<string, unknown> = {}) {
  return CrawlConfigSchema.parse({ url: "https://example.com", ...overrides });
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("sitemap parsing", () => {
  it("reads loc entries", () => {
    expect(parseSitemapLocs("<urlset><url><loc> https://example.com/a </loc></url><url><LOC>https://example.com/b</LOC></url></urlset>")).toEqual([
      "https://example.com/a",
      "https://example.com/b",
    ]);
  });

  it("reads Sitemap lines from robots.txt", () => {
    const robots = "User-agent: *\nDisallow: /admin\nSitemap: https://example.com/s1.xml\r\nsitemap:https://example.com/s2.xml";
    expect(parseRobotsSitemaps(robots)).toEqual(["https://example.com/s1.xml", "https://example.com/s2.xml"]);
  });
});

describe("discoverSitemapUrls", () => {
  it("expands nested sitemaps and keeps unique same-host pages", async () => {
    serve({
      "https://example.com/sitemap.xml": () =>
        text(
          sitemap(
            "https://example.com/",
            "https://example.com/about",
            "https://example.com/about/",
            "https://other.org/x",
            "https://example.com/posts.xml"
          )
        ),
      "https://example.com/posts.xml": () => text(sitemap("https://example.com/blog/one")),
    });

    expect(await discoverSitemapUrls("https://example.com/", config())).toEqual([
      "https://example.com/",
      "https://example.com/about",
      "https://example.com/blog/one",
    ]);
  });

  it("falls back to sitemaps listed in robots.txt", async () => {
    const fetchMock = serve({
      "https://example.com/robots.txt": () =>
        text("User-agent: *\nSitemap: https://example.com/custom.xml", "text/plain"),
      "https://example.com/custom.xml": () => text(sitemap("https://example.com/docs")),
    });

    expect(await discoverSitemapUrls("https://example.com/", config())).toEqual(["https://example.com/docs"]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://example.com/sitemap.xml",
      "https://example.com/sitemap_index.xml",
      "https://example.com/robots.txt",
      "https://example.com/custom.xml",
    ]);
  });

  it("does not follow a sitemap redirect to a blocked host", async () => {
    const warn = vi.mocked(console.warn);
    const fetchMock = serve({
      "https://example.com/sitemap.xml": () =>
        new Response(null, { status: 302, headers: { location: "https://blocked.test/sitemap.xml" } }),
    });

    expect(await discoverSitemapUrls("https://example.com/", config())).toEqual([]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://example.com/sitemap.xml",
      "https://example.com/sitemap_index.xml",
      "https://example.com/robots.txt",
    ]);
    expect(warn).toHaveBeenCalledWith(
      "[crawler] Could not fetch https://example.com/sitemap.xml: SSRF protection: Blocked host: blocked.test"
    );
  });

  it("follows a sitemap redirect on the same site", async () => {
    serve({
      "https://example.com/sitemap.xml": () =>
        new Response(null, { status: 301, headers: { location: "/sitemaps/main.xml" } }),
      "https://example.com/sitemaps/main.xml": () => text(sitemap("https://example.com/guide")),
    });

    expect(await discoverSitemapUrls("https://example.com/", config())).toEqual(["https://example.com/guide"]);
  });

  it("stops at maxPages", async () => {
    serve({
      "https://example.com/sitemap.xml": () =>
        text(sitemap("https://example.com/1", "https://example.com/2", "https://example.com/3")),
    });

    expect(await discoverSitemapUrls("https://example.com/", config({ maxPages: 2 }))).toEqual([
      "https://example.com/1",
      "https://example.com/2",
    ]);
  });
});

describe("crawlSite", () => {
  it("audits the pages listed in the sitemap", async () => {
    serve({
      "https://example.com/sitemap.xml": () =>
        text(sitemap("https://example.com/", "https://example.com/about", "https://example.com/feed")),
      "https://example.com/": () => html(page("Home")),
      "https://example.com/feed": () => text("<rss/>", "application/rss+xml"),
    });

    const result = await crawlSite(config());

    expect(result.source).toBe("sitemap");
    expect(result.pages.map((p) => [p.url, p.title])).toEqual([["https://example.com/", "Home"]]);
    expect(result.errorCount).toBe(2);
    expect(result.skippedCount).toBe(0);
  });

  it("follows links breadth first when there is no sitemap", async () => {
    serve({
      "https://example.com/": () => html(page("Home", ["/a", "/b", "/c", "/d"])),
      "https://example.com/a": () => html(page("A", ["/", "/e"])),
      "https://example.com/b": () => html(page("B")),
      "https://example.com/c": () => html(page("C")),
    });

    const result = await crawlSite(config({ maxPages: 3 }));

    expect(result.source).toBe("crawl");
    expect(result.pages.map((p) => p.url)).toEqual([
      "https://example.com/",
      "https://example.com/a",
      "https://example.com/b",
    ]);
  });

  it("queues at most linksPerPage new links from each page", async () => {
    serve({
      "https://example.com/": () => html(page("Home", ["/a", "/b", "/c", "/d"])),
      "https://example.com/a": () => html(page("A")),
      "https://example.com/b": () => html(page("B")),
      "https://example.com/c": () => html(page("C")),
      "https://example.com/d": () => html(page("D")),
    });

    const result = await crawlSite(config({ linksPerPage: 2 }));
    expect(result.pages.map((p) => p.title)).toEqual(["Home", "A", "B"]);
  });

  it("follows redirects", async () => {
    serve({
      "https://example.com/": () =>
        new Response(null, { status: 301, headers: { location: "https://example.com/home" } }),
      "https://example.com/home": () => html(page("Moved")),
    });

    const result = await crawlSite(config({ maxPages: 1 }));
    expect(result.pages.map((p) => [p.url, p.title])).toEqual([["https://example.com/", "Moved"]]);
  });

  it("rejects a root URL that fails the SSRF check", async () => {
    serve({});
    await expect(crawlSite(config({ url: "https://blocked.test" }))).rejects.toThrow(
      "SSRF protection: Blocked host: blocked.test"
    );
  });

  it("skips listed pages that fail the SSRF check", async () => {
    serve({
      "https://example.com/sitemap.xml": () => text(sitemap("https://example.com/", "https://example.com/blocked.test")),
      "https://example.com/": () => html(page("Home")),
    });

    const result = await crawlSite(config());
    expect(result.pages).toHaveLength(1);
    expect(result.skippedCount).toBe(1);
  });
});
