import * as cheerio from "cheerio";
import type { PageAttributes } from "./types";
import { normalizeUrl, isSameHost, getHost } from "./url-utils";

function headingTexts($: cheerio.CheerioAPI, selector: "h1" | "h2"): string[] {
  return $(selector)
    .map((_, el) => $(el).text().trim())
    .get();
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function extractLinks($: cheerio.CheerioAPI, url: string): { internal: string[]; external: string[] } {
  const internal = new Set<string>();
  const external = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;

    const normalized = normalizeUrl(href, url);
    if (!normalized) return;

    if (isSameHost(normalized, url)) {
      internal.add(normalized);
    } else if (/^https?:/i.test(normalized) && getHost(normalized)) {
      external.add(normalized);
    }
  });

  return { internal: Array.from(internal), external: Array.from(external) };
}

export interface ExtractedPage {
  attributes: PageAttributes;
  internalLinks: string[];
}

export function extractPageData(html: string, url: string): ExtractedPage {
  const $ = cheerio.load(html);

  const titleEl = $("title").first();
  const title = titleEl.length ? titleEl.text().trim() || null : null;

  const metaEl = $('meta[name="description"]').first();
  const metaDescription = metaEl.length ? (metaEl.attr("content") ?? "").trim() : null;

  const images = $("img");
  const imagesWithoutAlt = images.filter((_, el) => !$(el).attr("alt")).length;

  const links = extractLinks($, url);

  const attributes: PageAttributes = {
    url,
    title,
    metaDescription,
    h1Tags: headingTexts($, "h1"),
    h2Tags: headingTexts($, "h2"),
    wordCount: countWords($.root().text()),
    images: images.length,
    imagesWithoutAlt,
    internalLinks: links.internal.length,
    externalLinks: links.external.length,
  };

  return { attributes, internalLinks: links.internal };
}

export function extractPageAttributes(html: string, url: string): PageAttributes {
  return extractPageData(html, url).attributes;
}
