import { BlockList, isIP } from "node:net";
import { lookup } from "node:dns/promises";

export type UrlSafety = { safe: true } | { safe: false; reason: string };

const LOCAL_HOSTNAME = /(^|\.)(localhost|local)$/i;
const TRACKING_PARAM = /^(utm_[a-z]+|gclid|fbclid|ref|source)$/i;

const reservedAddresses = new BlockList();
for (const [network, prefix] of [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.168.0.0", 16],
] as const) {
  reservedAddresses.addSubnet(network, prefix, "ipv4");
}
for (const [network, prefix] of [
  ["::", 128],
  ["::1", 128],
  ["fc00::", 7],
  ["fe80::", 10],
] as const) {
  reservedAddresses.addSubnet(network, prefix, "ipv6");
}

/** Loopback, private, link-local, carrier-grade NAT or unspecified. */
export function isReservedAddress(address: string): boolean {
  const family = isIP(address);
  if (family === 0) return false;
  return reservedAddresses.check(address, family === 4 ? "ipv4" : "ipv6");
}

export function isLocalHostname(hostname: string): boolean {
  return LOCAL_HOSTNAME.test(hostname.replace(/\.$/, ""));
}

async function resolveAddresses(hostname: string): Promise<string[]> {
  try {
    const entries = await lookup(hostname, { all: true });
    return entries.map((entry) => entry.address);
  } catch (error) {
    // The fetch that follows reports the unresolvable host.
    console.warn(`[crawler] Could not resolve ${hostname}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
}

/**
 * Whether a URL may be fetched: http(s) only, never a local hostname, and
 * never an address (literal or resolved) in a reserved range.
 */
export async function checkUrlSafety(urlString: string): Promise<UrlSafety> {
  const url = parseUrl(urlString);
  if (!url) return { safe: false, reason: `Invalid URL: ${urlString}` };

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return { safe: false, reason: `Blocked protocol: ${url.protocol}` };
  }

  const hostname = url.hostname.replace(/^\[|\]$/g, "");
  if (isLocalHostname(hostname)) {
    return { safe: false, reason: `Blocked host: ${hostname}` };
  }

  if (isIP(hostname)) {
    return isReservedAddress(hostname) ? { safe: false, reason: `Private IP blocked: ${hostname}` } : { safe: true };
  }

  const reserved = (await resolveAddresses(hostname)).find(isReservedAddress);
  return reserved ? { safe: false, reason: `Hostname resolves to private IP: ${reserved}` } : { safe: true };
}

/**
 * Absolute form of `href` without its fragment, tracking parameters or
 * trailing slashes. Null when it cannot be parsed.
 */
export function normalizeUrl(href: string, base?: string): string | null {
  let url: URL;
  try {
    url = new URL(href, base);
  } catch {
    return null;
  }

  url.hash = "";
  for (const key of Array.from(url.searchParams.keys())) {
    if (TRACKING_PARAM.test(key)) url.searchParams.delete(key);
  }
  url.pathname = url.pathname.replace(/\/+$/, "") || "/";

  return url.toString();
}

/**
 * Compares `host`, which carries the port only when it is not the scheme's
 * default: http and https of one site match unless either names a non-default port.
 */
export function isSameHost(url1: string, url2: string): boolean {
  const host = getHost(url1);
  return host !== "" && host === getHost(url2);
}

function parseUrl(urlString: string): URL | null {
  try {
    return new URL(urlString);
  } catch {
    return null;
  }
}

export function getHost(urlString: string): string {
  return parseUrl(urlString)?.host ?? "";
}

/** Sitemap locations to try, in order, then robots.txt. */
export function getDiscoveryUrls(rootUrl: string): { sitemaps: string[]; robots: string } | null {
  const origin = parseUrl(rootUrl)?.origin;
  if (!origin) return null;
  return {
    sitemaps: [`${origin}/sitemap.xml`, `${origin}/sitemap_index.xml`],
    robots: `${origin}/robots.txt`,
  };
}
