/**
 * Web search through DuckDuckGo's HTML endpoint (no API key).
 *
 * Result links point at a DuckDuckGo redirect (`/l/?uddg=<target>`); the real
 * target is decoded from the `uddg` parameter. Ads and any link that stays on
 * duckduckgo.com are dropped.
 */

import { convert as htmlToText } from "html-to-text";
import type { WebSearchHit, WebSearchProvider } from "../routing/types";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DuckDuckGoOptions {
  endpoint?: string;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

const DEFAULT_ENDPOINT = "https://html.duckduckgo.com/html/";
const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; grounded-router/1.0)";

const ANCHOR_PATTERN = /<a\b([^>]*)>([\s\S]*?)<\/a>/gi;
const RESULT_CLASS_PATTERN = /\bclass\s*=\s*"[^"]*\bresult__a\b[^"]*"/i;
const HREF_PATTERN = /\bhref\s*=\s*"([^"]*)"/i;

/**
 * Resolve a result href to the page it points at, or null when it is not an
 * http(s) link off DuckDuckGo.
 */
export function resolveResultUrl(rawHref: string): string | null {
  const href = rawHref.replace(/&amp;/g, "&");

  let url: URL;
  try {
    url = new URL(href, "https://duckduckgo.com");
  } catch {
    return null;
  }

  if (url.hostname.endsWith("duckduckgo.com")) {
    const target = url.pathname === "/l/" ? url.searchParams.get("uddg") : null;
    if (!target) return null;
    try {
      url = new URL(target);
    } catch {
      return null;
    }
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  return url.toString();
}

function anchorText(html: string): string {
  return htmlToText(html, { wordwrap: false }).replace(/\s+/g, " ").trim();
}

/**
 * Extract result links in page order, deduplicated by URL.
 */
export function parseDuckDuckGoResults(html: string): WebSearchHit[] {
  const hits: WebSearchHit[] = [];
  const seen = new Set<string>();

  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    const attributes = match[1] ?? "";
    if (!RESULT_CLASS_PATTERN.test(attributes)) continue;

    const href = HREF_PATTERN.exec(attributes)?.[1];
    if (!href) continue;

    const url = resolveResultUrl(href);
    if (!url || seen.has(url)) continue;
    seen.add(url);

    hits.push({ title: anchorText(match[2] ?? "") || url, url });
  }

  return hits;
}

export class DuckDuckGoSearchProvider implements WebSearchProvider {
  private readonly endpoint: string;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: DuckDuckGoOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(text: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchHit[]> {
    const params = new URLSearchParams({ q: text });
    const response = await this.fetchImpl(`${this.endpoint}?${params}`, {
      headers: { "User-Agent": this.userAgent, Accept: "text/html" },
      signal,
    });

    if (!response.ok) throw new Error(`DuckDuckGo search error: ${response.status}`);

    const html = await response.text();
    return parseDuckDuckGoResults(html).slice(0, maxResults);
  }
}
