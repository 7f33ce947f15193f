import { convert as htmlToText } from "html-to-text";
import type { FetchLike } from "./duckDuckGoSearch";
import type { PageExtractor } from "../routing/types";

export interface HtmlPageExtractorOptions {
  userAgent?: string;
  fetchImpl?: FetchLike;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; grounded-router/1.0)";

const SKIPPED_ELEMENTS = ["nav", "header", "footer", "aside", "form", "script", "style", "noscript", "img", "svg"];

const HEADINGS = ["h1", "h2", "h3", "h4", "h5", "h6"];

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Readable text of an HTML page's body, whitespace collapsed to single spaces.
 */
export function htmlToArticleText(html: string): string {
  const text = htmlToText(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      ...SKIPPED_ELEMENTS.map((selector) => ({ selector, format: "skip" })),
      ...HEADINGS.map((selector) => ({ selector, options: { uppercase: false } })),
    ],
  });
  return collapseWhitespace(text);
}

/**
 * Fetches a page and returns its text, or null for content that is not text.
 * HTTP errors throw; the web breakout agent treats them as a failed source.
 */
export class HtmlPageExtractor implements PageExtractor {
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HtmlPageExtractorOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async extract(url: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.fetchImpl(url, {
      headers: { "User-Agent": this.userAgent, Accept: "text/html,text/plain" },
      redirect: "follow",
      signal,
    });

    if (!response.ok) throw new Error(`Fetch failed for ${url}: ${response.status}`);

    const contentType = (response.headers.get("content-type") ?? "").toLowerCase();
    const body = await response.text();

    if (contentType.includes("html") || contentType === "") {
      return htmlToArticleText(body);
    }
    if (contentType.startsWith("text/")) {
      return collapseWhitespace(body);
    }
    return null;
  }
}
