import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { ExtractionError, errorMessage } from "../shared/errors.js";
import { elementToText, htmlToText } from "../shared/html.js";
import { fail, ok, type Result } from "../shared/result.js";
import { findFirstUrl, findPassword } from "../shared/text.js";
import { stripBoilerplate } from "./boilerplate.js";
import type {
  ContentDescriptor,
  ExtractedContent,
  ExtractionStrategy,
} from "./types.js";

/**
 * The part of a fetch Response the strategy reads. The global fetch
 * satisfies it, and tests hand in plain objects.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init: RequestInit) => Promise<HttpResponse>;

export interface UrlStrategyOptions {
  minChars: number;
  timeoutMs: number;
  fetch?: HttpFetch;
}

const CONTENT_SELECTORS = [
  "article .entry-content",
  ".entry-content",
  ".post-content",
  ".article-content",
  "article .content",
  ".chapter-content",
  "article",
  "main",
];

const UNWANTED =
  "script, style, nav, form, .sharedaddy, .jp-relatedposts, .comments, #comments, footer";

const PASSWORD_FORM = "form.post-password-form";

const USER_AGENT =
  "Mozilla/5.0 (compatible; serial-drip/0.1; +https://example.invalid/serial-drip)";

/**
 * Fetches a linked story page, unlocking WordPress password-protected
 * posts, and keeps the largest known content container.
 */
export class PasswordProtectedUrlStrategy implements ExtractionStrategy {
  readonly name = "url";
  private readonly fetch: HttpFetch;

  constructor(private readonly options: UrlStrategyOptions) {
    this.fetch = options.fetch ?? fetch;
  }

  async attempt(
    input: ContentDescriptor
  ): Promise<Result<ExtractedContent, ExtractionError>> {
    const bodyText = input.text || htmlToText(input.html);
    const url = input.url ?? findFirstUrl(`${input.text}\n${input.html}`);

    if (!url) {
      return fail(new ExtractionError("parse", "no URL found in message"));
    }

    const password = input.password ?? findPassword(bodyText);

    try {
      const html = await this.fetchPage(url, password);
      const $ = cheerio.load(html);
      const content = this.largestContentBlock($);

      if (content === null) {
        return fail(
          new ExtractionError("parse", `no content container matched on ${url}`)
        );
      }

      if (content.length <= this.options.minChars) {
        return fail(
          new ExtractionError(
            "below-minimum-length",
            `page content has ${content.length} characters, needs more than ${this.options.minChars}`
          )
        );
      }

      const title = this.pageTitle($);
      return ok({
        content,
        confidence: 0.8,
        sourceUrl: url,
        ...(title ? { title } : {}),
      });
    } catch (error) {
      if (error instanceof ExtractionError) return fail(error);

      const timedOut =
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError");
      return fail(
        new ExtractionError(
          timedOut ? "timeout" : "network",
          `fetching ${url}: ${errorMessage(error)}`
        )
      );
    }
  }

  private async fetchPage(url: string, password: string | null): Promise<string> {
    const first = await this.get(url);
    const html = await first.text();

    if (cheerio.load(html)(PASSWORD_FORM).length === 0) {
      return html;
    }

    if (!password) {
      throw new ExtractionError(
        "missing-password",
        "page is password protected and no password was supplied"
      );
    }

    const form = cheerio.load(html)(PASSWORD_FORM).first();
    const action = new URL(
      form.attr("action") || "/wp-login.php?action=postpass",
      url
    ).toString();

    console.log(`[Extraction] Unlocking password-protected page via ${action}`);

    const posted = await this.fetch(action, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": USER_AGENT,
        Referer: url,
      },
      body: new URLSearchParams({ post_password: password, Submit: "Enter" }).toString(),
      redirect: "manual",
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (posted.status >= 400) {
      throw new ExtractionError(
        "network",
        `password form at ${action} returned ${posted.status}`
      );
    }

    const cookie = cookieHeader(posted.headers.get("set-cookie"));
    const unlocked = await (await this.get(url, cookie)).text();

    if (cheerio.load(unlocked)(PASSWORD_FORM).length > 0) {
      throw new ExtractionError(
        "missing-password",
        "password was rejected by the page"
      );
    }

    return unlocked;
  }

  private async get(url: string, cookie?: string): Promise<HttpResponse> {
    const response = await this.fetch(url, {
      headers: {
        "User-Agent": USER_AGENT,
        ...(cookie ? { Cookie: cookie } : {}),
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new ExtractionError("network", `GET ${url} returned ${response.status}`);
    }

    return response;
  }

  private largestContentBlock($: CheerioAPI): string | null {
    let best: string | null = null;

    for (const selector of CONTENT_SELECTORS) {
      for (const element of $(selector).toArray()) {
        const block = $(element).clone();
        block.find(UNWANTED).remove();
        const text = stripBoilerplate(elementToText($, block));
        if (best === null || text.length > best.length) {
          best = text;
        }
      }
    }

    return best;
  }

  private pageTitle($: CheerioAPI): string | null {
    const candidates = [
      $("h1.entry-title").first().text(),
      $("meta[property='og:title']").attr("content") ?? "",
      $("title").first().text(),
    ];
    const title = candidates.map((c) => c.trim()).find((c) => c.length > 0);
    return title ?? null;
  }
}

/**
 * Reduce a (possibly comma-joined) Set-Cookie header to a Cookie request
 * header. Commas inside Expires dates are not treated as separators.
 */
export function cookieHeader(setCookie: string | null): string | undefined {
  if (!setCookie) return undefined;

  const pairs = setCookie
    .split(/,(?=\s*[^;,=\s]+=)/)
    .map((cookie) => cookie.split(";")[0].trim())
    .filter((pair) => pair.includes("="));

  return pairs.length > 0 ? pairs.join("; ") : undefined;
}
