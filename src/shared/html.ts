import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

const BLOCK_TAGS = [
  "p",
  "div",
  "section",
  "article",
  "blockquote",
  "li",
  "pre",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "tr",
  "table",
].join(", ");

// Private-use sentinels survive whitespace collapsing and are swapped for
// real line breaks afterwards.
const PARAGRAPH_MARK = "\uE000";
const LINE_MARK = "\uE001";

/**
 * Flatten an element to text, keeping paragraph structure as blank-line
 * separated paragraphs and <br> as single newlines. <hr> becomes a
 * "* * *" scene break.
 */
export function elementToText<T extends AnyNode>(
  $: CheerioAPI,
  element: Cheerio<T>
): string {
  const root = element.clone();

  root.find("script, style, noscript, head").remove();
  root.find("br").replaceWith(LINE_MARK);
  root.find("hr").replaceWith(`${PARAGRAPH_MARK}* * *${PARAGRAPH_MARK}`);
  root.find(BLOCK_TAGS).each((_, el) => {
    $(el).prepend(PARAGRAPH_MARK).append(PARAGRAPH_MARK);
  });

  return normalizeMarkedText(root.text());
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  const body = $("body");
  return elementToText<AnyNode>($, body.length > 0 ? body : $.root());
}

function normalizeMarkedText(marked: string): string {
  return marked
    .replace(/\s+/g, " ")
    .split(PARAGRAPH_MARK)
    .map((paragraph) =>
      paragraph
        .split(LINE_MARK)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .join("\n")
    )
    .filter((paragraph) => paragraph.length > 0)
    .join("\n\n");
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
