import { splitParagraphs } from "../shared/text.js";

// Lines that newsletter platforms wrap around a story. Only short lines are
// tested so narrative sentences that happen to mention "share" survive.
const BOILERPLATE_LINES: RegExp[] = [
  /^view (?:this (?:post|email) )?(?:in (?:the )?app|in (?:your |a )?browser|online)\b/i,
  /^(?:read|open) (?:online|in (?:the )?app|in (?:your )?browser|on (?:the )?(?:web|site))\b/i,
  /\bunsubscribe\b/i,
  /\bmanage (?:your )?(?:email )?(?:preferences|subscription)/i,
  /\b(?:support|join|follow) (?:me |us )?on (?:patreon|ko-?fi|substack)\b/i,
  /^become a (?:patron|paid subscriber|member)\b/i,
  /^(?:like|comment|share|restack|subscribe|follow)(?:\s*[|·•]?\s*(?:like|comment|share|restack|subscribe|follow))*\s*$/i,
  /^(?:©|\(c\)|copyright\b)/i,
  /\ball rights reserved\b/i,
  /^(?:<<\s*)?(?:previous|next) (?:chapter|part|episode)\b/i,
  /^(?:table of contents|index|back to (?:index|contents))\s*$/i,
  /^(?:thanks for reading|thank you for reading)\b/i,
  /^https?:\/\/\S+$/i,
];

const HEADER_LINES: RegExp[] = [
  /^(?:chapter|episode|part|book)\s+[\divxlc]+\b/i,
  /^(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4}$/i,
  /^\d{4}-\d{2}-\d{2}$/,
];

const SHORT_LINE = 160;

function isBoilerplate(line: string): boolean {
  return line.length <= SHORT_LINE && BOILERPLATE_LINES.some((p) => p.test(line));
}

/**
 * Remove platform chrome from an email or page body, keeping the
 * blank-line paragraph structure intact. Leading chapter and date headers
 * are dropped as well.
 */
export function stripBoilerplate(text: string): string {
  const paragraphs = splitParagraphs(text.replace(/\r\n?/g, "\n"))
    .map((paragraph) =>
      paragraph
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !isBoilerplate(line))
        .join("\n")
    )
    .filter((paragraph) => paragraph.length > 0);

  while (
    paragraphs.length > 1 &&
    paragraphs[0].length <= SHORT_LINE &&
    HEADER_LINES.some((p) => p.test(paragraphs[0]))
  ) {
    paragraphs.shift();
  }

  return paragraphs.join("\n\n");
}
