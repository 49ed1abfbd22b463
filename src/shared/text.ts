const WORD = /[\p{L}\p{N}_]+/gu;

// A paragraph made of nothing but a divider: "* * *", "***", "---", "--",
// "═══", "───", a lone "#", and similar rules.
const SCENE_BREAK = /^(?:(?:[*~#•·◦○]\s*){3,}|(?:[-–—_=]\s*){2,}|[─━═]{3,}|#)$/u;

const SENTENCE_END = /(?<=[.!?…]["'”’)]?)\s+/u;

export function countWords(text: string): number {
  return text.match(WORD)?.length ?? 0;
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function isSceneBreak(paragraph: string): boolean {
  return SCENE_BREAK.test(paragraph.trim());
}

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_END)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Strip reply/forward prefixes from a subject line.
 */
export function cleanSubject(subject: string): string {
  return subject.replace(/^(?:\s*(?:re|fwd?|fw)\s*:\s*)+/i, "").trim();
}

/**
 * Pull a display name out of a From header ("Jane Doe <jane@example.com>"),
 * falling back to the mailbox local part.
 */
export function authorFromSender(from: string): string | null {
  const named = from.match(/^\s*"?([^"<]+?)"?\s*</);
  if (named) return named[1].trim();

  const local = from.match(/^\s*<?([^@<\s]+)@/);
  if (local) return local[1].trim();

  return null;
}

export function findFirstUrl(text: string): string | null {
  const match = text.match(/https?:\/\/[^\s<>"')\]]+/i);
  if (!match) return null;
  return match[0].replace(/[.,;:!?]+$/, "");
}

const PASSWORD = /\b(?:password|pass|pw|code)\b(?:\s*[:=]\s*|\s+is\s+|\s+)["']?([A-Za-z0-9][^\s"'<>]*)/gi;

const NOT_A_PASSWORD = new Set(["the", "is", "a", "for", "to", "protected"]);

/**
 * Find a password mentioned in an email body ("Password: hunter2",
 * "the password is hunter2", or the value on the line after a
 * "Password:" label).
 */
export function findPassword(text: string): string | null {
  for (const match of text.matchAll(PASSWORD)) {
    const candidate = match[1].replace(/[.,;!?]+$/, "");
    if (/^https?:/i.test(candidate)) continue;
    if (NOT_A_PASSWORD.has(candidate.toLowerCase())) continue;
    return candidate;
  }

  return null;
}
