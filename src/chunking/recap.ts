import type { TextCompleter } from "../llm/index.js";
import { errorMessage } from "../shared/errors.js";
import { withTimeout } from "../shared/timeout.js";
import { countWords, splitSentences } from "../shared/text.js";

const RULE = "─".repeat(39);
const MAX_SENTENCES = 10;

export interface RecapWriter {
  readonly name: string;
  write(previousNarrative: string, maxWords: number): Promise<string>;
}

/**
 * The closing sentences of the previous chunk, walking backwards until the
 * word or sentence limit. The last sentence is always kept.
 */
export class ExtractiveRecapWriter implements RecapWriter {
  readonly name = "extractive";

  async write(previousNarrative: string, maxWords: number): Promise<string> {
    return extractiveRecap(previousNarrative, maxWords);
  }
}

export function extractiveRecap(previousNarrative: string, maxWords: number): string {
  const sentences = splitSentences(previousNarrative.replace(/\s*\n\s*/g, " "));
  const picked: string[] = [];
  let words = 0;

  for (let i = sentences.length - 1; i >= 0; i--) {
    const sentenceWords = countWords(sentences[i]);
    if (picked.length > 0 && words + sentenceWords > maxWords) break;

    picked.unshift(sentences[i]);
    words += sentenceWords;
    if (picked.length >= MAX_SENTENCES) break;
  }

  return picked.join(" ");
}

export interface ModelRecapOptions {
  model: string;
  timeoutMs: number;
}

/**
 * Asks the model for a short synopsis, falling back to the extractive recap
 * on any error or an empty reply.
 */
export class ModelRecapWriter implements RecapWriter {
  readonly name = "model";

  constructor(
    private readonly completer: TextCompleter,
    private readonly options: ModelRecapOptions,
    private readonly fallback: RecapWriter = new ExtractiveRecapWriter()
  ) {}

  async write(previousNarrative: string, maxWords: number): Promise<string> {
    try {
      const synopsis = await withTimeout(
        this.completer.complete({
          model: this.options.model,
          maxTokens: Math.max(200, maxWords * 2),
          messages: [
            {
              role: "user",
              content: `Write a "previously on" synopsis of the story part below for a reader returning to it tomorrow.
Use at most ${maxWords} words, present tense, no spoilers beyond this part, no preamble or heading.

STORY PART:
${previousNarrative}`,
            },
          ],
        }),
        this.options.timeoutMs,
        "recap"
      );

      const cleaned = synopsis.trim();
      if (cleaned.length > 0) return cleaned;
      console.warn("[Chunking] Model recap was empty, using extractive recap");
    } catch (error) {
      console.warn(`[Chunking] Model recap failed, using extractive recap: ${errorMessage(error)}`);
    }

    return this.fallback.write(previousNarrative, maxWords);
  }
}

export function formatRecap(synopsis: string): string {
  const quoted = synopsis
    .split("\n")
    .map((line) => `> ${line.trim()}`.trimEnd())
    .join("\n");
  return `${RULE}\n*Previously:*\n${quoted}\n${RULE}`;
}

/**
 * Separate a recap block, as written by formatRecap, from the narrative
 * that follows it.
 */
export function splitRecap(text: string): { recap: string | null; narrative: string } {
  const pattern = new RegExp(`^${RULE}\\n\\*Previously:\\*\\n([\\s\\S]*?)\\n${RULE}(?:\\n\\n|$)`);
  const match = text.match(pattern);
  if (!match) return { recap: null, narrative: text };

  const recap = match[1]
    .split("\n")
    .map((line) => line.replace(/^>\s?/, ""))
    .join("\n")
    .trim();

  return { recap, narrative: text.slice(match[0].length) };
}
