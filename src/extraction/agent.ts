import type { TextCompleter } from "../llm/index.js";
import { ExtractionError, errorMessage } from "../shared/errors.js";
import { fail, ok, type Result } from "../shared/result.js";
import { countWords } from "../shared/text.js";
import type { PasswordProtectedUrlStrategy } from "./url.js";
import type {
  Confidence,
  ContentDescriptor,
  ExtractedContent,
  ExtractionStrategy,
} from "./types.js";

export interface AgentExtractionOptions {
  model: string;
  minConfidence: Confidence;
  minWords: number;
  previewChars?: number;
}

export interface ExtractionAnalysis {
  strategy: "inline" | "url" | null;
  url: string | null;
  password: string | null;
  confidence: Confidence;
  reasoning: string;
}

const CONFIDENCE_RANK: Record<Confidence, number> = { low: 0, medium: 1, high: 2 };
const CONFIDENCE_SCORE: Record<Confidence, number> = { low: 0.4, medium: 0.7, high: 0.95 };

/**
 * Lets the model decide whether the story is in the message body or behind
 * a link, then either delegates to the URL strategy or asks the model to
 * return the narrative without the surrounding chrome.
 */
export class AgentExtractionStrategy implements ExtractionStrategy {
  readonly name = "agent";

  constructor(
    private readonly completer: TextCompleter,
    private readonly urlStrategy: PasswordProtectedUrlStrategy,
    private readonly options: AgentExtractionOptions
  ) {}

  async attempt(
    input: ContentDescriptor
  ): Promise<Result<ExtractedContent, ExtractionError>> {
    let analysis: ExtractionAnalysis;
    try {
      const reply = await this.completer.complete({
        model: this.options.model,
        maxTokens: 500,
        messages: [{ role: "user", content: this.buildAnalysisPrompt(input) }],
      });
      analysis = parseAnalysis(reply);
    } catch (error) {
      return fail(new ExtractionError("network", `analysis call failed: ${errorMessage(error)}`));
    }

    if (!analysis.strategy) {
      return fail(new ExtractionError("parse", "analysis had no STRATEGY line"));
    }

    if (CONFIDENCE_RANK[analysis.confidence] < CONFIDENCE_RANK[this.options.minConfidence]) {
      return fail(
        new ExtractionError(
          "low-confidence",
          `analysis confidence ${analysis.confidence} is below ${this.options.minConfidence}`
        )
      );
    }

    console.log(
      `[Extraction] Agent chose ${analysis.strategy} (${analysis.confidence}): ${analysis.reasoning}`
    );

    let extracted: ExtractedContent;
    if (analysis.strategy === "url") {
      if (!analysis.url) {
        return fail(new ExtractionError("parse", "analysis chose url but named no URL"));
      }

      const fetched = await this.urlStrategy.attempt({
        ...input,
        url: analysis.url,
        password: analysis.password ?? input.password,
      });
      if (!fetched.ok) return fetched;
      extracted = fetched.value;
    } else {
      try {
        const content = await this.completer.complete({
          model: this.options.model,
          maxTokens: 16_000,
          messages: [{ role: "user", content: this.buildCleaningPrompt(input) }],
        });
        extracted = { content: content.trim(), confidence: 0 };
      } catch (error) {
        return fail(new ExtractionError("network", `cleaning call failed: ${errorMessage(error)}`));
      }
    }

    const words = countWords(extracted.content);
    if (words < this.options.minWords) {
      return fail(
        new ExtractionError(
          "below-minimum-length",
          `agent result has ${words} words, needs at least ${this.options.minWords}`
        )
      );
    }

    return ok({ ...extracted, confidence: CONFIDENCE_SCORE[analysis.confidence] });
  }

  private buildAnalysisPrompt(input: ContentDescriptor): string {
    const limit = this.options.previewChars ?? 2000;
    const html = input.html && input.html.length < limit ? input.html : "";

    return `Analyze this email to decide how to extract the story it carries.

EMAIL PREVIEW:
Subject: ${input.subject || "(no subject)"}
From: ${input.from || "(unknown)"}

--- TEXT CONTENT ---
${input.text.slice(0, limit) || "(empty)"}
${html ? `\n--- HTML CONTENT ---\n${html}` : ""}

RULES:
- Story content is narrative prose: several paragraphs of scenes, dialogue and description.
- Headers, "View in app" lines, dates, short announcements and bare URLs are not story content.
- Choose "inline" when the body already holds substantial narrative (roughly 1000+ characters of prose).
- Choose "url" only when the body is mostly a link, maybe with a password, and little prose.
- For "url", copy the exact URL and the exact password (often on the line after "Password:").
- Never write story content yourself.

Respond in this exact format:
STRATEGY: [inline or url]
URL: [exact URL, or none]
PASSWORD: [exact password, or none]
CONFIDENCE: [high, medium or low]
REASONING: [one or two sentences on what you saw]`;
  }

  private buildCleaningPrompt(input: ContentDescriptor): string {
    return `Below is an email that contains a chapter of a serialized story.

Return ONLY the story text, exactly as written, with paragraphs separated by a blank line.
Remove everything that is not narrative: "View in app" links, dates, chapter headers, author notes, patron and subscription prompts, social buttons, copyright lines and navigation.
Do not summarize, rephrase or add anything. Keep scene-break lines such as "* * *".

EMAIL TEXT:
${input.text}`;
  }
}

/**
 * Read the line-oriented analysis reply. Tolerates markdown bold around the
 * field names.
 */
export function parseAnalysis(text: string): ExtractionAnalysis {
  const analysis: ExtractionAnalysis = {
    strategy: null,
    url: null,
    password: null,
    confidence: "low",
    reasoning: "",
  };

  for (const rawLine of text.split("\n")) {
    const match = rawLine.replace(/\*\*/g, "").match(/^\s*([A-Z]+)\s*:\s*(.*)$/);
    if (!match) continue;

    const value = match[2].trim();
    const absent = value === "" || value.toLowerCase() === "none";

    switch (match[1]) {
      case "STRATEGY": {
        const strategy = value.toLowerCase();
        if (strategy === "inline" || strategy === "url") analysis.strategy = strategy;
        break;
      }
      case "URL":
        analysis.url = absent ? null : value.replace(/^<|>$/g, "");
        break;
      case "PASSWORD":
        analysis.password = absent ? null : value.replace(/^["'`]|["'`]$/g, "");
        break;
      case "CONFIDENCE": {
        const confidence = value.toLowerCase();
        if (confidence === "high" || confidence === "medium" || confidence === "low") {
          analysis.confidence = confidence;
        }
        break;
      }
      case "REASONING":
        analysis.reasoning = value;
        break;
    }
  }

  return analysis;
}
