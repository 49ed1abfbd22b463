import type { TextCompleter } from "../llm/index.js";
import { ChunkingError, errorMessage } from "../shared/errors.js";
import { fail, ok, type Result } from "../shared/result.js";
import { buildBreakPrompt, parseBreakResponse } from "./prompting.js";
import type { BreakPlan, ChunkingInput, ChunkingStrategy } from "./types.js";

export interface LlmChunkerOptions {
  model: string;
  maxPromptChars: number;
  timeoutMs?: number;
}

/**
 * One model call over the numbered paragraphs.
 */
export class LlmChunker implements ChunkingStrategy {
  readonly name = "llm";

  constructor(
    private readonly completer: TextCompleter,
    private readonly options: LlmChunkerOptions
  ) {}

  async attempt(input: ChunkingInput): Promise<Result<BreakPlan, ChunkingError>> {
    const prompt = buildBreakPrompt(input.paragraphs, input.targetWords, input.totalWords);
    if (prompt.length > this.options.maxPromptChars) {
      return fail(
        new ChunkingError(
          this.name,
          `prompt is ${prompt.length} characters, over the single-pass limit of ${this.options.maxPromptChars}`
        )
      );
    }

    let reply: string;
    try {
      reply = await this.completer.complete({
        model: this.options.model,
        maxTokens: 2000,
        messages: [{ role: "user", content: prompt }],
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      return fail(new ChunkingError(this.name, errorMessage(error)));
    }

    const parsed = parseBreakResponse(reply, input.paragraphs.length);
    if (parsed.noBreaksNeeded) {
      return ok({ breaks: [] });
    }
    if (parsed.breaks.length === 0) {
      return fail(new ChunkingError(this.name, "reply contained no usable BREAK_PARA lines"));
    }

    return ok({ breaks: parsed.breaks });
  }
}
