import type { ChatTurn, TextCompleter } from "../llm/index.js";
import { ChunkingError, errorMessage } from "../shared/errors.js";
import { fail, ok, type Result } from "../shared/result.js";
import { finalizeBreaks, segmentWords } from "./plan.js";
import { buildBreakPrompt, parseBreakResponse } from "./prompting.js";
import type { BreakPlan, ChunkingInput, ChunkingStrategy, Paragraph } from "./types.js";

export interface AgentChunkerOptions {
  model: string;
  maxPromptChars: number;
  maxRevisionRounds: number;
  timeoutMs?: number;
}

interface SegmentMeasure {
  first: number;
  last: number;
  words: number;
  adjustable: boolean;
}

const WINDOW_LOW = 0.4;
const WINDOW_HIGH = 1.6;

const SYSTEM = `You split long serialized fiction into daily reading chunks. You answer only with BREAK_PARA and REASON lines, or NO_BREAKS_NEEDED.`;

/**
 * Proposes breaks, measures the resulting chunks, and sends the
 * measurements back for revision while any chunk sits outside the flexible
 * window.
 */
export class AgentChunker implements ChunkingStrategy {
  readonly name = "agent";

  constructor(
    private readonly completer: TextCompleter,
    private readonly options: AgentChunkerOptions
  ) {}

  async attempt(input: ChunkingInput): Promise<Result<BreakPlan, ChunkingError>> {
    const prompt = buildBreakPrompt(input.paragraphs, input.targetWords, input.totalWords);
    if (prompt.length > this.options.maxPromptChars) {
      return fail(
        new ChunkingError(this.name, `prompt is ${prompt.length} characters, over the limit`)
      );
    }

    const conversation: ChatTurn[] = [{ role: "user", content: prompt }];
    let accepted: number[] | null = null;

    for (let round = 0; round <= this.options.maxRevisionRounds; round++) {
      let reply: string;
      try {
        reply = await this.completer.complete({
          model: this.options.model,
          system: SYSTEM,
          maxTokens: 2000,
          messages: conversation,
          timeoutMs: this.options.timeoutMs,
        });
      } catch (error) {
        if (accepted) break;
        return fail(new ChunkingError(this.name, errorMessage(error)));
      }

      const parsed = parseBreakResponse(reply, input.paragraphs.length);
      if (!parsed.noBreaksNeeded && parsed.breaks.length === 0) {
        if (accepted) break;
        return fail(new ChunkingError(this.name, "reply contained no usable BREAK_PARA lines"));
      }

      accepted = parsed.breaks;
      const measures = this.measure(input, parsed.breaks);
      const outliers = measures.filter((m) => this.outsideWindow(m, input.targetWords));

      if (outliers.length === 0) {
        return ok({ breaks: accepted });
      }
      if (round === this.options.maxRevisionRounds) break;

      console.log(
        `[Chunking] Agent round ${round + 1}: ${outliers.length} chunk(s) outside the window, asking for a revision`
      );
      conversation.push(
        { role: "assistant", content: reply },
        { role: "user", content: this.revisionPrompt(measures, input.targetWords) }
      );
    }

    return accepted ? ok({ breaks: accepted }) : fail(new ChunkingError(this.name, "no proposal"));
  }

  private measure(input: ChunkingInput, proposed: number[]): SegmentMeasure[] {
    const { breaks, mandatory } = finalizeBreaks(input.paragraphs, proposed, input);
    const bounds = [0, ...breaks, input.paragraphs.length];
    const fixed = new Set([0, ...mandatory, input.paragraphs.length]);
    const measures: SegmentMeasure[] = [];

    for (let i = 0; i < bounds.length - 1; i++) {
      const segment: Paragraph[] = input.paragraphs.slice(bounds[i], bounds[i + 1]);
      measures.push({
        first: bounds[i] + 1,
        last: bounds[i + 1],
        words: segmentWords(segment),
        adjustable: !(fixed.has(bounds[i]) && fixed.has(bounds[i + 1])),
      });
    }

    return measures;
  }

  private outsideWindow(measure: SegmentMeasure, targetWords: number): boolean {
    if (measure.words > targetWords * WINDOW_HIGH) return true;
    // A short section between two markers cannot be helped.
    return measure.adjustable && measure.words < targetWords * WINDOW_LOW;
  }

  private revisionPrompt(measures: SegmentMeasure[], targetWords: number): string {
    const low = Math.round(targetWords * WINDOW_LOW);
    const high = Math.round(targetWords * WINDOW_HIGH);
    const lines = measures.map((m, i) => {
      const flag = this.outsideWindow(m, targetWords) ? "  <-- outside window" : "";
      return `Chunk ${i + 1}: paragraphs ${m.first}-${m.last}, ${m.words} words${flag}`;
    });

    return `Your breaks produce these chunks (after applying the mandatory scene breaks):

${lines.join("\n")}

Every chunk should be between ${low} and ${high} words. Revise the breaks so the flagged chunks fall inside that window, still preferring natural scene transitions. Answer with the complete revised list of BREAK_PARA lines.`;
  }
}
