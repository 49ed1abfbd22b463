import type { TextCompleter } from "../llm/index.js";
import { ChunkingError, errorMessage } from "../shared/errors.js";
import { fail, type Result } from "../shared/result.js";
import { withTimeout } from "../shared/timeout.js";
import { countWords } from "../shared/text.js";
import { AgentChunker } from "./agent.js";
import { LlmChunker } from "./llm.js";
import {
  buildParagraphs,
  findOversizedSegment,
  finalizeBreaks,
  mandatoryBreaks,
  segmentWords,
  segmentsFromBreaks,
} from "./plan.js";
import { ExtractiveRecapWriter, ModelRecapWriter, formatRecap, type RecapWriter } from "./recap.js";
import { SimpleChunker } from "./simple.js";
import type {
  BreakPlan,
  ChunkDraft,
  ChunkingAttempt,
  ChunkingConfig,
  ChunkingInput,
  ChunkingOptions,
  ChunkingOutcome,
  ChunkingStrategy,
  Paragraph,
} from "./types.js";

export interface ChunkingDependencies {
  completer?: TextCompleter;
  recapWriter?: RecapWriter;
}

/**
 * Picks break points with the first strategy that produces an acceptable
 * plan (agent, llm, simple) and assembles numbered chunks with recaps.
 */
export class ChunkingOrchestrator {
  private readonly strategies: ChunkingStrategy[];
  private readonly recapWriter: RecapWriter;

  constructor(
    private readonly config: ChunkingConfig,
    deps: ChunkingDependencies = {}
  ) {
    const { completer } = deps;
    this.strategies = [];

    if (completer && config.useAgent) {
      this.strategies.push(
        new AgentChunker(completer, {
          model: config.agentModel,
          maxPromptChars: config.maxSinglePassChars,
          maxRevisionRounds: config.maxRevisionRounds,
          timeoutMs: config.strategyTimeoutMs,
        })
      );
    }
    if (completer && config.useLlm) {
      this.strategies.push(
        new LlmChunker(completer, {
          model: config.llmModel,
          maxPromptChars: config.maxSinglePassChars,
          timeoutMs: config.strategyTimeoutMs,
        })
      );
    }
    if (!completer && (config.useAgent || config.useLlm)) {
      console.warn("[Chunking] Model chunking enabled but no model client configured");
    }
    this.strategies.push(new SimpleChunker());

    this.recapWriter =
      deps.recapWriter ??
      (completer && config.useLlm
        ? new ModelRecapWriter(completer, {
            model: config.llmModel,
            timeoutMs: config.strategyTimeoutMs,
          })
        : new ExtractiveRecapWriter());
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async chunk(text: string, options: ChunkingOptions = {}): Promise<ChunkingOutcome> {
    const paragraphs = buildParagraphs(text);
    const totalWords = paragraphs.reduce((sum, p) => sum + p.words, 0);

    if (totalWords === 0) {
      throw new ChunkingError("simple", "text has no narrative to chunk");
    }

    const input: ChunkingInput = {
      paragraphs,
      targetWords: options.targetWords ?? this.config.targetWords,
      tolerance: this.config.tolerance,
      minChunkWords: this.config.minChunkWords,
      totalWords,
    };

    const attempts: ChunkingAttempt[] = [];

    for (const strategy of this.ordered(options.preferred)) {
      const result = await this.run(strategy, input);

      if (!result.ok) {
        console.warn(`[Chunking] ${strategy.name} failed: ${result.error.message}`);
        attempts.push({ strategy: strategy.name, message: result.error.message });
        continue;
      }

      // The simple plan already closes at every marker inside the tolerance band.
      const breaks =
        strategy.name === "simple"
          ? [...mandatoryBreaks(paragraphs), ...result.value.breaks]
          : finalizeBreaks(paragraphs, result.value.breaks, input).breaks;
      const segments = segmentsFromBreaks(paragraphs, breaks);

      if (strategy.name !== "simple") {
        const hardCap = input.targetWords * 2;
        const oversized = findOversizedSegment(segments, hardCap);
        if (oversized) {
          const message = `plan has a ${segmentWords(oversized)}-word chunk over the ${hardCap}-word cap`;
          console.warn(`[Chunking] ${strategy.name} rejected: ${message}`);
          attempts.push({ strategy: strategy.name, message });
          continue;
        }
      }

      const chunks = await this.assemble(segments);
      console.log(
        `[Chunking] ${strategy.name} produced ${chunks.length} chunk(s): ${chunks
          .map((c) => c.narrativeWordCount)
          .join(", ")} words`
      );

      return { chunks, chunkingStrategy: strategy.name, totalWords, attempts };
    }

    // The simple strategy always succeeds, so this only happens if it was removed.
    throw new ChunkingError(
      "simple",
      `no strategy produced a plan: ${attempts.map((a) => a.message).join("; ")}`
    );
  }

  private ordered(preferred?: ChunkingOptions["preferred"]): ChunkingStrategy[] {
    const first = this.strategies.find((s) => s.name === preferred);
    if (!first) return this.strategies;
    return [first, ...this.strategies.filter((s) => s !== first)];
  }

  private async run(
    strategy: ChunkingStrategy,
    input: ChunkingInput
  ): Promise<Result<BreakPlan, ChunkingError>> {
    try {
      return await withTimeout(
        strategy.attempt(input),
        this.config.strategyTimeoutMs,
        `${strategy.name} chunking`
      );
    } catch (error) {
      return fail(new ChunkingError(strategy.name, errorMessage(error)));
    }
  }

  private async assemble(segments: Paragraph[][]): Promise<ChunkDraft[]> {
    const narratives = segments.map((segment) => segment.map((p) => p.text).join("\n\n"));
    const chunks: ChunkDraft[] = [];

    for (let i = 0; i < narratives.length; i++) {
      const narrative = narratives[i];
      const recap =
        i === 0 ? null : await this.recapWriter.write(narratives[i - 1], this.config.recapWords);
      const text = recap === null ? narrative : `${formatRecap(recap)}\n\n${narrative}`;

      chunks.push({
        chunkNumber: i + 1,
        totalChunks: narratives.length,
        text,
        recap,
        narrative,
        wordCount: countWords(text),
        narrativeWordCount: segmentWords(segments[i]),
      });
    }

    return chunks;
  }
}
