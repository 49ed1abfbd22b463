import type { TextCompleter } from "../llm/index.js";
import {
  ExtractionError,
  TimeoutError,
  errorMessage,
  type ExtractionAttempt,
} from "../shared/errors.js";
import { withTimeout } from "../shared/timeout.js";
import { authorFromSender, cleanSubject, countWords } from "../shared/text.js";
import { AgentExtractionStrategy } from "./agent.js";
import { InlineTextStrategy } from "./inline.js";
import { PasswordProtectedUrlStrategy, type HttpFetch } from "./url.js";
import type {
  ContentDescriptor,
  ExtractionConfig,
  ExtractionResult,
  ExtractionStrategy,
} from "./types.js";

export interface ExtractionDependencies {
  completer?: TextCompleter;
  fetch?: HttpFetch;
}

/**
 * Runs the extraction strategies in a fixed order (agent, inline, url) and
 * keeps the first success.
 */
export class ExtractionOrchestrator {
  private readonly strategies: ExtractionStrategy[];

  constructor(
    private readonly config: ExtractionConfig,
    deps: ExtractionDependencies = {}
  ) {
    const url = new PasswordProtectedUrlStrategy({
      minChars: config.minPageChars,
      timeoutMs: config.fetchTimeoutMs,
      fetch: deps.fetch,
    });

    this.strategies = [];
    if (config.useAgent && deps.completer) {
      this.strategies.push(
        new AgentExtractionStrategy(deps.completer, url, {
          model: config.agentModel,
          minConfidence: config.agentMinConfidence,
          minWords: config.minAgentWords,
        })
      );
    } else if (config.useAgent) {
      console.warn("[Extraction] Agent extraction enabled but no model client configured");
    }
    this.strategies.push(new InlineTextStrategy(config.minInlineChars), url);
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async extract(input: ContentDescriptor): Promise<ExtractionResult> {
    const attempts: ExtractionAttempt[] = [];

    for (const strategy of this.strategies) {
      let failure: ExtractionError;

      try {
        const result = await withTimeout(
          strategy.attempt(input),
          this.config.strategyTimeoutMs,
          `${strategy.name} extraction`
        );

        if (result.ok) {
          const { content, confidence, title, sourceUrl } = result.value;
          const wordCount = countWords(content);
          console.log(
            `[Extraction] ${strategy.name} succeeded (${wordCount} words)`
          );

          return {
            content,
            metadata: {
              title: title || cleanSubject(input.subject) || "Untitled Story",
              author: authorFromSender(input.from),
              extractionMethod: strategy.name,
              wordCount,
              confidence,
              sourceUrl: sourceUrl ?? null,
            },
          };
        }

        failure = result.error;
      } catch (error) {
        failure = new ExtractionError(
          error instanceof TimeoutError ? "timeout" : "parse",
          errorMessage(error)
        );
      }

      console.warn(
        `[Extraction] ${strategy.name} failed (${failure.kind}): ${failure.message}`
      );
      attempts.push({
        strategy: strategy.name,
        kind: failure.kind,
        message: failure.message,
      });
    }

    throw ExtractionError.exhausted(attempts);
  }
}
