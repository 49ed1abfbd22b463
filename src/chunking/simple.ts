import { ok, type Result } from "../shared/result.js";
import type { ChunkingError } from "../shared/errors.js";
import type { BreakPlan, ChunkingInput, ChunkingStrategy, Paragraph } from "./types.js";

/**
 * Greedy paragraph packing inside each marker-delimited section. A chunk
 * closes once it reaches the target, or before a paragraph that would push
 * it past target × (1 + tolerance). Paragraphs are never split.
 */
export class SimpleChunker implements ChunkingStrategy {
  readonly name = "simple";

  async attempt(input: ChunkingInput): Promise<Result<BreakPlan, ChunkingError>> {
    return ok({ breaks: planSimpleBreaks(input) });
  }
}

export function planSimpleBreaks(input: ChunkingInput): number[] {
  const maxWords = input.targetWords * (1 + input.tolerance);
  const breaks: number[] = [];

  for (const section of sections(input.paragraphs)) {
    let current = 0;
    let closeBeforeNext = false;

    for (const paragraph of section) {
      if (current > 0 && (closeBeforeNext || current + paragraph.words > maxWords)) {
        breaks.push(paragraph.index);
        current = 0;
      }

      current += paragraph.words;
      closeBeforeNext = current >= input.targetWords;
    }
  }

  return breaks;
}

function sections(paragraphs: Paragraph[]): Paragraph[][] {
  const result: Paragraph[][] = [[]];
  for (const paragraph of paragraphs) {
    if (paragraph.sceneBreak) {
      result.push([]);
    } else {
      result[result.length - 1].push(paragraph);
    }
  }
  return result.filter((section) => section.length > 0);
}
