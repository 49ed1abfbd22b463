import { countWords, isSceneBreak, splitParagraphs } from "../shared/text.js";
import type { Paragraph } from "./types.js";

export function buildParagraphs(text: string): Paragraph[] {
  const blocks = splitParagraphs(text.replace(/\r\n?/g, "\n")).flatMap(separateDividers);

  return blocks.map((paragraph, index) => {
    const sceneBreak = isSceneBreak(paragraph);
    return {
      index,
      text: paragraph,
      words: sceneBreak ? 0 : countWords(paragraph),
      sceneBreak,
    };
  });
}

/**
 * A divider on its own line inside a block ("...end.\n* * *\nNext...") is
 * still a scene break, so it becomes a paragraph of its own.
 */
function separateDividers(block: string): string[] {
  const pieces: string[] = [];
  let lines: string[] = [];

  const flush = () => {
    const joined = lines.join("\n").trim();
    if (joined.length > 0) pieces.push(joined);
    lines = [];
  };

  for (const line of block.split("\n")) {
    if (line.trim().length > 0 && isSceneBreak(line)) {
      flush();
      pieces.push(line.trim());
    } else {
      lines.push(line);
    }
  }
  flush();

  return pieces;
}

export interface FinalizeOptions {
  targetWords: number;
  tolerance: number;
  minChunkWords: number;
}

export interface FinalPlan {
  breaks: number[];
  mandatory: number[];
}

/**
 * Paragraph indices of scene-break markers that can start a chunk. A marker
 * at the very start of the text has nothing before it to close.
 */
export function mandatoryBreaks(paragraphs: Paragraph[]): number[] {
  return paragraphs.filter((p) => p.sceneBreak && p.index > 0).map((p) => p.index);
}

/**
 * Narrative words in paragraphs [from, to).
 */
export function wordsBetween(paragraphs: Paragraph[], from: number, to: number): number {
  let total = 0;
  for (let i = Math.max(0, from); i < Math.min(to, paragraphs.length); i++) {
    total += paragraphs[i].words;
  }
  return total;
}

/**
 * Turn a strategy's proposed breaks into the final plan: every marker is a
 * break, proposals near a marker collapse onto it, and proposals that would
 * leave a segment under the minimum size are dropped.
 */
export function finalizeBreaks(
  paragraphs: Paragraph[],
  proposed: number[],
  options: FinalizeOptions
): FinalPlan {
  const count = paragraphs.length;
  const mandatory = mandatoryBreaks(paragraphs);
  const snapWindow = options.tolerance * options.targetWords;

  const candidates = uniqueSorted(
    proposed
      .filter((b) => Number.isInteger(b) && b > 0 && b < count)
      .map((b) => snapToMarker(paragraphs, b, mandatory, snapWindow))
      .filter((b) => !mandatory.includes(b))
  );

  let breaks = [...mandatory];
  for (const candidate of candidates) {
    const next = uniqueSorted([...breaks, candidate]);
    const position = next.indexOf(candidate);
    const before = position > 0 ? next[position - 1] : 0;
    const after = position < next.length - 1 ? next[position + 1] : count;

    if (
      wordsBetween(paragraphs, before, candidate) >= options.minChunkWords &&
      wordsBetween(paragraphs, candidate, after) >= options.minChunkWords
    ) {
      breaks = next;
    }
  }

  return { breaks, mandatory };
}

function snapToMarker(
  paragraphs: Paragraph[],
  index: number,
  markers: number[],
  window: number
): number {
  let best = index;
  let bestDistance = Infinity;

  for (const marker of markers) {
    const distance =
      marker < index
        ? wordsBetween(paragraphs, marker, index)
        : wordsBetween(paragraphs, index, marker);
    if (distance <= window && distance < bestDistance) {
      best = marker;
      bestDistance = distance;
    }
  }

  return best;
}

function uniqueSorted(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Cut the paragraphs at the given breaks. Marker paragraphs at either edge
 * of a segment are dropped, and segments left empty disappear.
 */
export function segmentsFromBreaks(paragraphs: Paragraph[], breaks: number[]): Paragraph[][] {
  const bounds = [0, ...uniqueSorted(breaks).filter((b) => b > 0 && b < paragraphs.length), paragraphs.length];
  const segments: Paragraph[][] = [];

  for (let i = 0; i < bounds.length - 1; i++) {
    const segment = paragraphs.slice(bounds[i], bounds[i + 1]);
    while (segment.length > 0 && segment[0].sceneBreak) segment.shift();
    while (segment.length > 0 && segment[segment.length - 1].sceneBreak) segment.pop();
    if (segment.length > 0) segments.push(segment);
  }

  return segments;
}

export function segmentWords(segment: Paragraph[]): number {
  return segment.reduce((sum, p) => sum + p.words, 0);
}

/**
 * The first segment with more than one paragraph above the hard cap, if any.
 */
export function findOversizedSegment(
  segments: Paragraph[][],
  hardCap: number
): Paragraph[] | undefined {
  return segments.find(
    (segment) =>
      segment.filter((p) => !p.sceneBreak).length > 1 && segmentWords(segment) > hardCap
  );
}
