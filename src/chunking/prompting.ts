import type { Paragraph } from "./types.js";

/**
 * Render paragraphs as "[Para n] (w words)" blocks, 1-based, for the
 * break-finding prompts. Markers are shown as SCENE BREAK.
 */
export function numberParagraphs(paragraphs: Paragraph[]): string {
  return paragraphs
    .map((p) =>
      p.sceneBreak
        ? `[Para ${p.index + 1}] SCENE BREAK`
        : `[Para ${p.index + 1}] (${p.words} words)\n${p.text}`
    )
    .join("\n\n");
}

export interface ParsedBreaks {
  breaks: number[];
  noBreaksNeeded: boolean;
}

/**
 * Read BREAK_PARA lines from a reply. "BREAK_PARA: 12" means chunk two
 * starts at paragraph 12, so it maps to index 11. Numbers outside
 * 2..paragraphCount are ignored.
 */
export function parseBreakResponse(text: string, paragraphCount: number): ParsedBreaks {
  const breaks: number[] = [];

  for (const line of text.split("\n")) {
    const match = line.replace(/\*\*/g, "").match(/BREAK_PARA\s*:\s*\[?(\d+)/i);
    if (!match) continue;

    const paragraphNumber = parseInt(match[1], 10);
    if (paragraphNumber >= 2 && paragraphNumber <= paragraphCount) {
      breaks.push(paragraphNumber - 1);
    }
  }

  return {
    breaks: [...new Set(breaks)].sort((a, b) => a - b),
    noBreaksNeeded: breaks.length === 0 && /NO[_ ]BREAKS(?:[_ ]NEEDED)?/i.test(text),
  };
}

export function buildBreakPrompt(
  paragraphs: Paragraph[],
  targetWords: number,
  totalWords: number
): string {
  const markers = paragraphs.filter((p) => p.sceneBreak).map((p) => p.index + 1);

  return `Analyze this story and choose the paragraphs where new reading chunks should begin.

Target: about ${targetWords} words per chunk (flexible)
Total: ${totalWords} words, ${paragraphs.length} paragraphs
Scene-break markers (always a chunk boundary): ${markers.length > 0 ? markers.join(", ") : "none"}

GOOD BREAKS, in order of preference:
1. The explicit scene-break markers listed above.
2. A move to a new location or a significant passage of time.
3. Just after a conflict or action sequence resolves, before the next begins.
4. A change of point-of-view character.
5. After a character finishes an emotional arc.

BAD BREAKS:
- In the middle of a fight, a chase, or a conversation
- During a climax, before the tension resolves
- Inside a flashback or remembered scene

Chunks may run from about ${Math.round(targetWords * 0.4)} to ${Math.round(targetWords * 1.6)} words when that lands on a proper scene break. Narrative coherence matters more than equal sizes.

For each break, answer with one line:
BREAK_PARA: <number of the paragraph that starts the new chunk>
REASON: <what ends before the break> | <what begins after it>

If the story should stay in one piece, answer NO_BREAKS_NEEDED.

Text with paragraph numbers:
${numberParagraphs(paragraphs)}`;
}
