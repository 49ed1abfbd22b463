import { splitRecap } from "../chunking/recap.js";
import { escapeHtml } from "../shared/html.js";
import { splitParagraphs } from "../shared/text.js";

export interface RenderableStory {
  title: string;
  author: string | null;
}

export interface RenderableChunk {
  chunkNumber: number;
  totalChunks: number;
  text: string;
}

export function chunkStoragePath(storyId: number, chunkNumber: number): string {
  return `story-chunks/${storyId}/part-${String(chunkNumber).padStart(3, "0")}.html`;
}

export function chunkTitle(story: RenderableStory, chunk: RenderableChunk): string {
  return `${story.title} - Part ${chunk.chunkNumber}/${chunk.totalChunks}`;
}

function renderParagraph(paragraph: string): string {
  return `<p>${paragraph.split("\n").map(escapeHtml).join("<br>\n")}</p>`;
}

/**
 * A standalone HTML document for one chunk, in the shape Send-to-Kindle
 * converts cleanly: title block, recap as a blockquote, then paragraphs.
 */
export function renderChunkDocument(story: RenderableStory, chunk: RenderableChunk): string {
  const { recap, narrative } = splitRecap(chunk.text);
  const title = escapeHtml(chunkTitle(story, chunk));

  const recapHtml = recap
    ? `  <blockquote class="recap">
    <p><em>Previously:</em></p>
    ${splitParagraphs(recap).map(renderParagraph).join("\n    ")}
  </blockquote>
  <hr>
`
    : "";

  const body = splitParagraphs(narrative).map(renderParagraph).join("\n  ");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${title}</title>
${story.author ? `  <meta name="author" content="${escapeHtml(story.author)}">\n` : ""}  <style>
    body { font-family: Georgia, serif; line-height: 1.5; }
    .recap { font-style: italic; color: #444; }
    p { margin: 0 0 1em; }
  </style>
</head>
<body>
  <h1>${escapeHtml(story.title)}</h1>
  <p class="byline">${story.author ? `by ${escapeHtml(story.author)} · ` : ""}Part ${chunk.chunkNumber} of ${chunk.totalChunks}</p>
${recapHtml}  ${body}
</body>
</html>
`;
}
