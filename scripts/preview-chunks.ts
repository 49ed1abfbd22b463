/**
 * Chunk a local text file with the configured strategies and print the
 * resulting part sizes, without touching the database.
 *
 * Usage: npx tsx scripts/preview-chunks.ts <story.txt> [--target 5000] [--prefer agent|llm|simple]
 */

import "dotenv/config";
import { readFile } from "fs/promises";
import { ChunkingOrchestrator, type ChunkingStrategyName } from "../src/chunking/index.js";
import { loadConfig } from "../src/config/index.js";
import { AnthropicCompleter } from "../src/llm/index.js";

function argValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

function isStrategyName(value: string): value is ChunkingStrategyName {
  return value === "agent" || value === "llm" || value === "simple";
}

async function main() {
  const args = process.argv.slice(2);
  const file = args.find((arg, i) => !arg.startsWith("--") && !(args[i - 1] ?? "").startsWith("--"));

  if (!file) {
    console.error("Usage: npx tsx scripts/preview-chunks.ts <story.txt> [--target N] [--prefer agent|llm|simple]");
    process.exit(1);
  }

  const config = loadConfig();
  const target = argValue(args, "--target");
  const prefer = argValue(args, "--prefer");

  const completer = config.anthropic.apiKey
    ? new AnthropicCompleter(config.anthropic.apiKey, config.anthropic.model)
    : undefined;
  const orchestrator = new ChunkingOrchestrator(config.chunking, { completer });

  const text = await readFile(file, "utf8");
  const outcome = await orchestrator.chunk(text, {
    targetWords: target ? parseInt(target, 10) : undefined,
    preferred: prefer && isStrategyName(prefer) ? prefer : undefined,
  });

  console.log(`\n📖 ${file}: ${outcome.totalWords} words`);
  console.log(`Strategy: ${outcome.chunkingStrategy}`);
  for (const attempt of outcome.attempts) {
    console.log(`  (skipped ${attempt.strategy}: ${attempt.message})`);
  }
  console.log("");

  for (const chunk of outcome.chunks) {
    const opening = chunk.narrative.slice(0, 70).replace(/\s+/g, " ");
    console.log(
      `Part ${chunk.chunkNumber}/${chunk.totalChunks}: ${chunk.narrativeWordCount} words` +
        (chunk.recap ? ` (+${chunk.wordCount - chunk.narrativeWordCount} recap)` : "") +
        `  "${opening}..."`
    );
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
