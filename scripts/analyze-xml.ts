/**
 * XML Analyze Tool
 *
 * Classifies an XML file, extracts its summary and chunks it, printing the
 * result as JSON.
 *
 * Usage:
 *   npx tsx scripts/analyze-xml.ts <file> [options]
 *   npx tsx scripts/analyze-xml.ts --list-handlers
 *
 * Options:
 *   --chunks           Include the chunks (default: counts only)
 *   --target-depth=N   Structural boundary depth
 *   --min-chars=N      Merge threshold for small structural units
 *   --max-chars=N      Split threshold for oversized chunks
 *   --no-parent-context  Leave the ancestor chain out of chunk metadata
 *   --output=FILE      Write the JSON to a file instead of stdout
 *   --list-handlers    List the built-in handlers and exit
 *
 * Chunk options also come from XML_CHUNK_* variables in .env.local.
 * Set DEBUG=xml:* to trace the pipeline.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { config } from "dotenv";
import {
  BUILTIN_HANDLERS,
  type ChunkOptions,
  type DocumentAnalysis,
  genericHandler,
  MalformedInputError,
  processXml,
} from "@/lib/xml";

config({ path: ".env.local" });

// Parse command line arguments
const args = process.argv.slice(2);
const file = args.find((a) => !a.startsWith("--"));
const includeChunks = args.includes("--chunks");
const listHandlers = args.includes("--list-handlers");
const outputFile = args.find((a) => a.startsWith("--output="))?.split("=")[1];

function log(message: string) {
  // stdout carries the JSON
  console.error(`[analyze] ${message}`);
}

function intFlag(name: string): number | undefined {
  const value = args.find((a) => a.startsWith(`--${name}=`))?.split("=")[1];
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

function chunkOptions(): Partial<ChunkOptions> {
  const options: Partial<ChunkOptions> = {};
  const targetDepth = intFlag("target-depth");
  const minChunkChars = intFlag("min-chars");
  const maxChunkChars = intFlag("max-chars");
  if (targetDepth !== undefined) {
    options.targetDepth = targetDepth;
  }
  if (minChunkChars !== undefined) {
    options.minChunkChars = minChunkChars;
  }
  if (maxChunkChars !== undefined) {
    options.maxChunkChars = maxChunkChars;
  }
  if (args.includes("--no-parent-context")) {
    options.includeParentContext = false;
  }
  return options;
}

function toReport(result: DocumentAnalysis) {
  const { classification } = result;
  return {
    documentType: classification.documentType,
    confidence: classification.confidence,
    candidates: classification.ranked
      .filter((candidate) => candidate.score > 0)
      .map(({ id, score, evidence }) => ({ id, score, evidence })),
    summary: result.summary.fields,
    mode: result.mode,
    chunkCount: result.chunks.length,
    tokenEstimate: result.chunks.reduce(
      (sum, chunk) => sum + chunk.metadata.tokenEstimate,
      0
    ),
    diagnostics: result.diagnostics,
    ...(includeChunks ? { chunks: result.chunks } : {}),
  };
}

function write(json: unknown) {
  const text = JSON.stringify(json, null, 2);
  if (outputFile) {
    writeFileSync(outputFile, text);
    log(`JSON output written to: ${outputFile}`);
  } else {
    console.log(text);
  }
}

function main() {
  if (listHandlers) {
    write(
      [...BUILTIN_HANDLERS, genericHandler].map((handler) => ({
        id: handler.id,
        label: handler.label,
        category: handler.category,
        priority: handler.priority,
      }))
    );
    return;
  }

  if (!file) {
    console.error("Usage: npx tsx scripts/analyze-xml.ts <file> [options]");
    process.exit(1);
  }
  if (!existsSync(file)) {
    console.error(`File not found: ${file}`);
    process.exit(1);
  }

  log(`Analyzing ${file}`);
  let result: DocumentAnalysis;
  try {
    result = processXml(readFileSync(file), chunkOptions());
  } catch (error) {
    if (error instanceof MalformedInputError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  log(
    `${result.classification.documentType} (${result.classification.confidence}), ${result.chunks.length} chunks, ${result.mode} mode`
  );
  write(toReport(result));
}

try {
  main();
} catch (error) {
  console.error("Fatal error:", error);
  process.exit(1);
}
