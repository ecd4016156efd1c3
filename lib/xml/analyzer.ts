/**
 * Pipeline: parse -> dispatch -> extract -> chunk -> resolve references.
 *
 * An analyzer is built on an explicit registry, which it seals. The module
 * level functions use a default analyzer over the built-in handlers with the
 * generic handler as fallback.
 */

import { createDefaultRegistry, genericHandler } from "../handlers";
import { chunkDocument } from "./chunking";
import { xmlDebug } from "./debug";
import { dispatch, scoreHandler } from "./dispatcher";
import { parseXml } from "./document";
import {
  ExtractionError,
  InvalidHandlerError,
  UnclassifiedDocumentError,
} from "./errors";
import { extractSummary } from "./extraction";
import type { HandlerRegistry } from "./registry";
import type {
  Chunk,
  ChunkOptions,
  ClassificationResult,
  Diagnostic,
  DocumentAnalysis,
  HandlerDescriptor,
  ParsedDocument,
  SummaryRecord,
  XmlInput,
} from "./types";

const dbg = xmlDebug("analyze");

export type XmlAnalyzerConfig = {
  registry: HandlerRegistry;
  /** Used by analyze/process when no registered handler matches */
  fallback?: HandlerDescriptor;
};

export type AnalysisResult = {
  classification: ClassificationResult;
  summary: SummaryRecord;
};

export type XmlAnalyzer = {
  readonly registry: HandlerRegistry;
  readonly fallback: HandlerDescriptor | undefined;
  classify(input: XmlInput): ClassificationResult;
  classifyDocument(doc: ParsedDocument): ClassificationResult;
  analyze(input: XmlInput): AnalysisResult;
  analyzeDocument(doc: ParsedDocument): AnalysisResult;
  chunk(input: XmlInput, options?: Partial<ChunkOptions>): Chunk[];
  process(input: XmlInput, options?: Partial<ChunkOptions>): DocumentAnalysis;
  processDocument(
    doc: ParsedDocument,
    options?: Partial<ChunkOptions>
  ): DocumentAnalysis;
};

export function createXmlAnalyzer(config: XmlAnalyzerConfig): XmlAnalyzer {
  const { registry, fallback } = config;
  registry.seal();

  if (fallback && registry.has(fallback.id)) {
    dbg("fallback %s is also registered", fallback.id);
  }

  const fallbackClassification = (
    doc: ParsedDocument,
    handler: HandlerDescriptor,
    error: UnclassifiedDocumentError
  ): ClassificationResult => {
    const diagnostics: Diagnostic[] = [...error.diagnostics];
    const candidate = scoreHandler(
      doc,
      { ...handler, registrationIndex: registry.size },
      diagnostics
    );
    diagnostics.push({
      kind: "fallback_handler",
      handlerId: handler.id,
      reason: error.message,
    });
    dbg("<%s> falls back to %s", doc.root.name, handler.id);
    return {
      documentType: handler.id,
      confidence: candidate.score,
      ranked: error.ranked,
      diagnostics,
    };
  };

  const classifyWithFallback = (
    doc: ParsedDocument
  ): { classification: ClassificationResult; handler: HandlerDescriptor } => {
    let classification: ClassificationResult;
    try {
      classification = dispatch(doc, registry);
    } catch (error) {
      if (fallback && error instanceof UnclassifiedDocumentError) {
        return {
          classification: fallbackClassification(doc, fallback, error),
          handler: fallback,
        };
      }
      throw error;
    }

    const handler = registry.get(classification.documentType);
    if (!handler) {
      throw new InvalidHandlerError(
        `Handler "${classification.documentType}" is not registered`
      );
    }
    return { classification, handler };
  };

  const analyzeDocument = (doc: ParsedDocument): AnalysisResult => {
    const { classification, handler } = classifyWithFallback(doc);
    const summary = extractSummary(doc, handler, classification);
    return { classification, summary };
  };

  /**
   * Hints and document type for chunking when classification or extraction
   * can't supply a full summary.
   */
  const chunkingInput = (
    doc: ParsedDocument
  ): { summary?: SummaryRecord; documentType?: string } => {
    try {
      const { classification, summary } = analyzeDocument(doc);
      return { summary, documentType: classification.documentType };
    } catch (error) {
      if (error instanceof ExtractionError) {
        dbg(
          "chunking <%s> with the partial %s record: %s",
          doc.root.name,
          error.handlerId ?? "unknown",
          error.message
        );
        return {
          summary: error.partial,
          documentType: error.classification?.documentType,
        };
      }
      if (error instanceof UnclassifiedDocumentError) {
        dbg("chunking unclassified <%s> structurally", doc.root.name);
        return {};
      }
      throw error;
    }
  };

  const processDocument = (
    doc: ParsedDocument,
    options?: Partial<ChunkOptions>
  ): DocumentAnalysis => {
    const { classification, handler } = classifyWithFallback(doc);
    const diagnostics: Diagnostic[] = [...classification.diagnostics];

    let summary: SummaryRecord;
    try {
      summary = extractSummary(doc, handler, classification);
    } catch (error) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }
      summary = error.partial;
      diagnostics.push({
        kind: "partial_extraction",
        handlerId: handler.id,
        message: error.message,
        failedFields: error.failedFields,
      });
    }

    const chunked = chunkDocument(doc, summary, options, {
      documentType: classification.documentType,
    });
    diagnostics.push(...chunked.diagnostics);
    return {
      classification,
      summary,
      chunks: chunked.chunks,
      mode: chunked.mode,
      diagnostics,
    };
  };

  return {
    registry,
    fallback,
    classify: (input) => dispatch(parseXml(input), registry),
    classifyDocument: (doc) => dispatch(doc, registry),
    analyze: (input) => analyzeDocument(parseXml(input)),
    analyzeDocument,
    chunk: (input, options) => {
      const doc = parseXml(input);
      const { summary, documentType } = chunkingInput(doc);
      return chunkDocument(doc, summary, options, { documentType }).chunks;
    },
    process: (input, options) => processDocument(parseXml(input), options),
    processDocument,
  };
}

// =============================================================================
// DEFAULT ANALYZER
// =============================================================================

let defaultAnalyzer: XmlAnalyzer | undefined;

/**
 * Analyzer over the built-in handlers, with the generic handler as fallback.
 */
export function getDefaultAnalyzer(): XmlAnalyzer {
  defaultAnalyzer ??= createXmlAnalyzer({
    registry: createDefaultRegistry(),
    fallback: genericHandler,
  });
  return defaultAnalyzer;
}

/**
 * @throws MalformedInputError, UnclassifiedDocumentError
 */
export function classify(input: XmlInput): ClassificationResult {
  return getDefaultAnalyzer().classify(input);
}

/**
 * @throws MalformedInputError, ExtractionError
 */
export function analyze(input: XmlInput): AnalysisResult {
  return getDefaultAnalyzer().analyze(input);
}

/**
 * @throws MalformedInputError
 */
export function chunk(
  input: XmlInput,
  options?: Partial<ChunkOptions>
): Chunk[] {
  return getDefaultAnalyzer().chunk(input, options);
}

/**
 * Full pipeline: classification, summary, chunks and diagnostics.
 *
 * @throws MalformedInputError
 */
export function processXml(
  input: XmlInput,
  options?: Partial<ChunkOptions>
): DocumentAnalysis {
  return getDefaultAnalyzer().process(input, options);
}
