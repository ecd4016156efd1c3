/**
 * Confidence scorer / dispatcher
 *
 * Runs every registered handler's detector against a document and picks
 * exactly one winner. Many formats share superficial structure (generic
 * <element>/<value> shapes), so the choice is a single best match with a
 * fixed ordering rather than "first handler that says yes":
 *
 *   1. higher score (rounded to SCORE_PRECISION decimals)
 *   2. higher priority
 *   3. earlier registration
 *
 * A detector that throws scores 0 and is reported as a diagnostic; it never
 * aborts the dispatch.
 */

import { SCORE_PRECISION } from "./config";
import { xmlDebug } from "./debug";
import { errorMessage, UnclassifiedDocumentError } from "./errors";
import type { HandlerRegistry, RegisteredHandler } from "./registry";
import type {
  ClassificationResult,
  Diagnostic,
  ParsedDocument,
  RankedCandidate,
} from "./types";

const dbg = xmlDebug("dispatch");

const SCORE_FACTOR = 10 ** SCORE_PRECISION;

/**
 * Round a score so near-equal floats compare as ties.
 */
export function roundScore(score: number): number {
  return Math.round(score * SCORE_FACTOR) / SCORE_FACTOR;
}

/**
 * Sort order for candidates: (-score, -priority, registrationIndex).
 */
export function compareCandidates(
  a: RankedCandidate,
  b: RankedCandidate
): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.registrationIndex - b.registrationIndex;
}

/**
 * Run one detector and turn its result into a ranked candidate. Failures and
 * out-of-range scores are recorded in `diagnostics`.
 */
export function scoreHandler(
  doc: ParsedDocument,
  handler: RegisteredHandler,
  diagnostics: Diagnostic[]
): RankedCandidate {
  const candidate: RankedCandidate = {
    id: handler.id,
    score: 0,
    priority: handler.priority,
    registrationIndex: handler.registrationIndex,
    evidence: [],
  };

  let reported: number;
  try {
    const detection = handler.detect(doc);
    reported = detection.score;
    candidate.evidence = [...(detection.evidence ?? [])];
  } catch (error) {
    const message = errorMessage(error);
    dbg("detector %s failed: %s", handler.id, message);
    diagnostics.push({
      kind: "detection_failed",
      handlerId: handler.id,
      message,
    });
    return candidate;
  }

  let score = Number.isFinite(reported) ? reported : 0;
  score = Math.min(1, Math.max(0, score));
  if (score !== reported) {
    dbg("detector %s reported %s, using %s", handler.id, reported, score);
    diagnostics.push({
      kind: "score_adjusted",
      handlerId: handler.id,
      reported,
      adjusted: score,
    });
  }
  candidate.score = roundScore(score);
  return candidate;
}

/**
 * Score every handler and rank them, best first.
 */
export function rankHandlers(
  doc: ParsedDocument,
  registry: HandlerRegistry
): { ranked: RankedCandidate[]; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const ranked = registry
    .all()
    .map((handler) => scoreHandler(doc, handler, diagnostics))
    .sort(compareCandidates);
  return { ranked, diagnostics };
}

/**
 * Choose the handler that owns a document.
 *
 * @throws UnclassifiedDocumentError when no handler scores above zero
 */
export function dispatch(
  doc: ParsedDocument,
  registry: HandlerRegistry
): ClassificationResult {
  const { ranked, diagnostics } = rankHandlers(doc, registry);
  const winner = ranked.find((candidate) => candidate.score > 0);

  if (!winner) {
    dbg("no handler matched <%s>", doc.root.name);
    throw new UnclassifiedDocumentError(doc.root.name, ranked, diagnostics);
  }

  dbg(
    "<%s> -> %s (score %d, priority %d)",
    doc.root.name,
    winner.id,
    winner.score,
    winner.priority
  );
  return {
    documentType: winner.id,
    confidence: winner.score,
    ranked,
    diagnostics,
  };
}
