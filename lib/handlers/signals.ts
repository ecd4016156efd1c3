/**
 * Detection building blocks shared by the built-in handlers.
 *
 * Two shapes cover every handler:
 * - `weighSignals`: independent signals whose weights add up (capped at 1)
 * - `firstRule`: ordered rules, the first that holds gives the score
 */

import type { DetectionResult, ParsedDocument } from "../xml/types";

export type Signal = {
  weight: number;
  evidence: string;
  test: (doc: ParsedDocument) => boolean;
  /** Score is 0 unless every required signal holds */
  required?: boolean;
};

export type Rule = {
  score: number | ((doc: ParsedDocument) => number);
  evidence: string;
  test: (doc: ParsedDocument) => boolean;
};

export const NO_MATCH: DetectionResult = { score: 0, evidence: [] };

/**
 * Sum the weights of the signals that hold.
 * With `threshold`, totals at or below it count as no match.
 */
export function weighSignals(
  doc: ParsedDocument,
  signals: readonly Signal[],
  options: { threshold?: number } = {}
): DetectionResult {
  let score = 0;
  const evidence: string[] = [];
  for (const signal of signals) {
    if (signal.test(doc)) {
      score += signal.weight;
      evidence.push(signal.evidence);
    } else if (signal.required) {
      return NO_MATCH;
    }
  }
  if (options.threshold !== undefined && score <= options.threshold) {
    return NO_MATCH;
  }
  return { score: Math.min(score, 1), evidence };
}

export function firstRule(
  doc: ParsedDocument,
  rules: readonly Rule[]
): DetectionResult {
  for (const rule of rules) {
    if (rule.test(doc)) {
      const score =
        typeof rule.score === "number" ? rule.score : rule.score(doc);
      return { score, evidence: [rule.evidence] };
    }
  }
  return NO_MATCH;
}

/**
 * How many of the given local names occur anywhere in the document.
 */
export function countPresent(
  doc: ParsedDocument,
  localNames: readonly string[]
): number {
  const present = new Set(doc.elements.map((el) => el.localName));
  return localNames.filter((name) => present.has(name)).length;
}

export function anyElementHasAttribute(
  doc: ParsedDocument,
  attribute: string
): boolean {
  return doc.elements.some((el) => el.attributes[attribute] !== undefined);
}

/**
 * Handler priorities. Precise handlers key on namespaces or unique roots,
 * heuristic ones on common element names.
 */
export const PRIORITY = {
  PRECISE: 10,
  HEURISTIC: 5,
  FALLBACK: 0,
} as const;
