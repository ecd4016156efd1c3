import { childText, getAttribute } from "../xml/query";
import type { SummaryValue, XmlElement } from "../xml/types";

type SummaryObject = { [key: string]: SummaryValue };

/**
 * Drop undefined entries so the object fits SummaryValue.
 */
export function compact(
  record: Record<string, SummaryValue | undefined>
): SummaryObject {
  const result: SummaryObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Occurrence count per value, keys in first-seen order.
 */
export function countBy(values: readonly string[]): SummaryObject {
  const counts: Record<string, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

export function unique(values: readonly (string | undefined)[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value) {
      seen.add(value);
    }
  }
  return [...seen];
}

/**
 * Numeric attribute or child text, undefined when absent or not a number.
 */
export function numberValue(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Child text, or the attribute of the same name when there is no child.
 */
export function childOrAttribute(
  el: XmlElement,
  name: string
): string | undefined {
  return childText(el, name) ?? getAttribute(el, name);
}
