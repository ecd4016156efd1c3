/**
 * Text rendering helpers for the document model.
 */

import { encode } from "gpt-tokenizer";
import type { XmlElement, XmlNode } from "./types";

const WHITESPACE_REGEX = /\s+/g;

/**
 * Collapse runs of whitespace (including newlines) to single spaces and trim.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(WHITESPACE_REGEX, " ").trim();
}

// Subtree text is requested repeatedly while sizing chunks
const textCache = new WeakMap<XmlElement, string>();

/**
 * Full text of an element's subtree in document order.
 * Text runs are whitespace-normalized and joined with single spaces.
 */
export function textContent(el: XmlElement): string {
  const cached = textCache.get(el);
  if (cached !== undefined) {
    return cached;
  }
  const text = renderNodes(el.nodes);
  textCache.set(el, text);
  return text;
}

export function nodeText(node: XmlNode): string {
  return node.type === "text"
    ? normalizeWhitespace(node.value)
    : textContent(node);
}

/**
 * Render a run of sibling nodes as one string.
 */
export function renderNodes(nodes: readonly XmlNode[]): string {
  const parts: string[] = [];
  for (const node of nodes) {
    const text = nodeText(node);
    if (text) {
      parts.push(text);
    }
  }
  return parts.join(" ");
}

/**
 * Collect every leaf text run under an element, in document order.
 */
export function leafTexts(el: XmlElement): string[] {
  const texts: string[] = [];
  const walk = (node: XmlNode) => {
    if (node.type === "text") {
      const text = normalizeWhitespace(node.value);
      if (text) {
        texts.push(text);
      }
      return;
    }
    for (const child of node.nodes) {
      walk(child);
    }
  };
  walk(el);
  return texts;
}

// Document text is data: "<|endoftext|>" in a CDATA section is counted as
// plain characters, never as a special token
const PLAIN_TEXT = { disallowedSpecial: new Set<string>() };

/**
 * Token count with the cl100k_base BPE, close enough for embedding budgets.
 */
export function countTokens(text: string): number {
  return encode(text, PLAIN_TEXT).length;
}
