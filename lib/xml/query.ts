/**
 * Element lookups, path patterns and selectors over the document model.
 *
 * Path patterns match an element's path from the root:
 *   "unload/incident"   exact path
 *   "unload/*"          any child of the root <unload>
 *   "**\/dependency"     any <dependency> at any depth
 *
 * Selectors read values relative to an element:
 *   "@id"               attribute of the element itself
 *   "sys_id"            text of child <sys_id>
 *   "AppenderRef/@ref"  attribute of every child <AppenderRef>
 *   "**\/use/@href"      attribute of every descendant <use>
 */

import { textContent } from "./text";
import type { ParsedDocument, XmlElement } from "./types";

const ANY_SEGMENT = "*";
const ANY_SEGMENTS = "**";

function splitPath(pattern: string): string[] {
  return pattern.split("/").filter((segment) => segment.length > 0);
}

function matchSegments(
  pattern: readonly string[],
  patternIndex: number,
  path: readonly string[],
  pathIndex: number
): boolean {
  if (patternIndex === pattern.length) {
    return pathIndex === path.length;
  }
  const segment = pattern[patternIndex];
  if (segment === ANY_SEGMENTS) {
    for (let i = pathIndex; i <= path.length; i++) {
      if (matchSegments(pattern, patternIndex + 1, path, i)) {
        return true;
      }
    }
    return false;
  }
  if (pathIndex === path.length) {
    return false;
  }
  if (segment !== ANY_SEGMENT && segment !== path[pathIndex]) {
    return false;
  }
  return matchSegments(pattern, patternIndex + 1, path, pathIndex + 1);
}

export function isWildcardPattern(pattern: string): boolean {
  return splitPath(pattern).some(
    (segment) => segment === ANY_SEGMENT || segment === ANY_SEGMENTS
  );
}

/**
 * Test an element path against a path pattern.
 */
export function matchesPath(pattern: string, path: string): boolean {
  return matchSegments(splitPath(pattern), 0, splitPath(path), 0);
}

/**
 * Every element of the document matching a path pattern, in document order.
 */
export function selectDocument(
  doc: ParsedDocument,
  pattern: string
): readonly XmlElement[] {
  if (!isWildcardPattern(pattern)) {
    return doc.index.get(splitPath(pattern).join("/")) ?? [];
  }
  return doc.elements.filter((el) => matchesPath(pattern, el.path));
}

// =============================================================================
// ELEMENT HELPERS
// =============================================================================

export function childElements(
  el: XmlElement,
  localName?: string
): XmlElement[] {
  if (localName === undefined) {
    return [...el.children];
  }
  return el.children.filter((child) => child.localName === localName);
}

export function firstChild(
  el: XmlElement,
  localName: string
): XmlElement | undefined {
  return el.children.find((child) => child.localName === localName);
}

/**
 * Descendants of an element in document order (the element itself excluded).
 */
export function descendants(el: XmlElement, localName?: string): XmlElement[] {
  const found: XmlElement[] = [];
  const walk = (parent: XmlElement) => {
    for (const child of parent.children) {
      if (localName === undefined || child.localName === localName) {
        found.push(child);
      }
      walk(child);
    }
  };
  walk(el);
  return found;
}

export function firstDescendant(
  el: XmlElement,
  localName: string
): XmlElement | undefined {
  for (const child of el.children) {
    if (child.localName === localName) {
      return child;
    }
    const nested = firstDescendant(child, localName);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

export function hasDescendant(el: XmlElement, localName: string): boolean {
  return firstDescendant(el, localName) !== undefined;
}

/**
 * Text of the first child with the given local name, or undefined when the
 * child is missing or empty.
 */
export function childText(
  el: XmlElement | undefined,
  localName: string
): string | undefined {
  if (!el) {
    return undefined;
  }
  const child = firstChild(el, localName);
  if (!child) {
    return undefined;
  }
  return textContent(child) || undefined;
}

/**
 * Attribute value by exact name, falling back to a match on the local part
 * ("href" finds "xlink:href", "id" finds "xml:id").
 */
export function getAttribute(
  el: XmlElement,
  name: string
): string | undefined {
  const exact = el.attributes[name];
  if (exact !== undefined) {
    return exact;
  }
  for (const [key, value] of Object.entries(el.attributes)) {
    if (key.startsWith("xmlns")) {
      continue;
    }
    const colon = key.indexOf(":");
    if (colon !== -1 && key.slice(colon + 1) === name) {
      return value;
    }
  }
  return undefined;
}

export function hasNamespace(doc: ParsedDocument, fragment: string): boolean {
  return doc.namespaceUris.some((uri) => uri.includes(fragment));
}

export function rootIs(doc: ParsedDocument, ...localNames: string[]): boolean {
  return localNames.includes(doc.root.localName);
}

// =============================================================================
// SELECTORS
// =============================================================================

/**
 * Elements reached from `el` by a relative path ("*" and "**" allowed).
 */
export function selectElements(
  el: XmlElement,
  relativePath: string
): XmlElement[] {
  let current: XmlElement[] = [el];
  for (const segment of splitPath(relativePath)) {
    const next: XmlElement[] = [];
    const seen = new Set<number>();
    const add = (candidate: XmlElement) => {
      if (!seen.has(candidate.order)) {
        seen.add(candidate.order);
        next.push(candidate);
      }
    };
    for (const item of current) {
      if (segment === ANY_SEGMENTS) {
        add(item);
        for (const nested of descendants(item)) {
          add(nested);
        }
      } else {
        for (const child of item.children) {
          if (segment === ANY_SEGMENT || child.localName === segment) {
            add(child);
          }
        }
      }
    }
    current = next;
  }
  return current;
}

/**
 * Values a selector yields for an element, in document order, empty values
 * dropped.
 */
export function selectValues(el: XmlElement, selector: string): string[] {
  const segments = splitPath(selector);
  const last = segments.at(-1);
  if (last === undefined) {
    return [];
  }

  const values: string[] = [];
  if (last.startsWith("@")) {
    const attribute = last.slice(1);
    const targets = selectElements(el, segments.slice(0, -1).join("/"));
    for (const target of targets) {
      const value = getAttribute(target, attribute)?.trim();
      if (value) {
        values.push(value);
      }
    }
    return values;
  }

  for (const target of selectElements(el, selector)) {
    const value = textContent(target);
    if (value) {
      values.push(value);
    }
  }
  return values;
}

/**
 * First value a selector yields, if any.
 */
export function selectValue(
  el: XmlElement,
  selector: string
): string | undefined {
  return selectValues(el, selector)[0];
}
