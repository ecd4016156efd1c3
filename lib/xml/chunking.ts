/**
 * Chunking engine
 *
 * Turns a ParsedDocument into an ordered chunk sequence. Two modes:
 *
 * - Hinted: the handler's boundary hints pick the chunk elements. The
 *   outermost match wins and keeps its whole subtree; content outside every
 *   boundary is gathered into "context" chunks. Grouped references then move
 *   dependent chunks right after their parent (see grouping.ts).
 * - Structural: elements at `targetDepth` are the units, plus shallower leaf
 *   elements and direct text so nothing is lost. Small units merge into the
 *   chunk before them.
 *
 * Units over `maxChunkChars` are split at the next-deeper element level,
 * packing whole nodes greedily. Chunk text never covers part of an element
 * unless that element is itself indivisible.
 */

import { createHash } from "node:crypto";
import { resolveChunkOptions } from "./config";
import { xmlDebug } from "./debug";
import { groupOrder } from "./grouping";
import {
  getAttribute,
  matchesPath,
  selectDocument,
  selectValue,
  selectValues,
} from "./query";
import { resolveReferences } from "./references";
import { countTokens, nodeText } from "./text";
import type {
  BoundaryHint,
  Chunk,
  ChunkContext,
  ChunkingResult,
  ChunkKind,
  ChunkOptions,
  DeclaredReference,
  Diagnostic,
  ParsedDocument,
  ReferenceHint,
  ReferenceNormalization,
  SummaryRecord,
  XmlElement,
  XmlNode,
} from "./types";

const dbg = xmlDebug("chunk");

const DEFAULT_REFERENCE_KEY = "references";

/** A node together with the path it sits under */
type Span = {
  node: XmlNode;
  /** Element path for elements, parent path for text runs */
  path: string;
  /** Element holding a text run */
  parent?: XmlElement;
};

/** Content that becomes one chunk, or several parts when oversized */
type Unit = {
  kind: ChunkKind;
  path: string;
  spans: Span[];
  element?: XmlElement;
  identifier?: string;
  declaredReferences: DeclaredReference[];
};

function spanOf(node: XmlNode, parent: XmlElement): Span {
  return node.type === "element"
    ? { node, path: node.path }
    : { node, path: parent.path, parent };
}

function spansText(spans: readonly Span[]): string {
  const parts: string[] = [];
  for (const span of spans) {
    const text = nodeText(span.node);
    if (text) {
      parts.push(text);
    }
  }
  return parts.join(" ");
}

/**
 * Longest common path prefix, by segment.
 */
function commonPath(paths: readonly string[]): string {
  const [first, ...rest] = paths.map((path) => path.split("/"));
  if (!first) {
    return "";
  }
  let length = first.length;
  for (const segments of rest) {
    let i = 0;
    while (i < length && segments[i] === first[i]) {
      i++;
    }
    length = i;
  }
  return first.slice(0, length).join("/");
}

function elementPaths(spans: readonly Span[]): string[] {
  const paths = new Set<string>();
  const walk = (el: XmlElement) => {
    paths.add(el.path);
    for (const child of el.children) {
      walk(child);
    }
  };
  for (const span of spans) {
    if (span.node.type === "element") {
      walk(span.node);
    }
  }
  return [...paths];
}

// =============================================================================
// REFERENCES
// =============================================================================

function normalizeReference(
  value: string,
  normalize: ReferenceNormalization | undefined
): string[] {
  switch (normalize) {
    case "qname":
      return [value.slice(value.lastIndexOf(":") + 1)];
    case "fragment":
      return [value.slice(value.lastIndexOf("#") + 1)];
    case "list":
      return value.split(/[\s,]+/);
    default:
      return [value];
  }
}

function declaredReferencesFor(
  el: XmlElement,
  hints: readonly ReferenceHint[]
): DeclaredReference[] {
  const declared: DeclaredReference[] = [];
  const seen = new Set<string>();
  for (const hint of hints) {
    if (!matchesPath(hint.from, el.path)) {
      continue;
    }
    const key = hint.key ?? DEFAULT_REFERENCE_KEY;
    const targets = selectValues(el, hint.target).flatMap((raw) =>
      normalizeReference(raw, hint.normalize)
    );
    for (const target of targets) {
      const dedupeKey = `${key}\u0000${target}`;
      if (!target || seen.has(dedupeKey)) {
        continue;
      }
      seen.add(dedupeKey);
      declared.push({ key, target, group: hint.group === true });
    }
  }
  return declared;
}

// =============================================================================
// HINTED MODE
// =============================================================================

/**
 * Boundary hint per element, first matching hint wins.
 */
function matchBoundaries(
  doc: ParsedDocument,
  boundaries: readonly BoundaryHint[],
  diagnostics: Diagnostic[]
): Map<number, BoundaryHint> {
  const matched = new Map<number, BoundaryHint>();
  for (const hint of boundaries) {
    const elements = selectDocument(doc, hint.path);
    if (elements.length === 0) {
      dbg("boundary %s not found", hint.path);
      diagnostics.push({ kind: "hint_not_found", pattern: hint.path });
      continue;
    }
    for (const el of elements) {
      if (!matched.has(el.order)) {
        matched.set(el.order, hint);
      }
    }
  }
  return matched;
}

function containsBoundary(
  el: XmlElement,
  boundaries: ReadonlyMap<number, BoundaryHint>
): boolean {
  return el.children.some(
    (child) =>
      boundaries.has(child.order) || containsBoundary(child, boundaries)
  );
}

function hintedUnits(
  doc: ParsedDocument,
  boundaries: ReadonlyMap<number, BoundaryHint>,
  references: readonly ReferenceHint[]
): Unit[] {
  const units: Unit[] = [];
  let context: Span[] = [];

  const flushContext = () => {
    if (context.length > 0 && spansText(context)) {
      units.push({
        kind: "context",
        path: commonPath(context.map((span) => span.path)),
        spans: context,
        declaredReferences: [],
      });
    }
    context = [];
  };

  const boundaryUnit = (el: XmlElement, hint: BoundaryHint): Unit => {
    const identifier = hint.identifier
      ? selectValue(el, hint.identifier)
      : undefined;
    return {
      kind: hint.kind,
      path: el.path,
      spans: [{ node: el, path: el.path }],
      element: el,
      ...(identifier ? { identifier } : {}),
      declaredReferences: declaredReferencesFor(el, references),
    };
  };

  const walk = (el: XmlElement) => {
    for (const node of el.nodes) {
      if (node.type === "text") {
        context.push(spanOf(node, el));
        continue;
      }
      const hint = boundaries.get(node.order);
      if (hint) {
        flushContext();
        units.push(boundaryUnit(node, hint));
      } else if (containsBoundary(node, boundaries)) {
        walk(node);
      } else {
        context.push(spanOf(node, el));
      }
    }
  };

  const rootHint = boundaries.get(doc.root.order);
  if (rootHint) {
    units.push(boundaryUnit(doc.root, rootHint));
  } else {
    walk(doc.root);
    flushContext();
  }
  return units;
}

function groupUnits(units: readonly Unit[]): Unit[] {
  const order = groupOrder(
    units.map((unit) => ({
      identifier: unit.identifier,
      parent: unit.declaredReferences.find((ref) => ref.group)?.target,
    }))
  );
  const grouped: Unit[] = [];
  for (const i of order) {
    const unit = units[i];
    if (unit) {
      grouped.push(unit);
    }
  }
  return grouped;
}

// =============================================================================
// STRUCTURAL MODE
// =============================================================================

function structuralUnits(doc: ParsedDocument, targetDepth: number): Unit[] {
  const units: Unit[] = [];

  const elementUnit = (el: XmlElement): Unit => ({
    kind: "section",
    path: el.path,
    spans: [{ node: el, path: el.path }],
    element: el,
    declaredReferences: [],
  });

  const walk = (el: XmlElement) => {
    for (const node of el.nodes) {
      if (node.type === "text") {
        units.push({
          kind: "context",
          path: el.path,
          spans: [spanOf(node, el)],
          declaredReferences: [],
        });
      } else if (node.depth >= targetDepth || node.children.length === 0) {
        units.push(elementUnit(node));
      } else {
        walk(node);
      }
    }
  };

  if (targetDepth <= 0) {
    units.push(elementUnit(doc.root));
  } else {
    walk(doc.root);
  }
  return units.filter((unit) => spansText(unit.spans).length > 0);
}

/**
 * Merge units at or below `minChunkChars` into the chunk before them.
 * Small units before the first large one carry forward into it.
 */
function mergeSmallUnits(
  units: readonly Unit[],
  minChunkChars: number
): Unit[] {
  const merged: Unit[] = [];
  let carried: Span[] = [];

  for (const unit of units) {
    const small = spansText(unit.spans).length <= minChunkChars;
    const previous = merged.at(-1);
    if (small && previous) {
      previous.spans.push(...unit.spans);
    } else if (small) {
      carried.push(...unit.spans);
    } else {
      merged.push({ ...unit, spans: [...carried, ...unit.spans] });
      carried = [];
    }
  }

  if (carried.length > 0) {
    merged.push({
      kind: "section",
      path: commonPath(carried.map((span) => span.path)),
      spans: carried,
      declaredReferences: [],
    });
  }
  return merged;
}

// =============================================================================
// SPLITTING
// =============================================================================

/**
 * Break spans into pieces that each fit `max`, descending only into elements
 * that have child elements. Oversized leaves stay whole.
 */
function splitSpans(
  spans: readonly Span[],
  max: number,
  diagnostics: Diagnostic[]
): Span[] {
  const pieces: Span[] = [];
  for (const span of spans) {
    const length = nodeText(span.node).length;
    if (length === 0) {
      continue;
    }
    if (length <= max) {
      pieces.push(span);
      continue;
    }
    const { node } = span;
    if (node.type === "element" && node.children.length > 0) {
      pieces.push(
        ...splitSpans(
          node.nodes.map((child) => spanOf(child, node)),
          max,
          diagnostics
        )
      );
      continue;
    }
    dbg("indivisible node at %s (%d chars)", span.path, length);
    diagnostics.push({
      kind: "oversized_node",
      path: span.path,
      length,
      maxChunkChars: max,
    });
    pieces.push(span);
  }
  return pieces;
}

/**
 * Greedily pack pieces into parts whose joined text stays within `max`.
 */
function packSpans(pieces: readonly Span[], max: number): Span[][] {
  const parts: Span[][] = [];
  let current: Span[] = [];
  let currentLength = 0;

  for (const piece of pieces) {
    const length = nodeText(piece.node).length;
    if (current.length > 0 && currentLength + 1 + length > max) {
      parts.push(current);
      current = [];
      currentLength = 0;
    }
    currentLength = current.length === 0 ? length : currentLength + 1 + length;
    current.push(piece);
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

function splitUnit(
  unit: Unit,
  maxChunkChars: number,
  diagnostics: Diagnostic[]
): Unit[] {
  if (spansText(unit.spans).length <= maxChunkChars) {
    return [unit];
  }
  const parts = packSpans(
    splitSpans(unit.spans, maxChunkChars, diagnostics),
    maxChunkChars
  );
  if (parts.length <= 1) {
    return [unit];
  }
  dbg("split %s into %d parts", unit.path, parts.length);
  // identifier and references belong to the first part only
  return parts.map((spans, i) =>
    i === 0
      ? { ...unit, spans }
      : { ...unit, spans, identifier: undefined, declaredReferences: [] }
  );
}

// =============================================================================
// ASSEMBLY
// =============================================================================

function chunkIdFor(index: number, text: string): string {
  const hash = createHash("sha256").update(text).digest("hex").slice(0, 8);
  return `chunk_${index}_${hash}`;
}

function parentIndex(doc: ParsedDocument): Map<number, XmlElement> {
  const parents = new Map<number, XmlElement>();
  for (const el of doc.elements) {
    for (const child of el.children) {
      parents.set(child.order, el);
    }
  }
  return parents;
}

function contextLabel(el: XmlElement): string {
  const id = getAttribute(el, "id") ?? getAttribute(el, "name");
  return id ? `${el.localName}[${id}]` : el.localName;
}

/**
 * "a > b[x] > c" for the elements enclosing a unit's content.
 */
function parentContextOf(
  unit: Unit,
  parents: ReadonlyMap<number, XmlElement>
): string | undefined {
  const first = unit.spans[0];
  let anchor: XmlElement | undefined;
  if (unit.element) {
    anchor = parents.get(unit.element.order);
  } else if (first) {
    anchor =
      first.node.type === "element"
        ? parents.get(first.node.order)
        : first.parent;
  }

  const labels: string[] = [];
  for (let el = anchor; el; el = parents.get(el.order)) {
    labels.unshift(contextLabel(el));
  }
  return labels.length > 0 ? labels.join(" > ") : undefined;
}

type Piece = {
  unit: Unit;
  text: string;
  part?: { index: number; total: number };
};

function splitAll(
  units: readonly Unit[],
  maxChunkChars: number,
  diagnostics: Diagnostic[]
): Piece[] {
  const pieces: Piece[] = [];
  for (const unit of units) {
    const parts = splitUnit(unit, maxChunkChars, diagnostics);
    parts.forEach((part, i) => {
      pieces.push({
        unit: part,
        text: spansText(part.spans),
        ...(parts.length > 1
          ? { part: { index: i + 1, total: parts.length } }
          : {}),
      });
    });
  }
  return pieces;
}

function assemble(
  doc: ParsedDocument,
  units: readonly Unit[],
  options: ChunkOptions,
  context: ChunkContext,
  diagnostics: Diagnostic[]
): Chunk[] {
  const pieces = splitAll(units, options.maxChunkChars, diagnostics).map(
    (piece, i) => ({ ...piece, chunkId: chunkIdFor(i, piece.text) })
  );
  const parents = options.includeParentContext
    ? parentIndex(doc)
    : undefined;

  return pieces.map(({ unit, text, part, chunkId }, index) => {
    const previousChunkId = index > 0 ? pieces[index - 1]?.chunkId : undefined;
    const nextChunkId = pieces[index + 1]?.chunkId;
    const parentContext = parents && parentContextOf(unit, parents);
    const chunk: Chunk = {
      index,
      chunkId,
      path: unit.path,
      kind: unit.kind,
      text,
      declaredReferences: unit.declaredReferences,
      references: {},
      referencedBy: {},
      externalReferences: {},
      metadata: {
        element: unit.element?.name,
        attributes: { ...(unit.element?.attributes ?? {}) },
        elementPaths: elementPaths(unit.spans),
        tokenEstimate: countTokens(text),
        ...(part ? { part } : {}),
        ...(context.documentType
          ? { documentType: context.documentType }
          : {}),
        totalChunks: pieces.length,
        ...(previousChunkId ? { previousChunkId } : {}),
        ...(nextChunkId ? { nextChunkId } : {}),
        ...(parentContext ? { parentContext } : {}),
      },
    };
    if (unit.identifier) {
      chunk.identifier = unit.identifier;
    }
    return chunk;
  });
}

/**
 * Chunk a parsed document. Hints from `summary` select hinted mode; without
 * hints, or when none of them matches, structural mode is used.
 * `context.documentType` is copied into every chunk's metadata.
 *
 * Never throws for a parsed document, apart from invalid options.
 */
export function chunkDocument(
  doc: ParsedDocument,
  summary?: SummaryRecord,
  options?: Partial<ChunkOptions>,
  context: ChunkContext = {}
): ChunkingResult {
  const resolved = resolveChunkOptions(options);
  const diagnostics: Diagnostic[] = [];
  const hints = summary?.hints;

  let mode: ChunkingResult["mode"] = "structural";
  let units: Unit[] = [];

  if (hints && hints.boundaries.length > 0) {
    const boundaries = matchBoundaries(doc, hints.boundaries, diagnostics);
    if (boundaries.size > 0) {
      mode = "hinted";
      units = groupUnits(hintedUnits(doc, boundaries, hints.references ?? []));
    } else {
      diagnostics.push({
        kind: "structural_fallback",
        reason: "no boundary hint matched the document",
      });
    }
  }

  if (mode === "structural") {
    units = mergeSmallUnits(
      structuralUnits(doc, resolved.targetDepth),
      resolved.minChunkChars
    );
  }

  const assembled = assemble(doc, units, resolved, context, diagnostics);
  const linked = resolveReferences(assembled);
  diagnostics.push(...linked.diagnostics);

  dbg(
    "%s mode: %d units -> %d chunks (<%s>)",
    mode,
    units.length,
    linked.chunks.length,
    doc.root.name
  );
  return { mode, chunks: linked.chunks, diagnostics };
}
