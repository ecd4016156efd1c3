/**
 * Types for XML document classification and chunking
 */

/** Raw input accepted by the pipeline: XML text or UTF-8 bytes */
export type XmlInput = string | Uint8Array;

// =============================================================================
// DOCUMENT MODEL
// =============================================================================

export type XmlText = {
  readonly type: "text";
  readonly value: string;
};

/**
 * An element of the parsed tree.
 *
 * `nodes` holds the mixed content (text runs and child elements) in document
 * order; `children` holds only the child elements. Whitespace-only text runs
 * are not kept.
 */
export type XmlElement = {
  readonly type: "element";
  /** Qualified name as written, e.g. "xs:element" */
  readonly name: string;
  readonly localName: string;
  readonly prefix: string | undefined;
  /** Namespace URI resolved from the in-scope xmlns declarations */
  readonly namespace: string | undefined;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlElement[];
  readonly nodes: readonly XmlNode[];
  /** Direct text of this element, whitespace-normalized */
  readonly text: string;
  /** Local names from the root joined with "/", e.g. "unload/incident" */
  readonly path: string;
  /** Root is depth 0 */
  readonly depth: number;
  /** Pre-order position in the document */
  readonly order: number;
};

export type XmlNode = XmlText | XmlElement;

/** External entity declared in the DOCTYPE's internal subset */
export type ExternalEntity = {
  readonly name: string;
  readonly systemId: string;
  /** NDATA notation, e.g. "cgm" */
  readonly notation?: string;
  readonly kind: "graphic" | "external";
};

export type ParsedDocument = {
  readonly root: XmlElement;
  /** Every element in document order */
  readonly elements: readonly XmlElement[];
  /** Element path -> elements at that path, in document order */
  readonly index: ReadonlyMap<string, readonly XmlElement[]>;
  /** Declared prefix -> URI ("default" for the default namespace, first declaration wins) */
  readonly namespaces: Readonly<Record<string, string>>;
  /** Every distinct namespace URI declared in the document */
  readonly namespaceUris: readonly string[];
  /** External entities taken out of the DOCTYPE before parsing */
  readonly externalEntities: readonly ExternalEntity[];
};

// =============================================================================
// HANDLER CAPABILITY
// =============================================================================

export type DetectionResult = {
  /** Confidence in [0, 1] */
  score: number;
  evidence?: string[];
};

export type SummaryValue =
  | string
  | number
  | boolean
  | null
  | SummaryValue[]
  | { [key: string]: SummaryValue };

export type SummaryFields = Record<string, SummaryValue>;

/**
 * Marks elements that start a chunk.
 * `path` is an element-path pattern: "/"-separated local names from the root,
 * "*" for exactly one segment, "**" for any number of segments.
 */
export type BoundaryHint = {
  path: string;
  kind: ChunkKind;
  /** Selector for the chunk identifier, e.g. "@id" or "sys_id" */
  identifier?: string;
};

/**
 * How reference values are cleaned before lookup. "list" splits a comma or
 * whitespace separated value into several targets.
 */
export type ReferenceNormalization = "qname" | "fragment" | "list";

/**
 * Declares that boundary chunks at `from` point at other chunks.
 * With `group`, each source chunk is placed right after the chunk it references.
 */
export type ReferenceHint = {
  from: string;
  /** Selector producing target identifiers, e.g. "element_id" or "AppenderRef/@ref" */
  target: string;
  /** Link key recorded on both ends (default "references") */
  key?: string;
  group?: boolean;
  normalize?: ReferenceNormalization;
};

export type StructuralHints = {
  boundaries: BoundaryHint[];
  references?: ReferenceHint[];
};

export type SummaryRecord = {
  fields: SummaryFields;
  hints?: StructuralHints;
};

export type HandlerDescriptor = {
  /** Document-type name, unique within a registry */
  readonly id: string;
  readonly label?: string;
  readonly category?: string;
  /** Tie-break weight, higher wins */
  readonly priority: number;
  /** Must be a pure function of the document */
  readonly detect: (doc: ParsedDocument) => DetectionResult;
  readonly extract: (doc: ParsedDocument) => SummaryRecord;
};

// =============================================================================
// CLASSIFICATION
// =============================================================================

export type RankedCandidate = {
  id: string;
  score: number;
  priority: number;
  registrationIndex: number;
  evidence: string[];
};

export type ClassificationResult = {
  documentType: string;
  confidence: number;
  /** Every registered handler, best first */
  ranked: RankedCandidate[];
  diagnostics: Diagnostic[];
};

// =============================================================================
// CHUNKS
// =============================================================================

export type ChunkKind =
  | "record"
  | "annotation"
  | "section"
  | "context"
  | (string & {});

export type ChunkOptions = {
  /** Depth of structural boundaries in fallback mode (root is 0) */
  targetDepth: number;
  /** Units at or below this many characters merge into a neighbour in fallback mode */
  minChunkChars: number;
  /** Chunks above this many characters are split at the next-deeper level */
  maxChunkChars: number;
  /** Record the ancestor chain of each chunk in `metadata.parentContext` */
  includeParentContext: boolean;
};

/** What the caller knows about the document being chunked */
export type ChunkContext = {
  documentType?: string;
};

export type DeclaredReference = {
  key: string;
  target: string;
  group: boolean;
};

export type ChunkMetadata = {
  element: string | undefined;
  attributes: Record<string, string>;
  elementPaths: string[];
  tokenEstimate: number;
  /** Set on chunks split from one oversized unit; `index` counts from 1 */
  part?: { index: number; total: number };
  /** Handler id of the classified document, when known */
  documentType?: string;
  totalChunks: number;
  previousChunkId?: string;
  nextChunkId?: string;
  /**
   * Ancestors of the chunk content from the root down, labelled with their
   * id or name, e.g. "definitions[StockQuote] > portType[QuotePort]".
   * Unset for the root element itself.
   */
  parentContext?: string;
};

export type Chunk = {
  index: number;
  chunkId: string;
  path: string;
  kind: ChunkKind;
  text: string;
  identifier?: string;
  declaredReferences: DeclaredReference[];
  /** key -> indices of chunks this chunk points at */
  references: Record<string, number[]>;
  /** key -> indices of chunks pointing at this chunk */
  referencedBy: Record<string, number[]>;
  /** key -> target identifiers not found in this document */
  externalReferences: Record<string, string[]>;
  metadata: ChunkMetadata;
};

export type ChunkingMode = "hinted" | "structural";

export type ChunkingResult = {
  mode: ChunkingMode;
  chunks: Chunk[];
  diagnostics: Diagnostic[];
};

// =============================================================================
// RESULTS & DIAGNOSTICS
// =============================================================================

export type Diagnostic =
  | { kind: "detection_failed"; handlerId: string; message: string }
  | {
      kind: "score_adjusted";
      handlerId: string;
      reported: number;
      adjusted: number;
    }
  | {
      kind: "partial_extraction";
      handlerId: string;
      message: string;
      failedFields: string[];
    }
  | { kind: "fallback_handler"; handlerId: string; reason: string }
  | { kind: "hint_not_found"; pattern: string }
  | { kind: "structural_fallback"; reason: string }
  | {
      kind: "oversized_node";
      path: string;
      length: number;
      maxChunkChars: number;
    }
  | {
      kind: "unresolved_reference";
      chunkIndex: number;
      key: string;
      target: string;
    }
  | {
      kind: "duplicate_identifier";
      identifier: string;
      chunkIndex: number;
      firstIndex: number;
    };

export type DocumentAnalysis = {
  classification: ClassificationResult;
  summary: SummaryRecord;
  chunks: Chunk[];
  mode: ChunkingMode;
  diagnostics: Diagnostic[];
};
