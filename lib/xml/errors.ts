import type { ZodIssue } from "zod";
import type {
  ClassificationResult,
  Diagnostic,
  RankedCandidate,
  SummaryRecord,
} from "./types";

export type XmlErrorCode =
  | "malformed_input"
  | "unclassified_document"
  | "extraction_failed"
  | "duplicate_handler"
  | "invalid_handler"
  | "registry_sealed"
  | "invalid_options";

/**
 * Base class for every error raised by the classification pipeline.
 * Callers can switch on `code` instead of `instanceof` chains.
 */
export class XmlAnalysisError extends Error {
  readonly code: XmlErrorCode;

  constructor(code: XmlErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Input is not well-formed XML. Raised before any handler runs.
 */
export class MalformedInputError extends XmlAnalysisError {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(
    message: string,
    position: { line?: number; column?: number } = {}
  ) {
    const where =
      position.line === undefined
        ? ""
        : ` (line ${position.line}, column ${position.column ?? 0})`;
    super("malformed_input", `Malformed XML: ${message}${where}`);
    this.line = position.line;
    this.column = position.column;
  }
}

/**
 * Well-formed XML that no registered handler scored above zero.
 */
export class UnclassifiedDocumentError extends XmlAnalysisError {
  readonly rootElement: string;
  readonly ranked: RankedCandidate[];
  readonly diagnostics: Diagnostic[];

  constructor(
    rootElement: string,
    ranked: RankedCandidate[],
    diagnostics: Diagnostic[]
  ) {
    super(
      "unclassified_document",
      `No handler recognised document with root <${rootElement}>`
    );
    this.rootElement = rootElement;
    this.ranked = ranked;
    this.diagnostics = diagnostics;
  }
}

export type ExtractionErrorDetails = {
  partial: SummaryRecord;
  failedFields?: string[];
  handlerId?: string;
  classification?: ClassificationResult;
  cause?: unknown;
};

/**
 * The winning handler failed to extract its summary.
 * `partial` holds whatever was extracted before the failure, hints included.
 */
export class ExtractionError extends XmlAnalysisError {
  readonly partial: SummaryRecord;
  readonly failedFields: string[];
  readonly handlerId: string | undefined;
  readonly classification: ClassificationResult | undefined;

  constructor(message: string, details: ExtractionErrorDetails) {
    super("extraction_failed", message, { cause: details.cause });
    this.partial = details.partial;
    this.failedFields = details.failedFields ?? [];
    this.handlerId = details.handlerId;
    this.classification = details.classification;
  }
}

export class DuplicateHandlerError extends XmlAnalysisError {
  readonly handlerId: string;

  constructor(handlerId: string) {
    super("duplicate_handler", `Handler "${handlerId}" is already registered`);
    this.handlerId = handlerId;
  }
}

export class InvalidHandlerError extends XmlAnalysisError {
  constructor(message: string) {
    super("invalid_handler", message);
  }
}

export class RegistrySealedError extends XmlAnalysisError {
  readonly handlerId: string;

  constructor(handlerId: string) {
    super(
      "registry_sealed",
      `Cannot register "${handlerId}": registry is sealed once classification starts`
    );
    this.handlerId = handlerId;
  }
}

/**
 * Chunk options or XML_CHUNK_* variables failed validation.
 * `issues` are the zod issues; `messages` the same issues as "path: message".
 */
export class InvalidOptionsError extends XmlAnalysisError {
  readonly issues: ZodIssue[];
  readonly messages: string[];

  constructor(issues: ZodIssue[]) {
    const messages = issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    );
    super("invalid_options", `Invalid chunk options: ${messages.join("; ")}`);
    this.issues = issues;
    this.messages = messages;
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
