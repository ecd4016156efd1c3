/**
 * Extraction adapter
 *
 * Runs the winning handler's `extract` on the document the dispatcher already
 * parsed. Whatever the handler throws comes back as an ExtractionError that
 * names the handler and carries the classification, so the caller can still
 * chunk with the partial record.
 */

import { xmlDebug } from "./debug";
import { errorMessage, ExtractionError } from "./errors";
import type {
  ClassificationResult,
  HandlerDescriptor,
  ParsedDocument,
  StructuralHints,
  SummaryFields,
  SummaryRecord,
  SummaryValue,
} from "./types";

const dbg = xmlDebug("extract");

/**
 * Invoke a handler's extraction.
 *
 * @throws ExtractionError with the partial record (empty when the handler
 * threw anything other than an ExtractionError)
 */
export function extractSummary(
  doc: ParsedDocument,
  handler: HandlerDescriptor,
  classification: ClassificationResult
): SummaryRecord {
  try {
    const summary = handler.extract(doc);
    dbg(
      "%s extracted %d fields, %d boundary hints",
      handler.id,
      Object.keys(summary.fields).length,
      summary.hints?.boundaries.length ?? 0
    );
    return summary;
  } catch (error) {
    if (error instanceof ExtractionError) {
      dbg(
        "%s extraction failed (%s), partial record kept",
        handler.id,
        error.message
      );
      throw new ExtractionError(error.message, {
        partial: error.partial,
        failedFields: error.failedFields,
        handlerId: handler.id,
        classification,
        cause: error.cause ?? error,
      });
    }

    const message = errorMessage(error);
    dbg("%s extraction threw: %s", handler.id, message);
    throw new ExtractionError(
      `Extraction by "${handler.id}" failed: ${message}`,
      {
        partial: { fields: {} },
        handlerId: handler.id,
        classification,
        cause: error,
      }
    );
  }
}

export type FieldGetters = Record<string, () => SummaryValue | undefined>;

/**
 * Build a summary field by field. Every getter runs even after one fails;
 * undefined results are left out.
 *
 * @throws ExtractionError listing the failed fields, with every field that
 * did succeed (and the hints) in `partial`
 */
export function collectFields(
  getters: FieldGetters,
  hints?: StructuralHints
): SummaryRecord {
  const fields: SummaryFields = {};
  const failed: string[] = [];
  const messages: string[] = [];

  for (const [name, getter] of Object.entries(getters)) {
    try {
      const value = getter();
      if (value !== undefined) {
        fields[name] = value;
      }
    } catch (error) {
      failed.push(name);
      messages.push(`${name}: ${errorMessage(error)}`);
    }
  }

  const record: SummaryRecord = hints ? { fields, hints } : { fields };
  if (failed.length > 0) {
    throw new ExtractionError(`Failed to extract ${messages.join("; ")}`, {
      partial: record,
      failedFields: failed,
    });
  }
  return record;
}
