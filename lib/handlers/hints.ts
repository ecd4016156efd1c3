import { selectDocument } from "../xml/query";
import type {
  BoundaryHint,
  ParsedDocument,
  ReferenceHint,
  StructuralHints,
} from "../xml/types";

/**
 * Hints limited to the boundaries that occur in this document.
 *
 * Handlers describe every layout their family can take (RSS vs Atom, GPX
 * waypoints vs tracks); a missing optional part is not worth a diagnostic.
 */
export function hintsFor(
  doc: ParsedDocument,
  boundaries: readonly BoundaryHint[],
  references: readonly ReferenceHint[] = []
): StructuralHints {
  return {
    boundaries: boundaries.filter(
      (hint) => selectDocument(doc, hint.path).length > 0
    ),
    references: [...references],
  };
}
