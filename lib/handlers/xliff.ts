/**
 * XLIFF translation files, 1.2 (<trans-unit>) and 2.x (<unit>/<segment>)
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  firstDescendant,
  getAttribute,
  hasNamespace,
  rootIs,
} from "../xml/query";
import { textContent } from "../xml/text";
import type { BoundaryHint, HandlerDescriptor } from "../xml/types";
import { countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const XLIFF_NAMESPACES = [
  "urn:oasis:names:tc:xliff:document:1.2",
  "urn:oasis:names:tc:xliff:document:2.0",
  "urn:oasis:names:tc:xliff:document:2.1",
  "xliff.oasis-open.org",
];

const BOUNDARIES: BoundaryHint[] = [
  { path: "xliff/file/**/trans-unit", kind: "unit", identifier: "@id" },
  { path: "xliff/file/**/unit", kind: "unit", identifier: "@id" },
];

export const xliffHandler: HandlerDescriptor = {
  id: "xliff",
  label: "XLIFF translation",
  category: "localization",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "XLIFF namespace",
        test: (d) => XLIFF_NAMESPACES.some((ns) => hasNamespace(d, ns)),
      },
      {
        score: 0.95,
        evidence: "root <xliff>",
        test: (d) => rootIs(d, "xliff"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const files = childElements(root, "file");
    const v2 = (getAttribute(root, "version") ?? "").startsWith("2");
    const units = descendants(root, v2 ? "unit" : "trans-unit");
    const targets = units.map((unit) => firstDescendant(unit, "target"));
    const firstFile = files[0];

    return collectFields(
      {
        version: () => getAttribute(root, "version"),
        sourceLanguage: () =>
          v2
            ? getAttribute(root, "srcLang")
            : firstFile && getAttribute(firstFile, "source-language"),
        targetLanguage: () =>
          v2
            ? getAttribute(root, "trgLang")
            : firstFile && getAttribute(firstFile, "target-language"),
        files: () =>
          unique(
            files.map(
              (file) =>
                getAttribute(file, "original") ?? getAttribute(file, "id")
            )
          ),
        unitCount: () => units.length,
        translatedCount: () =>
          targets.filter((target) => target && textContent(target)).length,
        states: () =>
          countBy(
            [
              ...targets.map(
                (target) => target && getAttribute(target, "state")
              ),
              ...descendants(root, "segment").map((segment) =>
                getAttribute(segment, "state")
              ),
            ].filter((state): state is string => state !== undefined)
          ),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
