/**
 * SCAP security content: XCCDF benchmarks, OVAL definitions, ARF reports
 *
 * XCCDF rules and OVAL definitions are the chunks; profiles link to the
 * rules they select and definitions to the tests their criteria run.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  descendants,
  getAttribute,
  hasNamespace,
  rootIs,
  selectValues,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  ReferenceHint,
} from "../xml/types";
import { compact, countBy } from "./fields";
import { hintsFor } from "./hints";
import { PRIORITY, weighSignals } from "./signals";

const SCAP_NAMESPACES = [
  "scap.nist.gov/schema/",
  "checklists.nist.gov/xccdf/",
  "oval.mitre.org/XMLSchema/",
  "asset-report-collection",
  "data-stream-collection",
];

const SCAP_ROOTS = [
  "Benchmark",
  "TestResult",
  "Profile",
  "asset-report-collection",
  "oval_definitions",
];

function mentions(doc: ParsedDocument, fragment: string): boolean {
  return (
    doc.root.name.toLowerCase().includes(fragment) ||
    doc.namespaceUris.some((uri) => uri.toLowerCase().includes(fragment))
  );
}

function standard(doc: ParsedDocument): string {
  if (rootIs(doc, "oval_definitions") || mentions(doc, "oval")) {
    return "oval";
  }
  if (rootIs(doc, "asset-report-collection")) {
    return "arf";
  }
  return mentions(doc, "xccdf") || rootIs(doc, "Benchmark") ? "xccdf" : "scap";
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "Benchmark/Profile", kind: "profile", identifier: "@id" },
  { path: "Benchmark/**/Rule", kind: "rule", identifier: "@id" },
  { path: "Benchmark/TestResult", kind: "result", identifier: "@id" },
  {
    path: "oval_definitions/definitions/definition",
    kind: "definition",
    identifier: "@id",
  },
  { path: "oval_definitions/tests/*", kind: "test", identifier: "@id" },
];

const REFERENCES: ReferenceHint[] = [
  { from: "Benchmark/Profile", target: "select/@idref", key: "selects" },
  {
    from: "oval_definitions/definitions/definition",
    target: "**/criterion/@test_ref",
    key: "tests",
  },
];

export const scapHandler: HandlerDescriptor = {
  id: "scap",
  label: "SCAP security content",
  category: "security",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    weighSignals(
      doc,
      [
        {
          weight: 0.4,
          evidence: "SCAP namespace",
          test: (d) => SCAP_NAMESPACES.some((ns) => hasNamespace(d, ns)),
        },
        {
          weight: 0.4,
          evidence: "SCAP root element",
          test: (d) => rootIs(d, ...SCAP_ROOTS),
        },
        { weight: 0.3, evidence: "XCCDF", test: (d) => mentions(d, "xccdf") },
        { weight: 0.3, evidence: "OVAL", test: (d) => mentions(d, "oval") },
      ],
      { threshold: 0.55 }
    ),
  extract: (doc) => {
    const root = doc.root;
    const rules = descendants(root, "Rule");
    const definitions = descendants(root, "definition");
    return collectFields(
      {
        standard: () => standard(doc),
        id: () => getAttribute(root, "id"),
        title: () => childText(root, "title"),
        version: () => childText(root, "version"),
        status: () => childText(root, "status"),
        profiles: () =>
          childElements(root, "Profile").map((profile) =>
            compact({
              id: getAttribute(profile, "id"),
              title: childText(profile, "title"),
              selected: childElements(profile, "select").filter(
                (select) => getAttribute(select, "selected") === "true"
              ).length,
            })
          ),
        groupCount: () => descendants(root, "Group").length,
        ruleCount: () => rules.length,
        severities: () =>
          rules.length > 0
            ? countBy(
                rules.map(
                  (rule) => getAttribute(rule, "severity") ?? "unknown"
                )
              )
            : undefined,
        results: () => {
          const outcomes = selectValues(root, "**/rule-result/result");
          return outcomes.length > 0 ? countBy(outcomes) : undefined;
        },
        definitionCount: () =>
          definitions.length > 0 ? definitions.length : undefined,
        definitionClasses: () =>
          definitions.length > 0
            ? countBy(
                definitions.map(
                  (definition) =>
                    getAttribute(definition, "class") ?? "unknown"
                )
              )
            : undefined,
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
