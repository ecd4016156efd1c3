/**
 * Java XML properties files (Properties.storeToXML)
 *
 * Values of keys that look like credentials are replaced before they reach
 * the summary; the entry chunks still carry the raw text.
 */

import { collectFields } from "../xml/extraction";
import { childElements, childText, getAttribute, rootIs } from "../xml/query";
import { textContent } from "../xml/text";
import type { BoundaryHint, HandlerDescriptor } from "../xml/types";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const SENSITIVE_KEY = /password|passwd|secret|token|credential/i;

const REDACTED = "[redacted]";

const BOUNDARIES: BoundaryHint[] = [
  { path: "properties/entry", kind: "entry", identifier: "@key" },
];

export const propertiesXmlHandler: HandlerDescriptor = {
  id: "properties-xml",
  label: "Java properties (XML)",
  category: "configuration",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "root <properties> with <entry> elements",
        test: (d) =>
          rootIs(d, "properties") && childElements(d.root, "entry").length > 0,
      },
      {
        score: 0.8,
        evidence: "root <properties> with a <comment>",
        test: (d) =>
          rootIs(d, "properties") && childText(d.root, "comment") !== undefined,
      },
      {
        score: 0.6,
        evidence: "root <properties>",
        test: (d) => rootIs(d, "properties"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const entries = childElements(root, "entry").flatMap((entry) => {
      const key = getAttribute(entry, "key");
      return key === undefined ? [] : [{ key, value: textContent(entry) }];
    });
    const sensitive = entries
      .map(({ key }) => key)
      .filter((key) => SENSITIVE_KEY.test(key));
    return collectFields(
      {
        comment: () => childText(root, "comment"),
        entryCount: () => entries.length,
        keys: () => entries.map(({ key }) => key),
        entries: () =>
          Object.fromEntries(
            entries.map(({ key, value }) => [
              key,
              SENSITIVE_KEY.test(key) ? REDACTED : value,
            ])
          ),
        sensitiveKeys: () => (sensitive.length > 0 ? sensitive : undefined),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
