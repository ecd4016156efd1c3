/**
 * XML Schema definitions
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  getAttribute,
  hasNamespace,
  rootIs,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const XSD_NAMESPACE = "XMLSchema";

function topLevelNames(schema: XmlElement, localName: string): string[] {
  return unique(
    childElements(schema, localName).map((el) => getAttribute(el, "name"))
  );
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "schema/complexType", kind: "type", identifier: "@name" },
  { path: "schema/simpleType", kind: "type", identifier: "@name" },
  { path: "schema/element", kind: "element", identifier: "@name" },
  { path: "schema/group", kind: "group", identifier: "@name" },
  { path: "schema/attributeGroup", kind: "group", identifier: "@name" },
];

// Built-in types (xs:string, ...) end up as external references
const REFERENCES: ReferenceHint[] = [
  { from: "schema/*", target: "**/@type", key: "type", normalize: "qname" },
  { from: "schema/*", target: "**/@base", key: "base", normalize: "qname" },
  { from: "schema/*", target: "**/@ref", key: "ref", normalize: "qname" },
];

export const xsdHandler: HandlerDescriptor = {
  id: "xsd",
  label: "XML Schema",
  category: "schema",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "<schema> in the XML Schema namespace",
        test: (d) => rootIs(d, "schema") && hasNamespace(d, XSD_NAMESPACE),
      },
      {
        score: 0.7,
        evidence: "root <schema>",
        test: (d) => rootIs(d, "schema"),
      },
    ]),
  extract: (doc) => {
    const schema = doc.root;
    return collectFields(
      {
        targetNamespace: () => getAttribute(schema, "targetNamespace"),
        elementFormDefault: () => getAttribute(schema, "elementFormDefault"),
        version: () => getAttribute(schema, "version"),
        elements: () => topLevelNames(schema, "element"),
        complexTypes: () => topLevelNames(schema, "complexType"),
        simpleTypes: () => topLevelNames(schema, "simpleType"),
        imports: () =>
          childElements(schema, "import").map((el) =>
            compact({
              namespace: getAttribute(el, "namespace"),
              schemaLocation: getAttribute(el, "schemaLocation"),
            })
          ),
        includes: () =>
          unique(
            childElements(schema, "include").map((el) =>
              getAttribute(el, "schemaLocation")
            )
          ),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
