/**
 * WSDL service descriptions, 1.1 (<definitions>) and 2.0 (<description>)
 *
 * Message, portType and binding names are qualified ("tns:GetQuote"); the
 * reference hints strip the prefix so they resolve against the @name of the
 * element they point at.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
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
  XmlElement,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const WSDL11_NAMESPACE = "schemas.xmlsoap.org/wsdl";
const WSDL20_NAMESPACE = "w3.org/ns/wsdl";

function names(elements: readonly XmlElement[]): string[] {
  return unique(elements.map((el) => getAttribute(el, "name")));
}

function isWsdl20(doc: ParsedDocument): boolean {
  return rootIs(doc, "description");
}

const V11_BOUNDARIES: BoundaryHint[] = [
  { path: "definitions/types", kind: "types" },
  { path: "definitions/message", kind: "message", identifier: "@name" },
  { path: "definitions/portType", kind: "interface", identifier: "@name" },
  { path: "definitions/binding", kind: "binding", identifier: "@name" },
  { path: "definitions/service", kind: "service", identifier: "@name" },
];

const V11_REFERENCES: ReferenceHint[] = [
  {
    from: "definitions/portType",
    target: "operation/*/@message",
    key: "messages",
    normalize: "qname",
  },
  {
    from: "definitions/binding",
    target: "@type",
    key: "interface",
    normalize: "qname",
  },
  {
    from: "definitions/service",
    target: "port/@binding",
    key: "binding",
    normalize: "qname",
  },
];

const V20_BOUNDARIES: BoundaryHint[] = [
  { path: "description/types", kind: "types" },
  { path: "description/interface", kind: "interface", identifier: "@name" },
  { path: "description/binding", kind: "binding", identifier: "@name" },
  { path: "description/service", kind: "service", identifier: "@name" },
];

const V20_REFERENCES: ReferenceHint[] = [
  {
    from: "description/binding",
    target: "@interface",
    key: "interface",
    normalize: "qname",
  },
  {
    from: "description/service",
    target: "@interface",
    key: "interface",
    normalize: "qname",
  },
  {
    from: "description/service",
    target: "endpoint/@binding",
    key: "binding",
    normalize: "qname",
  },
];

export const wsdlHandler: HandlerDescriptor = {
  id: "wsdl",
  label: "WSDL service description",
  category: "web-services",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "<definitions> in the WSDL 1.1 namespace",
        test: (d) =>
          rootIs(d, "definitions") && hasNamespace(d, WSDL11_NAMESPACE),
      },
      {
        score: 0.9,
        evidence: "<description> in the WSDL 2.0 namespace",
        test: (d) =>
          rootIs(d, "description") && hasNamespace(d, WSDL20_NAMESPACE),
      },
      {
        score: 0.7,
        evidence: "root <definitions>",
        test: (d) => rootIs(d, "definitions"),
      },
    ]),
  extract: (doc) => {
    const v20 = isWsdl20(doc);
    const root = doc.root;
    const interfaces = childElements(root, v20 ? "interface" : "portType");
    return collectFields(
      {
        version: () => (v20 ? "2.0" : "1.1"),
        name: () => getAttribute(root, "name"),
        targetNamespace: () => getAttribute(root, "targetNamespace"),
        messages: () => names(childElements(root, "message")),
        interfaces: () => names(interfaces),
        operations: () =>
          unique(
            interfaces.flatMap((el) =>
              childElements(el, "operation").map((op) =>
                getAttribute(op, "name")
              )
            )
          ),
        bindings: () => names(childElements(root, "binding")),
        services: () =>
          childElements(root, "service").map((service) =>
            compact({
              name: getAttribute(service, "name"),
              endpoints: [
                ...selectValues(service, "port/address/@location"),
                ...selectValues(service, "endpoint/@address"),
              ],
            })
          ),
      },
      v20
        ? hintsFor(doc, V20_BOUNDARIES, V20_REFERENCES)
        : hintsFor(doc, V11_BOUNDARIES, V11_REFERENCES)
    );
  },
};
