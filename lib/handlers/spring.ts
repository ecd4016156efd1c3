/**
 * Spring XML bean definitions
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  getAttribute,
  hasNamespace,
  rootIs,
  selectValues,
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

const SPRING_SCHEMAS = [
  "springframework.org/schema/beans",
  "springframework.org/schema/context",
  "springframework.org/schema/mvc",
];

function beanReferences(bean: XmlElement): string[] {
  return unique([
    ...selectValues(bean, "**/@ref"),
    ...selectValues(bean, "**/ref/@bean"),
    ...selectValues(bean, "**/idref/@bean"),
  ]);
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "beans/bean", kind: "bean", identifier: "@id" },
  { path: "beans/beans", kind: "profile", identifier: "@profile" },
];

const REFERENCES: ReferenceHint[] = [
  { from: "beans/bean", target: "**/@ref", key: "ref" },
  { from: "beans/bean", target: "**/ref/@bean", key: "ref" },
  { from: "beans/bean", target: "@parent", key: "parent" },
];

export const springHandler: HandlerDescriptor = {
  id: "spring",
  label: "Spring configuration",
  category: "configuration",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "Spring schema namespace",
        test: (d) => SPRING_SCHEMAS.some((schema) => hasNamespace(d, schema)),
      },
      {
        score: 0.7,
        evidence: "root <beans>",
        test: (d) => rootIs(d, "beans"),
      },
    ]),
  extract: (doc) => {
    const beans = descendants(doc.root, "bean");
    return collectFields(
      {
        beanCount: () => beans.length,
        beans: () =>
          beans.map((bean) =>
            compact({
              id: getAttribute(bean, "id") ?? getAttribute(bean, "name"),
              class: getAttribute(bean, "class"),
              scope: getAttribute(bean, "scope"),
              parent: getAttribute(bean, "parent"),
              references: beanReferences(bean),
            })
          ),
        imports: () => selectValues(doc.root, "import/@resource"),
        componentScan: () =>
          selectValues(doc.root, "component-scan/@base-package"),
        propertyPlaceholders: () =>
          selectValues(doc.root, "property-placeholder/@location"),
        profiles: () =>
          unique(
            childElements(doc.root, "beans").map((nested) =>
              getAttribute(nested, "profile")
            )
          ),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
