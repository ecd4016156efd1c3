/**
 * Hibernate configuration (hibernate.cfg.xml) and mapping (*.hbm.xml) files
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  firstChild,
  getAttribute,
  hasDescendant,
  rootIs,
} from "../xml/query";
import { textContent } from "../xml/text";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const RELATIONSHIPS = new Set([
  "many-to-one",
  "one-to-many",
  "many-to-many",
  "one-to-one",
]);

const ROOTS = ["hibernate-configuration", "hibernate-mapping"];

/** Session-factory property by name, with or without the "hibernate." prefix */
function setting(
  properties: readonly XmlElement[],
  name: string
): string | undefined {
  const property = properties.find((el) => {
    const key = getAttribute(el, "name");
    return key === name || key === `hibernate.${name}`;
  });
  return property ? textContent(property) || undefined : undefined;
}

function entity(el: XmlElement) {
  const id = firstChild(el, "id") ?? firstChild(el, "composite-id");
  return compact({
    name: getAttribute(el, "name") ?? getAttribute(el, "entity-name"),
    table: getAttribute(el, "table"),
    id: id && getAttribute(id, "name"),
    properties: childElements(el, "property").length,
  });
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "hibernate-configuration/session-factory", kind: "session-factory" },
  { path: "hibernate-mapping/class", kind: "entity", identifier: "@name" },
  { path: "hibernate-mapping/query", kind: "query", identifier: "@name" },
  { path: "hibernate-mapping/sql-query", kind: "query", identifier: "@name" },
];

const REFERENCES: ReferenceHint[] = [...RELATIONSHIPS].map((relation) => ({
  from: "hibernate-mapping/class",
  target: `**/${relation}/@class`,
  key: "associations",
}));

export const hibernateHandler: HandlerDescriptor = {
  id: "hibernate",
  label: "Hibernate ORM",
  category: "configuration",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: (d) =>
          hasDescendant(d.root, "session-factory") ||
          hasDescendant(d.root, "class") ||
          hasDescendant(d.root, "subclass")
            ? 1
            : 0.8,
        evidence: "Hibernate root element",
        test: (d) => rootIs(d, ...ROOTS),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const isMapping = root.localName === "hibernate-mapping";
    const sessionFactory = firstChild(root, "session-factory");
    const properties = sessionFactory
      ? childElements(sessionFactory, "property")
      : [];
    const classes = descendants(root, "class");
    return collectFields(
      {
        fileType: () => (isMapping ? "mapping" : "configuration"),
        package: () => getAttribute(root, "package"),
        driver: () => setting(properties, "connection.driver_class"),
        url: () => setting(properties, "connection.url"),
        dialect: () => setting(properties, "dialect"),
        properties: () =>
          sessionFactory
            ? unique(properties.map((el) => getAttribute(el, "name")))
            : undefined,
        plaintextPassword: () =>
          sessionFactory
            ? setting(properties, "connection.password") !== undefined
            : undefined,
        mappings: () =>
          sessionFactory
            ? unique(
                childElements(sessionFactory, "mapping").map(
                  (mapping) =>
                    getAttribute(mapping, "resource") ??
                    getAttribute(mapping, "class")
                )
              )
            : undefined,
        entityCount: () => classes.length,
        entities: () => (isMapping ? classes.map(entity) : undefined),
        relationships: () =>
          isMapping
            ? countBy(
                descendants(root)
                  .filter((el) => RELATIONSHIPS.has(el.localName))
                  .map((el) => el.localName)
              )
            : undefined,
        queries: () =>
          isMapping
            ? unique(
                [
                  ...childElements(root, "query"),
                  ...childElements(root, "sql-query"),
                ].map((query) => getAttribute(query, "name"))
              )
            : undefined,
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
