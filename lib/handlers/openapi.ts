/**
 * OpenAPI and Swagger documents serialised as XML
 *
 * Path keys such as "/orders/{id}" are not valid element names, so a path
 * element may carry the key in a `name` or `path` attribute; otherwise its
 * local name is the key.
 */

import { collectFields } from "../xml/extraction";
import {
  childText,
  firstChild,
  firstDescendant,
  getAttribute,
  hasDescendant,
  hasNamespace,
  rootIs,
  selectElements,
  selectValues,
} from "../xml/query";
import type { BoundaryHint, HandlerDescriptor, XmlElement } from "../xml/types";
import { compact, countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const HTTP_METHODS = [
  "get",
  "put",
  "post",
  "delete",
  "options",
  "head",
  "patch",
  "trace",
];

function keyOf(el: XmlElement): string {
  return getAttribute(el, "name") ?? getAttribute(el, "path") ?? el.localName;
}

function specVersion(root: XmlElement): string {
  return (
    getAttribute(root, "version") ??
    childText(root, "openapi") ??
    childText(root, "swagger") ??
    (hasDescendant(root, "definitions") && !hasDescendant(root, "components")
      ? "2.0"
      : "3.0.0")
  );
}

function operationElements(pathItem: XmlElement): XmlElement[] {
  return pathItem.children.filter((child) =>
    HTTP_METHODS.includes(child.localName.toLowerCase())
  );
}

function operations(pathItem: XmlElement) {
  return operationElements(pathItem).map((operation) => {
    const tags = selectValues(operation, "tags/tag");
    return compact({
      method: operation.localName.toUpperCase(),
      operationId: childText(operation, "operationId"),
      summary: childText(operation, "summary"),
      tags: tags.length > 0 ? tags : undefined,
    });
  });
}

function servers(root: XmlElement, swagger: boolean): string[] {
  if (!swagger) {
    return unique(
      selectElements(root, "servers/server").map(
        (server) => getAttribute(server, "url") ?? childText(server, "url")
      )
    );
  }
  const host = childText(root, "host");
  if (!host) {
    return [];
  }
  const basePath = childText(root, "basePath") ?? "/";
  const schemes = selectValues(root, "schemes/scheme");
  return (schemes.length > 0 ? schemes : ["https"]).map(
    (scheme) => `${scheme}://${host}${basePath}`
  );
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "*/info", kind: "info" },
  { path: "*/paths/*", kind: "path", identifier: "@name" },
  { path: "*/components/schemas/*", kind: "schema", identifier: "@name" },
  { path: "*/definitions/*", kind: "schema", identifier: "@name" },
];

export const openApiXmlHandler: HandlerDescriptor = {
  id: "openapi-xml",
  label: "OpenAPI description (XML)",
  category: "web-services",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "root <openapi> or <swagger>",
        test: (d) => rootIs(d, "openapi", "swagger"),
      },
      {
        score: 0.8,
        evidence: "Swagger namespace",
        test: (d) => hasNamespace(d, "swagger.io"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const version = specVersion(root);
    const swagger = version.startsWith("2") || version.startsWith("1");
    const info = firstChild(root, "info");
    const pathItems = selectElements(root, "paths/*");
    const allOperations = pathItems.flatMap(operationElements);
    const schemaElements = [
      ...selectElements(root, "components/schemas/*"),
      ...selectElements(root, "definitions/*"),
    ];
    const securitySchemes =
      firstDescendant(root, "securitySchemes") ??
      firstDescendant(root, "securityDefinitions");
    return collectFields(
      {
        specification: () => (swagger ? "swagger" : "openapi"),
        version: () => version,
        title: () => childText(info, "title"),
        apiVersion: () => childText(info, "version"),
        servers: () => servers(root, swagger),
        paths: () =>
          pathItems.map((item) => ({
            path: keyOf(item),
            operations: operations(item),
          })),
        operationCount: () => allOperations.length,
        methods: () =>
          countBy(allOperations.map((op) => op.localName.toUpperCase())),
        schemas: () =>
          schemaElements.map((schema) => ({
            name: keyOf(schema),
            type: childText(schema, "type") ?? "object",
          })),
        securitySchemes: () =>
          securitySchemes && securitySchemes.children.map(keyOf),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
