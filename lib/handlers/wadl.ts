/**
 * WADL REST API descriptions
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  firstChild,
  getAttribute,
  hasDescendant,
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
import { unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const WADL_NAMESPACES = ["wadl.dev.java.net", "research.sun.com/wadl"];

const WADL_ELEMENTS = [
  "resources",
  "resource",
  "method",
  "request",
  "response",
  "representation",
  "param",
];

function wadlElementCount(doc: ParsedDocument): number {
  return WADL_ELEMENTS.filter((name) => hasDescendant(doc.root, name)).length;
}

function joinPath(base: string, path: string | undefined): string {
  const segment = (path ?? "").replace(/^\/+|\/+$/g, "");
  if (!base) {
    return segment;
  }
  return segment ? `${base}/${segment}` : base;
}

/**
 * Flatten nested resources into full paths with their HTTP methods.
 * `<method href="#id"/>` is resolved against the top-level method
 * definitions.
 */
function endpoints(root: XmlElement) {
  const methodNames = new Map<string, string>();
  for (const method of descendants(root, "method")) {
    const id = getAttribute(method, "id");
    const name = getAttribute(method, "name");
    if (id && name) {
      methodNames.set(id, name);
    }
  }
  const methodName = (method: XmlElement) => {
    const href = getAttribute(method, "href");
    const id = href?.slice(href.lastIndexOf("#") + 1);
    return getAttribute(method, "name") ?? (id && methodNames.get(id));
  };

  const found: { path: string; methods: string[] }[] = [];
  const walk = (resource: XmlElement, base: string) => {
    const path = joinPath(base, getAttribute(resource, "path"));
    found.push({
      path,
      methods: unique(childElements(resource, "method").map(methodName)),
    });
    for (const child of childElements(resource, "resource")) {
      walk(child, path);
    }
  };
  for (const resources of childElements(root, "resources")) {
    for (const resource of childElements(resources, "resource")) {
      walk(resource, "");
    }
  }
  return found;
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "application/grammars", kind: "grammars" },
  {
    path: "application/resources/resource",
    kind: "resource",
    identifier: "@path",
  },
  { path: "application/method", kind: "method", identifier: "@id" },
  {
    path: "application/representation",
    kind: "representation",
    identifier: "@id",
  },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "application/resources/resource",
    target: "**/method/@href",
    key: "methods",
    normalize: "fragment",
  },
  {
    from: "application/method",
    target: "**/representation/@href",
    key: "representations",
    normalize: "fragment",
  },
];

export const wadlHandler: HandlerDescriptor = {
  id: "wadl",
  label: "WADL API description",
  category: "web-services",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "WADL namespace",
        test: (d) => WADL_NAMESPACES.some((ns) => hasNamespace(d, ns)),
      },
      {
        score: (d) => Math.min(wadlElementCount(d) * 0.2, 0.9),
        evidence: "root <application> with WADL elements",
        test: (d) => rootIs(d, "application") && wadlElementCount(d) >= 2,
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const intro = firstChild(root, "doc");
    return collectFields(
      {
        title: () => intro && getAttribute(intro, "title"),
        baseUri: () => selectValues(root, "resources/@base")[0],
        resourceCount: () => descendants(root, "resource").length,
        endpoints: () => endpoints(root),
        parameters: () =>
          unique(
            descendants(root, "param").map((param) =>
              getAttribute(param, "name")
            )
          ),
        mediaTypes: () =>
          unique(
            descendants(root, "representation").map((rep) =>
              getAttribute(rep, "mediaType")
            )
          ),
        grammars: () => selectValues(root, "grammars/include/@href"),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
