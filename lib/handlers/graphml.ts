/**
 * GraphML graphs
 *
 * Nodes and edges are chunks; each edge links to its source and target
 * nodes, and data values to the key declaring them.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
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
import { compact } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const GRAPHML_NAMESPACE = "graphml.graphdrawing.org";

function degrees(nodes: readonly XmlElement[], edges: readonly XmlElement[]) {
  const degree = new Map<string, number>();
  for (const node of nodes) {
    const id = getAttribute(node, "id");
    if (id) {
      degree.set(id, 0);
    }
  }
  for (const edge of edges) {
    const ends = [getAttribute(edge, "source"), getAttribute(edge, "target")];
    for (const end of ends) {
      if (end !== undefined) {
        degree.set(end, (degree.get(end) ?? 0) + 1);
      }
    }
  }
  return degree;
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "graphml/key", kind: "key", identifier: "@id" },
  { path: "graphml/graph/node", kind: "node", identifier: "@id" },
  { path: "graphml/graph/edge", kind: "edge", identifier: "@id" },
];

const REFERENCES: ReferenceHint[] = [
  { from: "graphml/graph/edge", target: "@source", key: "source" },
  { from: "graphml/graph/edge", target: "@target", key: "target" },
  { from: "graphml/graph/*", target: "data/@key", key: "keys" },
];

export const graphmlHandler: HandlerDescriptor = {
  id: "graphml",
  label: "GraphML graph",
  category: "data",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "GraphML namespace",
        test: (d) => hasNamespace(d, GRAPHML_NAMESPACE),
      },
      {
        score: 0.95,
        evidence: "root <graphml>",
        test: (d) => rootIs(d, "graphml"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const graphs = descendants(root, "graph");
    const nodes = descendants(root, "node");
    const edges = descendants(root, "edge");
    const degree = degrees(nodes, edges);
    return collectFields(
      {
        graphCount: () => graphs.length,
        edgeDefault: () => {
          const first = graphs[0];
          return first && (getAttribute(first, "edgedefault") ?? "undirected");
        },
        nodeCount: () => nodes.length,
        edgeCount: () => edges.length,
        keys: () =>
          childElements(root, "key").map((key) =>
            compact({
              id: getAttribute(key, "id"),
              for: getAttribute(key, "for"),
              name: getAttribute(key, "attr.name"),
              type: getAttribute(key, "attr.type"),
            })
          ),
        isolatedNodes: () =>
          [...degree].filter(([, count]) => count === 0).map(([id]) => id),
        maxDegree: () => {
          let best: { node: string; degree: number } | undefined;
          for (const [node, count] of degree) {
            if (!best || count > best.degree) {
              best = { node, degree: count };
            }
          }
          return best;
        },
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
