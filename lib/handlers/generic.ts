/**
 * Generic XML: the fallback when no specific handler matches.
 * It gives no structural hints, so its documents are chunked structurally.
 */

import type { HandlerDescriptor, XmlElement } from "../xml/types";
import { countBy } from "./fields";
import { PRIORITY } from "./signals";

function maxDepth(el: XmlElement): number {
  let depth = el.depth;
  for (const child of el.children) {
    depth = Math.max(depth, maxDepth(child));
  }
  return depth;
}

export const genericHandler: HandlerDescriptor = {
  id: "generic",
  label: "Generic XML",
  category: "generic",
  priority: PRIORITY.FALLBACK,
  detect: (doc) =>
    doc.root.nodes.length === 0
      ? { score: 0, evidence: ["empty root"] }
      : { score: 0.1, evidence: ["well-formed XML"] },
  extract: (doc) => {
    const attributeCount = doc.elements.reduce(
      (sum, el) =>
        sum +
        Object.keys(el.attributes).filter((name) => !name.startsWith("xmlns"))
          .length,
      0
    );
    return {
      fields: {
        rootElement: doc.root.name,
        elementCount: doc.elements.length,
        distinctElements: new Set(doc.elements.map((el) => el.localName)).size,
        attributeCount,
        maxDepth: maxDepth(doc.root),
        namespaces: { ...doc.namespaces },
        topLevelElements: countBy(doc.root.children.map((el) => el.localName)),
      },
    };
  },
};
