/**
 * SVG graphics
 */

import { collectFields } from "../xml/extraction";
import {
  childText,
  descendants,
  getAttribute,
  hasDescendant,
  hasNamespace,
  rootIs,
} from "../xml/query";
import { textContent } from "../xml/text";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
} from "../xml/types";
import { compact, countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const SVG_NAMESPACE = "http://www.w3.org/2000/svg";

const SHAPES = new Set([
  "rect",
  "circle",
  "ellipse",
  "line",
  "polyline",
  "polygon",
  "path",
  "text",
  "image",
  "use",
]);

const ANIMATIONS = ["animate", "animateTransform", "animateMotion", "set"];

const BOUNDARIES: BoundaryHint[] = [
  { path: "svg/defs/*", kind: "definition", identifier: "@id" },
  { path: "svg/symbol", kind: "definition", identifier: "@id" },
  { path: "svg/g", kind: "group", identifier: "@id" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "svg/g",
    target: "**/use/@href",
    key: "uses",
    normalize: "fragment",
  },
];

export const svgHandler: HandlerDescriptor = {
  id: "svg",
  label: "SVG graphic",
  category: "graphics",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      { score: 1, evidence: "root <svg>", test: (d) => rootIs(d, "svg") },
      {
        score: 0.9,
        evidence: "SVG namespace",
        test: (d) => hasNamespace(d, SVG_NAMESPACE),
      },
    ]),
  extract: (doc) => {
    const svg = doc.root;
    const all = descendants(svg);
    return collectFields(
      {
        width: () => getAttribute(svg, "width"),
        height: () => getAttribute(svg, "height"),
        viewBox: () => getAttribute(svg, "viewBox"),
        title: () => childText(svg, "title"),
        description: () => childText(svg, "desc"),
        elementCount: () => all.length,
        shapes: () =>
          countBy(
            all
              .filter((el) => SHAPES.has(el.localName))
              .map((el) => el.localName)
          ),
        ids: () => unique(all.map((el) => getAttribute(el, "id"))),
        texts: () =>
          all
            .filter((el) => el.localName === "text")
            .map((el) => textContent(el))
            .filter((text) => text.length > 0),
        features: () =>
          compact({
            animation: ANIMATIONS.some((name) => hasDescendant(svg, name)),
            scripts: hasDescendant(svg, "script"),
            styles: hasDescendant(svg, "style"),
            gradients:
              hasDescendant(svg, "linearGradient") ||
              hasDescendant(svg, "radialGradient"),
          }),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
