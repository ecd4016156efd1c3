/**
 * KML (Google Earth / OGC) documents
 */

import { collectFields } from "../xml/extraction";
import {
  childText,
  descendants,
  firstChild,
  hasNamespace,
  rootIs,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
} from "../xml/types";
import { countBy } from "./fields";
import { hintsFor } from "./hints";
import { countPresent, firstRule, PRIORITY } from "./signals";

const KML_NAMESPACES = ["opengis.net/kml", "earth.google.com/kml"];
const KML_ELEMENTS = [
  "Document",
  "Folder",
  "Placemark",
  "Point",
  "LineString",
  "Polygon",
];
const GEOMETRIES = new Set([
  "Point",
  "LineString",
  "LinearRing",
  "Polygon",
  "MultiGeometry",
]);

const BOUNDARIES: BoundaryHint[] = [
  { path: "kml/**/Style", kind: "style", identifier: "@id" },
  { path: "kml/**/StyleMap", kind: "style", identifier: "@id" },
  { path: "kml/**/Folder", kind: "folder", identifier: "name" },
  { path: "kml/**/Placemark", kind: "placemark", identifier: "name" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "kml/**",
    target: "**/styleUrl",
    key: "style",
    normalize: "fragment",
  },
];

export const kmlHandler: HandlerDescriptor = {
  id: "kml",
  label: "KML document",
  category: "geospatial",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "KML namespace",
        test: (d) => KML_NAMESPACES.some((ns) => hasNamespace(d, ns)),
      },
      {
        score: (d) => Math.min(countPresent(d, KML_ELEMENTS) * 0.2, 0.9),
        evidence: "root <kml> with KML features",
        test: (d) => rootIs(d, "kml") && countPresent(d, KML_ELEMENTS) >= 2,
      },
    ]),
  extract: (doc) => {
    const kml = doc.root;
    const kmlDocument = firstChild(kml, "Document");
    const placemarks = descendants(kml, "Placemark");
    return collectFields(
      {
        name: () => childText(kmlDocument, "name"),
        description: () => childText(kmlDocument, "description"),
        folderCount: () => descendants(kml, "Folder").length,
        placemarkCount: () => placemarks.length,
        placemarks: () =>
          placemarks
            .map((placemark) => childText(placemark, "name"))
            .filter((name): name is string => name !== undefined),
        geometries: () =>
          countBy(
            descendants(kml)
              .filter((el) => GEOMETRIES.has(el.localName))
              .map((el) => el.localName)
          ),
        styleCount: () =>
          descendants(kml, "Style").length +
          descendants(kml, "StyleMap").length,
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
