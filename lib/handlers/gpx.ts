/**
 * GPS Exchange Format (GPX) tracks, routes and waypoints
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  descendants,
  firstChild,
  getAttribute,
  hasNamespace,
  rootIs,
} from "../xml/query";
import type { BoundaryHint, HandlerDescriptor } from "../xml/types";
import { compact, numberValue } from "./fields";
import { hintsFor } from "./hints";
import { countPresent, firstRule, PRIORITY } from "./signals";

const GPX_NAMESPACE = "topografix.com/GPX";
const GPX_FEATURES = ["wpt", "rte", "trk"];

const BOUNDARIES: BoundaryHint[] = [
  { path: "gpx/wpt", kind: "waypoint", identifier: "name" },
  { path: "gpx/rte", kind: "route", identifier: "name" },
  { path: "gpx/trk", kind: "track", identifier: "name" },
];

export const gpxHandler: HandlerDescriptor = {
  id: "gpx",
  label: "GPX track",
  category: "geospatial",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "GPX namespace",
        test: (d) => hasNamespace(d, GPX_NAMESPACE),
      },
      {
        score: (d) => Math.min(countPresent(d, GPX_FEATURES) * 0.3, 0.9),
        evidence: "root <gpx> with waypoints, routes or tracks",
        test: (d) => rootIs(d, "gpx") && countPresent(d, GPX_FEATURES) > 0,
      },
    ]),
  extract: (doc) => {
    const gpx = doc.root;
    const metadata = firstChild(gpx, "metadata");
    const bounds = metadata && firstChild(metadata, "bounds");
    const tracks = childElements(gpx, "trk");
    const elevations = descendants(gpx, "ele")
      .map((ele) => numberValue(ele.text))
      .filter((value): value is number => value !== undefined);

    return collectFields(
      {
        version: () => getAttribute(gpx, "version"),
        creator: () => getAttribute(gpx, "creator"),
        name: () => childText(metadata, "name"),
        time: () => childText(metadata, "time"),
        waypointCount: () => childElements(gpx, "wpt").length,
        routeCount: () => childElements(gpx, "rte").length,
        trackCount: () => tracks.length,
        trackPointCount: () => descendants(gpx, "trkpt").length,
        trackNames: () =>
          tracks
            .map((track) => childText(track, "name"))
            .filter((name): name is string => name !== undefined),
        bounds: () =>
          bounds
            ? compact({
                minLat: numberValue(getAttribute(bounds, "minlat")),
                minLon: numberValue(getAttribute(bounds, "minlon")),
                maxLat: numberValue(getAttribute(bounds, "maxlat")),
                maxLon: numberValue(getAttribute(bounds, "maxlon")),
              })
            : undefined,
        elevation: () =>
          elevations.length > 0
            ? {
                min: Math.min(...elevations),
                max: Math.max(...elevations),
              }
            : undefined,
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
