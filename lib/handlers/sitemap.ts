/**
 * sitemaps.org URL sets and sitemap indexes
 */

import { collectFields } from "../xml/extraction";
import { childElements, childText, hasNamespace, rootIs } from "../xml/query";
import type { BoundaryHint, HandlerDescriptor } from "../xml/types";
import { countBy, numberValue } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const SITEMAP_NAMESPACE = "sitemaps.org/schemas/sitemap";

const BOUNDARIES: BoundaryHint[] = [
  { path: "urlset/url", kind: "url", identifier: "loc" },
  { path: "sitemapindex/sitemap", kind: "sitemap", identifier: "loc" },
];

export const sitemapHandler: HandlerDescriptor = {
  id: "sitemap",
  label: "Sitemap",
  category: "web",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "sitemaps.org namespace",
        test: (d) => hasNamespace(d, SITEMAP_NAMESPACE),
      },
      {
        score: 0.8,
        evidence: "root <urlset> or <sitemapindex>",
        test: (d) => rootIs(d, "urlset", "sitemapindex"),
      },
    ]),
  extract: (doc) => {
    const isIndex = rootIs(doc, "sitemapindex");
    const entries = childElements(doc.root, isIndex ? "sitemap" : "url");
    const modified = entries
      .map((entry) => childText(entry, "lastmod"))
      .filter((value): value is string => value !== undefined)
      .sort();
    const priorities = entries
      .map((entry) => numberValue(childText(entry, "priority")))
      .filter((value): value is number => value !== undefined);

    return collectFields(
      {
        type: () => (isIndex ? "sitemapindex" : "urlset"),
        entryCount: () => entries.length,
        locations: () =>
          entries
            .map((entry) => childText(entry, "loc"))
            .filter((loc): loc is string => loc !== undefined),
        changeFrequencies: () =>
          countBy(
            entries
              .map((entry) => childText(entry, "changefreq"))
              .filter((value): value is string => value !== undefined)
          ),
        averagePriority: () =>
          priorities.length > 0
            ? priorities.reduce((sum, value) => sum + value, 0) /
              priorities.length
            : undefined,
        lastModified: () =>
          modified.length > 0
            ? { earliest: modified[0] ?? "", latest: modified.at(-1) ?? "" }
            : undefined,
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
