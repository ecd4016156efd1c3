/**
 * Tests for sitemaps.
 */

import { expect, test } from "@playwright/test";
import { sitemapHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const URLSET = `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url>
    <loc>https://example.com/</loc>
    <lastmod>2024-05-02</lastmod>
    <changefreq>daily</changefreq>
    <priority>1.0</priority>
  </url>
  <url>
    <loc>https://example.com/about</loc>
    <lastmod>2024-01-15</lastmod>
    <changefreq>monthly</changefreq>
    <priority>0.5</priority>
  </url>
</urlset>`;

test.describe("Sitemap handler", () => {
  test("detects the sitemap namespace and roots", () => {
    expect(sitemapHandler.detect(parseXml(URLSET)).score).toBe(1);
    expect(sitemapHandler.detect(parseXml("<sitemapindex/>")).score).toBe(0.8);
  });

  test("summarises locations, frequencies and dates", () => {
    expect(processXml(URLSET).summary.fields).toEqual({
      type: "urlset",
      entryCount: 2,
      locations: ["https://example.com/", "https://example.com/about"],
      changeFrequencies: { daily: 1, monthly: 1 },
      averagePriority: 0.75,
      lastModified: { earliest: "2024-01-15", latest: "2024-05-02" },
    });
  });

  test("each URL is a chunk identified by its location", () => {
    expect(processXml(URLSET).chunks.map((c) => c.identifier)).toEqual([
      "https://example.com/",
      "https://example.com/about",
    ]);
  });
});
