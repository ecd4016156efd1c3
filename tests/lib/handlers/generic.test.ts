/**
 * Tests for the generic fallback handler.
 */

import { expect, test } from "@playwright/test";
import { genericHandler } from "@/lib/handlers";
import { parseXml } from "@/lib/xml/document";

test.describe("Generic handler", () => {
  test("scores any non-empty document low", () => {
    expect(genericHandler.detect(parseXml("<a>x</a>")).score).toBe(0.1);
    expect(genericHandler.detect(parseXml("<a/>")).score).toBe(0);
  });

  test("describes the document shape without hints", () => {
    const doc = parseXml(
      '<c:catalog xmlns:c="urn:catalog"><c:entry sku="1"><c:name>Bolt</c:name></c:entry><c:entry sku="2"/></c:catalog>'
    );

    expect(genericHandler.extract(doc)).toEqual({
      fields: {
        rootElement: "c:catalog",
        elementCount: 4,
        distinctElements: 3,
        attributeCount: 2,
        maxDepth: 2,
        namespaces: { c: "urn:catalog" },
        topLevelElements: { entry: 2 },
      },
    });
  });
});
