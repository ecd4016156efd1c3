/**
 * Tests for choosing a handler by detector score, priority and
 * registration order.
 */

import { expect, test } from "@playwright/test";
import { dispatch, rankHandlers, roundScore } from "@/lib/xml/dispatcher";
import { parseXml } from "@/lib/xml/document";
import { UnclassifiedDocumentError } from "@/lib/xml/errors";
import { createRegistry } from "@/lib/xml/registry";
import type { HandlerDescriptor, ParsedDocument } from "@/lib/xml/types";

const DOC = parseXml("<root><item>one</item></root>");

function handler(
  id: string,
  score: number | ((doc: ParsedDocument) => number),
  priority = 0
): HandlerDescriptor {
  return {
    id,
    priority,
    detect: (doc) => ({
      score: typeof score === "number" ? score : score(doc),
      evidence: [`${id} evidence`],
    }),
    extract: () => ({ fields: {} }),
  };
}

function failing(id: string): HandlerDescriptor {
  return {
    id,
    priority: 100,
    detect: () => {
      throw new Error("detector exploded");
    },
    extract: () => ({ fields: {} }),
  };
}

test.describe("dispatch", () => {
  test("highest score wins regardless of priority", () => {
    const registry = createRegistry([
      handler("low", 0.4, 10),
      handler("high", 0.9, 0),
    ]);
    const result = dispatch(DOC, registry);

    expect(result.documentType).toBe("high");
    expect(result.confidence).toBe(0.9);
    expect(result.ranked.map((c) => c.id)).toEqual(["high", "low"]);
  });

  test("equal scores fall back to priority", () => {
    const registry = createRegistry([
      handler("generic", 0.5, 1),
      handler("specific", 0.5, 5),
    ]);

    expect(dispatch(DOC, registry).documentType).toBe("specific");
  });

  test("equal score and priority fall back to registration order", () => {
    const registry = createRegistry([
      handler("first", 0.5, 5),
      handler("second", 0.5, 5),
    ]);

    expect(dispatch(DOC, registry).documentType).toBe("first");
  });

  test("scores within rounding distance tie", () => {
    const registry = createRegistry([
      handler("sum", () => 0.1 + 0.2, 1),
      handler("literal", 0.3, 2),
    ]);
    const result = dispatch(DOC, registry);

    expect(result.documentType).toBe("literal");
    expect(result.ranked.map((c) => c.score)).toEqual([0.3, 0.3]);
  });

  test("a throwing detector scores 0 and is reported", () => {
    const registry = createRegistry([failing("broken"), handler("ok", 0.2)]);
    const result = dispatch(DOC, registry);

    expect(result.documentType).toBe("ok");
    expect(result.diagnostics).toEqual([
      {
        kind: "detection_failed",
        handlerId: "broken",
        message: "detector exploded",
      },
    ]);
    expect(result.ranked.find((c) => c.id === "broken")?.score).toBe(0);
  });

  test("out-of-range scores are clamped and reported", () => {
    const registry = createRegistry([
      handler("over", 1.5),
      handler("under", -0.2),
    ]);
    const result = dispatch(DOC, registry);

    expect(result.documentType).toBe("over");
    expect(result.confidence).toBe(1);
    expect(result.diagnostics).toEqual([
      { kind: "score_adjusted", handlerId: "over", reported: 1.5, adjusted: 1 },
      {
        kind: "score_adjusted",
        handlerId: "under",
        reported: -0.2,
        adjusted: 0,
      },
    ]);
  });

  test("throws when no handler scores above zero", () => {
    const registry = createRegistry([handler("a", 0), handler("b", 0)]);

    let caught: unknown;
    try {
      dispatch(DOC, registry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnclassifiedDocumentError);
    if (caught instanceof UnclassifiedDocumentError) {
      expect(caught.rootElement).toBe("root");
      expect(caught.ranked.map((c) => c.id)).toEqual(["a", "b"]);
      expect(caught.message).toBe(
        "No handler recognised document with root <root>"
      );
    }
  });

  test("an empty registry classifies nothing", () => {
    expect(() => dispatch(DOC, createRegistry())).toThrow(
      UnclassifiedDocumentError
    );
  });

  test("ranking is the same on every run", () => {
    const registry = createRegistry([
      handler("a", 0.5, 1),
      handler("b", 0.7, 1),
      handler("c", 0.5, 3),
      handler("d", 0.5, 1),
    ]);
    const first = rankHandlers(DOC, registry).ranked.map((c) => c.id);
    const second = rankHandlers(DOC, registry).ranked.map((c) => c.id);

    expect(first).toEqual(["b", "c", "a", "d"]);
    expect(second).toEqual(first);
  });

  test("candidates carry the detector's evidence", () => {
    const registry = createRegistry([handler("a", 0.5)]);

    expect(dispatch(DOC, registry).ranked[0]?.evidence).toEqual([
      "a evidence",
    ]);
  });
});

test.describe("roundScore", () => {
  test("rounds to six decimal places", () => {
    expect(roundScore(0.1 + 0.2)).toBe(0.3);
    expect(roundScore(0.1234564)).toBe(0.123456);
  });
});
