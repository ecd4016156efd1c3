/**
 * Tests for resolving declared references into chunk links.
 */

import { expect, test } from "@playwright/test";
import { resolveReferences } from "@/lib/xml/references";
import type { Chunk, DeclaredReference } from "@/lib/xml/types";

function chunkAt(
  index: number,
  identifier: string | undefined,
  declaredReferences: DeclaredReference[] = []
): Chunk {
  return {
    index,
    chunkId: `chunk_${index}_00000000`,
    path: "root/item",
    kind: "item",
    text: `item ${index}`,
    ...(identifier ? { identifier } : {}),
    declaredReferences,
    references: {},
    referencedBy: {},
    externalReferences: {},
    metadata: {
      element: "item",
      attributes: {},
      elementPaths: ["root/item"],
      tokenEstimate: 2,
      totalChunks: 1,
    },
  };
}

function ref(target: string, key = "ref"): DeclaredReference {
  return { key, target, group: false };
}

test.describe("resolveReferences", () => {
  test("links both ends of a resolved reference", () => {
    const { chunks, diagnostics } = resolveReferences([
      chunkAt(0, "A", [ref("B")]),
      chunkAt(1, "B", [ref("A")]),
    ]);

    expect(chunks[0]?.references).toEqual({ ref: [1] });
    expect(chunks[0]?.referencedBy).toEqual({ ref: [1] });
    expect(chunks[1]?.references).toEqual({ ref: [0] });
    expect(chunks[1]?.referencedBy).toEqual({ ref: [0] });
    expect(diagnostics).toEqual([]);
  });

  test("keeps unknown targets as external references", () => {
    const { chunks, diagnostics } = resolveReferences([
      chunkAt(0, "A", [ref("xs:string", "type"), ref("xs:string", "type")]),
    ]);

    expect(chunks[0]?.references).toEqual({});
    expect(chunks[0]?.externalReferences).toEqual({ type: ["xs:string"] });
    expect(diagnostics).toEqual([
      {
        kind: "unresolved_reference",
        chunkIndex: 0,
        key: "type",
        target: "xs:string",
      },
    ]);
  });

  test("duplicate identifiers resolve to the first chunk", () => {
    const { chunks, diagnostics } = resolveReferences([
      chunkAt(0, "A"),
      chunkAt(1, "A"),
      chunkAt(2, undefined, [ref("A")]),
    ]);

    expect(chunks[2]?.references).toEqual({ ref: [0] });
    expect(chunks[0]?.referencedBy).toEqual({ ref: [2] });
    expect(chunks[1]?.referencedBy).toEqual({});
    expect(diagnostics).toEqual([
      {
        kind: "duplicate_identifier",
        identifier: "A",
        chunkIndex: 1,
        firstIndex: 0,
      },
    ]);
  });

  test("sorts link keys and indices", () => {
    const { chunks } = resolveReferences([
      chunkAt(0, "T"),
      chunkAt(1, "U"),
      chunkAt(2, undefined, [ref("U", "z"), ref("T", "z"), ref("T", "a")]),
    ]);

    expect(chunks[2]?.references).toEqual({ a: [0], z: [0, 1] });
    expect(Object.keys(chunks[2]?.references ?? {})).toEqual(["a", "z"]);
  });

  test("does not modify its input", () => {
    const input = [chunkAt(0, "A"), chunkAt(1, "B", [ref("A")])];
    const { chunks } = resolveReferences(input);

    expect(input[0]?.referencedBy).toEqual({});
    expect(chunks[0]).not.toBe(input[0]);
  });
});
