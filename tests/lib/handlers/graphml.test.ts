/**
 * Tests for GraphML graphs.
 */

import { expect, test } from "@playwright/test";
import { graphmlHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const GRAPH = `<graphml xmlns="http://graphml.graphdrawing.org/xmlns">
  <key id="label" for="node" attr.name="label" attr.type="string"/>
  <graph id="G" edgedefault="directed">
    <node id="a"><data key="label">Alpha</data></node>
    <node id="b"><data key="label">Beta</data></node>
    <node id="c"/>
    <edge id="e1" source="a" target="b"/>
  </graph>
</graphml>`;

test.describe("GraphML handler", () => {
  test("detects the namespace or the root", () => {
    expect(graphmlHandler.detect(parseXml(GRAPH)).score).toBe(1);
    expect(graphmlHandler.detect(parseXml("<graphml/>")).score).toBe(0.95);
  });

  test("summarises keys, counts and degrees", () => {
    expect(processXml(GRAPH).summary.fields).toEqual({
      graphCount: 1,
      edgeDefault: "directed",
      nodeCount: 3,
      edgeCount: 1,
      keys: [{ id: "label", for: "node", name: "label", type: "string" }],
      isolatedNodes: ["c"],
      maxDegree: { node: "a", degree: 1 },
    });
  });

  test("links edges to their end nodes", () => {
    const { chunks, diagnostics } = processXml(GRAPH);

    expect(chunks.map((c) => c.kind)).toEqual([
      "key",
      "node",
      "node",
      "node",
      "edge",
    ]);
    expect(chunks[1]?.text).toBe("Alpha");
    expect(chunks[1]?.references).toEqual({ keys: [0] });
    expect(chunks[4]?.references).toEqual({ source: [1], target: [2] });
    expect(chunks[1]?.referencedBy).toEqual({ source: [4] });
    expect(diagnostics).toEqual([]);
  });
});
