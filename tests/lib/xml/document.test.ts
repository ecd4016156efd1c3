/**
 * Tests for parsing XML into the document model.
 */

import { expect, test } from "@playwright/test";
import { parseXml } from "@/lib/xml/document";
import { MalformedInputError } from "@/lib/xml/errors";
import { textContent } from "@/lib/xml/text";

test.describe("parseXml", () => {
  test("builds element paths, depth and pre-order positions", () => {
    const doc = parseXml(
      '<root><a id="1">hello <b>world</b> !</a><c/></root>'
    );

    expect(doc.root.name).toBe("root");
    expect(doc.elements.map((el) => el.path)).toEqual([
      "root",
      "root/a",
      "root/a/b",
      "root/c",
    ]);
    expect(doc.elements.map((el) => el.order)).toEqual([0, 1, 2, 3]);
    expect(doc.elements.map((el) => el.depth)).toEqual([0, 1, 2, 1]);
  });

  test("keeps mixed content in document order", () => {
    const doc = parseXml('<root><a id="1">hello <b>world</b> !</a></root>');
    const a = doc.root.children[0];

    expect(a?.attributes).toEqual({ id: "1" });
    expect(a?.nodes.map((node) => node.type)).toEqual([
      "text",
      "element",
      "text",
    ]);
    expect(a?.text).toBe("hello !");
    expect(a && textContent(a)).toBe("hello world !");
  });

  test("drops whitespace-only text between elements", () => {
    const doc = parseXml("<r>\n  <a>x</a>\n</r>");

    expect(doc.root.nodes).toHaveLength(1);
    expect(doc.root.text).toBe("");
  });

  test("indexes elements by path", () => {
    const doc = parseXml(
      "<r><item>1</item><group><item>2</item></group><item>3</item></r>"
    );

    expect(doc.index.get("r/item")?.map((el) => el.text)).toEqual(["1", "3"]);
    expect(doc.index.get("r/group/item")?.map((el) => el.text)).toEqual(["2"]);
  });

  test("resolves prefixes and the default namespace", () => {
    const doc = parseXml(
      '<x:root xmlns:x="urn:x" xmlns="urn:d"><x:item/><item/></x:root>'
    );

    expect(doc.root.localName).toBe("root");
    expect(doc.root.prefix).toBe("x");
    expect(doc.root.namespace).toBe("urn:x");
    expect(doc.root.path).toBe("root");
    expect(doc.root.children.map((el) => el.namespace)).toEqual([
      "urn:x",
      "urn:d",
    ]);
    expect(doc.namespaces).toEqual({ x: "urn:x", default: "urn:d" });
    expect(doc.namespaceUris).toEqual(["urn:x", "urn:d"]);
  });

  test("accepts bytes with a byte order mark", () => {
    const bytes = new TextEncoder().encode("\uFEFF<r><a>x</a></r>");
    const doc = parseXml(bytes);

    expect(doc.root.name).toBe("r");
    expect(textContent(doc.root)).toBe("x");
  });

  test("decodes numeric character references in text and attributes", () => {
    const doc = parseXml('<doc><a t="&#65;&#x42;">caf&#233; &#x41;</a></doc>');
    const a = doc.root.children[0];

    expect(a?.text).toBe("café A");
    expect(a?.attributes).toEqual({ t: "AB" });
  });

  test("rejects bytes that are not valid UTF-8", () => {
    const bytes = new Uint8Array([
      ...new TextEncoder().encode("<doc><a>"),
      0xff,
      0xfe,
      ...new TextEncoder().encode("</a></doc>"),
    ]);

    expect(() => parseXml(bytes)).toThrow(MalformedInputError);
    expect(() => parseXml(bytes)).toThrow(
      "Malformed XML: input is not valid UTF-8"
    );
  });

  test("ignores the XML declaration and comments", () => {
    const doc = parseXml(
      '<?xml version="1.0" encoding="UTF-8"?>\n<!-- note --><r><a>x</a></r>'
    );

    expect(doc.root.name).toBe("r");
    expect(doc.elements).toHaveLength(2);
  });

  test("rejects malformed XML", () => {
    expect(() => parseXml("<a><b></a>")).toThrow(MalformedInputError);
  });

  test("rejects empty input", () => {
    expect(() => parseXml("  \n ")).toThrow("Malformed XML: document is empty");
  });

  test("malformed input errors carry the error code", () => {
    let caught: unknown;
    try {
      parseXml("<a>");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedInputError);
    expect(caught instanceof MalformedInputError && caught.code).toBe(
      "malformed_input"
    );
  });

  test("takes external entities out of the DOCTYPE", () => {
    const doc = parseXml(`<?xml version="1.0"?>
<!DOCTYPE dmodule [
<!NOTATION cgm PUBLIC "-//USA-DOD//NOTATION Computer Graphics Metafile//EN">
<!ENTITY ICN-BIKE-0001 SYSTEM "ICN-BIKE-0001.CGM" NDATA cgm>
<!ENTITY readme SYSTEM "readme.xml">
<!ENTITY passwd SYSTEM "file:///etc/passwd">
<!ENTITY up SYSTEM "../secret.png" NDATA png>
]>
<dmodule><content/></dmodule>`);

    expect(doc.root.name).toBe("dmodule");
    expect(doc.externalEntities).toEqual([
      {
        name: "ICN-BIKE-0001",
        systemId: "ICN-BIKE-0001.CGM",
        notation: "cgm",
        kind: "graphic",
      },
      { name: "readme", systemId: "readme.xml", kind: "external" },
    ]);
  });

  test("keeps line numbers after stripping declarations", () => {
    let caught: unknown;
    try {
      parseXml(
        '<!DOCTYPE dmodule [\n<!ENTITY ICN-1 SYSTEM "ICN-1.PNG" NDATA png>\n]>\n<dmodule><a></dmodule>'
      );
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof MalformedInputError && caught.line).toBe(4);
  });

  test("documents without a DOCTYPE have no external entities", () => {
    expect(parseXml("<r/>").externalEntities).toEqual([]);
  });
});
