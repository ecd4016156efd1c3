/**
 * Tests for DocBook documents.
 */

import { expect, test } from "@playwright/test";
import { docbookHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const GUIDE = `<book xmlns="http://docbook.org/ns/docbook" version="5.0">
  <info>
    <title>Guide</title>
    <author><personname><firstname>Ada</firstname><surname>Lovelace</surname></personname></author>
  </info>
  <chapter xml:id="intro">
    <title>Intro</title>
    <para>Read <xref linkend="setup"/> first.</para>
  </chapter>
  <chapter xml:id="setup">
    <title>Setup</title>
    <section>
      <title>Install</title>
      <programlisting>make install</programlisting>
    </section>
  </chapter>
</book>`;

test.describe("DocBook handler", () => {
  test("detects the DocBook namespace and roots", () => {
    expect(docbookHandler.detect(parseXml(GUIDE)).score).toBe(1);
    expect(docbookHandler.detect(parseXml("<article/>")).score).toBe(0.8);
  });

  test("summarises titles, authors and structure", () => {
    expect(processXml(GUIDE).summary.fields).toEqual({
      documentType: "book",
      version: "5.0",
      title: "Guide",
      authors: ["Ada Lovelace"],
      chapterCount: 2,
      sectionCount: 1,
      chapterTitles: ["Intro", "Setup"],
      codeListings: 1,
      tables: 0,
    });
  });

  test("chapters are chunks linked by cross references", () => {
    const { chunks } = processXml(GUIDE);

    expect(chunks.map((c) => [c.kind, c.identifier])).toEqual([
      ["context", undefined],
      ["chapter", "intro"],
      ["chapter", "setup"],
    ]);
    expect(chunks[1]?.text).toBe("Intro Read first.");
    expect(chunks[1]?.references).toEqual({ xref: [2] });
    expect(chunks[2]?.referencedBy).toEqual({ xref: [1] });
  });
});
