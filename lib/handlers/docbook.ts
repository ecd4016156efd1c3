/**
 * DocBook books and articles
 */

import { collectFields } from "../xml/extraction";
import {
  childText,
  descendants,
  firstChild,
  getAttribute,
  hasNamespace,
  rootIs,
} from "../xml/query";
import { textContent } from "../xml/text";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const DOCBOOK_ROOTS = ["book", "article", "chapter", "section", "para"];

const SECTION_NAMES = new Set(["section", "sect1", "sect2", "sect3"]);

/** <title> directly or inside <info>/<bookinfo>/<articleinfo> */
function titleOf(el: XmlElement): string | undefined {
  const direct = childText(el, "title");
  if (direct) {
    return direct;
  }
  for (const name of ["info", "bookinfo", "articleinfo"]) {
    const info = firstChild(el, name);
    const title = childText(info, "title");
    if (title) {
      return title;
    }
  }
  return undefined;
}

function authors(root: XmlElement): string[] {
  return unique(
    descendants(root, "author").map((author) => {
      const personName = firstChild(author, "personname") ?? author;
      const first = childText(personName, "firstname");
      const last = childText(personName, "surname");
      if (first || last) {
        return [first, last].filter(Boolean).join(" ");
      }
      return textContent(author) || undefined;
    })
  );
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "book/chapter", kind: "chapter", identifier: "@id" },
  { path: "book/part/chapter", kind: "chapter", identifier: "@id" },
  { path: "book/appendix", kind: "chapter", identifier: "@id" },
  { path: "book/preface", kind: "chapter", identifier: "@id" },
  { path: "article/section", kind: "section", identifier: "@id" },
  { path: "article/sect1", kind: "section", identifier: "@id" },
  { path: "chapter/section", kind: "section", identifier: "@id" },
  { path: "chapter/sect1", kind: "section", identifier: "@id" },
  { path: "section/section", kind: "section", identifier: "@id" },
];

const REFERENCES: ReferenceHint[] = [
  { from: "**", target: "**/xref/@linkend", key: "xref" },
  { from: "**", target: "**/link/@linkend", key: "xref" },
];

export const docbookHandler: HandlerDescriptor = {
  id: "docbook",
  label: "DocBook document",
  category: "documentation",
  priority: PRIORITY.HEURISTIC,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "DocBook namespace",
        test: (d) => hasNamespace(d, "docbook.org"),
      },
      {
        score: 0.8,
        evidence: "DocBook root element",
        test: (d) => rootIs(d, ...DOCBOOK_ROOTS),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const chapters = descendants(root, "chapter");
    const sections = descendants(root).filter((el) =>
      SECTION_NAMES.has(el.localName)
    );
    return collectFields(
      {
        documentType: () => root.localName,
        version: () =>
          getAttribute(root, "version") ??
          (hasNamespace(doc, "docbook.org") ? "5.x" : "4.x"),
        title: () => titleOf(root),
        authors: () => authors(root),
        chapterCount: () => chapters.length,
        sectionCount: () => sections.length,
        chapterTitles: () =>
          chapters
            .map((chapter) => titleOf(chapter))
            .filter((title): title is string => title !== undefined),
        codeListings: () =>
          descendants(root, "programlisting").length +
          descendants(root, "screen").length,
        tables: () =>
          descendants(root, "table").length +
          descendants(root, "informaltable").length,
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
