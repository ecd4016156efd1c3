/**
 * XHTML pages
 *
 * A bare <html> root needs several page indicators before it counts, since
 * plenty of XML vocabularies borrow <head>/<body>.
 */

import { collectFields } from "../xml/extraction";
import {
  descendants,
  firstChild,
  firstDescendant,
  getAttribute,
  hasDescendant,
  hasNamespace,
  rootIs,
} from "../xml/query";
import { textContent } from "../xml/text";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
} from "../xml/types";
import { compact, countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const XHTML_NAMESPACE = "www.w3.org/1999/xhtml";

const PAGE_PARTS = ["head", "body", "title", "meta", "link"];
const HEADINGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);
const LANDMARKS = [
  "header",
  "nav",
  "main",
  "article",
  "section",
  "aside",
  "footer",
];
const FORM_FIELDS = new Set(["input", "select", "textarea"]);

function pageIndicators(doc: ParsedDocument): number {
  const parts = PAGE_PARTS.filter((name) => hasDescendant(doc.root, name));
  const lang = getAttribute(doc.root, "xml:lang") !== undefined ? 2 : 0;
  return parts.length + lang;
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "html/head", kind: "head" },
  { path: "html/body/header", kind: "header" },
  { path: "html/body/nav", kind: "navigation" },
  { path: "html/body/main", kind: "section", identifier: "@id" },
  { path: "html/body/**/article", kind: "section", identifier: "@id" },
  { path: "html/body/**/section", kind: "section", identifier: "@id" },
  { path: "html/body/aside", kind: "aside" },
  { path: "html/body/footer", kind: "footer" },
];

export const xhtmlHandler: HandlerDescriptor = {
  id: "xhtml",
  label: "XHTML page",
  category: "web",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "XHTML namespace",
        test: (d) => rootIs(d, "html") && hasNamespace(d, XHTML_NAMESPACE),
      },
      {
        score: (d) => Math.min(pageIndicators(d) * 0.15, 0.9),
        evidence: "root <html> with page structure",
        test: (d) => rootIs(d, "html") && pageIndicators(d) >= 3,
      },
    ]),
  extract: (doc) => {
    const html = doc.root;
    const head = firstChild(html, "head");
    const all = descendants(html);
    return collectFields(
      {
        title: () => {
          const title = head && firstDescendant(head, "title");
          return title ? textContent(title) || undefined : undefined;
        },
        language: () =>
          getAttribute(html, "xml:lang") ?? getAttribute(html, "lang"),
        meta: () => {
          const entries: Record<string, string> = {};
          for (const meta of head ? descendants(head, "meta") : []) {
            const name = getAttribute(meta, "name");
            const content = getAttribute(meta, "content");
            if (name && content !== undefined) {
              entries[name] = content;
            }
          }
          return Object.keys(entries).length > 0 ? entries : undefined;
        },
        headings: () =>
          all
            .filter((el) => HEADINGS.has(el.localName))
            .map((el) => ({
              level: Number(el.localName.slice(1)),
              text: textContent(el),
            })),
        landmarks: () =>
          countBy(
            all
              .map((el) => el.localName)
              .filter((name) => LANDMARKS.includes(name))
          ),
        links: () =>
          unique(descendants(html, "a").map((el) => getAttribute(el, "href"))),
        images: () =>
          descendants(html, "img").map((el) =>
            compact({
              src: getAttribute(el, "src"),
              alt: getAttribute(el, "alt"),
            })
          ),
        forms: () =>
          descendants(html, "form").map((form) =>
            compact({
              action: getAttribute(form, "action"),
              method: getAttribute(form, "method"),
              fields: unique(
                descendants(form)
                  .filter((el) => FORM_FIELDS.has(el.localName))
                  .map((field) => getAttribute(field, "name"))
              ),
            })
          ),
        scripts: () =>
          unique(
            descendants(html, "script").map((el) => getAttribute(el, "src"))
          ),
        stylesheets: () =>
          unique(
            descendants(html, "link")
              .filter((el) => getAttribute(el, "rel") === "stylesheet")
              .map((el) => getAttribute(el, "href"))
          ),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
