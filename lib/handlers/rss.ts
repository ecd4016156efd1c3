/**
 * RSS 2.0 and Atom feeds
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  firstChild,
  getAttribute,
  rootIs,
  selectValues,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  XmlElement,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

function feedItems(doc: ParsedDocument): XmlElement[] {
  if (rootIs(doc, "feed")) {
    return childElements(doc.root, "entry");
  }
  const channel = firstChild(doc.root, "channel");
  return channel ? childElements(channel, "item") : [];
}

function atomLink(el: XmlElement): string | undefined {
  const links = childElements(el, "link");
  const alternate =
    links.find((link) => getAttribute(link, "rel") === "alternate") ??
    links.find((link) => getAttribute(link, "rel") === undefined);
  return alternate ? getAttribute(alternate, "href") : undefined;
}

function summarizeItem(item: XmlElement, atom: boolean) {
  return compact({
    title: childText(item, "title"),
    link: atom ? atomLink(item) : childText(item, "link"),
    published: atom
      ? (childText(item, "published") ?? childText(item, "updated"))
      : childText(item, "pubDate"),
    id: atom ? childText(item, "id") : childText(item, "guid"),
    author: atom
      ? childText(firstChild(item, "author"), "name")
      : (childText(item, "author") ?? childText(item, "creator")),
  });
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "rss/channel/item", kind: "item", identifier: "guid" },
  { path: "feed/entry", kind: "entry", identifier: "id" },
];

export const rssHandler: HandlerDescriptor = {
  id: "rss",
  label: "RSS / Atom feed",
  category: "syndication",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      { score: 1, evidence: "root <rss>", test: (d) => rootIs(d, "rss") },
      {
        score: 0.9,
        evidence: "root <feed> (Atom)",
        test: (d) => rootIs(d, "feed"),
      },
    ]),
  extract: (doc) => {
    const atom = rootIs(doc, "feed");
    const channel = atom ? doc.root : firstChild(doc.root, "channel");
    const items = feedItems(doc);
    return collectFields(
      {
        format: () => (atom ? "atom" : "rss"),
        version: () => (atom ? "1.0" : getAttribute(doc.root, "version")),
        title: () => childText(channel, "title"),
        link: () =>
          atom ? atomLink(doc.root) : childText(channel, "link"),
        description: () =>
          childText(channel, atom ? "subtitle" : "description"),
        language: () => childText(channel, "language"),
        itemCount: () => items.length,
        items: () => items.map((item) => summarizeItem(item, atom)),
        categories: () =>
          unique(
            items.flatMap((item) =>
              atom
                ? selectValues(item, "category/@term")
                : selectValues(item, "category")
            )
          ),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
