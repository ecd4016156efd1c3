/**
 * Log4j configuration files, 1.x (<log4j:configuration>) and 2.x
 * (<Configuration>).
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  firstChild,
  getAttribute,
  rootIs,
  selectValues,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

function isLog4j1(doc: ParsedDocument): boolean {
  return doc.root.name === "log4j:configuration";
}

function levelOf(logger: XmlElement): string | undefined {
  const attribute = getAttribute(logger, "level");
  if (attribute) {
    return attribute;
  }
  // 1.x: <level value="..."/> or the older <priority value="..."/>
  const child = firstChild(logger, "level") ?? firstChild(logger, "priority");
  return child ? getAttribute(child, "value") : undefined;
}

function appenders(doc: ParsedDocument): XmlElement[] {
  if (isLog4j1(doc)) {
    return childElements(doc.root, "appender");
  }
  const block = firstChild(doc.root, "Appenders");
  return block ? childElements(block) : [];
}

function loggers(doc: ParsedDocument): XmlElement[] {
  if (isLog4j1(doc)) {
    return doc.root.children.filter(
      (el) => el.localName === "logger" || el.localName === "category"
    );
  }
  const block = firstChild(doc.root, "Loggers");
  return block
    ? childElements(block).filter((el) => el.localName !== "Root")
    : [];
}

function rootLogger(doc: ParsedDocument): XmlElement | undefined {
  if (isLog4j1(doc)) {
    return firstChild(doc.root, "root");
  }
  const block = firstChild(doc.root, "Loggers");
  return block ? firstChild(block, "Root") : undefined;
}

function appenderRefs(logger: XmlElement): string[] {
  return unique([
    ...selectValues(logger, "appender-ref/@ref"),
    ...selectValues(logger, "AppenderRef/@ref"),
  ]);
}

const V1_BOUNDARIES: BoundaryHint[] = [
  { path: "configuration/appender", kind: "appender", identifier: "@name" },
  { path: "configuration/logger", kind: "logger", identifier: "@name" },
  { path: "configuration/category", kind: "logger", identifier: "@name" },
  { path: "configuration/root", kind: "logger" },
];

const V1_REFERENCES: ReferenceHint[] = [
  { from: "configuration/*", target: "appender-ref/@ref", key: "appenders" },
];

const V2_BOUNDARIES: BoundaryHint[] = [
  {
    path: "Configuration/Appenders/*",
    kind: "appender",
    identifier: "@name",
  },
  { path: "Configuration/Loggers/*", kind: "logger", identifier: "@name" },
];

const V2_REFERENCES: ReferenceHint[] = [
  {
    from: "Configuration/Loggers/*",
    target: "AppenderRef/@ref",
    key: "appenders",
  },
];

export const log4jHandler: HandlerDescriptor = {
  id: "log4j",
  label: "Log4j configuration",
  category: "configuration",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "root <log4j:configuration>",
        test: isLog4j1,
      },
      {
        score: 0.9,
        evidence: "<Configuration> with Appenders or Loggers",
        test: (d) =>
          rootIs(d, "Configuration") &&
          (firstChild(d.root, "Appenders") !== undefined ||
            firstChild(d.root, "Loggers") !== undefined),
      },
      {
        score: 0.8,
        evidence: "<Configuration> with status or monitorInterval",
        test: (d) =>
          rootIs(d, "Configuration") &&
          (d.root.attributes.status !== undefined ||
            d.root.attributes.monitorInterval !== undefined),
      },
    ]),
  extract: (doc) => {
    const v1 = isLog4j1(doc);
    const root = rootLogger(doc);
    return collectFields(
      {
        version: () => (v1 ? "1.x" : "2.x"),
        status: () => getAttribute(doc.root, "status"),
        monitorInterval: () => getAttribute(doc.root, "monitorInterval"),
        appenders: () =>
          appenders(doc).map((appender) =>
            compact({
              name: getAttribute(appender, "name"),
              type: v1
                ? getAttribute(appender, "class")
                : (getAttribute(appender, "type") ?? appender.localName),
            })
          ),
        loggers: () =>
          loggers(doc).map((logger) =>
            compact({
              name: getAttribute(logger, "name"),
              level: levelOf(logger),
              additivity: getAttribute(logger, "additivity"),
              appenders: appenderRefs(logger),
            })
          ),
        rootLogger: () =>
          root
            ? compact({ level: levelOf(root), appenders: appenderRefs(root) })
            : undefined,
      },
      v1
        ? hintsFor(doc, V1_BOUNDARIES, V1_REFERENCES)
        : hintsFor(doc, V2_BOUNDARIES, V2_REFERENCES)
    );
  },
};
