/**
 * Apache Ivy module descriptors (ivy.xml) and settings (ivysettings.xml)
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  firstChild,
  getAttribute,
  rootIs,
  selectValues,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const BOUNDARIES: BoundaryHint[] = [
  { path: "ivy-module/info", kind: "info" },
  { path: "ivy-module/configurations", kind: "configurations" },
  { path: "ivy-module/publications", kind: "publications" },
  {
    path: "ivy-module/dependencies/dependency",
    kind: "dependency",
    identifier: "@name",
  },
  { path: "ivysettings/settings", kind: "settings" },
  { path: "ivysettings/resolvers/*", kind: "resolver", identifier: "@name" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "ivysettings/settings",
    target: "@defaultResolver",
    key: "resolver",
  },
];

export const ivyHandler: HandlerDescriptor = {
  id: "ivy",
  label: "Apache Ivy",
  category: "build",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: (d) =>
          Math.min(
            0.8 +
              (getAttribute(d.root, "version") !== undefined ? 0.1 : 0) +
              (firstChild(d.root, "info") ? 0.1 : 0),
            1
          ),
        evidence: "root <ivy-module>",
        test: (d) => rootIs(d, "ivy-module"),
      },
      {
        score: 0.9,
        evidence: "root <ivysettings>",
        test: (d) => rootIs(d, "ivysettings"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const isModule = root.localName === "ivy-module";
    const info = firstChild(root, "info");
    const dependencies = descendants(root, "dependency");
    return collectFields(
      {
        fileType: () => (isModule ? "module" : "settings"),
        organisation: () => info && getAttribute(info, "organisation"),
        module: () => info && getAttribute(info, "module"),
        revision: () => info && getAttribute(info, "revision"),
        status: () => info && getAttribute(info, "status"),
        configurations: () =>
          isModule
            ? selectValues(root, "configurations/conf/@name")
            : undefined,
        publications: () =>
          isModule
            ? selectValues(root, "publications/artifact/@name")
            : undefined,
        dependencies: () =>
          isModule
            ? dependencies.map((dependency) =>
                compact({
                  org: getAttribute(dependency, "org"),
                  name: getAttribute(dependency, "name"),
                  rev: getAttribute(dependency, "rev"),
                  conf: getAttribute(dependency, "conf"),
                })
              )
            : undefined,
        dependencyCount: () => (isModule ? dependencies.length : undefined),
        defaultResolver: () =>
          isModule
            ? undefined
            : selectValues(root, "settings/@defaultResolver")[0],
        resolvers: () => {
          const resolvers = firstChild(root, "resolvers");
          return resolvers
            ? unique(
                childElements(resolvers).map((resolver) =>
                  getAttribute(resolver, "name")
                )
              )
            : undefined;
        },
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
