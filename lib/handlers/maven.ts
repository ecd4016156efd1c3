/**
 * Maven project descriptors (pom.xml)
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  firstChild,
  hasDescendant,
  hasNamespace,
  rootIs,
} from "../xml/query";
import { textContent } from "../xml/text";
import type { BoundaryHint, HandlerDescriptor, XmlElement } from "../xml/types";
import { compact } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const MAVEN_NAMESPACE = "maven.apache.org";

function coordinates(el: XmlElement) {
  return compact({
    groupId: childText(el, "groupId"),
    artifactId: childText(el, "artifactId"),
    version: childText(el, "version"),
    scope: childText(el, "scope"),
    type: childText(el, "type"),
  });
}

function listed(
  project: XmlElement,
  container: string,
  item: string
): XmlElement[] {
  const parent = firstChild(project, container);
  return parent ? childElements(parent, item) : [];
}

function properties(project: XmlElement): Record<string, string> {
  const result: Record<string, string> = {};
  const block = firstChild(project, "properties");
  for (const property of block?.children ?? []) {
    result[property.localName] = textContent(property);
  }
  return result;
}

function plugins(project: XmlElement): XmlElement[] {
  const build = firstChild(project, "build");
  return build ? listed(build, "plugins", "plugin") : [];
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "project/dependencies", kind: "dependencies" },
  { path: "project/dependencyManagement", kind: "dependencies" },
  { path: "project/build", kind: "build" },
  { path: "project/profiles/profile", kind: "profile", identifier: "id" },
];

export const mavenPomHandler: HandlerDescriptor = {
  id: "maven-pom",
  label: "Maven POM",
  category: "build",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "root <project> in the Maven namespace",
        test: (d) => rootIs(d, "project") && hasNamespace(d, MAVEN_NAMESPACE),
      },
      {
        score: 0.8,
        evidence: "root <project> with groupId and artifactId",
        test: (d) =>
          rootIs(d, "project") &&
          hasDescendant(d.root, "groupId") &&
          hasDescendant(d.root, "artifactId"),
      },
    ]),
  extract: (doc) => {
    const project = doc.root;
    return collectFields(
      {
        modelVersion: () => childText(project, "modelVersion"),
        groupId: () =>
          childText(project, "groupId") ??
          childText(firstChild(project, "parent"), "groupId"),
        artifactId: () => childText(project, "artifactId"),
        version: () => childText(project, "version"),
        packaging: () => childText(project, "packaging") ?? "jar",
        name: () => childText(project, "name"),
        description: () => childText(project, "description"),
        parent: () => {
          const parent = firstChild(project, "parent");
          return parent ? coordinates(parent) : undefined;
        },
        modules: () =>
          listed(project, "modules", "module").map((m) => textContent(m)),
        properties: () => properties(project),
        dependencies: () =>
          listed(project, "dependencies", "dependency").map(coordinates),
        plugins: () => plugins(project).map(coordinates),
        profiles: () =>
          listed(project, "profiles", "profile")
            .map((profile) => childText(profile, "id"))
            .filter((id): id is string => id !== undefined),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
