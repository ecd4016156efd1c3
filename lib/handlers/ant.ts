/**
 * Apache Ant build files
 *
 * Targets are the chunks. `depends="a, b"` links a target to the targets it
 * runs first.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  descendants,
  getAttribute,
  hasDescendant,
  hasNamespace,
  rootIs,
  selectValues,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { PRIORITY, type Signal, weighSignals } from "./signals";

function attributeSignal(name: string, weight: number): Signal {
  return {
    weight,
    evidence: `@${name} on <project>`,
    test: (d) => getAttribute(d.root, name) !== undefined,
  };
}

function elementSignal(...localNames: string[]): Signal {
  return {
    weight: 0.1,
    evidence: `<${localNames.join("> or <")}>`,
    test: (d) => localNames.some((name) => hasDescendant(d.root, name)),
  };
}

function dependsOn(target: XmlElement): string[] {
  return unique((getAttribute(target, "depends") ?? "").split(/[\s,]+/));
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "project/path", kind: "path", identifier: "@id" },
  { path: "project/target", kind: "target", identifier: "@name" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "project/target",
    target: "@depends",
    key: "depends",
    normalize: "list",
  },
  { from: "project/target", target: "**/@classpathref", key: "classpath" },
];

export const antBuildHandler: HandlerDescriptor = {
  id: "ant-build",
  label: "Apache Ant build",
  category: "build",
  priority: PRIORITY.HEURISTIC,
  detect: (doc) =>
    weighSignals(
      doc,
      [
        {
          weight: 0,
          evidence: "root <project>",
          test: (d) => rootIs(d, "project"),
          required: true,
        },
        {
          weight: 0,
          evidence: "outside the Maven namespace",
          test: (d) => !hasNamespace(d, "maven.apache.org"),
          required: true,
        },
        attributeSignal("name", 0.3),
        attributeSignal("default", 0.3),
        attributeSignal("basedir", 0.2),
        elementSignal("target"),
        elementSignal("property"),
        elementSignal("taskdef"),
        elementSignal("path", "fileset"),
        {
          weight: 0.2,
          evidence: "antlib namespace",
          test: (d) => hasNamespace(d, "antlib"),
        },
      ],
      { threshold: 0.45 }
    ),
  extract: (doc) => {
    const project = doc.root;
    const targets = childElements(project, "target");
    const properties = descendants(project, "property");
    return collectFields(
      {
        name: () => getAttribute(project, "name"),
        defaultTarget: () => getAttribute(project, "default"),
        basedir: () => getAttribute(project, "basedir") ?? ".",
        description: () => childText(project, "description"),
        targets: () =>
          targets.map((target) =>
            compact({
              name: getAttribute(target, "name"),
              description: getAttribute(target, "description"),
              depends: dependsOn(target),
            })
          ),
        properties: () => {
          const values: Record<string, string> = {};
          for (const property of properties) {
            const name = getAttribute(property, "name");
            const value = getAttribute(property, "value");
            if (name && value !== undefined) {
              values[name] = value;
            }
          }
          return values;
        },
        propertyFiles: () =>
          unique(properties.map((property) => getAttribute(property, "file"))),
        tasks: () =>
          countBy(
            targets.flatMap((target) =>
              childElements(target).map((task) => task.localName)
            )
          ),
        taskdefs: () =>
          unique(
            descendants(project, "taskdef").map((def) =>
              getAttribute(def, "name")
            )
          ),
        paths: () =>
          unique(
            childElements(project, "path").map((path) =>
              getAttribute(path, "id")
            )
          ),
        imports: () => [
          ...selectValues(project, "import/@file"),
          ...selectValues(project, "include/@file"),
        ],
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
