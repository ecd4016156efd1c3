/**
 * S1000D data modules and publication modules
 *
 * A data module code (DMC) is spread over the attributes of <dmCode>; it is
 * rendered in the usual hyphenated form:
 *   DMC-S1000DBIKE-AAA-DA1-00-00-00AA-041A-A
 */

import { collectFields } from "../xml/extraction";
import {
  descendants,
  firstDescendant,
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
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const S1000D_ROOTS = ["dmodule", "applicCrossRefTable", "publication"];

const CONTENT_TYPES = [
  "description",
  "procedure",
  "illustratedPartsCatalog",
  "faultIsolation",
  "process",
  "crew",
  "schedul",
  "wiringData",
];

export function formatDataModuleCode(dmCode: XmlElement): string {
  const a = (name: string) => getAttribute(dmCode, name) ?? "";
  const parts = [
    a("modelIdentCode"),
    a("systemDiffCode"),
    a("systemCode"),
    `${a("subSystemCode")}${a("subSubSystemCode")}`,
    a("assyCode"),
    `${a("disassyCode")}${a("disassyCodeVariant")}`,
    `${a("infoCode")}${a("infoCodeVariant")}`,
    a("itemLocationCode"),
  ];
  return `DMC-${parts.join("-")}`;
}

function schemaLocation(root: XmlElement): string {
  return (getAttribute(root, "noNamespaceSchemaLocation") ?? "").toLowerCase();
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "dmodule/identAndStatusSection", kind: "metadata" },
  {
    path: "dmodule/content/**/levelledPara",
    kind: "section",
    identifier: "@id",
  },
  {
    path: "dmodule/content/**/proceduralStep",
    kind: "step",
    identifier: "@id",
  },
  {
    path: "dmodule/content/**/isolationStep",
    kind: "step",
    identifier: "@id",
  },
  { path: "publication/pmEntry", kind: "section" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "dmodule/**",
    target: "**/internalRef/@internalRefId",
    key: "internal",
  },
  { from: "dmodule/**", target: "**/dmRef/@href", key: "dmRef" },
];

export const s1000dHandler: HandlerDescriptor = {
  id: "s1000d",
  label: "S1000D module",
  category: "technical-publication",
  priority: PRIORITY.HEURISTIC,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 0.9,
        evidence: "S1000D root element",
        test: (d) => rootIs(d, ...S1000D_ROOTS),
      },
      {
        score: 1,
        evidence: "s1000d.org namespace",
        test: (d) => hasNamespace(d, "s1000d.org"),
      },
      {
        score: 0.95,
        evidence: "S1000D schema location",
        test: (d) => schemaLocation(d.root).includes("s1000d"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const dmCode = firstDescendant(root, "dmCode");
    const dmTitle = firstDescendant(root, "dmTitle");
    const issueInfo = firstDescendant(root, "issueInfo");
    const language = firstDescendant(root, "language");
    const content = firstDescendant(root, "content");
    return collectFields(
      {
        structure: () => root.localName,
        dataModuleCode: () =>
          dmCode ? formatDataModuleCode(dmCode) : undefined,
        techName: () => {
          const techName = dmTitle && firstDescendant(dmTitle, "techName");
          return techName ? textContent(techName) : undefined;
        },
        infoName: () => {
          const infoName = dmTitle && firstDescendant(dmTitle, "infoName");
          return infoName ? textContent(infoName) : undefined;
        },
        issue: () =>
          issueInfo
            ? compact({
                number: getAttribute(issueInfo, "issueNumber"),
                inWork: getAttribute(issueInfo, "inWork"),
              })
            : undefined,
        language: () =>
          language
            ? compact({
                language: getAttribute(language, "languageIsoCode"),
                country: getAttribute(language, "countryIsoCode"),
              })
            : undefined,
        securityClassification: () => {
          const security = firstDescendant(root, "security");
          return security
            ? getAttribute(security, "securityClassification")
            : undefined;
        },
        contentType: () =>
          content?.children.find((child) =>
            CONTENT_TYPES.includes(child.localName)
          )?.localName,
        procedureSteps: () => descendants(root, "proceduralStep").length,
        dmRefs: () =>
          unique(
            descendants(root, "dmRef").map((ref) => {
              const code = firstDescendant(ref, "dmCode");
              return code ? formatDataModuleCode(code) : undefined;
            })
          ),
        graphics: () => {
          const graphics = doc.externalEntities
            .filter((entity) => entity.kind === "graphic")
            .map((entity) =>
              compact({
                name: entity.name,
                file: entity.systemId,
                notation: entity.notation,
              })
            );
          return graphics.length > 0 ? graphics : undefined;
        },
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
