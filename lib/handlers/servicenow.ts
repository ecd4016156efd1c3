/**
 * ServiceNow XML exports (<unload>)
 *
 * An export holds one or more table records (incident, problem, change_request,
 * ...) followed by the journal entries and attachments that belong to them.
 * Journal entries point at their record through <element_id>, attachments
 * through <table_sys_id>; chunking groups both right after the record.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  firstChild,
  getAttribute,
  hasDescendant,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, countBy, numberValue, unique } from "./fields";
import { hintsFor } from "./hints";
import { anyElementHasAttribute, PRIORITY, weighSignals } from "./signals";

const ANNOTATION_TABLES = [
  "sys_journal_field",
  "sys_attachment",
  "sys_attachment_doc",
] as const;

function isAnnotation(el: XmlElement): boolean {
  return ANNOTATION_TABLES.some((table) => table === el.localName);
}

/**
 * Reference field value; prefers the human-readable display_value.
 */
function displayValue(record: XmlElement, field: string): string | undefined {
  const child = firstChild(record, field);
  if (!child) {
    return undefined;
  }
  return getAttribute(child, "display_value") || childText(record, field);
}

function records(doc: ParsedDocument): XmlElement[] {
  return childElements(doc.root).filter((el) => !isAnnotation(el));
}

function summarizeRecord(record: XmlElement) {
  return compact({
    table: record.localName,
    action: getAttribute(record, "action"),
    sysId: childText(record, "sys_id"),
    number: childText(record, "number"),
    shortDescription: childText(record, "short_description"),
    state: childText(record, "state"),
    priority: childText(record, "priority"),
    category: childText(record, "category"),
    assignmentGroup: displayValue(record, "assignment_group"),
    assignedTo: displayValue(record, "assigned_to"),
    openedAt: childText(record, "opened_at"),
    closedAt: childText(record, "closed_at"),
  });
}

function summarizeJournal(doc: ParsedDocument) {
  const entries = childElements(doc.root, "sys_journal_field");
  const kinds = entries.map((entry) => childText(entry, "element") ?? "");
  return {
    total: entries.length,
    comments: kinds.filter((kind) => kind === "comments").length,
    workNotes: kinds.filter((kind) => kind === "work_notes").length,
    contributors: unique(
      entries.map((entry) => childText(entry, "sys_created_by"))
    ),
  };
}

function summarizeAttachments(doc: ParsedDocument) {
  const attachments = childElements(doc.root, "sys_attachment");
  let totalSizeBytes = 0;
  for (const attachment of attachments) {
    totalSizeBytes += numberValue(childText(attachment, "size_bytes")) ?? 0;
  }
  return {
    total: attachments.length,
    totalSizeBytes,
    contentTypes: countBy(
      attachments
        .map((attachment) => childText(attachment, "content_type"))
        .filter((type): type is string => type !== undefined)
    ),
    files: unique(
      attachments.map((attachment) => childText(attachment, "file_name"))
    ),
  };
}

const BOUNDARIES: BoundaryHint[] = [
  {
    path: "unload/sys_journal_field",
    kind: "annotation",
    identifier: "sys_id",
  },
  {
    path: "unload/sys_attachment",
    kind: "annotation",
    identifier: "sys_id",
  },
  { path: "unload/sys_attachment_doc", kind: "annotation" },
  { path: "unload/*", kind: "record", identifier: "sys_id" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "unload/sys_journal_field",
    target: "element_id",
    key: "record",
    group: true,
  },
  {
    from: "unload/sys_attachment",
    target: "table_sys_id",
    key: "record",
    group: true,
  },
  {
    from: "unload/sys_attachment_doc",
    target: "sys_attachment",
    key: "attachment",
    group: true,
  },
];

export const serviceNowHandler: HandlerDescriptor = {
  id: "servicenow",
  label: "ServiceNow export",
  category: "itsm",
  priority: PRIORITY.HEURISTIC,
  detect: (doc) =>
    weighSignals(
      doc,
      [
        {
          weight: 0.4,
          evidence: "root <unload>",
          test: (d) => d.root.localName === "unload",
        },
        {
          weight: 0.3,
          evidence: "<incident> record",
          test: (d) => hasDescendant(d.root, "incident"),
        },
        {
          weight: 0.2,
          evidence: "<sys_journal_field> entries",
          test: (d) => hasDescendant(d.root, "sys_journal_field"),
        },
        {
          weight: 0.1,
          evidence: "<sys_attachment> entries",
          test: (d) => hasDescendant(d.root, "sys_attachment"),
        },
        {
          weight: 0.1,
          evidence: "display_value attributes",
          test: (d) => anyElementHasAttribute(d, "display_value"),
        },
      ],
      { threshold: 0.5 }
    ),
  extract: (doc) =>
    collectFields(
      {
        primaryRecordType: () => records(doc)[0]?.localName ?? "unknown",
        recordCount: () => records(doc).length,
        exportedAt: () => getAttribute(doc.root, "unload_date"),
        records: () => records(doc).map(summarizeRecord),
        journal: () => summarizeJournal(doc),
        attachments: () => summarizeAttachments(doc),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    ),
};
