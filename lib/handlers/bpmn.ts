/**
 * BPMN 2.0 process models
 *
 * Each process is one chunk; collaborations link to the processes their
 * participants run, and message events to the message definitions.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  getAttribute,
  hasDescendant,
  rootIs,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, countBy, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

const ACTIVITIES = new Set([
  "task",
  "userTask",
  "serviceTask",
  "scriptTask",
  "sendTask",
  "receiveTask",
  "manualTask",
  "businessRuleTask",
  "subProcess",
  "callActivity",
]);

const EVENTS = new Set([
  "startEvent",
  "endEvent",
  "intermediateThrowEvent",
  "intermediateCatchEvent",
  "boundaryEvent",
]);

const isGateway = (el: XmlElement) => el.localName.endsWith("Gateway");

function bpmnNamespace(doc: ParsedDocument): boolean {
  return doc.namespaceUris.some((uri) => uri.toLowerCase().includes("bpmn"));
}

function structureCount(doc: ParsedDocument): number {
  const markers = ["process", "startEvent", "endEvent", "task"].filter(
    (name) => hasDescendant(doc.root, name)
  );
  return markers.length + (descendants(doc.root).some(isGateway) ? 1 : 0);
}

function processInfo(process: XmlElement) {
  const nodes = descendants(process);
  return compact({
    id: getAttribute(process, "id"),
    name: getAttribute(process, "name"),
    executable: getAttribute(process, "isExecutable") === "true",
    activities: nodes.filter((el) => ACTIVITIES.has(el.localName)).length,
    gateways: nodes.filter(isGateway).length,
    events: nodes.filter((el) => EVENTS.has(el.localName)).length,
  });
}

function decisionPoints(root: XmlElement) {
  const flows = descendants(root, "sequenceFlow");
  return descendants(root)
    .filter(isGateway)
    .map((gateway) => {
      const id = getAttribute(gateway, "id");
      return compact({
        id,
        name: getAttribute(gateway, "name"),
        type: gateway.localName,
        default: getAttribute(gateway, "default"),
        outgoing: unique(
          flows
            .filter((flow) => id && getAttribute(flow, "sourceRef") === id)
            .map((flow) => getAttribute(flow, "targetRef"))
        ),
      });
    });
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "definitions/message", kind: "message", identifier: "@id" },
  {
    path: "definitions/collaboration",
    kind: "collaboration",
    identifier: "@id",
  },
  { path: "definitions/process", kind: "process", identifier: "@id" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "definitions/collaboration",
    target: "**/participant/@processRef",
    key: "participants",
  },
  { from: "definitions/process", target: "**/@messageRef", key: "messages" },
];

export const bpmnHandler: HandlerDescriptor = {
  id: "bpmn",
  label: "BPMN process model",
  category: "business-process",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      { score: 1, evidence: "BPMN namespace", test: bpmnNamespace },
      {
        score: (d) => Math.min(structureCount(d) * 0.2, 0.9),
        evidence: "root <definitions> with process elements",
        test: (d) => rootIs(d, "definitions") && structureCount(d) >= 2,
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const all = descendants(root);
    return collectFields(
      {
        version: () =>
          doc.namespaceUris.some((uri) => uri.includes("BPMN/1"))
            ? "1.2"
            : "2.0",
        targetNamespace: () => getAttribute(root, "targetNamespace"),
        processes: () => childElements(root, "process").map(processInfo),
        activities: () =>
          countBy(
            all
              .filter((el) => ACTIVITIES.has(el.localName))
              .map((el) => el.localName)
          ),
        decisionPoints: () => decisionPoints(root),
        sequenceFlowCount: () => descendants(root, "sequenceFlow").length,
        lanes: () =>
          unique(
            descendants(root, "lane").map(
              (lane) => getAttribute(lane, "name") ?? getAttribute(lane, "id")
            )
          ),
        participants: () =>
          descendants(root, "participant").map((participant) =>
            compact({
              name: getAttribute(participant, "name"),
              process: getAttribute(participant, "processRef"),
            })
          ),
        messages: () =>
          unique(
            childElements(root, "message").map(
              (message) =>
                getAttribute(message, "name") ?? getAttribute(message, "id")
            )
          ),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
