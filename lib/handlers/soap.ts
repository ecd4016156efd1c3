/**
 * SOAP 1.1 / 1.2 message envelopes
 *
 * The operation is the first child of <Body>; a <Fault> there makes the
 * message a fault. Header blocks become their own chunks so WS-Security and
 * WS-Addressing headers stay separate from the payload.
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  childText,
  descendants,
  firstChild,
  hasNamespace,
  rootIs,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  XmlElement,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { PRIORITY, weighSignals } from "./signals";

const SOAP11_NAMESPACE = "schemas.xmlsoap.org/soap/envelope";
const SOAP12_NAMESPACE = "w3.org/2003/05/soap-envelope";
const WS_SECURITY = "docs.oasis-open.org/wss";
const WS_ADDRESSING = "/addressing";

function soapVersion(doc: ParsedDocument): string {
  return doc.root.namespace?.includes(SOAP12_NAMESPACE) ? "1.2" : "1.1";
}

function payload(doc: ParsedDocument): XmlElement | undefined {
  return firstChild(doc.root, "Body")?.children[0];
}

function messageType(doc: ParsedDocument): string {
  const first = payload(doc);
  if (!first) {
    return "empty";
  }
  if (first.localName === "Fault") {
    return "fault";
  }
  return first.localName.endsWith("Response") ? "response" : "request";
}

function fault(body: XmlElement | undefined) {
  if (!body || body.localName !== "Fault") {
    return undefined;
  }
  // 1.1 uses faultcode/faultstring, 1.2 Code/Reason
  return compact({
    code:
      childText(body, "faultcode") ??
      childText(firstChild(body, "Code"), "Value"),
    reason:
      childText(body, "faultstring") ??
      childText(firstChild(body, "Reason"), "Text"),
    actor: childText(body, "faultactor") ?? childText(body, "Role"),
  });
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "Envelope/Header/*", kind: "header" },
  { path: "Envelope/Body/*", kind: "body" },
];

export const soapEnvelopeHandler: HandlerDescriptor = {
  id: "soap-envelope",
  label: "SOAP envelope",
  category: "web-services",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    weighSignals(
      doc,
      [
        {
          weight: 0,
          evidence: "root <Envelope>",
          test: (d) => rootIs(d, "Envelope"),
          required: true,
        },
        {
          weight: 0.6,
          evidence: "SOAP envelope namespace",
          test: (d) =>
            hasNamespace(d, SOAP11_NAMESPACE) ||
            hasNamespace(d, SOAP12_NAMESPACE),
        },
        {
          weight: 0.3,
          evidence: "<Body>",
          test: (d) => firstChild(d.root, "Body") !== undefined,
        },
        {
          weight: 0.1,
          evidence: "<Header>",
          test: (d) => firstChild(d.root, "Header") !== undefined,
        },
      ],
      { threshold: 0.5 }
    ),
  extract: (doc) => {
    const header = firstChild(doc.root, "Header");
    const body = payload(doc);
    return collectFields(
      {
        version: () => soapVersion(doc),
        messageType: () => messageType(doc),
        operation: () =>
          body && body.localName !== "Fault" ? body.localName : undefined,
        operationNamespace: () =>
          body && body.localName !== "Fault" ? body.namespace : undefined,
        headers: () =>
          header ? childElements(header).map((block) => block.localName) : [],
        hasSecurity: () =>
          hasNamespace(doc, WS_SECURITY) ||
          (header !== undefined &&
            firstChild(header, "Security") !== undefined),
        addressing: () =>
          header && hasNamespace(doc, WS_ADDRESSING)
            ? compact({
                action: childText(header, "Action"),
                to: childText(header, "To"),
                messageId: childText(header, "MessageID"),
                relatesTo: childText(header, "RelatesTo"),
              })
            : undefined,
        fault: () => fault(body),
        parameters: () =>
          body && body.localName !== "Fault"
            ? unique(descendants(body).map((el) => el.localName))
            : undefined,
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
