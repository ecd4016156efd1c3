/**
 * SAML 1.1 / 2.0 assertions and protocol messages
 */

import { collectFields } from "../xml/extraction";
import {
  descendants,
  firstDescendant,
  getAttribute,
  hasDescendant,
  hasNamespace,
  rootIs,
  selectValues,
} from "../xml/query";
import { textContent } from "../xml/text";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { PRIORITY, type Signal, weighSignals } from "./signals";

const SAML2_NAMESPACES = [
  "urn:oasis:names:tc:SAML:2.0:assertion",
  "urn:oasis:names:tc:SAML:2.0:protocol",
];
const SAML1_NAMESPACES = [
  "urn:oasis:names:tc:SAML:1.0:assertion",
  "urn:oasis:names:tc:SAML:1.0:protocol",
];

const MESSAGE_TYPES: Record<string, string> = {
  Assertion: "assertion",
  Response: "response",
  AuthnRequest: "authentication-request",
  LogoutRequest: "logout-request",
  LogoutResponse: "logout-response",
  ArtifactResolve: "artifact-resolve",
  ArtifactResponse: "artifact-response",
};

const ROOTS = [
  "Assertion",
  "Response",
  "AuthnRequest",
  "LogoutRequest",
  "LogoutResponse",
];

function samlVersion(doc: ParsedDocument): string {
  const declared = getAttribute(doc.root, "Version");
  if (declared) {
    return declared;
  }
  return SAML1_NAMESPACES.some((ns) => hasNamespace(doc, ns)) &&
    !SAML2_NAMESPACES.some((ns) => hasNamespace(doc, ns))
    ? "1.1"
    : "2.0";
}

function attributeSignal(name: string): Signal {
  return {
    weight: 0.1,
    evidence: `@${name} on the root`,
    test: (d) => getAttribute(d.root, name) !== undefined,
  };
}

function childSignal(localName: string): Signal {
  return {
    weight: 0.05,
    evidence: `<${localName}>`,
    test: (d) => hasDescendant(d.root, localName),
  };
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "Response/Assertion", kind: "assertion", identifier: "@ID" },
  { path: "Response/EncryptedAssertion", kind: "assertion" },
  { path: "Assertion/Subject", kind: "subject" },
  { path: "Assertion/Conditions", kind: "conditions" },
  { path: "Assertion/AttributeStatement", kind: "attributes" },
  { path: "Assertion/AuthnStatement", kind: "authentication" },
];

export const samlHandler: HandlerDescriptor = {
  id: "saml",
  label: "SAML message",
  category: "security",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    weighSignals(doc, [
      {
        weight: 0,
        evidence: "SAML root element",
        test: (d) => rootIs(d, ...ROOTS),
        required: true,
      },
      {
        weight: 0.7,
        evidence: "SAML namespace",
        test: (d) =>
          [...SAML2_NAMESPACES, ...SAML1_NAMESPACES].some((ns) =>
            hasNamespace(d, ns)
          ),
        required: true,
      },
      attributeSignal("ID"),
      attributeSignal("IssueInstant"),
      attributeSignal("Version"),
      attributeSignal("Issuer"),
      childSignal("Issuer"),
      childSignal("Subject"),
      childSignal("Conditions"),
      childSignal("AttributeStatement"),
      childSignal("AuthnStatement"),
    ]),
  extract: (doc) => {
    const root = doc.root;
    const conditions = firstDescendant(root, "Conditions");
    const nameId = firstDescendant(root, "NameID");
    return collectFields(
      {
        version: () => samlVersion(doc),
        messageType: () => MESSAGE_TYPES[root.localName] ?? root.localName,
        id: () => getAttribute(root, "ID"),
        issueInstant: () => getAttribute(root, "IssueInstant"),
        issuer: () => {
          const issuer = firstDescendant(root, "Issuer");
          return issuer
            ? textContent(issuer) || undefined
            : getAttribute(root, "Issuer");
        },
        destination: () => getAttribute(root, "Destination"),
        status: () => selectValues(root, "Status/StatusCode/@Value")[0],
        subject: () =>
          nameId
            ? compact({
                nameId: textContent(nameId) || undefined,
                format: getAttribute(nameId, "Format"),
              })
            : undefined,
        conditions: () =>
          conditions
            ? compact({
                notBefore: getAttribute(conditions, "NotBefore"),
                notOnOrAfter: getAttribute(conditions, "NotOnOrAfter"),
                audiences: unique(
                  descendants(conditions, "Audience").map((el) =>
                    textContent(el)
                  )
                ),
              })
            : undefined,
        assertionCount: () =>
          rootIs(doc, "Assertion") ? 1 : descendants(root, "Assertion").length,
        attributes: () =>
          unique(
            descendants(root, "Attribute").map((el) => getAttribute(el, "Name"))
          ),
        authnContext: () => selectValues(root, "**/AuthnContextClassRef")[0],
        signed: () => hasDescendant(root, "Signature"),
        encrypted: () => hasDescendant(root, "EncryptedAssertion"),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
