/**
 * Tests for SAML assertions and protocol messages.
 */

import { expect, test } from "@playwright/test";
import { samlHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const RESPONSE = `<samlp:Response xmlns:samlp="urn:oasis:names:tc:SAML:2.0:protocol"
    xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion"
    ID="r1" Version="2.0" IssueInstant="2026-01-01T00:00:00Z"
    Destination="https://sp.example.com/acs">
  <saml:Issuer>https://idp.example.com</saml:Issuer>
  <samlp:Status>
    <samlp:StatusCode Value="urn:oasis:names:tc:SAML:2.0:status:Success"/>
  </samlp:Status>
  <saml:Assertion ID="a1" Version="2.0" IssueInstant="2026-01-01T00:00:00Z">
    <saml:Issuer>https://idp.example.com</saml:Issuer>
    <saml:Subject>
      <saml:NameID Format="urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress">user@example.com</saml:NameID>
    </saml:Subject>
    <saml:Conditions NotBefore="2026-01-01T00:00:00Z" NotOnOrAfter="2026-01-01T00:05:00Z">
      <saml:AudienceRestriction>
        <saml:Audience>https://sp.example.com</saml:Audience>
      </saml:AudienceRestriction>
    </saml:Conditions>
    <saml:AttributeStatement>
      <saml:Attribute Name="email"><saml:AttributeValue>user@example.com</saml:AttributeValue></saml:Attribute>
      <saml:Attribute Name="role"><saml:AttributeValue>admin</saml:AttributeValue></saml:Attribute>
    </saml:AttributeStatement>
  </saml:Assertion>
</samlp:Response>`;

test.describe("SAML handler", () => {
  test("requires a SAML root in a SAML namespace", () => {
    expect(samlHandler.detect(parseXml(RESPONSE)).score).toBe(1);
    expect(
      samlHandler.detect(
        parseXml(
          '<saml:Assertion xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion" ID="a1"/>'
        )
      ).score
    ).toBeCloseTo(0.8);
    expect(samlHandler.detect(parseXml("<Response ID='r1'/>")).score).toBe(0);
  });

  test("summarises the issuer, subject and conditions", () => {
    const { classification, summary } = processXml(RESPONSE);

    expect(classification.documentType).toBe("saml");
    expect(summary.fields).toEqual({
      version: "2.0",
      messageType: "response",
      id: "r1",
      issueInstant: "2026-01-01T00:00:00Z",
      issuer: "https://idp.example.com",
      destination: "https://sp.example.com/acs",
      status: "urn:oasis:names:tc:SAML:2.0:status:Success",
      subject: {
        nameId: "user@example.com",
        format: "urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress",
      },
      conditions: {
        notBefore: "2026-01-01T00:00:00Z",
        notOnOrAfter: "2026-01-01T00:05:00Z",
        audiences: ["https://sp.example.com"],
      },
      assertionCount: 1,
      attributes: ["email", "role"],
      signed: false,
      encrypted: false,
    });
  });

  test("keeps each assertion in its own chunk", () => {
    const { chunks } = processXml(RESPONSE);

    expect(chunks.map((c) => c.kind)).toEqual(["context", "assertion"]);
    expect(chunks[1]?.identifier).toBe("a1");
  });
});
