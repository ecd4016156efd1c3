/**
 * Tests for SOAP message envelopes.
 */

import { expect, test } from "@playwright/test";
import { soapEnvelopeHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const REQUEST = `<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/"
    xmlns:wsa="http://www.w3.org/2005/08/addressing">
  <soap:Header>
    <wsa:Action>urn:GetQuote</wsa:Action>
    <wsa:MessageID>uuid:1</wsa:MessageID>
  </soap:Header>
  <soap:Body>
    <q:GetQuote xmlns:q="urn:quotes"><q:symbol>ACME</q:symbol></q:GetQuote>
  </soap:Body>
</soap:Envelope>`;

const FAULT = `<env:Envelope xmlns:env="http://www.w3.org/2003/05/soap-envelope">
  <env:Body>
    <env:Fault>
      <env:Code><env:Value>env:Sender</env:Value></env:Code>
      <env:Reason><env:Text xml:lang="en">Bad symbol</env:Text></env:Reason>
    </env:Fault>
  </env:Body>
</env:Envelope>`;

test.describe("SOAP envelope handler", () => {
  test("weighs the namespace, body and header", () => {
    expect(soapEnvelopeHandler.detect(parseXml(REQUEST)).score).toBeCloseTo(1);
    expect(soapEnvelopeHandler.detect(parseXml(FAULT)).score).toBeCloseTo(0.9);
  });

  test("needs the envelope namespace", () => {
    expect(
      soapEnvelopeHandler.detect(parseXml("<Envelope><Header/><Body/></Envelope>"))
        .score
    ).toBe(0);
    expect(soapEnvelopeHandler.detect(parseXml("<doc/>")).score).toBe(0);
  });

  test("summarises the operation and addressing headers", () => {
    expect(processXml(REQUEST).summary.fields).toEqual({
      version: "1.1",
      messageType: "request",
      operation: "GetQuote",
      operationNamespace: "urn:quotes",
      headers: ["Action", "MessageID"],
      hasSecurity: false,
      addressing: { action: "urn:GetQuote", messageId: "uuid:1" },
      parameters: ["symbol"],
    });
  });

  test("reads SOAP 1.2 faults", () => {
    const { classification, summary } = processXml(FAULT);

    expect(classification.documentType).toBe("soap-envelope");
    expect(summary.fields).toEqual({
      version: "1.2",
      messageType: "fault",
      headers: [],
      hasSecurity: false,
      fault: { code: "env:Sender", reason: "Bad symbol" },
    });
  });

  test("chunks header blocks apart from the body", () => {
    const { chunks } = processXml(REQUEST);

    expect(chunks.map((c) => [c.kind, c.text])).toEqual([
      ["header", "urn:GetQuote"],
      ["header", "uuid:1"],
      ["body", "ACME"],
    ]);
  });
});
