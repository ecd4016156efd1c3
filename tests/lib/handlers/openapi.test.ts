/**
 * Tests for OpenAPI and Swagger documents in XML form.
 */

import { expect, test } from "@playwright/test";
import { openApiXmlHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const ORDERS = `<openapi version="3.0.3">
  <info><title>Orders API</title><version>1.2.0</version></info>
  <servers><server url="https://api.example.com/v1"/></servers>
  <paths>
    <path name="/orders">
      <get>
        <operationId>listOrders</operationId>
        <summary>List orders</summary>
        <tags><tag>orders</tag></tags>
      </get>
      <post><operationId>createOrder</operationId></post>
    </path>
    <path name="/orders/{id}">
      <get><operationId>getOrder</operationId></get>
    </path>
  </paths>
  <components>
    <schemas>
      <schema name="Order"><type>object</type></schema>
      <schema name="Money"><type>string</type></schema>
    </schemas>
    <securitySchemes><bearer><type>http</type></bearer></securitySchemes>
  </components>
</openapi>`;

const PETS = `<swagger>
  <swagger>2.0</swagger>
  <host>api.example.com</host>
  <basePath>/v2</basePath>
  <schemes><scheme>https</scheme><scheme>http</scheme></schemes>
  <definitions><Pet><type>object</type></Pet></definitions>
</swagger>`;

test.describe("OpenAPI XML handler", () => {
  test("detects the root or the Swagger namespace", () => {
    const score = (xml: string) =>
      openApiXmlHandler.detect(parseXml(xml)).score;

    expect(score(ORDERS)).toBe(1);
    expect(score(PETS)).toBe(1);
    expect(score('<api xmlns="http://swagger.io/v2"/>')).toBe(0.8);
    expect(score("<api><paths/></api>")).toBe(0);
  });

  test("summarises paths, operations and schemas", () => {
    expect(processXml(ORDERS).summary.fields).toEqual({
      specification: "openapi",
      version: "3.0.3",
      title: "Orders API",
      apiVersion: "1.2.0",
      servers: ["https://api.example.com/v1"],
      paths: [
        {
          path: "/orders",
          operations: [
            {
              method: "GET",
              operationId: "listOrders",
              summary: "List orders",
              tags: ["orders"],
            },
            { method: "POST", operationId: "createOrder" },
          ],
        },
        {
          path: "/orders/{id}",
          operations: [{ method: "GET", operationId: "getOrder" }],
        },
      ],
      operationCount: 3,
      methods: { GET: 2, POST: 1 },
      schemas: [
        { name: "Order", type: "object" },
        { name: "Money", type: "string" },
      ],
      securitySchemes: ["bearer"],
    });
  });

  test("builds Swagger 2.0 servers from host, base path and schemes", () => {
    expect(processXml(PETS).summary.fields).toMatchObject({
      specification: "swagger",
      version: "2.0",
      servers: ["https://api.example.com/v2", "http://api.example.com/v2"],
      schemas: [{ name: "Pet", type: "object" }],
    });
  });

  test("chunks the info block, each path and each schema", () => {
    const { chunks } = processXml(ORDERS);

    expect(chunks.map((c) => c.kind)).toEqual([
      "info",
      "path",
      "path",
      "schema",
      "schema",
      "context",
    ]);
    expect(chunks[2]?.identifier).toBe("/orders/{id}");
    expect(chunks[5]?.text).toBe("http");
  });
});
