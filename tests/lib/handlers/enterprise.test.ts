/**
 * Tests for application server configuration files.
 */

import { expect, test } from "@playwright/test";
import { enterpriseConfigHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const WEB_XML = `<web-app xmlns="http://xmlns.jcp.org/xml/ns/javaee" version="4.0">
  <display-name>Shop</display-name>
  <context-param><param-name>env</param-name><param-value>test</param-value></context-param>
  <servlet><servlet-name>api</servlet-name><servlet-class>org.example.ApiServlet</servlet-class></servlet>
  <filter><filter-name>auth</filter-name><filter-class>org.example.AuthFilter</filter-class></filter>
  <servlet-mapping><servlet-name>api</servlet-name><url-pattern>/api/*</url-pattern></servlet-mapping>
  <filter-mapping><filter-name>auth</filter-name><url-pattern>/*</url-pattern></filter-mapping>
  <listener><listener-class>org.example.Startup</listener-class></listener>
</web-app>`;

const TOMCAT = `<Server port="8005" shutdown="SHUTDOWN">
  <Service name="Catalina">
    <Connector port="8080" protocol="HTTP/1.1"/>
    <Engine name="Catalina" defaultHost="localhost">
      <Host name="localhost" appBase="webapps"/>
    </Engine>
  </Service>
</Server>`;

const WEBLOGIC = `<domain>
  <name>prod</name>
  <server><name>s1</name><cluster>c1</cluster></server>
  <cluster><name>c1</name></cluster>
</domain>`;

test.describe("Enterprise config handler", () => {
  test("scores each server configuration family", () => {
    expect(enterpriseConfigHandler.detect(parseXml(WEB_XML)).score).toBe(1);
    expect(enterpriseConfigHandler.detect(parseXml("<web-app/>")).score).toBe(
      0.5
    );
    expect(enterpriseConfigHandler.detect(parseXml(TOMCAT)).score).toBe(1);
    expect(
      enterpriseConfigHandler.detect(parseXml(WEBLOGIC)).score
    ).toBeCloseTo(0.9);
  });

  test("ignores bare roots without server markers", () => {
    expect(enterpriseConfigHandler.detect(parseXml("<server/>")).score).toBe(0);
    expect(enterpriseConfigHandler.detect(parseXml("<config/>")).score).toBe(0);
  });

  test("summarises a deployment descriptor", () => {
    expect(processXml(WEB_XML).summary.fields).toEqual({
      configType: "web-xml",
      label: "Java EE deployment descriptor",
      version: "4.0",
      displayName: "Shop",
      contextParams: ["env"],
      servlets: [{ name: "api", class: "org.example.ApiServlet" }],
      servletMappings: [{ servlet: "api", urlPatterns: ["/api/*"] }],
      filters: ["auth"],
      listeners: ["org.example.Startup"],
      securityConstraints: 0,
    });
  });

  test("places each mapping after the servlet or filter it maps", () => {
    const { chunks } = processXml(WEB_XML);

    expect(chunks.map((c) => c.kind)).toEqual([
      "context",
      "servlet",
      "servlet-mapping",
      "filter",
      "filter-mapping",
      "listener",
    ]);
    expect(chunks[2]?.references).toEqual({ servlet: [1] });
    expect(chunks[4]?.references).toEqual({ filter: [3] });
  });

  test("summarises Tomcat connectors and hosts", () => {
    expect(processXml(TOMCAT).summary.fields).toEqual({
      configType: "tomcat-server",
      label: "Tomcat server configuration",
      port: "8005",
      connectors: [{ port: "8080", protocol: "HTTP/1.1" }],
      hosts: ["localhost"],
      resources: [],
    });
  });

  test("links WebLogic servers to their clusters", () => {
    const { summary, chunks } = processXml(WEBLOGIC);

    expect(summary.fields).toEqual({
      configType: "weblogic",
      label: "WebLogic domain configuration",
      servers: ["s1"],
      clusters: ["c1"],
      machines: [],
    });
    expect(chunks.map((c) => c.kind)).toEqual(["context", "server", "cluster"]);
    expect(chunks[1]?.references).toEqual({ cluster: [2] });
  });
});
