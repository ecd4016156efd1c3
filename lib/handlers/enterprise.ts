/**
 * Application server configuration
 *
 * Covers Java EE deployment descriptors (web.xml), Tomcat server.xml and
 * context.xml, JBoss/WildFly standalone.xml and WebLogic config.xml. Spring
 * application contexts belong to the Spring handler.
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
  ParsedDocument,
  ReferenceHint,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { NO_MATCH, PRIORITY } from "./signals";

type ServerConfig = {
  type: string;
  label: string;
  roots: string[];
  namespaces?: string[];
  indicators?: string[];
};

const CONFIGS: readonly ServerConfig[] = [
  {
    type: "web-xml",
    label: "Java EE deployment descriptor",
    roots: ["web-app"],
    namespaces: [
      "java.sun.com/xml/ns/javaee",
      "java.sun.com/xml/ns/j2ee",
      "xmlns.jcp.org/xml/ns/javaee",
      "jakarta.ee/xml/ns/jakartaee",
    ],
  },
  {
    type: "tomcat-server",
    label: "Tomcat server configuration",
    roots: ["Server"],
    indicators: ["Connector", "Engine", "Host", "Context"],
  },
  {
    type: "tomcat-context",
    label: "Tomcat context configuration",
    roots: ["Context"],
    indicators: ["Resource", "ResourceLink", "Valve"],
  },
  {
    type: "jboss",
    label: "JBoss/WildFly configuration",
    roots: ["server"],
    namespaces: ["urn:jboss:domain"],
  },
  {
    type: "weblogic",
    label: "WebLogic domain configuration",
    roots: ["domain", "config"],
    indicators: ["server", "machine", "cluster"],
  },
];

function scoreConfig(doc: ParsedDocument, config: ServerConfig): number {
  if (!rootIs(doc, ...config.roots)) {
    return 0;
  }
  let score = 0.5;
  if (config.namespaces) {
    const declared = config.namespaces.some((ns) => hasNamespace(doc, ns));
    // a lowercase <server> root is too common to count on its own
    if (!declared && config.type === "jboss") {
      return 0;
    }
    score += declared ? 0.5 : 0;
  }
  if (config.indicators) {
    const found = config.indicators.filter((name) =>
      hasDescendant(doc.root, name)
    ).length;
    if (found === 0 && config.type === "weblogic") {
      return 0;
    }
    score += Math.min(found * 0.2, 0.5);
  }
  return Math.min(score, 1);
}

function matchConfig(doc: ParsedDocument): ServerConfig | undefined {
  return CONFIGS.find((config) => scoreConfig(doc, config) > 0);
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "web-app/servlet", kind: "servlet", identifier: "servlet-name" },
  { path: "web-app/servlet-mapping", kind: "servlet-mapping" },
  { path: "web-app/filter", kind: "filter", identifier: "filter-name" },
  { path: "web-app/filter-mapping", kind: "filter-mapping" },
  { path: "web-app/listener", kind: "listener" },
  { path: "web-app/security-constraint", kind: "security" },
  { path: "Server/Service", kind: "service", identifier: "@name" },
  { path: "Server/GlobalNamingResources", kind: "resources" },
  { path: "Context/Resource", kind: "resource", identifier: "@name" },
  { path: "Context/Valve", kind: "valve" },
  { path: "server/profile/subsystem", kind: "subsystem" },
  { path: "server/interfaces", kind: "interfaces" },
  { path: "server/socket-binding-group", kind: "socket-bindings" },
  { path: "*/server", kind: "server", identifier: "name" },
  { path: "*/cluster", kind: "cluster", identifier: "name" },
  { path: "*/machine", kind: "machine", identifier: "name" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "web-app/servlet-mapping",
    target: "servlet-name",
    key: "servlet",
    group: true,
  },
  {
    from: "web-app/filter-mapping",
    target: "filter-name",
    key: "filter",
    group: true,
  },
  { from: "*/server", target: "cluster", key: "cluster" },
  { from: "*/server", target: "machine", key: "machine" },
];

export const enterpriseConfigHandler: HandlerDescriptor = {
  id: "enterprise-config",
  label: "Application server configuration",
  category: "configuration",
  priority: PRIORITY.HEURISTIC,
  detect: (doc) => {
    const config = matchConfig(doc);
    if (!config) {
      return NO_MATCH;
    }
    return {
      score: scoreConfig(doc, config),
      evidence: [`${config.label} (root <${doc.root.localName}>)`],
    };
  },
  extract: (doc) => {
    const root = doc.root;
    const config = matchConfig(doc);
    const webApp = config?.type === "web-xml";
    const weblogic = config?.type === "weblogic";
    const named = (localName: string) =>
      unique(
        descendants(root, localName).map(
          (el) => childText(el, "name") ?? getAttribute(el, "name")
        )
      );
    return collectFields(
      {
        configType: () => config?.type,
        label: () => config?.label,
        version: () => getAttribute(root, "version"),
        displayName: () => childText(root, "display-name"),
        contextParams: () =>
          webApp ? selectValues(root, "context-param/param-name") : undefined,
        servlets: () =>
          webApp
            ? childElements(root, "servlet").map((servlet) =>
                compact({
                  name: childText(servlet, "servlet-name"),
                  class: childText(servlet, "servlet-class"),
                })
              )
            : undefined,
        servletMappings: () =>
          webApp
            ? childElements(root, "servlet-mapping").map((mapping) =>
                compact({
                  servlet: childText(mapping, "servlet-name"),
                  urlPatterns: selectValues(mapping, "url-pattern"),
                })
              )
            : undefined,
        filters: () =>
          webApp ? selectValues(root, "filter/filter-name") : undefined,
        listeners: () =>
          webApp ? selectValues(root, "listener/listener-class") : undefined,
        securityConstraints: () =>
          webApp
            ? childElements(root, "security-constraint").length
            : undefined,
        port: () =>
          rootIs(doc, "Server") ? getAttribute(root, "port") : undefined,
        connectors: () =>
          config?.type === "tomcat-server"
            ? descendants(root, "Connector").map((connector) =>
                compact({
                  port: getAttribute(connector, "port"),
                  protocol: getAttribute(connector, "protocol"),
                })
              )
            : undefined,
        hosts: () =>
          config?.type === "tomcat-server"
            ? unique(
                descendants(root, "Host").map((host) =>
                  getAttribute(host, "name")
                )
              )
            : undefined,
        resources: () =>
          config?.type.startsWith("tomcat")
            ? descendants(root, "Resource").map((resource) =>
                compact({
                  name: getAttribute(resource, "name"),
                  type: getAttribute(resource, "type"),
                })
              )
            : undefined,
        subsystems: () =>
          config?.type === "jboss"
            ? descendants(root, "subsystem").length
            : undefined,
        servers: () => (weblogic ? named("server") : undefined),
        clusters: () => (weblogic ? named("cluster") : undefined),
        machines: () => (weblogic ? named("machine") : undefined),
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
