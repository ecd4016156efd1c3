/**
 * Built-in format handlers.
 *
 * Registration order is the final tie-break, so the most specific handlers
 * come first.
 */

import { createRegistry, type HandlerRegistry } from "../xml/registry";
import type { HandlerDescriptor } from "../xml/types";
import { antBuildHandler } from "./ant";
import { bpmnHandler } from "./bpmn";
import { docbookHandler } from "./docbook";
import { enterpriseConfigHandler } from "./enterprise";
import { genericHandler } from "./generic";
import { gpxHandler } from "./gpx";
import { graphmlHandler } from "./graphml";
import { hibernateHandler } from "./hibernate";
import { ivyHandler } from "./ivy";
import { junitHandler } from "./junit";
import { kmlHandler } from "./kml";
import { log4jHandler } from "./log4j";
import { mavenPomHandler } from "./maven";
import { openApiXmlHandler } from "./openapi";
import { propertiesXmlHandler } from "./properties";
import { rssHandler } from "./rss";
import { s1000dHandler } from "./s1000d";
import { samlHandler } from "./saml";
import { scapHandler } from "./scap";
import { serviceNowHandler } from "./servicenow";
import { sitemapHandler } from "./sitemap";
import { soapEnvelopeHandler } from "./soap";
import { springHandler } from "./spring";
import { strutsConfigHandler } from "./struts";
import { svgHandler } from "./svg";
import { wadlHandler } from "./wadl";
import { wsdlHandler } from "./wsdl";
import { xhtmlHandler } from "./xhtml";
import { xliffHandler } from "./xliff";
import { xsdHandler } from "./xsd";

export const BUILTIN_HANDLERS: readonly HandlerDescriptor[] = [
  scapHandler,
  samlHandler,
  mavenPomHandler,
  springHandler,
  antBuildHandler,
  ivyHandler,
  log4jHandler,
  strutsConfigHandler,
  enterpriseConfigHandler,
  propertiesXmlHandler,
  hibernateHandler,
  serviceNowHandler,
  bpmnHandler,
  wsdlHandler,
  openApiXmlHandler,
  soapEnvelopeHandler,
  wadlHandler,
  rssHandler,
  docbookHandler,
  sitemapHandler,
  xhtmlHandler,
  kmlHandler,
  gpxHandler,
  svgHandler,
  graphmlHandler,
  xliffHandler,
  junitHandler,
  xsdHandler,
  s1000dHandler,
];

/**
 * A fresh, unsealed registry holding the built-in handlers. The generic
 * handler is not registered; pass it as an analyzer fallback instead.
 */
export function createDefaultRegistry(): HandlerRegistry {
  return createRegistry(BUILTIN_HANDLERS);
}

export {
  antBuildHandler,
  bpmnHandler,
  docbookHandler,
  enterpriseConfigHandler,
  genericHandler,
  gpxHandler,
  graphmlHandler,
  hibernateHandler,
  ivyHandler,
  junitHandler,
  kmlHandler,
  log4jHandler,
  mavenPomHandler,
  openApiXmlHandler,
  propertiesXmlHandler,
  rssHandler,
  s1000dHandler,
  samlHandler,
  scapHandler,
  serviceNowHandler,
  sitemapHandler,
  soapEnvelopeHandler,
  springHandler,
  strutsConfigHandler,
  svgHandler,
  wadlHandler,
  wsdlHandler,
  xhtmlHandler,
  xliffHandler,
  xsdHandler,
};
