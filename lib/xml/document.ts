/**
 * Document model: parses raw XML into an immutable element tree with a
 * path index.
 *
 * Parsing uses fast-xml-parser with `preserveOrder=true` so mixed content
 * ("see <ref>R1</ref> for details") keeps its document order. Well-formedness
 * is checked with XMLValidator first, so malformed input is rejected before
 * any handler sees it.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { xmlDebug } from "./debug";
import { errorMessage, MalformedInputError } from "./errors";
import { normalizeWhitespace } from "./text";
import type {
  ExternalEntity,
  ParsedDocument,
  XmlElement,
  XmlInput,
  XmlNode,
  XmlText,
} from "./types";

const dbg = xmlDebug("document");

const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";
const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const DOCTYPE_SUBSET = /<!DOCTYPE[^[>]*\[([\s\S]*?)\]\s*>/;
const EXTERNAL_ENTITY =
  /<!ENTITY\s+(%\s+)?([^\s>]+)\s+(?:SYSTEM|PUBLIC\s+("[^"]*"|'[^']*'))\s+("[^"]*"|'[^']*')(?:\s+NDATA\s+([^\s>]+))?\s*>/gi;
const NOTATION = /<!NOTATION\s[^>]*>/gi;
const GRAPHIC_FORMATS = new Set([
  "cgm",
  "jpg",
  "jpeg",
  "png",
  "tif",
  "tiff",
  "svg",
  "gif",
  "bmp",
]);

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

const preserveOrderParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  preserveOrder: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  // decodes character references (&#233; &#x41;) along with the named ones
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

type NamespaceScope = Readonly<Record<string, string>>;

type BuildState = {
  nextOrder: number;
  elements: XmlElement[];
  namespaces: Record<string, string>;
  namespaceUris: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Tag name of a preserveOrder entry (the first key that is not ":@").
 */
function entryTag(entry: Record<string, unknown>): string | undefined {
  for (const key of Object.keys(entry)) {
    if (key !== ATTRIBUTES_KEY) {
      return key;
    }
  }
  return undefined;
}

function isElementTag(tag: string): boolean {
  return tag !== TEXT_KEY && !tag.startsWith("?") && !tag.startsWith("!");
}

function splitQualifiedName(name: string): {
  prefix: string | undefined;
  localName: string;
} {
  const colon = name.indexOf(":");
  if (colon === -1) {
    return { prefix: undefined, localName: name };
  }
  return { prefix: name.slice(0, colon), localName: name.slice(colon + 1) };
}

function decodeInput(input: XmlInput): string {
  if (typeof input === "string") {
    return input.startsWith("\uFEFF") ? input.slice(1) : input;
  }
  try {
    // drops a leading BOM by default
    return utf8Decoder.decode(input);
  } catch (error) {
    throw new MalformedInputError(
      `input is not valid UTF-8 (${errorMessage(error)})`
    );
  }
}

function blankOut(declaration: string): string {
  return declaration.replace(/[^\n]/g, "");
}

function isLocalSystemId(systemId: string): boolean {
  if (/^https?:\/\//i.test(systemId)) {
    return true;
  }
  return (
    !systemId.includes("..") &&
    !/[/\\]/.test(systemId) &&
    !/^[a-z][\w+.-]*:/i.test(systemId)
  );
}

function entityKind(
  systemId: string,
  notation: string | undefined
): ExternalEntity["kind"] {
  const extension = systemId.slice(systemId.lastIndexOf(".") + 1);
  const graphic =
    GRAPHIC_FORMATS.has(extension.toLowerCase()) &&
    (notation === undefined || GRAPHIC_FORMATS.has(notation.toLowerCase()));
  return graphic ? "graphic" : "external";
}

/**
 * Take external entity and notation declarations out of the internal DTD
 * subset, which the parser does not accept. S1000D data modules declare
 * their illustrations this way. Line breaks stay so error positions still
 * match the input; entities pointing outside the document's directory are
 * dropped without being recorded.
 */
function stripExternalDeclarations(xml: string): {
  xml: string;
  entities: ExternalEntity[];
} {
  const doctype = DOCTYPE_SUBSET.exec(xml);
  const subset = doctype?.[1];
  if (!doctype || !subset) {
    return { xml, entities: [] };
  }

  const entities: ExternalEntity[] = [];
  const cleaned = subset
    .replace(
      EXTERNAL_ENTITY,
      (
        declaration: string,
        parameter: string | undefined,
        name: string,
        _publicId: string | undefined,
        quotedSystemId: string,
        notation: string | undefined
      ) => {
        const systemId = quotedSystemId.slice(1, -1);
        if (parameter) {
          dbg("dropped parameter entity %s", name);
        } else if (!isLocalSystemId(systemId)) {
          dbg("dropped entity %s pointing at %s", name, systemId);
        } else {
          entities.push({
            name,
            systemId,
            ...(notation ? { notation } : {}),
            kind: entityKind(systemId, notation),
          });
        }
        return blankOut(declaration);
      }
    )
    .replace(NOTATION, blankOut);

  const start = doctype.index + doctype[0].indexOf("[") + 1;
  return {
    xml: xml.slice(0, start) + cleaned + xml.slice(start + subset.length),
    entities,
  };
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX)
      ? key.slice(ATTRIBUTE_PREFIX.length)
      : key;
    attributes[name] = String(value);
  }
  return attributes;
}

function declareNamespaces(
  attributes: Record<string, string>,
  parentScope: NamespaceScope,
  state: BuildState
): NamespaceScope {
  let scope: Record<string, string> | undefined;
  for (const [name, uri] of Object.entries(attributes)) {
    let prefix: string | undefined;
    if (name === "xmlns") {
      prefix = "";
    } else if (name.startsWith("xmlns:")) {
      prefix = name.slice("xmlns:".length);
    } else {
      continue;
    }
    scope ??= { ...parentScope };
    scope[prefix] = uri;

    const documentKey = prefix === "" ? "default" : prefix;
    if (!(documentKey in state.namespaces)) {
      state.namespaces[documentKey] = uri;
    }
    if (uri && !state.namespaceUris.includes(uri)) {
      state.namespaceUris.push(uri);
    }
  }
  return scope ?? parentScope;
}

function buildElement(
  tag: string,
  entry: Record<string, unknown>,
  parentPath: string,
  depth: number,
  parentScope: NamespaceScope,
  state: BuildState
): XmlElement {
  const order = state.nextOrder++;
  const attributes = readAttributes(entry[ATTRIBUTES_KEY]);
  const scope = declareNamespaces(attributes, parentScope, state);
  const { prefix, localName } = splitQualifiedName(tag);
  const namespace =
    prefix === "xml" ? XML_NAMESPACE : scope[prefix ?? ""] || undefined;
  const path = parentPath ? `${parentPath}/${localName}` : localName;

  const nodes: XmlNode[] = [];
  const children: XmlElement[] = [];
  const ownText: string[] = [];

  const content = entry[tag];
  if (Array.isArray(content)) {
    for (const item of content) {
      if (!isRecord(item)) {
        continue;
      }
      const childTag = entryTag(item);
      if (!childTag) {
        continue;
      }
      if (childTag === TEXT_KEY) {
        const value = String(item[TEXT_KEY] ?? "");
        if (value.trim()) {
          const textNode: XmlText = { type: "text", value };
          nodes.push(textNode);
          ownText.push(value);
        }
        continue;
      }
      if (!isElementTag(childTag)) {
        continue;
      }
      const child = buildElement(
        childTag,
        item,
        path,
        depth + 1,
        scope,
        state
      );
      nodes.push(child);
      children.push(child);
    }
  }

  const element: XmlElement = {
    type: "element",
    name: tag,
    localName,
    prefix,
    namespace,
    attributes,
    children,
    nodes,
    text: normalizeWhitespace(ownText.join(" ")),
    path,
    depth,
    order,
  };
  state.elements[order] = element;
  return element;
}

function findRootEntry(
  parsed: unknown
): { tag: string; entry: Record<string, unknown> } | undefined {
  if (!Array.isArray(parsed)) {
    return undefined;
  }
  for (const item of parsed) {
    if (!isRecord(item)) {
      continue;
    }
    const tag = entryTag(item);
    if (tag && isElementTag(tag)) {
      return { tag, entry: item };
    }
  }
  return undefined;
}

function buildIndex(
  elements: readonly XmlElement[]
): Map<string, XmlElement[]> {
  const index = new Map<string, XmlElement[]>();
  for (const element of elements) {
    const existing = index.get(element.path);
    if (existing) {
      existing.push(element);
    } else {
      index.set(element.path, [element]);
    }
  }
  return index;
}

/**
 * Parse raw XML into a ParsedDocument.
 *
 * @throws MalformedInputError when the input is empty or not well-formed
 */
export function parseXml(input: XmlInput): ParsedDocument {
  const decoded = decodeInput(input);
  if (!decoded.trim()) {
    throw new MalformedInputError("document is empty");
  }
  const { xml, entities } = stripExternalDeclarations(decoded);

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedInputError(msg, { line, column: col });
  }

  const root = findRootEntry(preserveOrderParser.parse(xml));
  if (!root) {
    throw new MalformedInputError("no root element");
  }

  const state: BuildState = {
    nextOrder: 0,
    elements: [],
    namespaces: {},
    namespaceUris: [],
  };
  const rootElement = buildElement(root.tag, root.entry, "", 0, {}, state);

  dbg(
    "parsed <%s> with %d elements, %d namespaces, %d external entities",
    rootElement.name,
    state.elements.length,
    state.namespaceUris.length,
    entities.length
  );

  return {
    root: rootElement,
    elements: state.elements,
    index: buildIndex(state.elements),
    namespaces: state.namespaces,
    namespaceUris: state.namespaceUris,
    externalEntities: entities,
  };
}
