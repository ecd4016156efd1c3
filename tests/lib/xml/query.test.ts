/**
 * Tests for path patterns, element helpers and selectors.
 */

import { expect, test } from "@playwright/test";
import { parseXml } from "@/lib/xml/document";
import {
  childText,
  descendants,
  getAttribute,
  hasNamespace,
  matchesPath,
  selectDocument,
  selectValue,
  selectValues,
} from "@/lib/xml/query";

const CONFIG = `<Configuration status="warn">
  <Appenders>
    <Console name="STDOUT"/>
    <File name="FILE" fileName="app.log"/>
  </Appenders>
  <Loggers>
    <Logger name="com.example" level="debug">
      <AppenderRef ref="FILE"/>
      <AppenderRef ref="STDOUT"/>
    </Logger>
    <Root level="info">
      <AppenderRef ref="STDOUT"/>
    </Root>
  </Loggers>
</Configuration>`;

test.describe("matchesPath", () => {
  test("matches exact paths", () => {
    expect(matchesPath("unload/incident", "unload/incident")).toBe(true);
    expect(matchesPath("unload/incident", "unload/problem")).toBe(false);
  });

  test("* matches exactly one segment", () => {
    expect(matchesPath("unload/*", "unload/incident")).toBe(true);
    expect(matchesPath("unload/*", "unload")).toBe(false);
    expect(matchesPath("unload/*", "unload/incident/number")).toBe(false);
  });

  test("** matches any number of segments, including none", () => {
    expect(
      matchesPath("**/dependency", "project/dependencies/dependency")
    ).toBe(true);
    expect(matchesPath("**/dependency", "dependency")).toBe(true);
    expect(matchesPath("kml/**/Placemark", "kml/Placemark")).toBe(true);
    expect(matchesPath("kml/**/Placemark", "kml/Document/Folder/Placemark")).toBe(
      true
    );
    expect(matchesPath("kml/**/Placemark", "gpx/Placemark")).toBe(false);
  });
});

test.describe("selectDocument", () => {
  test("returns matches in document order", () => {
    const doc = parseXml(CONFIG);

    expect(
      selectDocument(doc, "Configuration/Appenders/*").map((el) => el.name)
    ).toEqual(["Console", "File"]);
    expect(
      selectDocument(doc, "**/AppenderRef").map((el) => el.attributes.ref)
    ).toEqual(["FILE", "STDOUT", "STDOUT"]);
    expect(selectDocument(doc, "Configuration/Missing")).toEqual([]);
  });
});

test.describe("selectors", () => {
  test("read attributes of the element and of child elements", () => {
    const doc = parseXml(CONFIG);
    const logger = selectDocument(doc, "Configuration/Loggers/Logger")[0];
    if (!logger) {
      throw new Error("Logger not parsed");
    }

    expect(selectValue(logger, "@name")).toBe("com.example");
    expect(selectValues(logger, "AppenderRef/@ref")).toEqual([
      "FILE",
      "STDOUT",
    ]);
    expect(selectValues(logger, "@missing")).toEqual([]);
  });

  test("read child text and descendant attributes", () => {
    const doc = parseXml(
      "<g><sys_id> abc </sys_id><use href='#a'/><x><use href='#b'/></x></g>"
    );

    expect(selectValue(doc.root, "sys_id")).toBe("abc");
    expect(selectValues(doc.root, "**/use/@href")).toEqual(["#a", "#b"]);
  });

  test("childText is undefined for missing or empty children", () => {
    const doc = parseXml("<r><a>text</a><b/></r>");

    expect(childText(doc.root, "a")).toBe("text");
    expect(childText(doc.root, "b")).toBeUndefined();
    expect(childText(doc.root, "c")).toBeUndefined();
    expect(childText(undefined, "a")).toBeUndefined();
  });
});

test.describe("element helpers", () => {
  test("getAttribute falls back to the local part of prefixed names", () => {
    const doc = parseXml(
      '<svg xmlns:xlink="http://www.w3.org/1999/xlink"><use xlink:href="#icon"/></svg>'
    );
    const use = descendants(doc.root, "use")[0];

    expect(use && getAttribute(use, "href")).toBe("#icon");
    expect(use && getAttribute(use, "xlink:href")).toBe("#icon");
  });

  test("hasNamespace matches a fragment of any declared URI", () => {
    const doc = parseXml(
      '<project xmlns="http://maven.apache.org/POM/4.0.0"><artifactId>a</artifactId></project>'
    );

    expect(hasNamespace(doc, "maven.apache.org")).toBe(true);
    expect(hasNamespace(doc, "springframework.org")).toBe(false);
  });

  test("descendants excludes the element itself", () => {
    const doc = parseXml("<a><a><a/></a></a>");

    expect(descendants(doc.root, "a").map((el) => el.depth)).toEqual([1, 2]);
  });
});
