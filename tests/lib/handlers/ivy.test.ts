/**
 * Tests for Apache Ivy descriptors and settings.
 */

import { expect, test } from "@playwright/test";
import { ivyHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const MODULE = `<ivy-module version="2.0">
  <info organisation="org.example" module="shop" revision="1.2" status="release"/>
  <configurations><conf name="compile"/><conf name="test" extends="compile"/></configurations>
  <publications><artifact name="shop" type="jar"/></publications>
  <dependencies>
    <dependency org="commons-io" name="commons-io" rev="2.11.0" conf="compile->default"/>
    <dependency org="junit" name="junit" rev="4.13.2" conf="test->default"/>
  </dependencies>
</ivy-module>`;

const SETTINGS = `<ivysettings>
  <settings defaultResolver="chain"/>
  <resolvers>
    <chain name="chain"><ibiblio name="central" m2compatible="true"/></chain>
    <filesystem name="local"/>
  </resolvers>
</ivysettings>`;

test.describe("Ivy handler", () => {
  test("detects module descriptors and settings", () => {
    expect(ivyHandler.detect(parseXml(MODULE)).score).toBe(1);
    expect(ivyHandler.detect(parseXml("<ivy-module/>")).score).toBe(0.8);
    expect(ivyHandler.detect(parseXml(SETTINGS)).score).toBe(0.9);
  });

  test("summarises the module and its dependencies", () => {
    expect(processXml(MODULE).summary.fields).toEqual({
      fileType: "module",
      organisation: "org.example",
      module: "shop",
      revision: "1.2",
      status: "release",
      configurations: ["compile", "test"],
      publications: ["shop"],
      dependencies: [
        {
          org: "commons-io",
          name: "commons-io",
          rev: "2.11.0",
          conf: "compile->default",
        },
        { org: "junit", name: "junit", rev: "4.13.2", conf: "test->default" },
      ],
      dependencyCount: 2,
    });
  });

  test("chunks each dependency", () => {
    const { chunks } = processXml(MODULE);

    expect(chunks.map((c) => c.kind)).toEqual([
      "info",
      "configurations",
      "publications",
      "dependency",
      "dependency",
    ]);
    expect(chunks.slice(3).map((c) => c.identifier)).toEqual([
      "commons-io",
      "junit",
    ]);
  });

  test("links settings to the default resolver", () => {
    const { summary, chunks } = processXml(SETTINGS);

    expect(summary.fields).toEqual({
      fileType: "settings",
      defaultResolver: "chain",
      resolvers: ["chain", "local"],
    });
    expect(chunks.map((c) => c.kind)).toEqual([
      "settings",
      "resolver",
      "resolver",
    ]);
    expect(chunks[0]?.references).toEqual({ resolver: [1] });
  });
});
