/**
 * Tests for SCAP content.
 */

import { expect, test } from "@playwright/test";
import { scapHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const BENCHMARK = `<Benchmark xmlns="http://checklists.nist.gov/xccdf/1.2" id="xccdf_org.example_benchmark_shop" resolved="1">
  <status>draft</status>
  <title>Shop hardening</title>
  <version>1.0</version>
  <Profile id="xccdf_org.example_profile_base">
    <title>Base</title>
    <select idref="xccdf_org.example_rule_ssh" selected="true"/>
    <select idref="xccdf_org.example_rule_ftp" selected="false"/>
  </Profile>
  <Group id="xccdf_org.example_group_net">
    <title>Network</title>
    <Rule id="xccdf_org.example_rule_ssh" severity="high"><title>Disable SSH root login</title></Rule>
    <Rule id="xccdf_org.example_rule_ftp" severity="medium"><title>Remove FTP</title></Rule>
  </Group>
</Benchmark>`;

const OVAL = `<oval_definitions xmlns="http://oval.mitre.org/XMLSchema/oval-definitions-5">
  <definitions>
    <definition id="oval:org.example:def:1" class="vulnerability" version="1">
      <metadata><title>Old OpenSSL</title></metadata>
      <criteria><criterion test_ref="oval:org.example:tst:1"/></criteria>
    </definition>
  </definitions>
  <tests>
    <rpminfo_test id="oval:org.example:tst:1" version="1" check="all"/>
  </tests>
</oval_definitions>`;

test.describe("SCAP handler", () => {
  test("detects XCCDF and OVAL content", () => {
    expect(scapHandler.detect(parseXml(BENCHMARK)).score).toBe(1);
    expect(scapHandler.detect(parseXml(OVAL)).score).toBe(1);
  });

  test("ignores a lone <Profile> without SCAP namespaces", () => {
    expect(scapHandler.detect(parseXml("<Profile/>")).score).toBe(0);
  });

  test("summarises a benchmark's profiles and rules", () => {
    expect(processXml(BENCHMARK).summary.fields).toEqual({
      standard: "xccdf",
      id: "xccdf_org.example_benchmark_shop",
      title: "Shop hardening",
      version: "1.0",
      status: "draft",
      profiles: [
        { id: "xccdf_org.example_profile_base", title: "Base", selected: 1 },
      ],
      groupCount: 1,
      ruleCount: 2,
      severities: { high: 1, medium: 1 },
    });
  });

  test("links profiles to the rules they select", () => {
    const { chunks, diagnostics } = processXml(BENCHMARK);

    expect(chunks.map((c) => c.kind)).toEqual([
      "context",
      "profile",
      "context",
      "rule",
      "rule",
    ]);
    expect(chunks[3]?.identifier).toBe("xccdf_org.example_rule_ssh");
    expect(chunks[1]?.references).toEqual({ selects: [3, 4] });
    expect(diagnostics).toEqual([]);
  });

  test("links OVAL definitions to their tests", () => {
    const { summary, chunks } = processXml(OVAL);

    expect(summary.fields).toMatchObject({
      standard: "oval",
      definitionCount: 1,
      definitionClasses: { vulnerability: 1 },
    });
    expect(chunks.map((c) => c.kind)).toEqual(["definition", "test"]);
    expect(chunks[0]?.references).toEqual({ tests: [1] });
  });
});
