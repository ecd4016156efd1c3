/**
 * Tests for Spring bean definition files.
 */

import { expect, test } from "@playwright/test";
import { springHandler } from "@/lib/handlers";
import { processXml } from "@/lib/xml";
import { parseXml } from "@/lib/xml/document";

const BEANS = `<beans xmlns="http://www.springframework.org/schema/beans">
  <bean id="dataSource" class="com.example.DataSource"/>
  <bean id="repo" class="com.example.Repo">
    <property name="dataSource" ref="dataSource"/>
  </bean>
  <bean id="service" class="com.example.Service" parent="base">
    <constructor-arg><ref bean="repo"/></constructor-arg>
  </bean>
</beans>`;

test.describe("Spring handler", () => {
  test("detects the beans schema namespace", () => {
    expect(springHandler.detect(parseXml(BEANS)).score).toBe(1);
  });

  test("detects a bare <beans> root with lower confidence", () => {
    expect(springHandler.detect(parseXml("<beans/>")).score).toBe(0.7);
  });

  test("summarises beans and their references", () => {
    const { summary } = processXml(BEANS);

    expect(summary.fields.beanCount).toBe(3);
    expect(summary.fields.beans).toEqual([
      { id: "dataSource", class: "com.example.DataSource", references: [] },
      {
        id: "repo",
        class: "com.example.Repo",
        references: ["dataSource"],
      },
      {
        id: "service",
        class: "com.example.Service",
        parent: "base",
        references: ["repo"],
      },
    ]);
  });

  test("links beans through ref attributes and <ref> elements", () => {
    const { chunks, diagnostics } = processXml(BEANS);

    expect(chunks.map((c) => c.identifier)).toEqual([
      "dataSource",
      "repo",
      "service",
    ]);
    expect(chunks[1]?.references).toEqual({ ref: [0] });
    expect(chunks[2]?.references).toEqual({ ref: [1] });
    expect(chunks[2]?.externalReferences).toEqual({ parent: ["base"] });
    expect(diagnostics).toEqual([
      {
        kind: "unresolved_reference",
        chunkIndex: 2,
        key: "parent",
        target: "base",
      },
    ]);
  });
});
