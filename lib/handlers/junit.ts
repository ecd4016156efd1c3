/**
 * JUnit-style test reports (also written by pytest, Jest and Surefire) and
 * TestNG results
 */

import { collectFields } from "../xml/extraction";
import { descendants, firstChild, getAttribute, rootIs } from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ParsedDocument,
  XmlElement,
} from "../xml/types";
import { numberValue } from "./fields";
import { hintsFor } from "./hints";
import { countPresent, firstRule, PRIORITY } from "./signals";

const TEST_ELEMENTS = ["testcase", "test-method", "test", "suite"];

function framework(doc: ParsedDocument): string {
  if (rootIs(doc, "testng-results")) {
    return "testng";
  }
  if (rootIs(doc, "testsuites", "testsuite")) {
    return "junit";
  }
  return "generic";
}

function outcome(testcase: XmlElement): string {
  if (firstChild(testcase, "failure")) {
    return "failed";
  }
  if (firstChild(testcase, "error")) {
    return "error";
  }
  if (firstChild(testcase, "skipped")) {
    return "skipped";
  }
  return "passed";
}

function testName(testcase: XmlElement): string {
  const className = getAttribute(testcase, "classname");
  const name = getAttribute(testcase, "name") ?? "";
  return className ? `${className}.${name}` : name;
}

const BOUNDARIES: BoundaryHint[] = [
  { path: "testsuites/testsuite", kind: "suite", identifier: "@name" },
  { path: "testsuite/testcase", kind: "testcase" },
  { path: "testng-results/suite/test", kind: "suite", identifier: "@name" },
];

export const junitHandler: HandlerDescriptor = {
  id: "junit",
  label: "Test report",
  category: "testing",
  priority: PRIORITY.HEURISTIC,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 1,
        evidence: "<testsuite(s)> with tests/failures counts",
        test: (d) =>
          rootIs(d, "testsuites", "testsuite") &&
          (getAttribute(d.root, "tests") !== undefined ||
            getAttribute(d.root, "failures") !== undefined),
      },
      {
        score: 1,
        evidence: "root <testng-results>",
        test: (d) => rootIs(d, "testng-results"),
      },
      {
        score: (d) => Math.min(countPresent(d, TEST_ELEMENTS) * 0.3, 0.9),
        evidence: "test case elements",
        test: (d) => countPresent(d, TEST_ELEMENTS) >= 2,
      },
    ]),
  extract: (doc) => {
    const testcases = descendants(doc.root, "testcase");
    const outcomes = testcases.map(outcome);
    const count = (value: string) =>
      outcomes.filter((result) => result === value).length;
    const times = testcases
      .map((testcase) => numberValue(getAttribute(testcase, "time")))
      .filter((value): value is number => value !== undefined);

    return collectFields(
      {
        framework: () => framework(doc),
        suiteCount: () =>
          rootIs(doc, "testsuite")
            ? 1
            : descendants(doc.root, "testsuite").length,
        tests: () => testcases.length,
        passed: () => count("passed"),
        failures: () => count("failed"),
        errors: () => count("error"),
        skipped: () => count("skipped"),
        totalTime: () =>
          numberValue(getAttribute(doc.root, "time")) ??
          times.reduce((sum, value) => sum + value, 0),
        failedTests: () =>
          testcases
            .filter(
              (_, i) => outcomes[i] === "failed" || outcomes[i] === "error"
            )
            .map(testName),
      },
      hintsFor(doc, BOUNDARIES)
    );
  },
};
