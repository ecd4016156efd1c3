/**
 * Apache Struts 1.x configuration (struts-config.xml)
 */

import { collectFields } from "../xml/extraction";
import {
  childElements,
  descendants,
  firstChild,
  getAttribute,
  rootIs,
  selectValues,
} from "../xml/query";
import type {
  BoundaryHint,
  HandlerDescriptor,
  ReferenceHint,
  XmlElement,
} from "../xml/types";
import { compact, unique } from "./fields";
import { hintsFor } from "./hints";
import { firstRule, PRIORITY } from "./signals";

function action(el: XmlElement) {
  return compact({
    path: getAttribute(el, "path"),
    type: getAttribute(el, "type"),
    form: getAttribute(el, "name"),
    scope: getAttribute(el, "scope"),
    input: getAttribute(el, "input"),
    forwards: unique(
      childElements(el, "forward").map((forward) =>
        getAttribute(forward, "name")
      )
    ),
  });
}

const BOUNDARIES: BoundaryHint[] = [
  {
    path: "struts-config/form-beans/form-bean",
    kind: "form",
    identifier: "@name",
  },
  { path: "struts-config/global-exceptions", kind: "exceptions" },
  { path: "struts-config/global-forwards", kind: "forwards" },
  {
    path: "struts-config/action-mappings/action",
    kind: "action",
    identifier: "@path",
  },
  { path: "struts-config/plug-in", kind: "plugin" },
];

const REFERENCES: ReferenceHint[] = [
  {
    from: "struts-config/action-mappings/action",
    target: "@name",
    key: "form",
  },
];

export const strutsConfigHandler: HandlerDescriptor = {
  id: "struts-config",
  label: "Struts configuration",
  category: "configuration",
  priority: PRIORITY.PRECISE,
  detect: (doc) =>
    firstRule(doc, [
      {
        score: 0.95,
        evidence: "root <struts-config>",
        test: (d) => rootIs(d, "struts-config"),
      },
    ]),
  extract: (doc) => {
    const root = doc.root;
    const controller = firstChild(root, "controller");
    return collectFields(
      {
        formBeans: () =>
          descendants(root, "form-bean").map((bean) =>
            compact({
              name: getAttribute(bean, "name"),
              type: getAttribute(bean, "type"),
            })
          ),
        actions: () => descendants(root, "action").map(action),
        globalForwards: () =>
          selectValues(root, "global-forwards/forward/@name"),
        globalExceptions: () =>
          selectValues(root, "global-exceptions/exception/@type"),
        messageResources: () =>
          selectValues(root, "message-resources/@parameter"),
        plugins: () => selectValues(root, "plug-in/@className"),
        controller: () =>
          controller && getAttribute(controller, "processorClass"),
        dataSources: () => descendants(root, "data-source").length,
      },
      hintsFor(doc, BOUNDARIES, REFERENCES)
    );
  },
};
