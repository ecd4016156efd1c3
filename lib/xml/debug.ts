import debugLib from "debug";

/**
 * Pipeline debug logger.
 *
 * Usage:
 *   import { xmlDebug } from "./debug";
 *   const dbg = xmlDebug("dispatch");
 *   dbg("scored %d handlers", 12);  // outputs: xml:dispatch scored 12 handlers +2ms
 *
 * Enable with DEBUG=xml:* (or a single component, e.g. DEBUG=xml:chunk).
 */

const xmlLog = debugLib("xml");

/**
 * Create a debug function for one pipeline component.
 * @param component - Component name, e.g. "dispatch", "chunk", "refs"
 */
export function xmlDebug(
  component: string
): (formatter: string, ...args: unknown[]) => void {
  const logger = xmlLog.extend(component);
  return (formatter: string, ...args: unknown[]) => {
    logger(formatter, ...args);
  };
}
