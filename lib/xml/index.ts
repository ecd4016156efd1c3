export {
  analyze,
  chunk,
  classify,
  createXmlAnalyzer,
  getDefaultAnalyzer,
  processXml,
} from "./analyzer";
export type {
  AnalysisResult,
  XmlAnalyzer,
  XmlAnalyzerConfig,
} from "./analyzer";
export { chunkDocument } from "./chunking";
export {
  DEFAULT_CHUNK_OPTIONS,
  resolveChunkOptions,
} from "./config";
export { compareCandidates, dispatch, rankHandlers } from "./dispatcher";
export { parseXml } from "./document";
export * from "./errors";
export { collectFields, extractSummary } from "./extraction";
export type { FieldGetters } from "./extraction";
export { groupOrder } from "./grouping";
export { resolveReferences } from "./references";
export { createRegistry, HandlerRegistry } from "./registry";
export type { RegisteredHandler } from "./registry";
export * from "./types";
export {
  BUILTIN_HANDLERS,
  createDefaultRegistry,
  genericHandler,
} from "../handlers";
