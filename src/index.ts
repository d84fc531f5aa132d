export * from "./graph/errors.js";
export * from "./graph/indexGraph.js";
export * from "./graph/keyedGraph.js";
export * from "./graph/toposort.js";
export * from "./io/document.js";
export * from "./logger.js";
export { ERROR_CATALOG, ERROR_CODES, type ErrorCode } from "./types.js";
