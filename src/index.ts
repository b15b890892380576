/**
 * json-schema-subset - JSON Schema compatibility (subset) checker
 * @module json-schema-subset
 */

// Types
export * from "./types/index.js";

// Schema
export {
  parseSchemaDocument,
  parseSchemaDocumentFile,
  loadSchema,
  SchemaParseError,
} from "./schema/index.js";
export {
  serializeSchemaDocument,
  serializeValue,
  stringifySchemaDocument,
  dumpSchemaDocument,
} from "./schema/index.js";
export { validateSchemaDocument } from "./schema/index.js";

// Resolver
export { resolveDocument, resolveValue, ResolutionFault } from "./resolver/index.js";
export type { ResolutionFaultCode } from "./resolver/index.js";

// Subset
export {
  checkSubset,
  isSubset,
  formatSubsetError,
  formatSubsetErrors,
  describeKind,
  valuesEqual,
} from "./subset/index.js";

// Compare
export { compareSchemas, compareSchemaFiles } from "./compare.js";
export type { CompareResult } from "./compare.js";

// History
export {
  SchemaHistory,
  FileSchemaHistoryStore,
  SchemaHistoryError,
  versionFileName,
} from "./history/index.js";

// Logging
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
