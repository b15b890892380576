/**
 * 型定義のエクスポート
 */

// Common
export type { JSONSchema, JSONSchemaType } from "./common.js";

// Value Model
export type {
  SchemaDefault,
  NullValue,
  BooleanValue,
  IntegerValue,
  NumberValue,
  StringValue,
  ArrayNode,
  ObjectNode,
  AnyOfNode,
  AllOfValue,
  RefValue,
  ScalarValue,
  ArrayValue,
  ObjectValue,
  AnyOfValue,
  Value,
  UnresolvedValue,
  ValueKind,
  UnresolvedValueKind,
} from "./value.js";
export { assertNever } from "./value.js";

// Document
export type { SchemaDocument } from "./document.js";

// Subset
export type { SubsetError } from "./subset.js";
export { ARRAY_ITEM_SEGMENT, TYPES_DONT_MATCH } from "./subset.js";

// Validation
export type {
  SchemaValidationErrorCode,
  SchemaValidationError,
  SchemaValidationResult,
} from "./validation.js";

// History
export type {
  SchemaHistoryStore,
  RecordResult,
  VersionPairResult,
  HistoryCheckResult,
} from "./history.js";
