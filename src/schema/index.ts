/**
 * Schema モジュール
 * ドキュメントの読み込み・書き出し・バリデーション
 */

export {
  parseSchemaDocument,
  parseSchemaDocumentFile,
  loadSchema,
  syntaxForPath,
  SchemaParseError,
} from "./parser.js";
export type { SchemaSyntax } from "./parser.js";
export {
  serializeSchemaDocument,
  serializeValue,
  stringifySchemaDocument,
  dumpSchemaDocument,
  DEFS_REF_PREFIX,
} from "./serializer.js";
export { validateSchemaDocument } from "./validator.js";
