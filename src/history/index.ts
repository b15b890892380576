/**
 * History モジュール
 * バージョン履歴の記録と互換性検証
 */

export { SchemaHistory } from "./schema-history.js";
export type { SchemaHistoryOptions } from "./schema-history.js";
export {
  FileSchemaHistoryStore,
  SchemaHistoryError,
  DEFAULT_HISTORY_DIR,
  versionFileName,
} from "./file-store.js";
export type { FileSchemaHistoryStoreOptions } from "./file-store.js";
