/**
 * ドキュメント検証の型定義
 * @see src/schema/validator.ts
 */

/**
 * 検証エラーコード
 * - UNKNOWN_REFERENCE: 定義テーブルに存在しない参照先
 * - UNSUPPORTED_ALL_OF: Ref 1 要素以外の allOf
 * - CYCLIC_REFERENCE: 参照を辿って自身に戻る定義
 * - UNKNOWN_REQUIRED_PROPERTY: properties にない required 名
 */
export type SchemaValidationErrorCode =
  | "UNKNOWN_REFERENCE"
  | "UNSUPPORTED_ALL_OF"
  | "CYCLIC_REFERENCE"
  | "UNKNOWN_REQUIRED_PROPERTY";

export interface SchemaValidationError {
  code: SchemaValidationErrorCode;
  message: string;
  /** JSON Pointer 形式の位置 */
  path: string;
}

export interface SchemaValidationResult {
  valid: boolean;
  errors: SchemaValidationError[];
}
