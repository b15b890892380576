/**
 * 共通の型定義
 * 循環参照を避けるため、複数モジュールで使用される型をここに配置
 */

/**
 * JSON Schema の型定義（入出力で扱うフィールドのみ）
 * 読み込み・書き出しの境界でのみ使用し、内部では Value を使う
 */
export interface JSONSchema {
  /** スキーマの型 */
  type?: JSONSchemaType;
  /** タイトル */
  title?: string;
  /** 説明 */
  description?: string;
  /** デフォルト値 */
  default?: unknown;
  /** 列挙値 */
  enum?: unknown[];
  /** 文字列のフォーマット */
  format?: string;
  /** オブジェクトのプロパティ定義 */
  properties?: Record<string, JSONSchema>;
  /** 必須プロパティ */
  required?: string[];
  /** 配列の要素スキーマ */
  items?: JSONSchema;
  /** 和 */
  anyOf?: JSONSchema[];
  /** 単一参照のエイリアス */
  allOf?: JSONSchema[];
  /** 参照（#/$defs/<name>） */
  $ref?: string;
  /** 定義テーブル（書き出しは常にこのキー） */
  $defs?: Record<string, JSONSchema>;
}

/** JSON Schema で使用する型名 */
export type JSONSchemaType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "object"
  | "array"
  | "null";
