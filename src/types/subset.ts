/**
 * 部分集合チェックの型定義
 * @see src/subset/checker.ts
 */

import type { Value } from "./value.js";

/** 配列要素を表すパスセグメント */
export const ARRAY_ITEM_SEGMENT = "[]";

/** 既定のエラーメッセージ */
export const TYPES_DONT_MATCH = "Types don't match";

/**
 * 非互換の記録
 * チェッカーは入力ツリーを変更せず、新しいレコードのみを生成する
 */
export interface SubsetError {
  /** プロパティ名、または配列要素を表す "[]" の列 */
  path: readonly string[];
  /** 左側（a）の該当ノード */
  a: Value;
  /** 右側（b）の該当ノード */
  b: Value;
  msg: string;
}
