/**
 * スキーマドキュメント（ルート）の型定義
 */

import type { UnresolvedValue } from "./value.js";

/**
 * 定義テーブルとルートのオブジェクト形を持つドキュメント
 * 構築後は変更しない
 */
export interface SchemaDocument {
  title: string;
  description?: string;
  /**
   * 名前付き定義
   * @term RefValue.target から参照される
   */
  definitions: Readonly<Record<string, UnresolvedValue>>;
  properties: Readonly<Record<string, UnresolvedValue>>;
  required: readonly string[];
}
