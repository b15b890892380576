/**
 * スキーマ履歴の型定義
 * @see src/history/schema-history.ts
 */

import type { SchemaDocument } from "./document.js";
import type { SubsetError } from "./subset.js";

/**
 * バージョン履歴の保存先
 * SchemaHistory に注入する
 */
export interface SchemaHistoryStore {
  /** 保存済みバージョン番号（昇順） */
  listVersions(name: string): Promise<number[]>;
  read(name: string, version: number): Promise<SchemaDocument>;
  write(name: string, version: number, document: SchemaDocument): Promise<void>;
}

export interface RecordResult {
  /** 最新のバージョン番号 */
  version: number;
  /** 新しいバージョンを書き込んだか */
  created: boolean;
}

/** 連続する 2 バージョンの比較結果 */
export interface VersionPairResult {
  from: number;
  to: number;
  errors: SubsetError[];
}

export interface HistoryCheckResult {
  name: string;
  compatible: boolean;
  pairs: VersionPairResult[];
}
