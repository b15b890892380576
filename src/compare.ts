/**
 * 2 つのスキーマドキュメントの比較
 * 解決 → 部分集合チェック → 整形 をまとめて行う
 */

import type { SchemaDocument, SubsetError } from "./types/index.js";
import { resolveDocument } from "./resolver/resolver.js";
import { checkSubset } from "./subset/checker.js";
import { formatSubsetError } from "./subset/reporter.js";
import { loadSchema } from "./schema/parser.js";

export interface CompareResult {
  /** a に適合する値がすべて b にも適合するか */
  compatible: boolean;
  errors: SubsetError[];
  /** 整形済みのエラー行 */
  lines: string[];
}

/**
 * a ⊆ b を検証する
 * @throws ResolutionFault - どちらかのドキュメントが解決できない場合
 */
export function compareSchemas(a: SchemaDocument, b: SchemaDocument): CompareResult {
  return toResult(checkSubset(resolveDocument(a), resolveDocument(b)));
}

/**
 * ファイル版
 * @throws SchemaParseError | ResolutionFault
 */
export async function compareSchemaFiles(
  pathA: string,
  pathB: string
): Promise<CompareResult> {
  const [a, b] = await Promise.all([loadSchema(pathA), loadSchema(pathB)]);
  return toResult(checkSubset(a, b));
}

function toResult(errors: SubsetError[]): CompareResult {
  return {
    compatible: errors.length === 0,
    errors,
    lines: errors.map(formatSubsetError),
  };
}
