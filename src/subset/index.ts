/**
 * Subset モジュール
 * 部分集合チェックと結果の整形
 */

export { checkSubset, isSubset } from "./checker.js";
export { formatSubsetError, formatSubsetErrors, describeKind } from "./reporter.js";
export { valuesEqual } from "./equality.js";
