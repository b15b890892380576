/**
 * 非互換レコードの整形
 */

import type { SubsetError, ValueKind } from "../types/index.js";

const KIND_LABELS: Record<ValueKind, string> = {
  null: "Null",
  boolean: "Boolean",
  integer: "Integer",
  number: "Number",
  string: "String",
  array: "Array",
  object: "Object",
  anyOf: "AnyOf",
};

/**
 * ノード種別の表示名
 */
export function describeKind(kind: ValueKind): string {
  return KIND_LABELS[kind];
}

/**
 * 1 レコードを 1 行に整形する
 * @example "At .b.a Types don't match - a: String b: Integer"
 */
export function formatSubsetError(error: SubsetError): string {
  return (
    `At .${error.path.join(".")} ${error.msg} - ` +
    `a: ${describeKind(error.a.kind)} b: ${describeKind(error.b.kind)}`
  );
}

export function formatSubsetErrors(errors: readonly SubsetError[]): string {
  return errors.map(formatSubsetError).join("\n");
}
