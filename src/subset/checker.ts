/**
 * Subset Checker
 * 2 つの解決済みツリーを並行して辿り、a の値がすべて b にも適合するかを判定する
 * @see src/types/subset.ts
 */

import type {
  Value,
  StringValue,
  ArrayValue,
  ObjectValue,
  AnyOfValue,
  SubsetError,
} from "../types/index.js";
import { ARRAY_ITEM_SEGMENT, TYPES_DONT_MATCH } from "../types/index.js";

/**
 * a が b の部分集合でない箇所をすべて列挙する
 * 空配列なら a に適合する値はすべて b にも適合する
 * @param a - 左側（生産者）のスキーマ
 * @param b - 右側（消費者）のスキーマ
 * @param path - 現在位置
 */
export function checkSubset(
  a: Value,
  b: Value,
  path: readonly string[] = []
): SubsetError[] {
  // 左の和: すべての分岐が b に適合する必要がある
  if (a.kind === "anyOf") {
    return a.variants.flatMap((variant) => checkSubset(variant, b, path));
  }

  // 右の和: いずれか 1 つの分岐に適合すればよい
  if (b.kind === "anyOf") {
    return checkAgainstUnion(a, b, path);
  }

  switch (a.kind) {
    case "string":
      return checkString(a, b, path);
    case "null":
    case "boolean":
    case "integer":
    case "number":
      // Integer -> Number の拡大も不一致として扱う
      return a.kind === b.kind ? [] : [createError(path, a, b)];
    case "array":
      return checkArray(a, b, path);
    case "object":
      return checkObject(a, b, path);
    default: {
      const unknown: never = a;
      return [createError(path, unknown, b, "Unknown type")];
    }
  }
}

/**
 * a が b の部分集合かを判定する
 */
export function isSubset(a: Value, b: Value): boolean {
  return checkSubset(a, b).length === 0;
}

/**
 * 全分岐が失敗した場合は、診断用に全分岐のエラーを順に返す
 */
function checkAgainstUnion(
  a: Value,
  b: AnyOfValue,
  path: readonly string[]
): SubsetError[] {
  const branches = b.variants.map((variant) => checkSubset(a, variant, path));
  if (branches.every((errors) => errors.length > 0)) {
    return branches.flat();
  }
  return [];
}

function checkString(
  a: StringValue,
  b: Value,
  path: readonly string[]
): SubsetError[] {
  if (b.kind !== "string") {
    return [createError(path, a, b)];
  }
  if (a.format !== b.format) {
    return [createError(path, a, b, "String formats do not match")];
  }
  if (b.enum === undefined) {
    return [];
  }
  if (a.enum === undefined) {
    return [createError(path, a, b, "Cannot fit any string into an Enum")];
  }

  const allowed = new Set(b.enum);
  const extra = [...new Set(a.enum)].filter((value) => !allowed.has(value)).sort();
  if (extra.length === 0) {
    return [];
  }
  return [createError(path, a, b, `Following keys not in a: ${extra.join(", ")}`)];
}

function checkArray(
  a: ArrayValue,
  b: Value,
  path: readonly string[]
): SubsetError[] {
  if (b.kind !== "array") {
    return [createError(path, a, b)];
  }
  return checkSubset(a.items, b.items, [...path, ARRAY_ITEM_SEGMENT]);
}

/**
 * b が宣言しないプロパティは制約しない
 * b で省略可能なプロパティも、a が持っていれば検査する
 */
function checkObject(
  a: ObjectValue,
  b: Value,
  path: readonly string[]
): SubsetError[] {
  if (b.kind !== "object") {
    return [createError(path, a, b)];
  }

  const errors: SubsetError[] = [];
  const required = new Set(b.required);

  for (const [key, bValue] of Object.entries(b.properties)) {
    const keyPath = [...path, key];
    const aValue = Object.hasOwn(a.properties, key) ? a.properties[key] : undefined;

    if (aValue === undefined) {
      if (required.has(key)) {
        errors.push(
          createError(
            keyPath,
            a,
            b,
            `Key: ${key} not in ${Object.keys(a.properties).join(", ")}`
          )
        );
      }
      continue;
    }

    errors.push(...checkSubset(aValue, bValue, keyPath));
  }

  return errors;
}

/**
 * エラーレコード生成ヘルパー
 */
function createError(
  path: readonly string[],
  a: Value,
  b: Value,
  msg: string = TYPES_DONT_MATCH
): SubsetError {
  return { path: [...path], a, b, msg };
}
