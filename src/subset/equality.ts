/**
 * 解決済みツリーの構造的等価判定
 * プロパティの挿入順、required と enum の並びは区別しない
 */

import type { Value } from "../types/index.js";

export function valuesEqual(x: Value, y: Value): boolean {
  if (
    x.title !== y.title ||
    x.description !== y.description ||
    x.default !== y.default
  ) {
    return false;
  }

  switch (x.kind) {
    case "null":
    case "boolean":
      return x.kind === y.kind;
    case "integer":
      return y.kind === "integer" && setsEqual(x.enum, y.enum);
    case "number":
      return y.kind === "number" && setsEqual(x.enum, y.enum);
    case "string":
      return (
        y.kind === "string" &&
        x.format === y.format &&
        setsEqual(x.enum, y.enum)
      );
    case "array":
      return y.kind === "array" && valuesEqual(x.items, y.items);
    case "object":
      return (
        y.kind === "object" &&
        setsEqual(x.required, y.required) &&
        propertiesEqual(x.properties, y.properties)
      );
    case "anyOf": {
      if (y.kind !== "anyOf" || x.variants.length !== y.variants.length) {
        return false;
      }
      // 分岐の順序は区別する
      const others = y.variants;
      return x.variants.every((variant, index) => {
        const other = others[index];
        return other !== undefined && valuesEqual(variant, other);
      });
    }
  }
}

function setsEqual<T>(
  x: readonly T[] | undefined,
  y: readonly T[] | undefined
): boolean {
  if (x === undefined || y === undefined) {
    return x === y;
  }
  const left = new Set(x);
  const right = new Set(y);
  return left.size === right.size && [...left].every((item) => right.has(item));
}

function propertiesEqual(
  x: Readonly<Record<string, Value>>,
  y: Readonly<Record<string, Value>>
): boolean {
  const keys = Object.keys(x);
  if (keys.length !== Object.keys(y).length) {
    return false;
  }
  return keys.every((key) => {
    const left = x[key];
    const right = Object.hasOwn(y, key) ? y[key] : undefined;
    return left !== undefined && right !== undefined && valuesEqual(left, right);
  });
}
