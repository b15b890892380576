/**
 * テスト用のノード生成ヘルパー
 */

import type {
  Value,
  NullValue,
  BooleanValue,
  IntegerValue,
  NumberValue,
  StringValue,
  ArrayValue,
  ObjectValue,
  AnyOfValue,
  SchemaDocument,
  UnresolvedValue,
} from "../src/types/index.js";

export const nul = (): NullValue => ({ kind: "null" });
export const bool = (): BooleanValue => ({ kind: "boolean" });
export const int = (values?: number[]): IntegerValue =>
  values === undefined ? { kind: "integer" } : { kind: "integer", enum: values };
export const num = (): NumberValue => ({ kind: "number" });

export function str(options: { format?: string; enum?: string[] } = {}): StringValue {
  return { kind: "string", ...options };
}

export const arr = (items: Value): ArrayValue => ({ kind: "array", items });

export function obj(
  properties: Record<string, Value>,
  required: string[] = Object.keys(properties)
): ObjectValue {
  return { kind: "object", properties, required };
}

export const anyOf = (...variants: Value[]): AnyOfValue => ({ kind: "anyOf", variants });

export function doc(
  properties: Record<string, UnresolvedValue>,
  options: {
    required?: string[];
    definitions?: Record<string, UnresolvedValue>;
    title?: string;
  } = {}
): SchemaDocument {
  return {
    title: options.title ?? "Model",
    definitions: options.definitions ?? {},
    properties,
    required: options.required ?? Object.keys(properties),
  };
}
