/**
 * スキーマドキュメントの書き出し
 * 定義テーブルは常に $defs として書き出す
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
  JSONSchema,
  SchemaDocument,
  UnresolvedValue,
  Value,
} from "../types/index.js";
import { assertNever } from "../types/index.js";

/** $ref の書き出し先プレフィックス */
export const DEFS_REF_PREFIX = "#/$defs/";

/**
 * ドキュメントを JSON Schema 形式に変換する
 */
export function serializeSchemaDocument(document: SchemaDocument): JSONSchema {
  const schema: JSONSchema = {
    type: "object",
    title: document.title,
  };
  if (document.description !== undefined) {
    schema.description = document.description;
  }
  if (Object.keys(document.definitions).length > 0) {
    schema.$defs = serializeMap(document.definitions);
  }
  schema.properties = serializeMap(document.properties);
  schema.required = [...document.required];
  return schema;
}

/**
 * 1 ノードを JSON Schema 形式に変換する
 * 解決済み・解決前のどちらも受け付ける
 */
export function serializeValue(value: UnresolvedValue | Value): JSONSchema {
  const schema: JSONSchema = {};
  if (value.title !== undefined) {
    schema.title = value.title;
  }
  if (value.description !== undefined) {
    schema.description = value.description;
  }

  switch (value.kind) {
    case "ref":
      schema.$ref = `${DEFS_REF_PREFIX}${value.target}`;
      return schema;
    case "allOf":
      schema.allOf = value.conjuncts.map(serializeValue);
      break;
    case "anyOf":
      schema.anyOf = value.variants.map(serializeValue);
      break;
    case "null":
    case "boolean":
      schema.type = value.kind;
      break;
    case "integer":
    case "number":
      schema.type = value.kind;
      if (value.enum !== undefined) {
        schema.enum = [...value.enum];
      }
      break;
    case "string":
      schema.type = "string";
      if (value.enum !== undefined) {
        schema.enum = [...value.enum];
      }
      if (value.format !== undefined) {
        schema.format = value.format;
      }
      break;
    case "array":
      schema.type = "array";
      schema.items = serializeValue(value.items);
      break;
    case "object":
      schema.type = "object";
      schema.properties = serializeMap(value.properties);
      schema.required = [...value.required];
      break;
    default:
      return assertNever(value);
  }

  if (value.default !== undefined) {
    schema.default = value.default;
  }
  return schema;
}

/**
 * キーを再帰的にソートし、4 スペースでインデントした JSON テキスト
 */
export function stringifySchemaDocument(document: SchemaDocument): string {
  return `${JSON.stringify(sortKeys(serializeSchemaDocument(document)), null, 4)}\n`;
}

/**
 * ドキュメントをファイルに書き出す
 * 親ディレクトリがなければ作成する
 */
export async function dumpSchemaDocument(
  document: SchemaDocument,
  filePath: string
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, stringifySchemaDocument(document), "utf-8");
}

function serializeMap(
  values: Readonly<Record<string, UnresolvedValue | Value>>
): Record<string, JSONSchema> {
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [key, serializeValue(value)])
  );
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([key, child]) => [key, sortKeys(child)])
    );
  }
  return value;
}
