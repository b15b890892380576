/**
 * スキーマドキュメントのパーサー
 * JSON / YAML テキストを検証して Value Model に変換する
 * @see src/types/value.ts
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type {
  SchemaDocument,
  UnresolvedValue,
  ObjectValue,
  SchemaDefault,
} from "../types/index.js";
import { resolveDocument } from "../resolver/resolver.js";

/**
 * パースエラー
 */
export class SchemaParseError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "SchemaParseError";
  }
}

/** 入力テキストの構文 */
export type SchemaSyntax = "json" | "yaml";

// =============================================================================
// 入力ノードの型
// zod の optional 出力に合わせて undefined を明示する
// =============================================================================

interface RawAnnotations {
  title?: string | undefined;
  description?: string | undefined;
}

interface RawRef extends RawAnnotations {
  $ref: string;
}

interface RawAllOf extends RawAnnotations {
  allOf: RawNode[];
  default?: SchemaDefault | null | undefined;
}

interface RawAnyOf extends RawAnnotations {
  anyOf: RawNode[];
  default?: SchemaDefault | null | undefined;
}

interface RawNull extends RawAnnotations {
  type: "null";
}

interface RawBoolean extends RawAnnotations {
  type: "boolean";
  default?: boolean | null | undefined;
}

interface RawInteger extends RawAnnotations {
  type: "integer";
  enum?: number[] | undefined;
  default?: number | null | undefined;
}

interface RawNumber extends RawAnnotations {
  type: "number";
  enum?: number[] | undefined;
  default?: number | null | undefined;
}

interface RawString extends RawAnnotations {
  type: "string";
  enum?: string[] | undefined;
  format?: string | undefined;
  default?: string | null | undefined;
}

interface RawArray extends RawAnnotations {
  type: "array";
  items: RawNode;
}

interface RawObject extends RawAnnotations {
  type: "object";
  properties: Record<string, RawNode>;
  required: string[];
}

type RawNode =
  | RawRef
  | RawAllOf
  | RawAnyOf
  | RawNull
  | RawBoolean
  | RawInteger
  | RawNumber
  | RawString
  | RawArray
  | RawObject;

// =============================================================================
// Zod スキーマ定義
// =============================================================================

/** #/<table-key>/<name> 形式。末尾のセグメントのみ参照名として使う */
const REF_PATTERN = /^#\/[^/]+\/([^/]+)$/;

const ScalarDefaultSchema = z.union([z.boolean(), z.number(), z.string()]);

const annotations = {
  title: z.string().optional(),
  description: z.string().optional(),
};

const NodeSchema: z.ZodType<RawNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({
      ...annotations,
      $ref: z.string().regex(REF_PATTERN, "Expected $ref of the form #/$defs/<name>"),
    }),
    z.object({
      ...annotations,
      allOf: z.array(NodeSchema),
      default: ScalarDefaultSchema.nullable().optional(),
    }),
    z.object({
      ...annotations,
      anyOf: z.array(NodeSchema),
      default: ScalarDefaultSchema.nullable().optional(),
    }),
    TypedNodeSchema,
  ])
);

/**
 * プロパティ名・定義名のテーブル
 * zod の record は __proto__ キーを黙って落とすため、事前に拒否する
 */
const NodeRecordSchema = z
  .unknown()
  .superRefine((value, ctx) => {
    if (typeof value === "object" && value !== null && Object.hasOwn(value, "__proto__")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Reserved name is not allowed",
        path: ["__proto__"],
      });
    }
  })
  .pipe(z.record(NodeSchema));

const TypedNodeSchema = z.discriminatedUnion("type", [
  z.object({
    ...annotations,
    type: z.literal("null"),
  }),
  z.object({
    ...annotations,
    type: z.literal("boolean"),
    default: z.boolean().nullable().optional(),
  }),
  z.object({
    ...annotations,
    type: z.literal("integer"),
    enum: z.array(z.number().int()).optional(),
    default: z.number().int().nullable().optional(),
  }),
  z.object({
    ...annotations,
    type: z.literal("number"),
    enum: z.array(z.number()).optional(),
    default: z.number().nullable().optional(),
  }),
  z.object({
    ...annotations,
    type: z.literal("string"),
    enum: z.array(z.string()).optional(),
    format: z.string().optional(),
    default: z.string().nullable().optional(),
  }),
  z.object({
    ...annotations,
    type: z.literal("array"),
    items: z.lazy(() => NodeSchema),
  }),
  z.object({
    ...annotations,
    type: z.literal("object"),
    properties: NodeRecordSchema.default({}),
    required: z.array(z.string()).default([]),
  }),
]);

/**
 * ドキュメントのトップレベル構造
 * 定義テーブルは $defs / definitions のどちらでも受け付ける
 */
const SchemaDocumentSchema = z.object({
  type: z.literal("object"),
  title: z.string(),
  description: z.string().optional(),
  $defs: NodeRecordSchema.optional(),
  definitions: NodeRecordSchema.optional(),
  properties: NodeRecordSchema.default({}),
  required: z.array(z.string()).default([]),
});

type RawSchemaDocument = z.infer<typeof SchemaDocumentSchema>;

// =============================================================================
// パース関数
// =============================================================================

/**
 * テキストを SchemaDocument にパースする
 * YAML は JSON の上位互換のため、既定では YAML パーサーで読む
 * @throws SchemaParseError - 構文エラーまたは構造の不一致
 */
export function parseSchemaDocument(
  text: string,
  syntax: SchemaSyntax = "yaml"
): SchemaDocument {
  let parsed: unknown;

  try {
    parsed = syntax === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new SchemaParseError(`Invalid ${syntax.toUpperCase()} syntax`, error);
  }

  const result = SchemaDocumentSchema.safeParse(parsed);

  if (!result.success) {
    const errors = flattenUnionIssues(result.error.errors)
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new SchemaParseError(`Invalid schema document: ${errors}`);
  }

  return toDocument(result.data);
}

/** ノードの形を決めるキー。これが欠けている分岐は入力に当てはまらない */
const BRANCH_KEYS = new Set(["$ref", "allOf", "anyOf"]);

/**
 * ノードの和で全分岐が失敗した場合、入力の形に当てはまる分岐のエラーに置き換える
 */
function flattenUnionIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
  return issues.flatMap((issue) => {
    if (issue.code !== z.ZodIssueCode.invalid_union) {
      return [issue];
    }
    const branch = issue.unionErrors.find(
      (error) => !missesBranchKey(error.issues, issue.path.length)
    );
    return branch ? flattenUnionIssues(branch.issues) : [issue];
  });
}

function missesBranchKey(issues: z.ZodIssue[], depth: number): boolean {
  return issues.some(
    (issue) =>
      issue.code === z.ZodIssueCode.invalid_type &&
      issue.received === z.ZodParsedType.undefined &&
      issue.path.length === depth + 1 &&
      BRANCH_KEYS.has(String(issue.path[depth]))
  );
}

/**
 * ファイルから SchemaDocument を読み込む
 * .yaml / .yml は YAML、それ以外は JSON として扱う
 * @throws SchemaParseError - 読み込みまたはパース失敗時
 */
export async function parseSchemaDocumentFile(filePath: string): Promise<SchemaDocument> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new SchemaParseError(`Failed to read file: ${filePath}`, error);
  }

  return parseSchemaDocument(content, syntaxForPath(filePath));
}

/**
 * ファイルを読み込み、解決済みのルートを返す
 * @throws SchemaParseError | ResolutionFault
 */
export async function loadSchema(filePath: string): Promise<ObjectValue> {
  return resolveDocument(await parseSchemaDocumentFile(filePath));
}

export function syntaxForPath(filePath: string): SchemaSyntax {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}

// =============================================================================
// 変換
// exactOptionalPropertyTypes に対応するため、undefined と null を除外
// =============================================================================

function toDocument(raw: RawSchemaDocument): SchemaDocument {
  const document: SchemaDocument = {
    title: raw.title,
    definitions: toValueMap(raw.$defs ?? raw.definitions ?? {}),
    properties: toValueMap(raw.properties),
    required: raw.required,
  };
  if (raw.description !== undefined) {
    document.description = raw.description;
  }
  return document;
}

function toValueMap(raw: Record<string, RawNode>): Record<string, UnresolvedValue> {
  return Object.fromEntries(
    Object.entries(raw).map(([key, node]) => [key, toValue(node)])
  );
}

function toValue(raw: RawNode): UnresolvedValue {
  const base = {
    ...(raw.title !== undefined && { title: raw.title }),
    ...(raw.description !== undefined && { description: raw.description }),
  };

  if ("$ref" in raw) {
    return { kind: "ref", target: refName(raw.$ref), ...base };
  }
  if ("allOf" in raw) {
    return {
      kind: "allOf",
      conjuncts: raw.allOf.map(toValue),
      ...base,
      ...withDefault(raw.default),
    };
  }
  if ("anyOf" in raw) {
    return {
      kind: "anyOf",
      variants: raw.anyOf.map(toValue),
      ...base,
      ...withDefault(raw.default),
    };
  }

  switch (raw.type) {
    case "null":
      return { kind: "null", ...base };
    case "boolean":
      return { kind: "boolean", ...base, ...withDefault(raw.default) };
    case "integer":
      return {
        kind: "integer",
        ...base,
        ...(raw.enum !== undefined && { enum: raw.enum }),
        ...withDefault(raw.default),
      };
    case "number":
      return {
        kind: "number",
        ...base,
        ...(raw.enum !== undefined && { enum: raw.enum }),
        ...withDefault(raw.default),
      };
    case "string":
      return {
        kind: "string",
        ...base,
        ...(raw.enum !== undefined && { enum: raw.enum }),
        ...(raw.format !== undefined && { format: raw.format }),
        ...withDefault(raw.default),
      };
    case "array":
      return { kind: "array", items: toValue(raw.items), ...base };
    case "object":
      return {
        kind: "object",
        properties: toValueMap(raw.properties),
        required: raw.required,
        ...base,
      };
  }
}

function withDefault(value: SchemaDefault | null | undefined): { default?: SchemaDefault } {
  return value === undefined || value === null ? {} : { default: value };
}

function refName(ref: string): string {
  const match = REF_PATTERN.exec(ref);
  return match?.[1] ?? ref;
}
