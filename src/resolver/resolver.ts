/**
 * Resolver
 * 定義テーブルと参照を展開し、自己完結した解決済みツリーを生成する
 * @see src/types/value.ts
 */

import type {
  SchemaDocument,
  UnresolvedValue,
  Value,
  ObjectValue,
  AllOfValue,
  RefValue,
  SchemaDefault,
} from "../types/index.js";
import { assertNever } from "../types/index.js";

/**
 * 解決不能なドキュメント
 * - UNSUPPORTED_ALL_OF: allOf が Ref 1 要素ではない
 * - UNKNOWN_REFERENCE: 参照先が定義テーブルにない
 */
export type ResolutionFaultCode = "UNSUPPORTED_ALL_OF" | "UNKNOWN_REFERENCE";

export class ResolutionFault extends Error {
  constructor(
    public readonly code: ResolutionFaultCode,
    message: string
  ) {
    super(message);
    this.name = "ResolutionFault";
  }
}

type Definitions = Readonly<Record<string, UnresolvedValue>>;

/**
 * ドキュメントを解決してルートのオブジェクトを返す
 * @throws ResolutionFault - 不正な allOf または未定義の参照
 */
export function resolveDocument(document: SchemaDocument): ObjectValue {
  return {
    kind: "object",
    properties: resolveProperties(document.properties, document.definitions),
    required: document.required,
  };
}

/**
 * ノードを再帰的に解決する
 * 入力は変更せず、新しいツリーを返す
 * @throws ResolutionFault - 不正な allOf または未定義の参照
 */
export function resolveValue(node: UnresolvedValue, definitions: Definitions): Value {
  switch (node.kind) {
    case "null":
    case "boolean":
    case "integer":
    case "number":
    case "string":
      return node;
    case "array":
      return { ...node, items: resolveValue(node.items, definitions) };
    case "object":
      return {
        ...node,
        properties: resolveProperties(node.properties, definitions),
      };
    case "anyOf":
      return {
        ...node,
        variants: node.variants.map((variant) => resolveValue(variant, definitions)),
      };
    case "allOf":
      return resolveAlias(node, definitions);
    case "ref":
      return resolveValue(lookup(node, definitions), definitions);
    default:
      return assertNever(node);
  }
}

function resolveProperties(
  properties: Readonly<Record<string, UnresolvedValue>>,
  definitions: Definitions
): Record<string, Value> {
  return Object.fromEntries(
    Object.entries(properties).map(([key, value]) => [
      key,
      resolveValue(value, definitions),
    ])
  );
}

/**
 * 単一参照の allOf を解決
 * allOf 側の default があれば解決結果の default を上書きする
 */
function resolveAlias(node: AllOfValue, definitions: Definitions): Value {
  const [conjunct, ...rest] = node.conjuncts;
  if (conjunct === undefined || rest.length > 0 || conjunct.kind !== "ref") {
    throw new ResolutionFault(
      "UNSUPPORTED_ALL_OF",
      `Unsupported allOf shape: expected exactly one $ref, got ${node.conjuncts.length} element(s)`
    );
  }

  const resolved = resolveValue(lookup(conjunct, definitions), definitions);
  if (node.default === undefined) {
    return resolved;
  }
  return withDefault(resolved, node.default);
}

function withDefault(value: Value, defaultValue: SchemaDefault): Value {
  return { ...value, default: defaultValue };
}

function lookup(ref: RefValue, definitions: Definitions): UnresolvedValue {
  const target = Object.hasOwn(definitions, ref.target)
    ? definitions[ref.target]
    : undefined;
  if (target === undefined) {
    throw new ResolutionFault(
      "UNKNOWN_REFERENCE",
      `Unknown reference: ${ref.target}`
    );
  }
  return target;
}
