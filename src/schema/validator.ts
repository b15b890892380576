/**
 * スキーマドキュメントのバリデーター
 * 参照整合性を検証する（Resolver の事前チェック用、任意）
 * @see src/resolver/resolver.ts
 */

import type {
  SchemaDocument,
  UnresolvedValue,
  SchemaValidationResult,
  SchemaValidationError,
  SchemaValidationErrorCode,
} from "../types/index.js";

/**
 * ドキュメントをバリデーションする
 * 例外は投げず、問題をすべて収集する
 * @param document - バリデーション対象のドキュメント
 * @returns バリデーション結果
 */
export function validateSchemaDocument(document: SchemaDocument): SchemaValidationResult {
  const errors: SchemaValidationError[] = [];
  const definitionNames = new Set(Object.keys(document.definitions));

  // 定義テーブル内の参照
  Object.entries(document.definitions).forEach(([name, value]) => {
    walk(value, `/$defs/${escapePointer(name)}`, definitionNames, errors);
  });

  // ルートのプロパティ
  Object.entries(document.properties).forEach(([name, value]) => {
    walk(value, `/properties/${escapePointer(name)}`, definitionNames, errors);
  });
  validateRequired(document.properties, document.required, "", errors);

  // 循環参照
  validateAcyclic(document, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * ノードを辿り、参照先・allOf の形・required を検証
 */
function walk(
  node: UnresolvedValue,
  pointer: string,
  definitionNames: Set<string>,
  errors: SchemaValidationError[]
): void {
  switch (node.kind) {
    case "null":
    case "boolean":
    case "integer":
    case "number":
    case "string":
      return;
    case "array":
      walk(node.items, `${pointer}/items`, definitionNames, errors);
      return;
    case "object":
      Object.entries(node.properties).forEach(([name, value]) => {
        walk(value, `${pointer}/properties/${escapePointer(name)}`, definitionNames, errors);
      });
      validateRequired(node.properties, node.required, pointer, errors);
      return;
    case "anyOf":
      node.variants.forEach((variant, index) => {
        walk(variant, `${pointer}/anyOf/${index}`, definitionNames, errors);
      });
      return;
    case "allOf": {
      const [conjunct] = node.conjuncts;
      if (node.conjuncts.length !== 1 || conjunct?.kind !== "ref") {
        errors.push(
          createError(
            "UNSUPPORTED_ALL_OF",
            `allOf must contain exactly one $ref, got ${node.conjuncts.length} element(s)`,
            `${pointer}/allOf`
          )
        );
      }
      node.conjuncts.forEach((value, index) => {
        walk(value, `${pointer}/allOf/${index}`, definitionNames, errors);
      });
      return;
    }
    case "ref":
      if (!definitionNames.has(node.target)) {
        errors.push(
          createError(
            "UNKNOWN_REFERENCE",
            `Reference '${node.target}' is not defined`,
            `${pointer}/$ref`
          )
        );
      }
      return;
  }
}

function validateRequired(
  properties: Readonly<Record<string, UnresolvedValue>>,
  required: readonly string[],
  pointer: string,
  errors: SchemaValidationError[]
): void {
  required.forEach((name, index) => {
    if (!Object.hasOwn(properties, name)) {
      errors.push(
        createError(
          "UNKNOWN_REQUIRED_PROPERTY",
          `Required property '${name}' is not defined in properties`,
          `${pointer}/required/${index}`
        )
      );
    }
  });
}

/**
 * 循環参照の検証
 * 定義間の参照グラフを DFS で辿り、自身に戻る定義を報告する
 */
function validateAcyclic(
  document: SchemaDocument,
  errors: SchemaValidationError[]
): void {
  // 参照グラフを構築
  const graph = new Map<string, Set<string>>();
  Object.entries(document.definitions).forEach(([name, value]) => {
    const targets = new Set<string>();
    collectTargets(value, targets);
    graph.set(name, targets);
  });

  const reported = new Set<string>();
  for (const start of graph.keys()) {
    if (reported.has(start)) {
      continue;
    }
    const cycle = findCycle(start, graph);
    if (cycle) {
      cycle.forEach((name) => reported.add(name));
      errors.push(
        createError(
          "CYCLIC_REFERENCE",
          `Definition '${start}' references itself through ${cycle.join(" -> ")}`,
          `/$defs/${escapePointer(start)}`
        )
      );
    }
  }
}

/**
 * start から start に戻る経路を探す
 * @returns 経路（start から始まり start で終わる）、なければ null
 */
function findCycle(start: string, graph: Map<string, Set<string>>): string[] | null {
  const visited = new Set<string>();
  const stack: string[][] = [[start]];

  while (stack.length > 0) {
    const trail = stack.pop() ?? [];
    const current = trail[trail.length - 1] ?? start;
    for (const next of graph.get(current) ?? []) {
      if (next === start) {
        return [...trail, start];
      }
      if (!visited.has(next)) {
        visited.add(next);
        stack.push([...trail, next]);
      }
    }
  }

  return null;
}

function collectTargets(node: UnresolvedValue, targets: Set<string>): void {
  switch (node.kind) {
    case "null":
    case "boolean":
    case "integer":
    case "number":
    case "string":
      return;
    case "array":
      collectTargets(node.items, targets);
      return;
    case "object":
      Object.values(node.properties).forEach((value) => collectTargets(value, targets));
      return;
    case "anyOf":
      node.variants.forEach((value) => collectTargets(value, targets));
      return;
    case "allOf":
      node.conjuncts.forEach((value) => collectTargets(value, targets));
      return;
    case "ref":
      targets.add(node.target);
      return;
  }
}

/**
 * JSON Pointer のエスケープ（~ と /）
 */
function escapePointer(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * エラーオブジェクト生成ヘルパー
 */
function createError(
  code: SchemaValidationErrorCode,
  message: string,
  path: string
): SchemaValidationError {
  return { code, message, path };
}
