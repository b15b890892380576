/**
 * スキーマノードの型定義
 * 解決前（Ref / AllOf を含む）と解決後の 2 つの閉じた集合を持つ
 * @see src/resolver/resolver.ts
 */

/** デフォルト値として保持できるスカラー */
export type SchemaDefault = boolean | number | string;

/**
 * 全ノード共通のドキュメント用フィールド
 * 比較には使用しない
 */
interface Annotated {
  title?: string;
  description?: string;
}

/**
 * デフォルト値を持てるノード
 * 型ごとの値の妥当性は読み込み時に検証する
 */
interface Defaulted extends Annotated {
  default?: SchemaDefault;
}

export interface NullValue extends Defaulted {
  kind: "null";
}

export interface BooleanValue extends Defaulted {
  kind: "boolean";
}

export interface IntegerValue extends Defaulted {
  kind: "integer";
  enum?: readonly number[];
}

export interface NumberValue extends Defaulted {
  kind: "number";
  enum?: readonly number[];
}

export interface StringValue extends Defaulted {
  kind: "string";
  enum?: readonly string[];
  /** date / date-time などの不透明なタグ。完全一致でのみ比較する */
  format?: string;
}

/** 単一の要素型を持つ配列 */
export interface ArrayNode<TChild> extends Defaulted {
  kind: "array";
  items: TChild;
}

/**
 * オブジェクト
 * required に含まれないプロパティは省略可能
 */
export interface ObjectNode<TChild> extends Defaulted {
  kind: "object";
  properties: Readonly<Record<string, TChild>>;
  required: readonly string[];
}

/** 和（いずれかの形に一致） */
export interface AnyOfNode<TChild> extends Annotated {
  kind: "anyOf";
  variants: readonly TChild[];
  default?: SchemaDefault;
}

/**
 * 単一参照のエイリアス
 * conjuncts は Ref 1 要素のみ有効。default の上書きに使われる
 */
export interface AllOfValue extends Annotated {
  kind: "allOf";
  conjuncts: readonly UnresolvedValue[];
  default?: SchemaDefault;
}

/**
 * 定義テーブルへの参照
 * @term target は SchemaDocument.definitions のキー
 */
export interface RefValue extends Annotated {
  kind: "ref";
  target: string;
}

export type ScalarValue =
  | NullValue
  | BooleanValue
  | IntegerValue
  | NumberValue
  | StringValue;

export type ArrayValue = ArrayNode<Value>;
export type ObjectValue = ObjectNode<Value>;
export type AnyOfValue = AnyOfNode<Value>;

/** 解決済みノード。Ref と AllOf は現れない */
export type Value = ScalarValue | ArrayValue | ObjectValue | AnyOfValue;

/** 解決前ノード */
export type UnresolvedValue =
  | ScalarValue
  | ArrayNode<UnresolvedValue>
  | ObjectNode<UnresolvedValue>
  | AnyOfNode<UnresolvedValue>
  | AllOfValue
  | RefValue;

/** 解決済みノードの種別 */
export type ValueKind = Value["kind"];

/** 解決前ノードの種別 */
export type UnresolvedValueKind = UnresolvedValue["kind"];

/**
 * 網羅性チェック用
 * 到達した場合はロジックの誤り
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected schema node: ${JSON.stringify(value)}`);
}
