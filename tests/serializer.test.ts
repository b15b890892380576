/**
 * スキーマドキュメントの書き出しのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  serializeSchemaDocument,
  serializeValue,
  stringifySchemaDocument,
  dumpSchemaDocument,
} from "../src/schema/serializer.js";
import { parseSchemaDocument, parseSchemaDocumentFile } from "../src/schema/parser.js";
import type { SchemaDocument } from "../src/types/index.js";

const document: SchemaDocument = {
  title: "Profile",
  description: "A user profile",
  definitions: {
    Plan: { kind: "string", enum: ["free", "pro"], title: "Plan" },
  },
  properties: {
    name: { kind: "string", title: "Name" },
    plan: { kind: "allOf", conjuncts: [{ kind: "ref", target: "Plan" }], default: "free" },
    born: { kind: "anyOf", variants: [{ kind: "string", format: "date" }, { kind: "null" }] },
    scores: { kind: "array", items: { kind: "number" } },
    active: { kind: "boolean", default: true },
  },
  required: ["name"],
};

describe("serializeSchemaDocument", () => {
  it("should write the JSON Schema form with $defs", () => {
    expect(serializeSchemaDocument(document)).toEqual({
      type: "object",
      title: "Profile",
      description: "A user profile",
      $defs: {
        Plan: { type: "string", enum: ["free", "pro"], title: "Plan" },
      },
      properties: {
        name: { type: "string", title: "Name" },
        plan: { allOf: [{ $ref: "#/$defs/Plan" }], default: "free" },
        born: { anyOf: [{ type: "string", format: "date" }, { type: "null" }] },
        scores: { type: "array", items: { type: "number" } },
        active: { type: "boolean", default: true },
      },
      required: ["name"],
    });
  });

  it("should omit an empty definitions table", () => {
    const schema = serializeSchemaDocument({
      title: "Empty",
      definitions: {},
      properties: {},
      required: [],
    });
    expect(schema).toEqual({ type: "object", title: "Empty", properties: {}, required: [] });
  });
});

describe("serializeValue", () => {
  it("should write resolved objects", () => {
    expect(
      serializeValue({
        kind: "object",
        properties: { id: { kind: "integer", enum: [1, 2] } },
        required: ["id"],
      })
    ).toEqual({
      type: "object",
      properties: { id: { type: "integer", enum: [1, 2] } },
      required: ["id"],
    });
  });
});

describe("stringifySchemaDocument", () => {
  it("should sort keys and indent with four spaces", () => {
    const text = stringifySchemaDocument({
      title: "T",
      definitions: {},
      properties: { b: { kind: "null" }, a: { kind: "null" } },
      required: [],
    });

    expect(text).toBe(
      [
        "{",
        '    "properties": {',
        '        "a": {',
        '            "type": "null"',
        "        },",
        '        "b": {',
        '            "type": "null"',
        "        }",
        "    },",
        '    "required": [],',
        '    "title": "T",',
        '    "type": "object"',
        "}",
        "",
      ].join("\n")
    );
  });

  it("should round trip through the parser", () => {
    expect(parseSchemaDocument(stringifySchemaDocument(document), "json")).toEqual(document);
  });
});

describe("dumpSchemaDocument", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "json-schema-subset-dump-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should create parent directories and write the document", async () => {
    const filePath = path.join(tempDir, "nested", "profile.json");

    await dumpSchemaDocument(document, filePath);

    expect(await parseSchemaDocumentFile(filePath)).toEqual(document);
  });
});
