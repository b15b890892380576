/**
 * ドキュメント比較のテスト
 * 読み込み → 解決 → 部分集合チェック の一連の流れ
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { compareSchemas, compareSchemaFiles } from "../src/compare.js";
import { ResolutionFault } from "../src/resolver/resolver.js";
import { SchemaParseError } from "../src/schema/parser.js";
import { doc } from "./helpers.js";

describe("compareSchemas", () => {
  it("should report compatible documents", () => {
    expect(compareSchemas(doc({ a: { kind: "string" } }), doc({ a: { kind: "string" } }))).toEqual({
      compatible: true,
      errors: [],
      lines: [],
    });
  });

  it("should resolve references before checking", () => {
    const a = doc(
      { b: { kind: "ref", target: "StrOnly" } },
      {
        definitions: {
          StrOnly: { kind: "object", properties: { a: { kind: "string" } }, required: ["a"] },
        },
      }
    );
    const b = doc(
      { b: { kind: "ref", target: "IntOnly" } },
      {
        definitions: {
          IntOnly: { kind: "object", properties: { a: { kind: "integer" } }, required: ["a"] },
        },
      }
    );

    const result = compareSchemas(a, b);

    expect(result.compatible).toBe(false);
    expect(result.lines).toEqual(["At .b.a Types don't match - a: String b: Integer"]);
  });

  it("should propagate resolution faults", () => {
    expect(() =>
      compareSchemas(doc({ a: { kind: "ref", target: "Missing" } }), doc({}))
    ).toThrow(ResolutionFault);
  });
});

describe("compareSchemaFiles", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "json-schema-subset-compare-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeSchema = async (name: string, schema: unknown): Promise<string> => {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, JSON.stringify(schema));
    return filePath;
  };

  it("should compare two files", async () => {
    const dateOnly = await writeSchema("date.json", {
      type: "object",
      title: "DateOnly",
      properties: { a: { type: "string", format: "date", title: "A" } },
      required: ["a"],
    });
    const dateTimeOnly = await writeSchema("datetime.json", {
      type: "object",
      title: "DateTimeOnly",
      properties: { a: { type: "string", format: "date-time", title: "A" } },
      required: ["a"],
    });

    const result = await compareSchemaFiles(dateOnly, dateTimeOnly);

    expect(result.lines).toEqual(["At .a String formats do not match - a: String b: String"]);
  });

  it("should reject an unparseable file", async () => {
    const valid = await writeSchema("valid.json", { type: "object", title: "Valid" });
    const invalid = await writeSchema("invalid.json", { type: "object" });

    await expect(compareSchemaFiles(valid, invalid)).rejects.toThrow(SchemaParseError);
  });
});
