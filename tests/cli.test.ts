/**
 * CLI のテスト
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { parseArgs, getStringOption, requireStringOption, CliError } from "../src/cli/args.js";
import { runCli } from "../src/cli/commands.js";
import type { CliIO } from "../src/cli/commands.js";
import { silentLogger } from "../src/logger.js";

describe("parseArgs", () => {
  it("should split command, options and positionals", () => {
    expect(parseArgs(["check", "old.json", "--format", "text", "new.json"])).toEqual({
      command: "check",
      options: { format: "text" },
      positionals: ["old.json", "new.json"],
    });
  });

  it("should accept --key=value and flags", () => {
    expect(parseArgs(["resolve", "--file=a.json", "--verbose"])).toEqual({
      command: "resolve",
      options: { file: "a.json", verbose: true },
      positionals: [],
    });
  });

  it("should keep the last value of a repeated option", () => {
    const parsed = parseArgs(["--name", "a", "--name", "b"]);
    expect(parsed.command).toBeUndefined();
    expect(parsed.options).toEqual({ name: "b" });
    expect(getStringOption(parsed.options, "name")).toBe("b");
  });

  it("should let a value override an earlier flag", () => {
    expect(parseArgs(["history", "--name", "--name=Foo"]).options).toEqual({ name: "Foo" });
  });

  it("should ignore flags when reading string options", () => {
    expect(getStringOption({ format: true }, "format")).toBeUndefined();
  });

  it("should require string options", () => {
    expect(() => requireStringOption({ schema: true }, "schema")).toThrow(
      new CliError("INVALID_INPUT", "--schema is required")
    );
  });
});

describe("runCli", () => {
  let tempDir: string;
  let output: string[];
  let io: CliIO;

  const stdout = (): unknown => JSON.parse(output.join(""));

  const writeSchema = async (name: string, schema: unknown): Promise<string> => {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, JSON.stringify(schema));
    return filePath;
  };

  const strOnly = {
    type: "object",
    title: "StrOnly",
    properties: { a: { type: "string" } },
    required: ["a"],
  };
  const intOnly = {
    type: "object",
    title: "IntOnly",
    properties: { a: { type: "integer" } },
    required: ["a"],
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "json-schema-subset-cli-"));
    output = [];
    io = {
      stdout: (text) => {
        output.push(text);
      },
      env: {},
      logger: silentLogger,
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("check", () => {
    it("should exit 0 for compatible schemas", async () => {
      const a = await writeSchema("a.json", strOnly);

      expect(await runCli(["check", a, a], io)).toBe(0);
      expect(stdout()).toEqual({ compatible: true, errors: [] });
    });

    it("should report incompatibilities as JSON", async () => {
      const a = await writeSchema("a.json", strOnly);
      const b = await writeSchema("b.json", intOnly);

      expect(await runCli(["check", "--old", a, "--new", b], io)).toBe(1);
      expect(stdout()).toEqual({
        compatible: false,
        errors: [
          {
            path: ["a"],
            message: "Types don't match",
            a: "string",
            b: "integer",
            line: "At .a Types don't match - a: String b: Integer",
          },
        ],
      });
    });

    it("should print text lines", async () => {
      const a = await writeSchema("a.json", strOnly);
      const b = await writeSchema("b.json", intOnly);

      expect(await runCli(["check", a, b, "--format", "text"], io)).toBe(1);
      expect(output.join("")).toBe("At .a Types don't match - a: String b: Integer\n");

      output.length = 0;
      expect(await runCli(["check", a, a, "--format", "text"], io)).toBe(0);
      expect(output.join("")).toBe("compatible\n");
    });

    it("should require two files", async () => {
      expect(await runCli(["check", "only.json"], io)).toBe(1);
      expect(stdout()).toEqual({
        error: {
          code: "INVALID_INPUT",
          message: "Two schema files are required: check <old> <new>",
        },
      });
    });

    it("should report resolution faults", async () => {
      const a = await writeSchema("a.json", strOnly);
      const dangling = await writeSchema("dangling.json", {
        type: "object",
        title: "Dangling",
        properties: { a: { $ref: "#/$defs/Missing" } },
      });

      expect(await runCli(["check", a, dangling], io)).toBe(1);
      expect(stdout()).toEqual({
        error: { code: "UNKNOWN_REFERENCE", message: "Unknown reference: Missing" },
      });
    });
  });

  describe("validate", () => {
    it("should print the validation result", async () => {
      const file = await writeSchema("dangling.json", {
        type: "object",
        title: "Dangling",
        properties: { a: { $ref: "#/$defs/Missing" } },
      });

      expect(await runCli(["validate", file], io)).toBe(1);
      expect(stdout()).toEqual({
        valid: false,
        errors: [
          {
            code: "UNKNOWN_REFERENCE",
            message: "Reference 'Missing' is not defined",
            path: "/properties/a/$ref",
          },
        ],
      });
    });
  });

  describe("resolve", () => {
    it("should print the resolved tree", async () => {
      const file = await writeSchema("aliased.json", {
        type: "object",
        title: "Aliased",
        $defs: { Text: { type: "string", format: "email" } },
        properties: { email: { $ref: "#/$defs/Text" } },
        required: ["email"],
      });

      expect(await runCli(["resolve", file], io)).toBe(0);
      expect(stdout()).toEqual({
        type: "object",
        properties: { email: { type: "string", format: "email" } },
        required: ["email"],
      });
    });

    it("should report parse errors", async () => {
      const missing = path.join(tempDir, "missing.json");

      expect(await runCli(["resolve", missing], io)).toBe(1);
      expect(stdout()).toMatchObject({
        error: { code: "PARSE_ERROR", message: `Failed to read file: ${missing}` },
      });
    });
  });

  describe("history", () => {
    it("should record versions and check them", async () => {
      const historyDir = path.join(tempDir, "history");
      const a = await writeSchema("a.json", strOnly);
      const b = await writeSchema("b.json", intOnly);
      io.env = { SCHEMA_SUBSET_HISTORY_DIR: historyDir };

      expect(await runCli(["history", "record", "--name", "Foo", "--schema", a], io)).toBe(0);
      expect(stdout()).toEqual({ version: 1, created: true });

      output.length = 0;
      expect(await runCli(["history", "record", "--name", "Foo", "--schema", b], io)).toBe(0);
      expect(stdout()).toEqual({ version: 2, created: true });

      output.length = 0;
      expect(await runCli(["history", "check", "--name", "Foo"], io)).toBe(1);
      expect(stdout()).toEqual({
        name: "Foo",
        compatible: false,
        pairs: [
          {
            from: 1,
            to: 2,
            errors: ["At .a Types don't match - a: String b: Integer"],
          },
        ],
      });

      expect((await fs.readdir(path.join(historyDir, "Foo"))).sort()).toEqual([
        "0001.json",
        "0002.json",
      ]);
    });

    it("should prefer --history-dir over the environment", async () => {
      const optionDir = path.join(tempDir, "option");
      const a = await writeSchema("a.json", strOnly);
      io.env = { SCHEMA_SUBSET_HISTORY_DIR: path.join(tempDir, "env") };

      await runCli(
        ["history", "record", "--name", "Foo", "--schema", a, "--history-dir", optionDir],
        io
      );

      expect(await fs.readdir(path.join(optionDir, "Foo"))).toEqual(["0001.json"]);
    });

    it("should reject an unknown action", async () => {
      expect(await runCli(["history", "prune", "--name", "Foo"], io)).toBe(1);
      expect(stdout()).toEqual({
        error: {
          code: "INVALID_INPUT",
          message: "Unknown history action: prune. Expected record or check",
        },
      });
    });
  });

  it("should print help", async () => {
    expect(await runCli(["help"], io)).toBe(0);
    expect(stdout()).toHaveProperty("commands.check");
  });

  it("should reject unknown commands", async () => {
    expect(await runCli(["frobnicate"], io)).toBe(1);
    expect(stdout()).toEqual({
      error: { code: "INVALID_INPUT", message: "Unknown command: frobnicate" },
    });
  });
});
