/**
 * CLI コマンドの実装
 * 結果は stdout に JSON で出力し、終了コードを返す
 */

import { compareSchemaFiles } from "../compare.js";
import { ResolutionFault } from "../resolver/resolver.js";
import { parseSchemaDocumentFile, loadSchema, SchemaParseError } from "../schema/parser.js";
import { serializeValue } from "../schema/serializer.js";
import { validateSchemaDocument } from "../schema/validator.js";
import { formatSubsetError } from "../subset/reporter.js";
import { SchemaHistory } from "../history/schema-history.js";
import {
  FileSchemaHistoryStore,
  SchemaHistoryError,
  DEFAULT_HISTORY_DIR,
} from "../history/file-store.js";
import type { Logger } from "../logger.js";
import { createLogger, isSilent } from "../logger.js";
import type { Options } from "./args.js";
import { parseArgs, getStringOption, requireStringOption, CliError } from "./args.js";

/**
 * CLI の出力先
 * テストでは差し替える
 */
export interface CliIO {
  stdout(text: string): void;
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

export function defaultIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    env: process.env,
    logger: createLogger(isSilent(process.env)),
  };
}

/**
 * コマンドを実行して終了コードを返す
 */
export async function runCli(args: string[], io: CliIO = defaultIO()): Promise<number> {
  const parsed = parseArgs(args);

  if (!parsed.command || parsed.command === "help") {
    outputHelp(io);
    return 0;
  }

  try {
    switch (parsed.command) {
      case "check":
        return await commandCheck(parsed.options, parsed.positionals, io);
      case "validate":
        return await commandValidate(parsed.options, parsed.positionals, io);
      case "resolve":
        return await commandResolve(parsed.options, parsed.positionals, io);
      case "history":
        return await commandHistory(parsed.options, parsed.positionals, io);
      default:
        throw new CliError("INVALID_INPUT", `Unknown command: ${parsed.command}`);
    }
  } catch (error) {
    if (error instanceof CliError) {
      outputError(io, error.code, error.message, error.details);
      return 1;
    }
    if (error instanceof ResolutionFault) {
      outputError(io, error.code, error.message);
      return 1;
    }
    if (error instanceof SchemaParseError) {
      outputError(io, "PARSE_ERROR", error.message, causeDetails(error.cause));
      return 1;
    }
    if (error instanceof SchemaHistoryError) {
      outputError(io, "HISTORY_ERROR", error.message, causeDetails(error.cause));
      return 1;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    io.logger.error(error);
    outputError(io, "INTERNAL_ERROR", message);
    return 1;
  }
}

// =============================================================================
// コマンド
// =============================================================================

/**
 * check <old> <new>
 * 旧スキーマの値がすべて新スキーマに適合するかを検証
 */
async function commandCheck(options: Options, positionals: string[], io: CliIO): Promise<number> {
  const oldPath = getStringOption(options, "old") ?? positionals[0];
  const newPath = getStringOption(options, "new") ?? positionals[1];
  if (!oldPath || !newPath) {
    throw new CliError("INVALID_INPUT", "Two schema files are required: check <old> <new>");
  }

  const format = getStringOption(options, "format") ?? "json";
  if (format !== "json" && format !== "text") {
    throw new CliError("INVALID_INPUT", `Unknown format: ${format}`);
  }

  const result = await compareSchemaFiles(oldPath, newPath);
  io.logger.info(`Compared ${oldPath} -> ${newPath}: ${result.errors.length} error(s)`);

  if (format === "text") {
    io.stdout(`${result.compatible ? "compatible" : result.lines.join("\n")}\n`);
  } else {
    outputJson(io, {
      compatible: result.compatible,
      errors: result.errors.map((error) => ({
        path: error.path,
        message: error.msg,
        a: error.a.kind,
        b: error.b.kind,
        line: formatSubsetError(error),
      })),
    });
  }

  return result.compatible ? 0 : 1;
}

/**
 * validate <file>
 */
async function commandValidate(options: Options, positionals: string[], io: CliIO): Promise<number> {
  const filePath = requireFile(options, positionals);
  const document = await parseSchemaDocumentFile(filePath);
  const result = validateSchemaDocument(document);
  outputJson(io, result);
  return result.valid ? 0 : 1;
}

/**
 * resolve <file>
 * 解決済みツリーを JSON Schema 形式で出力
 */
async function commandResolve(options: Options, positionals: string[], io: CliIO): Promise<number> {
  const filePath = requireFile(options, positionals);
  outputJson(io, serializeValue(await loadSchema(filePath)));
  return 0;
}

/**
 * history record --name <name> --schema <file>
 * history check --name <name>
 */
async function commandHistory(options: Options, positionals: string[], io: CliIO): Promise<number> {
  const [action] = positionals;
  const name = requireStringOption(options, "name");
  const baseDir =
    getStringOption(options, "history-dir") ??
    io.env.SCHEMA_SUBSET_HISTORY_DIR ??
    DEFAULT_HISTORY_DIR;
  const history = new SchemaHistory(new FileSchemaHistoryStore({ baseDir }), {
    logger: io.logger,
  });

  switch (action) {
    case "record": {
      const schemaPath = requireStringOption(options, "schema");
      const record = await history.record(name, await parseSchemaDocumentFile(schemaPath));
      outputJson(io, record);
      return 0;
    }
    case "check": {
      const result = await history.check(name);
      outputJson(io, {
        name: result.name,
        compatible: result.compatible,
        pairs: result.pairs.map((pair) => ({
          from: pair.from,
          to: pair.to,
          errors: pair.errors.map(formatSubsetError),
        })),
      });
      return result.compatible ? 0 : 1;
    }
    default:
      throw new CliError(
        "INVALID_INPUT",
        `Unknown history action: ${action ?? "(none)"}. Expected record or check`
      );
  }
}

// =============================================================================
// ヘルパー
// =============================================================================

function requireFile(options: Options, positionals: string[]): string {
  const filePath = getStringOption(options, "file") ?? positionals[0];
  if (!filePath) {
    throw new CliError("INVALID_INPUT", "A schema file is required");
  }
  return filePath;
}

function causeDetails(cause: unknown): { reason: string } | undefined {
  return cause instanceof Error ? { reason: cause.message } : undefined;
}

function outputJson(io: CliIO, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

function outputError(io: CliIO, code: string, message: string, details?: unknown): void {
  const errorPayload: { error: { code: string; message: string; details?: unknown } } = {
    error: { code, message },
  };
  if (details !== undefined) {
    errorPayload.error.details = details;
  }
  outputJson(io, errorPayload);
}

function outputHelp(io: CliIO): void {
  outputJson(io, {
    commands: {
      check: "Check that every value of the old schema is accepted by the new schema",
      validate: "Validate references and allOf shapes of a schema document",
      resolve: "Print the resolved schema tree",
      "history record": "Record a new schema version when it changed",
      "history check": "Check every consecutive pair of recorded versions",
      help: "Show this help",
    },
    options: {
      check: ["--old", "--new", "--format json|text"],
      validate: ["--file"],
      resolve: ["--file"],
      history: ["--name", "--schema", "--history-dir"],
    },
    env: {
      SCHEMA_SUBSET_HISTORY_DIR: `History base directory (default: ${DEFAULT_HISTORY_DIR})`,
      SCHEMA_SUBSET_SILENT: "Set to 1 to silence diagnostic logging",
    },
  });
}
