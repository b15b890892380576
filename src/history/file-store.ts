/**
 * ファイルベースのスキーマ履歴ストア
 * <baseDir>/<name>/0001.json の形式でバージョンを保存する
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { SchemaDocument, SchemaHistoryStore } from "../types/index.js";
import { parseSchemaDocumentFile } from "../schema/parser.js";
import { stringifySchemaDocument } from "../schema/serializer.js";

/**
 * 履歴エラー
 */
export class SchemaHistoryError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "SchemaHistoryError";
  }
}

/**
 * デフォルトの保存ディレクトリ
 */
export const DEFAULT_HISTORY_DIR = "schemas";

const SCHEMA_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const VERSION_FILE_PATTERN = /^(\d{4,})\.json$/;

/**
 * バージョン番号をファイル名に変換
 * @example versionFileName(1) === "0001.json"
 */
export function versionFileName(version: number): string {
  return `${String(version).padStart(4, "0")}.json`;
}

export function assertSchemaName(name: string): void {
  if (!SCHEMA_NAME_PATTERN.test(name)) {
    throw new SchemaHistoryError(`Invalid schema name: ${name}`);
  }
}

/**
 * ファイルストアオプション
 */
export interface FileSchemaHistoryStoreOptions {
  /** 保存ディレクトリのベースパス */
  baseDir?: string;
}

export class FileSchemaHistoryStore implements SchemaHistoryStore {
  private readonly baseDir: string;

  constructor(options: FileSchemaHistoryStoreOptions = {}) {
    this.baseDir = options.baseDir ?? DEFAULT_HISTORY_DIR;
  }

  /**
   * スキーマごとのディレクトリ
   */
  getSchemaDir(name: string): string {
    assertSchemaName(name);
    return path.join(this.baseDir, name);
  }

  getFilePath(name: string, version: number): string {
    return path.join(this.getSchemaDir(name), versionFileName(version));
  }

  /**
   * 保存済みバージョンを昇順で返す
   * 命名規則に合わないファイルは無視する
   */
  async listVersions(name: string): Promise<number[]> {
    const dir = this.getSchemaDir(name);
    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw new SchemaHistoryError(`Failed to list versions: ${dir}`, error);
    }

    return files
      .map((file) => VERSION_FILE_PATTERN.exec(file)?.[1])
      .filter((digits): digits is string => digits !== undefined)
      .map((digits) => Number.parseInt(digits, 10))
      .sort((left, right) => left - right);
  }

  async read(name: string, version: number): Promise<SchemaDocument> {
    const filePath = this.getFilePath(name, version);
    try {
      return await parseSchemaDocumentFile(filePath);
    } catch (error) {
      throw new SchemaHistoryError(
        `Failed to read schema version: ${name}@${version}`,
        error
      );
    }
  }

  /**
   * バージョンを書き込む
   * 既存のバージョンは上書きしない
   */
  async write(name: string, version: number, document: SchemaDocument): Promise<void> {
    const filePath = this.getFilePath(name, version);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    try {
      await fs.writeFile(filePath, stringifySchemaDocument(document), {
        encoding: "utf-8",
        flag: "wx",
      });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "EEXIST") {
        throw new SchemaHistoryError(
          `Schema version already exists: ${name}@${version}`,
          error
        );
      }
      throw new SchemaHistoryError(
        `Failed to write schema version: ${name}@${version}`,
        error
      );
    }
  }
}
