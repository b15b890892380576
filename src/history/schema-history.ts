/**
 * スキーマ履歴サービス
 * バージョンを記録し、連続するバージョン間の後方互換性を検証する
 * @see src/types/history.ts
 */

import type {
  SchemaDocument,
  SchemaHistoryStore,
  ObjectValue,
  RecordResult,
  HistoryCheckResult,
  VersionPairResult,
} from "../types/index.js";
import { resolveDocument } from "../resolver/resolver.js";
import { checkSubset } from "../subset/checker.js";
import { valuesEqual } from "../subset/equality.js";
import { formatSubsetErrors } from "../subset/reporter.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export interface SchemaHistoryOptions {
  logger?: Logger;
}

export class SchemaHistory {
  private readonly logger: Logger;

  constructor(
    private readonly store: SchemaHistoryStore,
    options: SchemaHistoryOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * 最新のバージョン番号（なければ 0）
   */
  async latestVersion(name: string): Promise<number> {
    const versions = await this.store.listVersions(name);
    return versions[versions.length - 1] ?? 0;
  }

  /**
   * 解決結果が最新バージョンと異なる場合のみ新しいバージョンを書き込む
   * @throws ResolutionFault - document が解決できない場合
   */
  async record(name: string, document: SchemaDocument): Promise<RecordResult> {
    const current = resolveDocument(document);
    const latest = await this.latestVersion(name);

    if (latest > 0) {
      const previous = resolveDocument(await this.store.read(name, latest));
      if (valuesEqual(current, previous)) {
        return { version: latest, created: false };
      }
    }

    const version = latest + 1;
    await this.store.write(name, version, document);
    this.logger.info(`Recorded schema ${name} version ${version}`);
    return { version, created: true };
  }

  /**
   * 連続するバージョンの組ごとに、旧 ⊆ 新 を検証する
   */
  async check(name: string): Promise<HistoryCheckResult> {
    const versions = await this.store.listVersions(name);
    const resolved = new Map<number, ObjectValue>();
    for (const version of versions) {
      resolved.set(version, resolveDocument(await this.store.read(name, version)));
    }

    const pairs: VersionPairResult[] = [];
    versions.forEach((from, index) => {
      const to = versions[index + 1];
      const older = resolved.get(from);
      const newer = to === undefined ? undefined : resolved.get(to);
      if (to === undefined || older === undefined || newer === undefined) {
        return;
      }

      const errors = checkSubset(older, newer);
      if (errors.length > 0) {
        this.logger.error(
          `Backwards compatible schema failure between ${name}@${from} and ${name}@${to}:\n${formatSubsetErrors(errors)}`
        );
      }
      pairs.push({ from, to, errors });
    });

    return {
      name,
      compatible: pairs.every((pair) => pair.errors.length === 0),
      pairs,
    };
  }

  async recordAndCheck(
    name: string,
    document: SchemaDocument
  ): Promise<{ record: RecordResult; check: HistoryCheckResult }> {
    const record = await this.record(name, document);
    const check = await this.check(name);
    return { record, check };
  }
}
