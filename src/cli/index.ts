#!/usr/bin/env node
/**
 * json-schema-subset CLI
 * スキーマの互換性チェックと履歴管理
 */

import { runCli } from "./commands.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  process.stdout.write(
    `${JSON.stringify({ error: { code: "INTERNAL_ERROR", message } }, null, 2)}\n`
  );
  process.exit(1);
});
