/**
 * 診断ログ
 * stdout は結果の JSON 専用のため、ログは stderr に出す
 */

export interface Logger {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * SCHEMA_SUBSET_SILENT=1 または NODE_ENV=test のときは出力しない
 */
export function isSilent(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.SCHEMA_SUBSET_SILENT === "1" || env.NODE_ENV === "test";
}

export function createLogger(silent: boolean = isSilent()): Logger {
  const write = (...args: unknown[]) => {
    if (!silent) {
      console.error(...args);
    }
  };
  return {
    info: write,
    error: write,
  };
}

/** 何も出力しない Logger */
export const silentLogger: Logger = createLogger(true);
