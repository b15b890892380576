/**
 * CLI 引数の解析
 */

export type OptionValue = string | boolean;

export type Options = Record<string, OptionValue>;

export interface ParsedArgs {
  command?: string;
  options: Options;
  positionals: string[];
}

export class CliError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CliError";
  }
}

/**
 * 先頭の非オプション引数をコマンドとして扱う
 * --key value / --key=value / --flag を受け付ける。同じキーは後勝ち
 */
export function parseArgs(args: string[]): ParsedArgs {
  const [first, ...rest] = args;
  const hasCommand = first !== undefined && !first.startsWith("-");
  const tokens = hasCommand ? rest : args;
  const options: Options = {};
  const positionals: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const body = token.slice(2);
    const eqIndex = body.indexOf("=");
    if (eqIndex !== -1) {
      options[body.slice(0, eqIndex)] = body.slice(eqIndex + 1);
      continue;
    }

    const next = tokens[i + 1];
    if (next !== undefined && !next.startsWith("-")) {
      options[body] = next;
      i++;
    } else {
      options[body] = true;
    }
  }

  return {
    options,
    positionals,
    ...(hasCommand && { command: first }),
  };
}

/**
 * 値付きで指定された文字列オプションを取得する
 * フラグとして指定された場合は未指定と同じ扱い
 */
export function getStringOption(options: Options, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

export function requireStringOption(options: Options, key: string): string {
  const value = getStringOption(options, key);
  if (!value) {
    throw new CliError("INVALID_INPUT", `--${key} is required`);
  }
  return value;
}
