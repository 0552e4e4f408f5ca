import path from "node:path";

import { ConfigError } from "../../domain/models/errors";

import type { LogLevel } from "../../application/ports/output/logger";

const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"] satisfies LogLevel[];

/**
 * アプリケーション全体の設定
 */
export interface AppConfig {
  /** 書籍リストを保存するJSONファイル */
  readonly dataFile: string;
  /** CSVエクスポートの既定の出力先 */
  readonly csvFile: string;
  readonly logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

/**
 * パスを表す環境変数を読む
 * 未設定なら既定値、空文字列なら設定エラー
 */
function readPath(env: NodeJS.ProcessEnv, key: string, fallback: string, cwd: string): string {
  const value = env[key];
  if (value === undefined) {
    return path.resolve(cwd, fallback);
  }
  if (!value.trim()) {
    throw new ConfigError(`${key} に空のパスが設定されています`, key);
  }
  return path.resolve(cwd, value.trim());
}

/**
 * 環境変数から設定を読み込む
 * @param env 環境変数
 * @param cwd 相対パスの基準ディレクトリ
 * @throws ConfigError 設定値が不正な場合
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || "warn";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `LOG_LEVEL には ${LOG_LEVELS.join(", ")} のいずれかを指定してください: ${logLevel}`,
      "LOG_LEVEL"
    );
  }

  return {
    dataFile: readPath(env, "LIBRARY_DATA_FILE", "books_data.json", cwd),
    csvFile: readPath(env, "LIBRARY_CSV_FILE", "books_export.csv", cwd),
    logLevel
  };
}

/**
 * コマンドラインオプションで設定を上書きする
 */
export function withCliOverrides(
  config: AppConfig,
  options: Readonly<{ file?: string }>,
  cwd: string = process.cwd()
): AppConfig {
  if (!options.file?.trim()) {
    return config;
  }
  return { ...config, dataFile: path.resolve(cwd, options.file.trim()) };
}
