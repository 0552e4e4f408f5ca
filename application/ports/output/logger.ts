/**
 * ロガーのポート
 * アプリケーション層で使用するログインターフェース
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * 情報レベルのログを出力
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * 警告レベルのログを出力
   * エラーではないが注意が必要な状況を示す情報
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * エラーレベルのログを出力
   */
  error(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
