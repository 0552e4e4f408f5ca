import type { LogLevel, Logger } from "../../../application/ports/output/logger";

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * コンソールロガーの実装
 * ログメッセージをコンソールに出力するシンプルなロガー
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly enabledLevels: ReadonlySet<LogLevel>;

  /**
   * @param prefix ログメッセージに付与するプレフィックス
   * @param level 有効にするログレベル。指定されたレベル以上のログが出力される
   */
  constructor(prefix: string, level: LogLevel = "info") {
    this.prefix = prefix;
    this.enabledLevels = new Set(LEVEL_ORDER.slice(LEVEL_ORDER.indexOf(level)));
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.prefix}] ${message}`;
  }

  /**
   * コンテキスト情報をフォーマット
   */
  private formatContext(context?: Record<string, unknown>): string {
    if (!context) return "";

    try {
      // エラーオブジェクトを特別に処理
      const processedContext = { ...context };
      if (context.error instanceof Error) {
        processedContext.error = {
          name: context.error.name,
          message: context.error.message,
          stack: context.error.stack
        };
      }

      return JSON.stringify(processedContext, null, 2);
    } catch (e) {
      return `[Context serialization failed: ${e instanceof Error ? e.message : String(e)}]`;
    }
  }

  private write(level: LogLevel, sink: (...data: unknown[]) => void, message: string, context?: Record<string, unknown>) {
    if (!this.enabledLevels.has(level)) return;

    sink(this.formatMessage(level, message));
    const formattedContext = this.formatContext(context);
    if (formattedContext) {
      sink(formattedContext);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", console.debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", console.info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", console.warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", console.error, message, context);
  }
}
