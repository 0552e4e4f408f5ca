/**
 * アプリケーション全体の基底エラークラス
 * すべての独自エラーの基底となるクラス
 */
export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.code = code;

    // Error stacktraceを適切に保持する
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * バリデーションエラー
 * 入力値の検証に失敗した場合に使用
 */
export class ValidationError extends AppError {
  readonly field: string;
  readonly value?: unknown;

  constructor(message: string, field: string, value?: unknown, cause?: unknown) {
    super(message, "VALIDATION_ERROR", cause);
    this.field = field;
    this.value = value;
  }
}

/**
 * ファイル操作関連のエラー
 * ファイルの読み書きに失敗した場合に使用
 */
export class FileError extends AppError {
  readonly path: string;
  readonly operation: "read" | "write";

  constructor(message: string, path: string, operation: "read" | "write", cause?: unknown) {
    super(message, "FILE_ERROR", cause);
    this.path = path;
    this.operation = operation;
  }
}

/**
 * 設定関連のエラー
 */
export class ConfigError extends AppError {
  readonly key?: string;

  constructor(message: string, key?: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.key = key;
  }
}

/**
 * エラーをAppErrorに正規化する
 * @param error 変換元のエラー
 * @param context コンテキスト情報
 */
export function normalizeError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const prefix = context ? `[${context}] ` : "";
  if (error instanceof Error) {
    return new AppError(`${prefix}${error.message}`, "UNKNOWN_ERROR", error);
  }

  return new AppError(`${prefix}予期せぬエラー: ${String(error)}`, "UNKNOWN_ERROR", error);
}
