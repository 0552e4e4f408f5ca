/**
 * 想定内の失敗を例外ではなく値として返すための型
 * 入力の検証やエクスポートのように、呼び出し側が失敗を分岐で扱う処理で使う
 */
export type Success<T> = Readonly<{ tag: "success"; value: T }>;

export type Failure<E> = Readonly<{ tag: "failure"; error: E }>;

export type Result<E, T> = Success<T> | Failure<E>;

export function ok<E, T>(value: T): Result<E, T> {
  return { tag: "success", value };
}

export function err<E, T>(error: E): Result<E, T> {
  return { tag: "failure", error };
}

export function isSuccess<E, T>(result: Result<E, T>): result is Success<T> {
  return result.tag === "success";
}

export function isError<E, T>(result: Result<E, T>): result is Failure<E> {
  return result.tag === "failure";
}
