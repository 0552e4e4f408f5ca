import type { Book } from "../../../domain/models/book";

/**
 * 読み込み結果
 * - empty: ファイルが存在しない、または書籍リストとして解釈できない
 * - loaded: 保存されていた書籍リスト
 */
export type LoadOutcome =
  | { readonly kind: "empty"; readonly reason: "missing" | "malformed" }
  | { readonly kind: "loaded"; readonly books: Book[] };

/**
 * 書籍ストアのポート
 * コレクション全体をまとめて読み書きする
 */
export interface BookStore {
  /**
   * 保存されている書籍リストを読み込む
   * 読み込めない場合は空のリストを返し、例外は投げない
   */
  load(): Promise<Book[]>;

  /**
   * 書籍リスト全体で保存内容を置き換える
   * @throws FileError 書き込みに失敗した場合
   */
  save(books: readonly Book[]): Promise<void>;
}
