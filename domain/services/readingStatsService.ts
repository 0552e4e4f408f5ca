import type { Book } from "../models/book";

/**
 * 読書状況の集計結果
 */
export type ReadingStats = {
  readonly total: number;
  readonly read: number;
  readonly unread: number;
  /** 読了率 (%)。丸めない */
  readonly completionRate: number;
};

/**
 * ジャンルごとの冊数
 * ジャンル未設定の書籍は空文字列のキーに集計される
 */
export type GenreDistribution = ReadonlyMap<string, number>;

/**
 * 読書状況を集計する
 */
export function computeReadingStats(books: readonly Book[]): ReadingStats {
  const total = books.length;
  const read = books.filter((book) => book.read).length;
  return {
    total,
    read,
    unread: total - read,
    completionRate: total > 0 ? (read / total) * 100 : 0
  };
}

/**
 * ジャンル分布を集計する
 * ジャンル文字列はそのまま（大文字小文字・前後の空白を区別して）キーにする
 */
export function computeGenreDistribution(books: readonly Book[]): GenreDistribution {
  const distribution = new Map<string, number>();
  for (const book of books) {
    distribution.set(book.genre, (distribution.get(book.genre) ?? 0) + 1);
  }
  return distribution;
}
