import stringWidth from "string-width";

import type { Book } from "../../domain/models/book";
import type { GenreDistribution, ReadingStats } from "../../domain/services/readingStatsService";

const TABLE_HEADERS = ["タイトル", "著者", "出版年", "ジャンル", "状態"] as const;
const COLUMN_GAP = "  ";
const BAR_WIDTH = 30;

export const EMPTY_LIBRARY_MESSAGE = "蔵書はまだありません。本を追加してください。";
export const NO_GENRE_LABEL = "(未設定)";

export function readStatusLabel(read: boolean): string {
  return read ? "既読" : "未読";
}

export function formatCompletionRate(rate: number): string {
  return `${rate.toFixed(1)}%`;
}

/**
 * 端末上の表示幅で右側を空白で埋める
 * 全角文字は2桁として数える
 */
function padDisplayEnd(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - stringWidth(text)));
}

function formatRow(cells: readonly string[], widths: readonly number[]): string {
  return cells
    .map((cell, i) => padDisplayEnd(cell, widths[i]))
    .join(COLUMN_GAP)
    .trimEnd();
}

/**
 * 書籍リストを表形式の行に変換する
 */
export function renderBookTable(books: readonly Book[]): string[] {
  if (books.length === 0) {
    return [EMPTY_LIBRARY_MESSAGE];
  }

  const rows = books.map((book) => [book.title, book.author, book.year, book.genre, readStatusLabel(book.read)]);
  const widths = TABLE_HEADERS.map((header, i) =>
    Math.max(stringWidth(header), ...rows.map((row) => stringWidth(row[i])))
  );

  return [
    formatRow(TABLE_HEADERS, widths),
    widths.map((width) => "-".repeat(width)).join(COLUMN_GAP),
    ...rows.map((row) => formatRow(row, widths))
  ];
}

/**
 * 横棒グラフを描画する
 * 最大値の棒が BAR_WIDTH 文字になるように縮尺する
 * ラベルは表示幅でそろえる
 */
export function renderBarChart(entries: ReadonlyArray<readonly [string, number]>): string[] {
  const max = Math.max(0, ...entries.map(([, count]) => count));
  const labelWidth = Math.max(0, ...entries.map(([label]) => stringWidth(label)));

  return entries.map(([label, count]) => {
    const bar = max > 0 ? "#".repeat(Math.round((count / max) * BAR_WIDTH)) : "";
    return `${padDisplayEnd(label, labelWidth)} | ${bar ? `${bar} ` : ""}${count}`;
  });
}

/**
 * 読書統計とグラフを描画する
 */
export function renderStats(stats: ReadingStats, genres: GenreDistribution): string[] {
  const lines = [
    `蔵書数: ${stats.total}`,
    `既読: ${stats.read}`,
    `読了率: ${formatCompletionRate(stats.completionRate)}`,
    "",
    "読書状況",
    ...renderBarChart([
      [readStatusLabel(true), stats.read],
      [readStatusLabel(false), stats.unread]
    ])
  ];

  if (genres.size > 0) {
    const genreEntries = Array.from(genres.entries()).map(
      ([genre, count]) => [genre === "" ? NO_GENRE_LABEL : genre, count] as const
    );
    lines.push("", "ジャンル分布", ...renderBarChart(genreEntries));
  }

  return lines;
}

/**
 * 編集・削除の対象になるタイトル一覧を描画する
 */
export function renderTitleChoices(titles: readonly string[]): string[] {
  if (titles.length === 0) {
    return [EMPTY_LIBRARY_MESSAGE];
  }
  return ["登録されている書籍:", ...titles.map((title) => `  - ${title}`)];
}
