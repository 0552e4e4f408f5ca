import fs from "node:fs/promises";
import path from "node:path";

import { FileError } from "../../../domain/models/errors";

import type { BookStore, LoadOutcome } from "../../../application/ports/output/bookStore";
import type { Logger } from "../../../application/ports/output/logger";
import type { Book } from "../../../domain/models/book";

/**
 * ファイルに保存される書籍レコード
 */
export type BookRecord = {
  title: string;
  author: string;
  year: string;
  genre: string;
  read: boolean;
  added_date: string;
};

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 文字列として扱えるフィールドを正規化する
 * 数値は文字列化し、未設定は空文字列にする。それ以外はnull
 */
function toText(value: unknown): string | null {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return null;
}

/**
 * 保存されていた値を書籍に変換する
 * 書籍レコードとして解釈できない場合はnullを返す
 */
export function recordToBook(value: unknown): Book | null {
  if (!isRecordObject(value)) return null;

  const { title, author } = value;
  if (typeof title !== "string" || typeof author !== "string") return null;

  const year = toText(value.year);
  const genre = toText(value.genre);
  if (year === null || genre === null) return null;

  const read = value.read ?? false;
  if (typeof read !== "boolean") return null;

  const addedDate = value.added_date ?? "";
  if (typeof addedDate !== "string") return null;

  return { title, author, year, genre, read, addedDate };
}

export function bookToRecord(book: Book): BookRecord {
  return {
    title: book.title,
    author: book.author,
    year: book.year,
    genre: book.genre,
    read: book.read,
    added_date: book.addedDate
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSONファイルによる書籍ストアの実装
 * コレクション全体を1つのファイルに保存する
 */
export class JsonFileBookStore implements BookStore {
  private readonly filePath: string;
  private readonly logger: Logger;

  /**
   * @param filePath 保存先のJSONファイル
   */
  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<Book[]> {
    const outcome = await this.loadOutcome();
    return outcome.kind === "loaded" ? outcome.books : [];
  }

  /**
   * 読み込み結果を種別付きで返す
   * 読み込めなかった理由は呼び出し側には例外として伝えない
   */
  async loadOutcome(): Promise<LoadOutcome> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug(`書籍ファイルが存在しないため、空のリストから始めます: ${this.filePath}`);
        return { kind: "empty", reason: "missing" };
      }
      const fileError = new FileError(
        `書籍ファイルを読み込めませんでした: ${error instanceof Error ? error.message : String(error)}`,
        this.filePath,
        "read",
        error
      );
      this.logger.warn(fileError.message, { error: fileError, filePath: this.filePath });
      return { kind: "empty", reason: "malformed" };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`書籍ファイルがJSONとして解釈できません: ${this.filePath}`, { error });
      return { kind: "empty", reason: "malformed" };
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`書籍ファイルの形式が不正です（配列ではありません）: ${this.filePath}`);
      return { kind: "empty", reason: "malformed" };
    }

    const books: Book[] = [];
    for (const [index, item] of parsed.entries()) {
      const book = recordToBook(item);
      if (!book) {
        this.logger.warn(`書籍ファイルの形式が不正です（${index}番目のレコード）: ${this.filePath}`);
        return { kind: "empty", reason: "malformed" };
      }
      books.push(book);
    }

    return { kind: "loaded", books };
  }

  /**
   * 一時ファイルに書き込んでからリネームし、保存内容を丸ごと置き換える
   */
  async save(books: readonly Book[]): Promise<void> {
    const payload = `${JSON.stringify(books.map(bookToRecord), null, 2)}\n`;
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, payload, "utf-8");
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await this.removeTmpFile(tmpPath);
      const fileError = new FileError(
        `書籍ファイルの書き込みに失敗しました: ${error instanceof Error ? error.message : String(error)}`,
        this.filePath,
        "write",
        error
      );
      this.logger.error(fileError.message, { error, filePath: this.filePath });
      throw fileError;
    }
  }

  /**
   * 書き込みに失敗した一時ファイルを削除する
   * 存在しない場合は何もしない
   */
  private async removeTmpFile(tmpPath: string): Promise<void> {
    try {
      await fs.rm(tmpPath, { force: true });
    } catch (error) {
      this.logger.warn(`一時ファイルを削除できませんでした: ${tmpPath}`, { error });
    }
  }
}
