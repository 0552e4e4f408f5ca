import { applyBookPatch, createBook, hasTitle, matchesSearchTerm } from "../../domain/models/book";
import { computeGenreDistribution, computeReadingStats } from "../../domain/services/readingStatsService";

import type { Book, BookPatch, NewBook } from "../../domain/models/book";
import type { GenreDistribution, ReadingStats } from "../../domain/services/readingStatsService";
import type { BookStore } from "../ports/output/bookStore";
import type { Clock } from "../ports/output/clock";
import type { Logger } from "../ports/output/logger";

export interface BookCollectionOptions {
  readonly logger: Logger;
  readonly clock: Clock;
}

/**
 * 蔵書コレクション
 * メモリ上の書籍リストを保持し、変更のたびにストアへ全件保存する
 */
export class BookCollection {
  private bookList: Book[];
  private readonly store: BookStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private constructor(store: BookStore, books: Book[], options: BookCollectionOptions) {
    this.store = store;
    this.bookList = books;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  /**
   * ストアから書籍リストを読み込んでコレクションを作成する
   */
  static async open(store: BookStore, options: BookCollectionOptions): Promise<BookCollection> {
    const books = await store.load();
    options.logger.debug(`書籍リストを読み込みました: ${books.length}冊`);
    return new BookCollection(store, books, options);
  }

  /**
   * 現在の書籍リスト
   * 返すのは写しなので、変更してもコレクションには影響しない
   */
  get books(): Book[] {
    return this.bookList.map((book) => ({ ...book }));
  }

  /**
   * 書籍を末尾に追加して保存する
   * 入力値の検証は呼び出し側で行う
   */
  async add(params: NewBook): Promise<Book> {
    const book = createBook(params, this.clock.now());
    this.bookList.push(book);
    await this.persist();
    this.logger.info(`書籍を追加しました: ${book.title}`);
    return { ...book };
  }

  /**
   * タイトルが一致する書籍をすべて削除して保存する
   * @returns 削除した冊数（0なら何もしていない）
   */
  async remove(title: string): Promise<number> {
    const before = this.bookList.length;
    this.bookList = this.bookList.filter((book) => !hasTitle(book, title));
    await this.persist();

    const removed = before - this.bookList.length;
    this.logger.info(`書籍を削除しました: ${title} (${removed}冊)`);
    return removed;
  }

  /**
   * タイトルが最初に一致した書籍だけを更新して保存する
   * @param originalTitle 更新前のタイトル
   * @returns 対象が見つかった場合はtrue。見つからなければ保存もしない
   */
  async update(originalTitle: string, patch: BookPatch): Promise<boolean> {
    const index = this.bookList.findIndex((book) => hasTitle(book, originalTitle));
    if (index === -1) {
      this.logger.debug(`更新対象の書籍が見つかりません: ${originalTitle}`);
      return false;
    }

    this.bookList[index] = applyBookPatch(this.bookList[index], patch);
    await this.persist();
    this.logger.info(`書籍を更新しました: ${originalTitle}`);
    return true;
  }

  /**
   * タイトルまたは著者で検索する
   * 検索語が空なら全件をそのままの順序で返す
   */
  search(term = ""): Book[] {
    const matched = term ? this.bookList.filter((book) => matchesSearchTerm(book, term)) : this.bookList;
    return matched.map((book) => ({ ...book }));
  }

  stats(): ReadingStats {
    return computeReadingStats(this.bookList);
  }

  genreDistribution(): GenreDistribution {
    return computeGenreDistribution(this.bookList);
  }

  /**
   * 現在のタイトル一覧（編集・削除の対象選択用）
   */
  titles(): string[] {
    return this.bookList.map((book) => book.title);
  }

  private async persist(): Promise<void> {
    await this.store.save(this.bookList);
    this.logger.debug(`書籍リストを保存しました: ${this.bookList.length}冊`);
  }
}
