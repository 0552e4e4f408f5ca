import type { BookStore } from "../../../application/ports/output/bookStore";
import type { Book } from "../../../domain/models/book";

/**
 * インメモリで書籍リストを保持するストア実装
 * 保存回数を数えるので、テストで保存の有無を確認できる
 */
export class InMemoryBookStore implements BookStore {
  private books: Book[];
  private saves = 0;

  constructor(books: readonly Book[] = []) {
    this.books = books.map((book) => ({ ...book }));
  }

  async load(): Promise<Book[]> {
    return this.books.map((book) => ({ ...book }));
  }

  async save(books: readonly Book[]): Promise<void> {
    this.books = books.map((book) => ({ ...book }));
    this.saves += 1;
  }

  snapshot(): Book[] {
    return this.books.map((book) => ({ ...book }));
  }

  saveCount(): number {
    return this.saves;
  }
}
