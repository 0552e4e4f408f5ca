import { describe, it, expect, vi } from "vitest";

import { BookCollection } from "../../../application/services/bookCollection";
import { InMemoryBookStore } from "../../../infrastructure/adapters/storage/inMemoryBookStore";

import type { Clock } from "../../../application/ports/output/clock";
import type { Logger } from "../../../application/ports/output/logger";
import type { Book } from "../../../domain/models/book";

// モックの作成
function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

const fixedClock: Clock = { now: () => new Date(2026, 9, 18, 12, 0, 0) };

function createTestBook(overrides: Partial<Book>): Book {
  return {
    title: "Untitled",
    author: "Anonymous",
    year: "",
    genre: "",
    read: false,
    addedDate: "2026-01-01",
    ...overrides
  };
}

async function openCollection(books: Book[] = []) {
  const store = new InMemoryBookStore(books);
  const collection = await BookCollection.open(store, { logger: createMockLogger(), clock: fixedClock });
  return { store, collection };
}

describe("BookCollection", () => {
  describe("open", () => {
    it("ストアに保存されている書籍リストを読み込む", async () => {
      const books = [createTestBook({ title: "A" }), createTestBook({ title: "B" })];
      const { collection, store } = await openCollection(books);

      expect(collection.books).toEqual(books);
      expect(store.saveCount()).toBe(0);
    });
  });

  describe("add", () => {
    it("追加した書籍をタイトルで検索すると同じ値が得られる", async () => {
      const { collection } = await openCollection();

      await collection.add({ title: "Dune", author: "Herbert", year: "1965", genre: "Sci-Fi", read: false });

      expect(collection.search("Dune")).toEqual([
        { title: "Dune", author: "Herbert", year: "1965", genre: "Sci-Fi", read: false, addedDate: "2026-10-18" }
      ]);
    });

    it("末尾に追加して全件を保存する", async () => {
      const { collection, store } = await openCollection([createTestBook({ title: "First" })]);

      const added = await collection.add({ title: "Second", author: "X" });

      expect(collection.titles()).toEqual(["First", "Second"]);
      expect(store.saveCount()).toBe(1);
      expect(store.snapshot()).toEqual([createTestBook({ title: "First" }), added]);
    });

    it("入力値を検証しない", async () => {
      const { collection } = await openCollection();

      const book = await collection.add({ title: "", author: "" });

      expect(book.title).toBe("");
      expect(collection.books).toHaveLength(1);
    });
  });

  describe("remove", () => {
    it("大文字小文字を区別せずに一致する書籍をすべて削除する", async () => {
      const { collection, store } = await openCollection();
      await collection.add({ title: "A", author: "X" });
      await collection.add({ title: "a", author: "Y" });

      const removed = await collection.remove("A");

      expect(removed).toBe(2);
      expect(collection.books).toEqual([]);
      expect(store.snapshot()).toEqual([]);
    });

    it("一致しない書籍は残す", async () => {
      const { collection } = await openCollection([
        createTestBook({ title: "Keep" }),
        createTestBook({ title: "Drop" }),
        createTestBook({ title: "Keep too" })
      ]);

      await collection.remove("drop");

      expect(collection.titles()).toEqual(["Keep", "Keep too"]);
    });

    it("2回続けて呼んでも1回目と同じ結果になる", async () => {
      const { collection, store } = await openCollection([
        createTestBook({ title: "Dune" }),
        createTestBook({ title: "Emma" })
      ]);

      expect(await collection.remove("Dune")).toBe(1);
      const afterFirst = store.snapshot();

      expect(await collection.remove("Dune")).toBe(0);
      expect(store.snapshot()).toEqual(afterFirst);
      expect(collection.titles()).toEqual(["Emma"]);
    });

    it("一致しなくてもエラーにしない", async () => {
      const books = [createTestBook({ title: "Dune" })];
      const { collection, store } = await openCollection(books);

      await expect(collection.remove("Missing")).resolves.toBe(0);
      expect(store.snapshot()).toEqual(books);
    });
  });

  describe("update", () => {
    it("最初に一致した書籍だけを更新する", async () => {
      const { collection, store } = await openCollection([
        createTestBook({ title: "Dune", author: "First" }),
        createTestBook({ title: "dune", author: "Second" })
      ]);

      const updated = await collection.update("DUNE", { read: true });

      expect(updated).toBe(true);
      expect(collection.books.map((book) => book.read)).toEqual([true, false]);
      expect(store.saveCount()).toBe(1);
      expect(store.snapshot()[0].read).toBe(true);
    });

    it("タイトルを変更すると以後は新しいタイトルで探す", async () => {
      const { collection } = await openCollection([createTestBook({ title: "Dune", addedDate: "2020-05-05" })]);

      expect(await collection.update("Dune", { title: "Dune Messiah", year: "1969" })).toBe(true);
      expect(await collection.update("Dune", { read: true })).toBe(false);

      expect(collection.books).toEqual([
        createTestBook({ title: "Dune Messiah", year: "1969", addedDate: "2020-05-05" })
      ]);
    });

    it("見つからない場合はfalseを返し保存しない", async () => {
      const books = [createTestBook({ title: "Dune" })];
      const { collection, store } = await openCollection(books);

      const updated = await collection.update("Emma", { read: true });

      expect(updated).toBe(false);
      expect(store.saveCount()).toBe(0);
      expect(store.snapshot()).toEqual(books);
      expect(collection.books).toEqual(books);
    });
  });

  describe("search", () => {
    const books = [
      createTestBook({ title: "Dune", author: "Frank Herbert" }),
      createTestBook({ title: "Emma", author: "Jane Austen" }),
      createTestBook({ title: "Persuasion", author: "Jane Austen" })
    ];

    it("検索語が空なら全件を元の順序で返す", async () => {
      const { collection } = await openCollection(books);

      expect(collection.search("")).toEqual(books);
      expect(collection.search()).toEqual(books);
    });

    it("タイトルまたは著者の部分一致を元の順序で返す", async () => {
      const { collection } = await openCollection(books);

      expect(collection.search("AUSTEN").map((book) => book.title)).toEqual(["Emma", "Persuasion"]);
      expect(collection.search("un").map((book) => book.title)).toEqual(["Dune"]);
    });

    it("検索結果は全件の部分集合になる", async () => {
      const { collection } = await openCollection(books);
      const all = collection.search("");

      for (const term of ["e", "Jane", "zzz", "N"]) {
        for (const book of collection.search(term)) {
          expect(all).toContainEqual(book);
        }
      }
    });

    it("返した書籍を書き換えてもコレクションに影響しない", async () => {
      const { collection, store } = await openCollection();
      const added = await collection.add({ title: "Dune", author: "Herbert" });

      Object.assign(added, { title: "Changed" });
      const [found] = collection.search("Dune");
      Object.assign(found, { addedDate: "1999-01-01", read: true });
      Object.assign(collection.books[0], { author: "Someone" });

      expect(collection.search("Dune")).toEqual([
        { title: "Dune", author: "Herbert", year: "", genre: "", read: false, addedDate: "2026-10-18" }
      ]);
      expect(store.snapshot()[0].addedDate).toBe("2026-10-18");
    });

    it("返した配列を変更してもコレクションに影響しない", async () => {
      const { collection } = await openCollection(books);

      collection.search("").pop();

      expect(collection.books).toHaveLength(3);
    });
  });

  describe("stats", () => {
    it("空のコレクションでは読了率0を返す", async () => {
      const { collection } = await openCollection();

      expect(collection.stats()).toEqual({ total: 0, read: 0, unread: 0, completionRate: 0 });
    });

    it("追加から読了までの統計の変化", async () => {
      const { collection } = await openCollection();

      await collection.add({ title: "Dune", author: "Herbert", year: "1965", genre: "Sci-Fi", read: false });
      expect(collection.stats()).toEqual({ total: 1, read: 0, unread: 1, completionRate: 0 });

      expect(await collection.update("Dune", { read: true })).toBe(true);
      const stats = collection.stats();
      expect(stats.read).toBe(1);
      expect(stats.completionRate).toBe(100);
      expect(stats.total).toBe(stats.read + stats.unread);
    });
  });

  describe("genreDistribution", () => {
    it("ジャンル未設定の書籍は空文字列に集計する", async () => {
      const { collection } = await openCollection([
        createTestBook({ genre: "Fiction" }),
        createTestBook({ genre: "" }),
        createTestBook({ genre: "Fiction" })
      ]);

      expect([...collection.genreDistribution().entries()]).toEqual([
        ["Fiction", 2],
        ["", 1]
      ]);
    });
  });
});
