/**
 * 書籍エンティティ
 * 蔵書1冊分の記録を表す
 */
export type Book = Readonly<{
  title: string;
  author: string;
  /** 出版年（数値としては検証しない） */
  year: string;
  genre: string;
  read: boolean;
  /** 登録日 (YYYY-MM-DD)。作成時に決まり、以後変更しない */
  addedDate: string;
}>;

/**
 * 書籍の登録に必要なパラメータ
 */
export type NewBook = Readonly<{
  title: string;
  author: string;
  year?: string;
  genre?: string;
  read?: boolean;
}>;

/**
 * 書籍の部分更新
 * 登録日は更新対象にならない
 */
export type BookPatch = Readonly<Partial<Omit<Book, "addedDate">>>;

/**
 * 日付を登録日の書式 (YYYY-MM-DD, ローカル時刻) に変換する
 */
export function formatAddedDate(date: Date): string {
  const yyyy = String(date.getFullYear()).padStart(4, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

/**
 * 書籍を作成する
 * @param params 書籍のパラメータ
 * @param addedAt 登録日時
 * @returns 新しい書籍オブジェクト
 */
export function createBook(params: NewBook, addedAt: Date): Book {
  return {
    title: params.title,
    author: params.author,
    year: params.year ?? "",
    genre: params.genre ?? "",
    read: params.read ?? false,
    addedDate: formatAddedDate(addedAt)
  };
}

/**
 * 書籍に部分更新を適用する
 * パッチに含まれるフィールドだけを上書きする
 * @returns 更新された新しい書籍オブジェクト
 */
export function applyBookPatch(book: Book, patch: BookPatch): Book {
  return {
    title: patch.title ?? book.title,
    author: patch.author ?? book.author,
    year: patch.year ?? book.year,
    genre: patch.genre ?? book.genre,
    read: patch.read ?? book.read,
    addedDate: book.addedDate
  };
}

/**
 * タイトルが大文字小文字を区別せずに一致するか
 */
export function hasTitle(book: Book, title: string): boolean {
  return book.title.toLowerCase() === title.toLowerCase();
}

/**
 * タイトルまたは著者に検索語が含まれるか（大文字小文字を区別しない）
 */
export function matchesSearchTerm(book: Book, term: string): boolean {
  const needle = term.toLowerCase();
  return book.title.toLowerCase().includes(needle) || book.author.toLowerCase().includes(needle);
}
