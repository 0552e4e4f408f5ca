import type { Book } from "../../../domain/models/book";
import type { FileError } from "../../../domain/models/errors";
import type { Result } from "../../../domain/models/result";

/**
 * 書籍リストのエクスポートを担当するポート
 */
export interface BookExporter {
  /**
   * 書籍リストをファイルに書き出す
   * @param books 書籍リスト
   * @param filePath 出力先ファイルパス（省略時は既定のパス）
   * @returns 成功時は書き出したファイルパス
   */
  export(books: readonly Book[], filePath?: string): Promise<Result<FileError, string>>;
}
