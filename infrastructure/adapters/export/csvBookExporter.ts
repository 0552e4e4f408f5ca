import fs from "node:fs/promises";
import path from "node:path";

import { unparse } from "papaparse";

import { FileError } from "../../../domain/models/errors";
import { err, ok } from "../../../domain/models/result";
import { bookToRecord } from "../storage/jsonFileBookStore";

import type { BookExporter } from "../../../application/ports/output/bookExporter";
import type { Logger } from "../../../application/ports/output/logger";
import type { Book } from "../../../domain/models/book";
import type { Result } from "../../../domain/models/result";
import type { BookRecord } from "../storage/jsonFileBookStore";

/**
 * CSVに出力するカラム（出力順）
 */
export const CSV_COLUMNS = [
  "title",
  "author",
  "year",
  "genre",
  "read",
  "added_date"
] as const satisfies readonly (keyof BookRecord)[];

/**
 * 書籍リストをCSVファイルに書き出すエクスポーター
 */
export class CsvBookExporter implements BookExporter {
  constructor(
    private readonly defaultPath: string,
    private readonly logger: Logger
  ) {}

  async export(books: readonly Book[], filePath: string = this.defaultPath): Promise<Result<FileError, string>> {
    try {
      const rows = books.map(bookToRecord);
      const csv = unparse({ fields: [...CSV_COLUMNS], data: rows });

      const dir = path.dirname(filePath);
      if (dir && dir !== ".") {
        await fs.mkdir(dir, { recursive: true });
      }
      await fs.writeFile(filePath, csv, "utf-8");

      this.logger.info(`CSVファイルを保存しました: ${filePath} (${books.length}冊)`, {
        size: books.length,
        filePath
      });
      return ok(filePath);
    } catch (error) {
      const fileError = new FileError(
        `CSVファイルの書き込みに失敗しました: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        "write",
        error
      );
      this.logger.error(fileError.message, { error, filePath });
      return err(fileError);
    }
  }
}
