import { ValidationError } from "../../domain/models/errors";
import { err, ok } from "../../domain/models/result";

import type { NewBook } from "../../domain/models/book";
import type { Result } from "../../domain/models/result";

export const REQUIRED_FIELDS_MESSAGE = "タイトルと著者は必須項目です";

/**
 * 追加する書籍の入力値を検証する
 * タイトルと著者が空（空白のみを含む）でないことだけを確認し、値はそのまま使う
 */
export function validateNewBook(input: NewBook): Result<ValidationError, NewBook> {
  if (!input.title.trim()) {
    return err(new ValidationError(REQUIRED_FIELDS_MESSAGE, "title", input.title));
  }
  if (!input.author.trim()) {
    return err(new ValidationError(REQUIRED_FIELDS_MESSAGE, "author", input.author));
  }
  return ok(input);
}
