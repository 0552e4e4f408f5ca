import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { validateNewBook } from "./bookInput";
import { renderBookTable, renderStats, renderTitleChoices } from "./renderers";
import { BookCollection } from "../../application/services/bookCollection";
import { ValidationError } from "../../domain/models/errors";
import { isError } from "../../domain/models/result";

import type { AppContext } from "../di/container";
import type { BookPatch } from "../../domain/models/book";

/**
 * パース済みのコマンド
 */
export type CliCommand =
  | { readonly kind: "list" }
  | {
      readonly kind: "add";
      readonly title: string;
      readonly author: string;
      readonly year: string;
      readonly genre: string;
      readonly read: boolean;
    }
  | { readonly kind: "search"; readonly term: string }
  | { readonly kind: "edit"; readonly originalTitle: string; readonly patch: BookPatch }
  | { readonly kind: "delete"; readonly title: string }
  | { readonly kind: "stats" }
  | { readonly kind: "export"; readonly output?: string };

/**
 * コマンドに依存しないオプション
 */
export interface CliOptions {
  readonly file?: string;
}

/**
 * コマンドの出力先
 */
export interface CliOutput {
  print(line: string): void;
  printError(line: string): void;
}

export const consoleOutput: CliOutput = {
  print: (line) => console.log(line),
  printError: (line) => console.error(line)
};

/**
 * コマンドライン引数を解析する
 * @returns ヘルプ表示などでコマンドが実行されない場合はnull
 * @throws ValidationError 引数が不正な場合
 */
export async function parseCliArguments(
  argv: string[]
): Promise<{ command: CliCommand; options: CliOptions } | null> {
  const commands: CliCommand[] = [];

  const parsedArgs = await yargs(hideBin(argv))
    .scriptName("library")
    .usage("$0 <command> [options]")
    .command("list", "蔵書の一覧を表示します", {}, () => {
      commands.push({ kind: "list" });
    })
    .command(
      "add <title> <author>",
      "本を追加します",
      (y) =>
        y
          .positional("title", { type: "string", describe: "タイトル", demandOption: true })
          .positional("author", { type: "string", describe: "著者", demandOption: true })
          .option("year", { type: "string", description: "出版年", default: "" })
          .option("genre", { type: "string", description: "ジャンル", default: "" })
          .option("read", { type: "boolean", description: "読了済みにする", default: false }),
      (args) => {
        commands.push({
          kind: "add",
          title: args.title,
          author: args.author,
          year: args.year,
          genre: args.genre,
          read: args.read
        });
      }
    )
    .command(
      "search [term]",
      "タイトルまたは著者で検索します",
      (y) => y.positional("term", { type: "string", describe: "検索語", default: "" }),
      (args) => {
        commands.push({ kind: "search", term: args.term });
      }
    )
    .command(
      "edit <originalTitle>",
      "本の情報を更新します（指定した項目のみ）",
      (y) =>
        y
          .positional("originalTitle", { type: "string", describe: "更新する本の現在のタイトル", demandOption: true })
          .option("title", { type: "string", description: "新しいタイトル" })
          .option("author", { type: "string", description: "新しい著者" })
          .option("year", { type: "string", description: "新しい出版年" })
          .option("genre", { type: "string", description: "新しいジャンル" })
          .option("read", { type: "boolean", description: "読了状態 (--no-read で未読)" }),
      (args) => {
        commands.push({
          kind: "edit",
          originalTitle: args.originalTitle,
          patch: {
            title: args.title,
            author: args.author,
            year: args.year,
            genre: args.genre,
            read: args.read
          }
        });
      }
    )
    .command(
      "delete <title>",
      "タイトルが一致する本をすべて削除します",
      (y) => y.positional("title", { type: "string", describe: "タイトル", demandOption: true }),
      (args) => {
        commands.push({ kind: "delete", title: args.title });
      }
    )
    .command("stats", "読書統計を表示します", {}, () => {
      commands.push({ kind: "stats" });
    })
    .command(
      "export",
      "蔵書をCSVファイルに書き出します",
      (y) => y.option("output", { alias: "o", type: "string", description: "出力先のCSVファイル" }),
      (args) => {
        commands.push({ kind: "export", output: args.output });
      }
    )
    .option("file", {
      alias: "f",
      type: "string",
      description: "書籍リストのJSONファイル (LIBRARY_DATA_FILE より優先)"
    })
    .demandCommand(1, "コマンドを指定してください")
    .help()
    .alias("help", "h")
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new ValidationError(message, "argv");
    })
    .wrap(null)
    .parseAsync();

  const [command] = commands;
  if (!command) {
    return null;
  }
  return { command, options: { file: parsedArgs.file } };
}

/**
 * コマンドを実行する
 * @returns 終了コード
 */
export async function executeCommand(context: AppContext, command: CliCommand, output: CliOutput): Promise<number> {
  const { logger, clock, store, exporter } = context;
  const collection = await BookCollection.open(store, { logger, clock });
  const printAll = (lines: readonly string[]) => lines.forEach((line) => output.print(line));

  logger.debug(`コマンドを実行します: ${command.kind}`);

  switch (command.kind) {
    case "list": {
      printAll(renderBookTable(collection.books));
      return 0;
    }

    case "add": {
      const validated = validateNewBook(command);
      if (isError(validated)) {
        output.printError(validated.error.message);
        return 1;
      }
      const book = await collection.add(validated.value);
      output.print(`「${book.title}」を追加しました。`);
      return 0;
    }

    case "search": {
      if (!command.term) {
        output.print("検索語を入力してください。");
        return 0;
      }
      const results = collection.search(command.term);
      if (results.length === 0) {
        output.print("一致する書籍が見つかりませんでした。");
        return 0;
      }
      output.print(`${results.length}件の書籍が見つかりました:`);
      printAll(renderBookTable(results));
      return 0;
    }

    case "edit": {
      const updated = await collection.update(command.originalTitle, command.patch);
      if (!updated) {
        output.printError(`「${command.originalTitle}」が見つかりませんでした。`);
        printAll(renderTitleChoices(collection.titles()));
        return 1;
      }
      output.print(`「${command.originalTitle}」を更新しました。`);
      return 0;
    }

    case "delete": {
      const removed = await collection.remove(command.title);
      if (removed === 0) {
        output.printError(`「${command.title}」が見つかりませんでした。`);
        printAll(renderTitleChoices(collection.titles()));
        return 1;
      }
      output.print(`「${command.title}」を削除しました (${removed}冊)。`);
      return 0;
    }

    case "stats": {
      printAll(renderStats(collection.stats(), collection.genreDistribution()));
      return 0;
    }

    case "export": {
      const result = await exporter.export(collection.books, command.output);
      if (isError(result)) {
        output.printError(result.error.message);
        return 1;
      }
      output.print(`CSVファイルに書き出しました: ${result.value}`);
      return 0;
    }
  }
}
