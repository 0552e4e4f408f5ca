#!/usr/bin/env node
import path from "node:path";

import { config } from "dotenv";

import { consoleOutput, executeCommand, parseCliArguments } from "./cli/commandExecutor";
import { withCliOverrides, loadConfig } from "./di/config";
import { createAppContext } from "./di/container";
import { normalizeError } from "../domain/models/errors";

// 環境変数の読み込み
config({ path: path.join(process.cwd(), ".env") });

/**
 * アプリケーションのエントリポイント
 * 1. コマンドライン引数の解析
 * 2. 設定の読み込みとコンテキストのセットアップ
 * 3. コマンドの実行と全体的なエラーハンドリング
 * @returns 終了コード
 */
export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = await parseCliArguments(argv);
    if (!parsed) {
      return 0;
    }

    const appConfig = withCliOverrides(loadConfig(), parsed.options);
    const context = createAppContext(appConfig);

    try {
      return await executeCommand(context, parsed.command, consoleOutput);
    } catch (error) {
      const appError = normalizeError(error, parsed.command.kind);
      context.logger.error(`処理中にエラーが発生しました: ${appError.message}`, { error: appError, code: appError.code });
      throw appError;
    }
  } catch (error) {
    const appError = normalizeError(error);
    console.error(`エラーが発生しました: ${appError.message}`);
    return 1;
  }
}

// スクリプト直接実行時のエントリポイント
if (require.main === module) {
  main(process.argv)
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error("予期しないエラーが発生しました:", error);
      process.exitCode = 1;
    });
}
