import { CsvBookExporter } from "../../infrastructure/adapters/export/csvBookExporter";
import { ConsoleLogger } from "../../infrastructure/adapters/logging/consoleLogger";
import { JsonFileBookStore } from "../../infrastructure/adapters/storage/jsonFileBookStore";
import { SystemClock } from "../../infrastructure/adapters/time/systemClock";

import type { AppConfig } from "./config";
import type { BookExporter } from "../../application/ports/output/bookExporter";
import type { BookStore } from "../../application/ports/output/bookStore";
import type { Clock } from "../../application/ports/output/clock";
import type { Logger } from "../../application/ports/output/logger";

/**
 * アプリケーションのコンテキスト
 * DIコンテナの代わりに依存関係をまとめて持ち回る
 */
export interface AppContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly clock: Clock;
  readonly store: BookStore;
  readonly exporter: BookExporter;
}

/**
 * アプリケーションコンテキストを作成する
 */
export function createAppContext(config: AppConfig): AppContext {
  const logger = new ConsoleLogger("Library", config.logLevel);

  return {
    config,
    logger,
    clock: new SystemClock(),
    store: new JsonFileBookStore(config.dataFile, logger),
    exporter: new CsvBookExporter(config.csvFile, logger)
  };
}
