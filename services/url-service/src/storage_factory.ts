import type { Logger } from "pino";
import { redactDsn, type Config } from "./config.js";
import type { UrlStore } from "./storage.js";
import { FileUrlStore } from "./storage_file.js";
import { MemoryUrlStore } from "./storage_memory.js";
import { PostgresUrlStore } from "./storage_postgres.js";

export type StorageConfig = Pick<Config, "storageMode" | "databaseDsn" | "fileStoragePath">;

export function buildStore(config: StorageConfig, logger: Logger): UrlStore {
  switch (config.storageMode) {
    case "postgres":
      if (!config.databaseDsn) throw new Error("postgres storage requires a database DSN");
      logger.info({ dsn: redactDsn(config.databaseDsn) }, "using postgres storage");
      return new PostgresUrlStore(config.databaseDsn, { logger });
    case "file":
      if (!config.fileStoragePath) throw new Error("file storage requires a file path");
      logger.info({ path: config.fileStoragePath }, "using file journal storage");
      return new FileUrlStore(config.fileStoragePath, { logger });
    case "memory":
      logger.info("using in-memory storage");
      return new MemoryUrlStore({ logger });
  }
}

/** Builds the configured store and bootstraps it; a bootstrap failure closes it again. */
export async function openStore(config: StorageConfig, logger: Logger): Promise<UrlStore> {
  const store = buildStore(config, logger);
  try {
    await store.bootstrap();
  } catch (err) {
    await store.close().catch((closeErr: unknown) => {
      logger.error({ err: closeErr }, "closing store after failed bootstrap");
    });
    throw err;
  }
  return store;
}
