import { pino } from "pino";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import type { UrlStore } from "./storage.js";
import { openStore } from "./storage_factory.js";

const config = loadConfig();
const logger = pino({ level: config.logLevel });

let store: UrlStore;
try {
  store = await openStore(config, logger);
} catch (err) {
  logger.fatal({ err }, "storage bootstrap failed");
  process.exit(1);
}

const app = await buildApp({ config, store, logger });

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  app.log.info({ signal }, "shutting down");
  await app.close();
  await store.close();
  app.log.info("url-service stopped");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.port, host: config.host });
app.log.info(
  { port: config.port, storageMode: config.storageMode, baseUrl: config.baseUrl, version: config.appVersion },
  "url-service started"
);
