import { randomBytes } from "crypto";
import { ensureTrailingSlash } from "./storage.js";

export type StorageMode = "memory" | "file" | "postgres";

const STORAGE_MODES: readonly StorageMode[] = ["memory", "file", "postgres"];
const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  port: number;
  host: string;
  baseUrl: string;
  storageMode: StorageMode;
  databaseDsn?: string;
  fileStoragePath?: string;
  secretKey: string;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  /** Deadline for each store call made on behalf of a request. */
  storeTimeoutMs: number;
  appVersion: string;
}

function mustBeUrl(s: string): string {
  try {
    const u = new URL(s);
    if (u.protocol !== "http:" && u.protocol !== "https:") throw new Error("bad protocol");
    return s;
  } catch {
    throw new Error(`Invalid BASE_URL: ${s}`);
  }
}

function isStorageMode(s: string): s is StorageMode {
  return STORAGE_MODES.some((m) => m === s);
}

function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}

function nonEmpty(s: string | undefined): string | undefined {
  return s !== undefined && s.trim() !== "" ? s : undefined;
}

/**
 * Precedence when STORAGE_MODE is unset: database DSN, then file path, then memory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = Number(env.PORT ?? "8080");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) throw new Error("Invalid PORT");

  const host = env.HOST ?? "0.0.0.0";

  const baseUrl = ensureTrailingSlash(mustBeUrl(env.BASE_URL ?? "http://localhost:8080/"));

  const databaseDsn = nonEmpty(env.DATABASE_DSN) ?? nonEmpty(env.DATABASE_URL);
  const fileStoragePath = nonEmpty(env.FILE_STORAGE_PATH);

  let storageMode: StorageMode = databaseDsn ? "postgres" : fileStoragePath ? "file" : "memory";
  const requested = nonEmpty(env.STORAGE_MODE);
  if (requested !== undefined) {
    if (!isStorageMode(requested)) throw new Error(`Invalid STORAGE_MODE: ${requested}`);
    storageMode = requested;
  }
  if (storageMode === "postgres" && !databaseDsn) {
    throw new Error("STORAGE_MODE=postgres requires DATABASE_DSN");
  }
  if (storageMode === "file" && !fileStoragePath) {
    throw new Error("STORAGE_MODE=file requires FILE_STORAGE_PATH");
  }

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);

  const bodyLimitBytes = Number(env.BODY_LIMIT_BYTES ?? String(1024 * 1024)); // 1MB, batches can be large
  if (!Number.isInteger(bodyLimitBytes) || bodyLimitBytes <= 0) throw new Error("Invalid BODY_LIMIT_BYTES");

  const storeTimeoutMs = Number(env.STORE_TIMEOUT_MS ?? "5000");
  if (!Number.isInteger(storeTimeoutMs) || storeTimeoutMs <= 0) throw new Error("Invalid STORE_TIMEOUT_MS");

  // Without a configured secret, cookies only stay valid for the life of the process.
  const secretKey = nonEmpty(env.SECRET_KEY) ?? randomBytes(32).toString("hex");

  return {
    port,
    host,
    baseUrl,
    storageMode,
    databaseDsn,
    fileStoragePath,
    secretKey,
    logLevel,
    bodyLimitBytes,
    storeTimeoutMs,
    appVersion: env.APP_VERSION ?? "dev"
  };
}

/** Hides the password of a connection string for logging. */
export function redactDsn(dsn: string): string {
  try {
    const u = new URL(dsn);
    if (u.password) u.password = "***";
    return u.toString();
  } catch {
    return "<unparseable dsn>";
  }
}
