import pg from "pg";
import type { Logger } from "pino";
import { toSaveResult, type Allocation } from "./allocation.js";
import { CODE_LENGTH, MAX_ALLOCATION_ATTEMPTS, generateCode, type CodeGenerator } from "./code.js";
import { AllocationExhaustedError, BackendUnavailableError, StorageOperationError, StoreError } from "./errors.js";
import {
  newRecord,
  shortUrlFor,
  type DeleteResult,
  type LoadResult,
  type OpContext,
  type SaveResult,
  type StoreOptions,
  type UrlStore,
  type UserUrlEntry
} from "./storage.js";

const { Pool } = pg;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS short_urls (
    id SERIAL PRIMARY KEY,
    short_id TEXT UNIQUE NOT NULL,
    original_url TEXT UNIQUE NOT NULL,
    user_id TEXT NOT NULL,
    is_deleted BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    deleted_at TIMESTAMPTZ
  );
`;

// No conflict target: a clash on either unique column inserts nothing, and the
// follow-up lookup by URL tells the two apart without aborting a transaction.
const INSERT_URL = `
  INSERT INTO short_urls (short_id, original_url, user_id)
  VALUES ($1, $2, $3)
  ON CONFLICT DO NOTHING
  RETURNING short_id
`;
const SELECT_CODE_BY_URL = `SELECT short_id FROM short_urls WHERE original_url = $1`;
const SELECT_BY_CODE = `SELECT original_url, is_deleted FROM short_urls WHERE short_id = $1`;
const SELECT_BY_OWNER = `
  SELECT short_id, original_url FROM short_urls
  WHERE user_id = $1 AND is_deleted = FALSE
  ORDER BY id
`;

type CodeRow = { short_id: string };
type UrlRow = { original_url: string; is_deleted: boolean };
type OwnerRow = { short_id: string; original_url: string };

/**
 * Settles with `work`, or rejects with the abort reason as soon as `signal` fires.
 * `onAbort` runs before the rejection; `work` keeps a handler either way.
 */
function abortable<T>(work: Promise<T>, signal: AbortSignal | undefined, onAbort: () => void): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const abort = () => {
      onAbort();
      reject(signal.reason);
    };
    signal.addEventListener("abort", abort, { once: true });
    if (signal.aborted) abort();
    work.then(
      (value) => {
        signal.removeEventListener("abort", abort);
        resolve(value);
      },
      (err) => {
        signal.removeEventListener("abort", abort);
        reject(err);
      }
    );
  });
}

function isAbort(err: unknown, ctx: OpContext): boolean {
  return ctx.signal?.aborted === true && err === ctx.signal.reason;
}

export class PostgresUrlStore implements UrlStore {
  private readonly pool: pg.Pool;
  private readonly log: Logger;
  private readonly generate: CodeGenerator;
  private closed = false;

  constructor(source: string | pg.Pool, options: StoreOptions) {
    this.log = options.logger.child({ component: "store", backend: "postgres" });
    this.generate = options.generate ?? generateCode;
    this.pool =
      typeof source === "string"
        ? new Pool({
            connectionString: source,
            max: 10,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 5_000
          })
        : source;
  }

  async bootstrap(ctx: OpContext = {}): Promise<void> {
    try {
      await this.borrow(ctx, (client) => client.query(SCHEMA));
    } catch (err) {
      if (isAbort(err, ctx)) throw err;
      this.log.error({ err }, "schema bootstrap failed");
      throw new BackendUnavailableError("cannot create short_urls table", { cause: err });
    }
    this.log.info("schema ready");
  }

  async ping(ctx: OpContext = {}): Promise<void> {
    try {
      await this.borrow(ctx, (client) => client.query("SELECT 1"));
    } catch (err) {
      if (isAbort(err, ctx)) throw err;
      this.log.error({ err }, "ping failed");
      throw new BackendUnavailableError("database is not reachable", { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
  }

  async save(ownerId: string, url: string, baseUrl: string, ctx: OpContext = {}): Promise<SaveResult> {
    const a = await this.withClient(ctx, "save failed", (client) => this.allocate(client, ownerId, url, ctx));
    return toSaveResult(a, baseUrl);
  }

  async saveBatch(
    ownerId: string,
    urls: readonly string[],
    baseUrl: string,
    ctx: OpContext = {}
  ): Promise<SaveResult[]> {
    if (urls.length === 0) return [];
    const allocations = await this.withTransaction(ctx, async (client) => {
      const out: Allocation[] = [];
      for (const url of urls) out.push(await this.allocate(client, ownerId, url, ctx));
      return out;
    });
    return allocations.map((a) => toSaveResult(a, baseUrl));
  }

  async loadFull(code: string, ctx: OpContext = {}): Promise<LoadResult | null> {
    const res = await this.withClient(ctx, "load failed", (client) => client.query<UrlRow>(SELECT_BY_CODE, [code]));
    const row = res.rows[0];
    if (!row) return null;
    return { originalUrl: row.original_url, isDeleted: row.is_deleted };
  }

  async loadUserUrls(ownerId: string, baseUrl: string, ctx: OpContext = {}): Promise<UserUrlEntry[]> {
    const res = await this.withClient(ctx, "listing failed", (client) =>
      client.query<OwnerRow>(SELECT_BY_OWNER, [ownerId])
    );
    return res.rows.map((row) => ({ shortUrl: shortUrlFor(baseUrl, row.short_id), originalUrl: row.original_url }));
  }

  async deleteBatch(ownerId: string, codes: readonly string[], ctx: OpContext = {}): Promise<DeleteResult> {
    const unique = [...new Set(codes)];
    if (unique.length === 0) return { deleted: [], skipped: [] };

    const placeholders = unique.map((_, i) => `$${i + 2}`).join(", ");
    const sql = `
      UPDATE short_urls
      SET is_deleted = TRUE, deleted_at = COALESCE(deleted_at, now())
      WHERE user_id = $1 AND short_id IN (${placeholders})
      RETURNING short_id
    `;
    const res = await this.withClient(ctx, "delete failed", (client) =>
      client.query<CodeRow>(sql, [ownerId, ...unique])
    );
    const hit = new Set(res.rows.map((row) => row.short_id));
    return {
      deleted: unique.filter((code) => hit.has(code)),
      skipped: unique.filter((code) => !hit.has(code))
    };
  }

  private async allocate(client: pg.PoolClient, ownerId: string, url: string, ctx: OpContext): Promise<Allocation> {
    for (let i = 0; i < MAX_ALLOCATION_ATTEMPTS; i++) {
      ctx.signal?.throwIfAborted();
      const code = this.generate(CODE_LENGTH);

      const inserted = await client.query<CodeRow>(INSERT_URL, [code, url, ownerId]);
      const row = inserted.rows[0];
      if (row) return { status: "created", record: newRecord(row.short_id, url, ownerId) };

      const existing = await client.query<CodeRow>(SELECT_CODE_BY_URL, [url]);
      const found = existing.rows[0];
      if (found) {
        this.log.debug({ code: found.short_id }, "url already shortened");
        return { status: "conflict", code: found.short_id };
      }

      this.log.debug({ code }, "short code collision, retrying");
    }
    throw new AllocationExhaustedError(MAX_ALLOCATION_ATTEMPTS);
  }

  /**
   * Checks out a connection for `fn`. Both the checkout and `fn` give way to the signal;
   * a connection whose work was aborted is destroyed rather than returned to the pool.
   */
  private async borrow<T>(ctx: OpContext, fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    ctx.signal?.throwIfAborted();
    const connecting = this.pool.connect();
    const client = await abortable(connecting, ctx.signal, () => {
      void connecting.then(
        (late) => late.release(true),
        (err: unknown) => this.log.debug({ err }, "connection attempt failed after abort")
      );
    });

    let discard = false;
    try {
      return await abortable(fn(client), ctx.signal, () => {
        discard = true;
      });
    } finally {
      client.release(discard);
    }
  }

  private async withClient<T>(ctx: OpContext, what: string, fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    try {
      return await this.borrow(ctx, fn);
    } catch (err) {
      throw this.wrap(err, ctx, what);
    }
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT on one connection. Any error rolls back.
   * On abort the connection is discarded instead, which ends the transaction server-side.
   */
  private async withTransaction<T>(ctx: OpContext, fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    return this.withClient(ctx, "batch insert failed", async (client) => {
      await client.query("BEGIN");
      try {
        const result = await fn(client);
        await client.query("COMMIT");
        return result;
      } catch (err) {
        if (!ctx.signal?.aborted) await this.rollback(client);
        throw err;
      }
    });
  }

  private async rollback(client: pg.PoolClient): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (err) {
      this.log.error({ err }, "rollback failed");
    }
  }

  private wrap(err: unknown, ctx: OpContext, what: string): Error {
    if (err instanceof StoreError) return err;
    if (isAbort(err, ctx)) {
      this.log.warn({ reason: String(err) }, `${what}: aborted`);
      return err instanceof Error ? err : new StorageOperationError(`${what}: aborted`, { cause: err });
    }
    this.log.error({ err }, what);
    return new StorageOperationError(what, { cause: err });
  }
}
