import { open, readFile, type FileHandle } from "node:fs/promises";
import type { Logger } from "pino";
import { allocate, planBatch, toSaveResult } from "./allocation.js";
import { generateCode, type CodeGenerator } from "./code.js";
import { BackendUnavailableError, StorageOperationError } from "./errors.js";
import { encodeRecord, mergeLine, parseLine } from "./journal.js";
import { RecordTable } from "./record_table.js";
import { SerialQueue } from "./serial_queue.js";
import {
  shortUrlFor,
  type DeleteResult,
  type LoadResult,
  type OpContext,
  type SaveResult,
  type StoreOptions,
  type UrlRecord,
  type UrlStore,
  type UserUrlEntry
} from "./storage.js";

const JOURNAL_MODE = 0o600;

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Append-only JSON-lines journal replayed into memory on bootstrap.
 *
 * Mutations go through one queue: decide against the table, append and sync the
 * journal, then apply to the table. A failed append leaves the table as it was.
 * Reads only look at the table.
 */
export class FileUrlStore implements UrlStore {
  private readonly table = new RecordTable();
  private readonly queue = new SerialQueue();
  private readonly log: Logger;
  private readonly generate: CodeGenerator;
  private handle: FileHandle | null = null;

  constructor(
    private readonly filePath: string,
    options: StoreOptions
  ) {
    this.log = options.logger.child({ component: "store", backend: "file", path: filePath });
    this.generate = options.generate ?? generateCode;
  }

  async bootstrap(): Promise<void> {
    await this.queue.run(async () => {
      if (this.handle) return;
      const tornTail = await this.replay();

      let handle: FileHandle;
      try {
        handle = await open(this.filePath, "a", JOURNAL_MODE);
      } catch (err) {
        this.log.error({ err }, "cannot open journal for append");
        throw new BackendUnavailableError(`cannot open journal ${this.filePath}`, { cause: err });
      }

      // Terminate a half-written last line so the next append starts a line of its own.
      if (tornTail) {
        try {
          await handle.appendFile("\n", "utf8");
          await handle.datasync();
        } catch (err) {
          await handle.close();
          this.log.error({ err }, "cannot terminate torn journal tail");
          throw new BackendUnavailableError(`cannot repair journal ${this.filePath}`, { cause: err });
        }
        this.log.warn("journal ended mid-line, terminated it before appending");
      }
      this.handle = handle;
    });
  }

  async ping(): Promise<void> {
    const handle = this.requireHandle();
    try {
      await handle.stat();
    } catch (err) {
      this.log.error({ err }, "journal stat failed");
      throw new BackendUnavailableError("journal is not accessible", { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.queue.run(async () => {
      const handle = this.handle;
      this.handle = null;
      await handle?.close();
    });
  }

  async save(ownerId: string, url: string, baseUrl: string, ctx: OpContext = {}): Promise<SaveResult> {
    return this.queue.run(async () => {
      ctx.signal?.throwIfAborted();
      const a = allocate(this.table, ownerId, url, this.generate);
      if (a.status === "created") {
        await this.commit([a.record]);
      } else {
        this.log.debug({ code: a.code }, "url already shortened");
      }
      return toSaveResult(a, baseUrl);
    });
  }

  async saveBatch(
    ownerId: string,
    urls: readonly string[],
    baseUrl: string,
    ctx: OpContext = {}
  ): Promise<SaveResult[]> {
    return this.queue.run(async () => {
      ctx.signal?.throwIfAborted();
      const plan = planBatch(this.table, ownerId, urls, this.generate);
      await this.commit(plan.records);
      return plan.allocations.map((a) => toSaveResult(a, baseUrl));
    });
  }

  async loadFull(code: string, ctx: OpContext = {}): Promise<LoadResult | null> {
    ctx.signal?.throwIfAborted();
    const rec = this.table.get(code);
    if (!rec) return null;
    return { originalUrl: rec.originalUrl, isDeleted: rec.isDeleted };
  }

  async loadUserUrls(ownerId: string, baseUrl: string, ctx: OpContext = {}): Promise<UserUrlEntry[]> {
    ctx.signal?.throwIfAborted();
    return this.table
      .listByOwner(ownerId)
      .map((rec) => ({ shortUrl: shortUrlFor(baseUrl, rec.code), originalUrl: rec.originalUrl }));
  }

  async deleteBatch(ownerId: string, codes: readonly string[], ctx: OpContext = {}): Promise<DeleteResult> {
    return this.queue.run(async () => {
      ctx.signal?.throwIfAborted();
      const plan = this.table.planDeletion(ownerId, codes);
      await this.commit(plan.tombstones);
      return plan.result;
    });
  }

  private requireHandle(): FileHandle {
    if (!this.handle) throw new BackendUnavailableError("file store is not bootstrapped");
    return this.handle;
  }

  // Must run inside the queue.
  private async commit(records: UrlRecord[]): Promise<void> {
    const handle = this.requireHandle();
    if (records.length === 0) return;

    const data = records.map((rec) => encodeRecord(rec) + "\n").join("");
    try {
      await handle.appendFile(data, "utf8");
      await handle.datasync();
    } catch (err) {
      this.log.error({ err, records: records.length }, "journal append failed");
      throw new StorageOperationError("journal append failed", { cause: err });
    }
    for (const rec of records) this.table.put(rec);
  }

  /** Loads the journal into the table. Resolves true when the file does not end in a newline. */
  private async replay(): Promise<boolean> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isErrno(err, "ENOENT")) {
        this.log.info("journal does not exist yet, starting empty");
        return false;
      }
      this.log.error({ err }, "cannot read journal");
      throw new BackendUnavailableError(`cannot read journal ${this.filePath}`, { cause: err });
    }

    const replayedAt = new Date().toISOString();
    let applied = 0;
    let skipped = 0;

    content.split("\n").forEach((raw, i) => {
      if (raw.trim() === "") return;
      try {
        const line = parseLine(raw);
        const rec = mergeLine(this.table.get(line.short_url), line, replayedAt);
        if (!rec) {
          this.log.warn({ line: i + 1 }, "journal line has no original url, skipping");
          skipped++;
          return;
        }
        this.table.put(rec);
        applied++;
      } catch (err) {
        this.log.warn({ err, line: i + 1 }, "malformed journal line, skipping");
        skipped++;
      }
    });

    this.log.info({ applied, skipped, records: this.table.size }, "journal replayed");
    return content !== "" && !content.endsWith("\n");
  }
}
