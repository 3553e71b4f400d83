import type { Logger } from "pino";
import { allocate, planBatch, toSaveResult } from "./allocation.js";
import { generateCode, type CodeGenerator } from "./code.js";
import { RecordTable } from "./record_table.js";
import {
  shortUrlFor,
  type DeleteResult,
  type LoadResult,
  type OpContext,
  type SaveResult,
  type StoreOptions,
  type UrlStore,
  type UserUrlEntry
} from "./storage.js";

/**
 * Non-durable store. Every method runs to completion without awaiting,
 * so each one has the table to itself.
 */
export class MemoryUrlStore implements UrlStore {
  private readonly table = new RecordTable();
  private readonly log: Logger;
  private readonly generate: CodeGenerator;

  constructor(options: StoreOptions) {
    this.log = options.logger.child({ component: "store", backend: "memory" });
    this.generate = options.generate ?? generateCode;
  }

  async bootstrap(): Promise<void> {
    // nothing
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    // nothing to release
  }

  async save(ownerId: string, url: string, baseUrl: string, ctx: OpContext = {}): Promise<SaveResult> {
    ctx.signal?.throwIfAborted();
    const a = allocate(this.table, ownerId, url, this.generate);
    if (a.status === "created") {
      this.table.put(a.record);
    } else {
      this.log.debug({ code: a.code }, "url already shortened");
    }
    return toSaveResult(a, baseUrl);
  }

  async saveBatch(
    ownerId: string,
    urls: readonly string[],
    baseUrl: string,
    ctx: OpContext = {}
  ): Promise<SaveResult[]> {
    ctx.signal?.throwIfAborted();
    const plan = planBatch(this.table, ownerId, urls, this.generate);
    for (const rec of plan.records) this.table.put(rec);
    return plan.allocations.map((a) => toSaveResult(a, baseUrl));
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
    ctx.signal?.throwIfAborted();
    const plan = this.table.planDeletion(ownerId, codes);
    for (const rec of plan.tombstones) this.table.put(rec);
    return plan.result;
  }
}
