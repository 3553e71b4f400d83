import type { AllocationIndex } from "./allocation.js";
import { tombstone, type DeleteResult, type UrlRecord } from "./storage.js";

export interface DeletionPlan {
  result: DeleteResult;
  /** Records that flip to deleted; already-deleted ones are not repeated. */
  tombstones: UrlRecord[];
}

/**
 * Code -> record map with a URL index, owned by one store instance.
 * Records go in and come out as copies.
 */
export class RecordTable implements AllocationIndex {
  private readonly byCode = new Map<string, UrlRecord>();
  private readonly byUrl = new Map<string, string>();

  get size(): number {
    return this.byCode.size;
  }

  get(code: string): UrlRecord | undefined {
    const rec = this.byCode.get(code);
    return rec ? { ...rec } : undefined;
  }

  hasCode(code: string): boolean {
    return this.byCode.has(code);
  }

  codeForUrl(url: string): string | undefined {
    return this.byUrl.get(url);
  }

  /**
   * Inserts or replaces the record for `rec.code`.
   * The URL index keeps the first code seen for a URL.
   */
  put(rec: UrlRecord): void {
    this.byCode.set(rec.code, { ...rec });
    if (!this.byUrl.has(rec.originalUrl)) {
      this.byUrl.set(rec.originalUrl, rec.code);
    }
  }

  listByOwner(ownerId: string): UrlRecord[] {
    const out: UrlRecord[] = [];
    for (const rec of this.byCode.values()) {
      if (rec.ownerId === ownerId && !rec.isDeleted) out.push({ ...rec });
    }
    return out;
  }

  planDeletion(ownerId: string, codes: readonly string[], now = new Date()): DeletionPlan {
    const deleted: string[] = [];
    const skipped: string[] = [];
    const tombstones: UrlRecord[] = [];

    for (const code of new Set(codes)) {
      const rec = this.byCode.get(code);
      if (!rec || rec.ownerId !== ownerId) {
        skipped.push(code);
        continue;
      }
      deleted.push(code);
      if (!rec.isDeleted) tombstones.push(tombstone(rec, now));
    }

    return { result: { deleted, skipped }, tombstones };
  }
}
