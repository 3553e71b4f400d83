import { CODE_LENGTH, MAX_ALLOCATION_ATTEMPTS, type CodeGenerator } from "./code.js";
import { AllocationExhaustedError } from "./errors.js";
import { newRecord, shortUrlFor, type SaveResult, type UrlRecord } from "./storage.js";

/** What the dedup policy needs to know about already-stored records. */
export interface AllocationIndex {
  hasCode(code: string): boolean;
  codeForUrl(url: string): string | undefined;
}

export type Allocation =
  | { status: "created"; record: UrlRecord }
  | { status: "conflict"; code: string };

export interface BatchPlan {
  allocations: Allocation[];
  /** New records, in submission order, not yet applied anywhere. */
  records: UrlRecord[];
}

/**
 * Decides the outcome of shortening `url` against `index` without mutating it.
 * A known URL short-circuits to its existing code before any code is drawn.
 */
export function allocate(
  index: AllocationIndex,
  ownerId: string,
  url: string,
  generate: CodeGenerator,
  now = new Date()
): Allocation {
  const existing = index.codeForUrl(url);
  if (existing !== undefined) return { status: "conflict", code: existing };

  for (let i = 0; i < MAX_ALLOCATION_ATTEMPTS; i++) {
    const code = generate(CODE_LENGTH);
    if (!index.hasCode(code)) {
      return { status: "created", record: newRecord(code, url, ownerId, now) };
    }
  }
  throw new AllocationExhaustedError(MAX_ALLOCATION_ATTEMPTS);
}

class StagedIndex implements AllocationIndex {
  private readonly codes = new Set<string>();
  private readonly urls = new Map<string, string>();

  constructor(private readonly base: AllocationIndex) {}

  hasCode(code: string): boolean {
    return this.codes.has(code) || this.base.hasCode(code);
  }

  codeForUrl(url: string): string | undefined {
    return this.urls.get(url) ?? this.base.codeForUrl(url);
  }

  stage(rec: UrlRecord): void {
    this.codes.add(rec.code);
    this.urls.set(rec.originalUrl, rec.code);
  }
}

/**
 * Allocates every URL of a batch against `index` plus the batch's own earlier rows,
 * so a URL repeated inside one batch resolves to the code minted for its first occurrence.
 * Throws before anything is applied if any row cannot be allocated.
 */
export function planBatch(
  index: AllocationIndex,
  ownerId: string,
  urls: readonly string[],
  generate: CodeGenerator
): BatchPlan {
  const staged = new StagedIndex(index);
  const now = new Date();
  const allocations: Allocation[] = [];
  const records: UrlRecord[] = [];

  for (const url of urls) {
    const a = allocate(staged, ownerId, url, generate, now);
    if (a.status === "created") {
      staged.stage(a.record);
      records.push(a.record);
    }
    allocations.push(a);
  }

  return { allocations, records };
}

export function toSaveResult(a: Allocation, baseUrl: string): SaveResult {
  const code = a.status === "created" ? a.record.code : a.code;
  return { status: a.status, code, shortUrl: shortUrlFor(baseUrl, code) };
}
