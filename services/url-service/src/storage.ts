import type { Logger } from "pino";
import type { CodeGenerator } from "./code.js";

export interface UrlRecord {
  code: string;
  originalUrl: string;
  ownerId: string;
  isDeleted: boolean;
  createdAt: string;
  deletedAt: string | null;
}

export interface UserUrlEntry {
  shortUrl: string;
  originalUrl: string;
}

/**
 * `conflict` means the URL was already shortened; `code` is the existing one.
 * Callers answer it differently from `created`, but it is not a failure.
 */
export type SaveStatus = "created" | "conflict";

export interface SaveResult {
  status: SaveStatus;
  code: string;
  shortUrl: string;
}

export interface LoadResult {
  originalUrl: string;
  isDeleted: boolean;
}

export interface DeleteResult {
  /** Codes owned by the caller that are now tombstoned (including ones that already were). */
  deleted: string[];
  /** Codes that are absent or owned by someone else. */
  skipped: string[];
}

export interface OpContext {
  signal?: AbortSignal;
}

/** Constructor dependencies shared by every backend. */
export interface StoreOptions {
  logger: Logger;
  /** Short-code source; defaults to generateCode. */
  generate?: CodeGenerator;
}

export interface UrlStore {
  bootstrap(ctx?: OpContext): Promise<void>;
  ping(ctx?: OpContext): Promise<void>;
  close(): Promise<void>;
  save(ownerId: string, url: string, baseUrl: string, ctx?: OpContext): Promise<SaveResult>;
  saveBatch(ownerId: string, urls: readonly string[], baseUrl: string, ctx?: OpContext): Promise<SaveResult[]>;
  loadFull(code: string, ctx?: OpContext): Promise<LoadResult | null>;
  loadUserUrls(ownerId: string, baseUrl: string, ctx?: OpContext): Promise<UserUrlEntry[]>;
  deleteBatch(ownerId: string, codes: readonly string[], ctx?: OpContext): Promise<DeleteResult>;
}

export function ensureTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

export function shortUrlFor(baseUrl: string, code: string): string {
  return ensureTrailingSlash(baseUrl) + code;
}

export function newRecord(code: string, originalUrl: string, ownerId: string, now = new Date()): UrlRecord {
  return {
    code,
    originalUrl,
    ownerId,
    isDeleted: false,
    createdAt: now.toISOString(),
    deletedAt: null
  };
}

export function tombstone(rec: UrlRecord, now = new Date()): UrlRecord {
  if (rec.isDeleted) return { ...rec };
  return { ...rec, isDeleted: true, deletedAt: now.toISOString() };
}
