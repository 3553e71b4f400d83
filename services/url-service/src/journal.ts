import { z } from "zod";
import type { UrlRecord } from "./storage.js";

// One line of the journal. `short_url` carries the bare code; `uuid` is reserved.
export const journalLineSchema = z.object({
  uuid: z.string().default(""),
  short_url: z.string().min(1),
  original_url: z.string().min(1).optional(),
  user_id: z.string().default(""),
  is_deleted: z.boolean().default(false),
  created_at: z.string().optional(),
  deleted_at: z.string().nullable().optional()
});

export type JournalLine = z.infer<typeof journalLineSchema>;

export function encodeRecord(rec: UrlRecord): string {
  const line: JournalLine = {
    uuid: "",
    short_url: rec.code,
    original_url: rec.originalUrl,
    user_id: rec.ownerId,
    is_deleted: rec.isDeleted,
    created_at: rec.createdAt,
    deleted_at: rec.deletedAt
  };
  return JSON.stringify(line);
}

/** Throws on invalid JSON or a shape the schema rejects. */
export function parseLine(raw: string): JournalLine {
  const json: unknown = JSON.parse(raw);
  return journalLineSchema.parse(json);
}

/**
 * Folds a journal line over the record previously replayed for the same code.
 * Later lines win, except that a deletion is never undone.
 * Returns null when neither the line nor an earlier one names the URL.
 */
export function mergeLine(prev: UrlRecord | undefined, line: JournalLine, replayedAt: string): UrlRecord | null {
  const originalUrl = line.original_url ?? prev?.originalUrl;
  if (originalUrl === undefined) return null;

  const wasDeleted = prev?.isDeleted ?? false;
  const isDeleted = wasDeleted || line.is_deleted;
  let deletedAt: string | null = null;
  if (wasDeleted && prev) deletedAt = prev.deletedAt;
  else if (isDeleted) deletedAt = line.deleted_at ?? replayedAt;

  return {
    code: line.short_url,
    originalUrl,
    ownerId: line.user_id !== "" ? line.user_id : (prev?.ownerId ?? ""),
    isDeleted,
    createdAt: line.created_at ?? prev?.createdAt ?? replayedAt,
    deletedAt
  };
}
