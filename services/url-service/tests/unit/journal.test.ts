import { describe, expect, it } from "vitest";
import { encodeRecord, mergeLine, parseLine } from "../../src/journal.js";
import { newRecord, tombstone } from "../../src/storage.js";

const REPLAYED_AT = "2026-01-01T00:00:00.000Z";

describe("journal lines", () => {
  it("encodes the code under short_url with an empty uuid", () => {
    const rec = newRecord("CODE0001", "https://example.com", "u1", new Date("2025-05-05T10:00:00.000Z"));

    expect(JSON.parse(encodeRecord(rec))).toEqual({
      uuid: "",
      short_url: "CODE0001",
      original_url: "https://example.com",
      user_id: "u1",
      is_deleted: false,
      created_at: "2025-05-05T10:00:00.000Z",
      deleted_at: null
    });
  });

  it("fills defaults for the minimal line", () => {
    expect(parseLine('{"short_url":"c1","original_url":"a"}')).toEqual({
      uuid: "",
      short_url: "c1",
      original_url: "a",
      user_id: "",
      is_deleted: false
    });
  });

  it("rejects lines that are not records", () => {
    expect(() => parseLine("{oops")).toThrow();
    expect(() => parseLine('{"original_url":"a"}')).toThrow();
    expect(() => parseLine('{"short_url":"c1","is_deleted":"yes"}')).toThrow();
  });

  it("lets a tombstone inherit the earlier url and owner", () => {
    const prev = newRecord("c1", "a", "u1", new Date("2025-05-05T10:00:00.000Z"));

    const merged = mergeLine(prev, parseLine('{"short_url":"c1","is_deleted":true}'), REPLAYED_AT);

    expect(merged).toEqual({
      code: "c1",
      originalUrl: "a",
      ownerId: "u1",
      isDeleted: true,
      createdAt: "2025-05-05T10:00:00.000Z",
      deletedAt: REPLAYED_AT
    });
  });

  it("keeps the first deletion time", () => {
    const prev = tombstone(newRecord("c1", "a", "u1"), new Date("2025-06-01T00:00:00.000Z"));

    const merged = mergeLine(
      prev,
      parseLine('{"short_url":"c1","is_deleted":false,"deleted_at":null}'),
      REPLAYED_AT
    );

    expect(merged?.isDeleted).toBe(true);
    expect(merged?.deletedAt).toBe("2025-06-01T00:00:00.000Z");
  });

  it("lets a later line replace the url", () => {
    const prev = newRecord("c1", "a", "u1");

    expect(mergeLine(prev, parseLine('{"short_url":"c1","original_url":"b"}'), REPLAYED_AT)?.originalUrl).toBe("b");
  });

  it("drops a line when no url is known for the code", () => {
    expect(mergeLine(undefined, parseLine('{"short_url":"c1","is_deleted":true}'), REPLAYED_AT)).toBeNull();
  });
});
