import { describe, expect, it } from "vitest";
import { RecordTable } from "../../src/record_table.js";
import { newRecord, tombstone } from "../../src/storage.js";

describe("RecordTable", () => {
  it("keeps the first code seen for a url", () => {
    const table = new RecordTable();
    table.put(newRecord("FIRST001", "https://example.com", "u1"));
    table.put(newRecord("SECOND01", "https://example.com", "u2"));

    expect(table.codeForUrl("https://example.com")).toBe("FIRST001");
    expect(table.hasCode("SECOND01")).toBe(true);
  });

  it("does not share records with callers", () => {
    const table = new RecordTable();
    const rec = newRecord("CODE0001", "https://example.com", "u1");
    table.put(rec);
    rec.isDeleted = true;

    const got = table.get("CODE0001");
    expect(got?.isDeleted).toBe(false);
    if (got) got.originalUrl = "https://changed.example";
    expect(table.get("CODE0001")?.originalUrl).toBe("https://example.com");
  });

  it("plans deletions without applying them", () => {
    const table = new RecordTable();
    table.put(newRecord("MINE0001", "https://example.com/1", "u1"));
    table.put(newRecord("THEIRS01", "https://example.com/2", "u2"));

    const plan = table.planDeletion("u1", ["MINE0001", "THEIRS01", "ABSENT01"]);

    expect(plan.result).toEqual({ deleted: ["MINE0001"], skipped: ["THEIRS01", "ABSENT01"] });
    expect(plan.tombstones).toEqual([
      expect.objectContaining({ code: "MINE0001", isDeleted: true, deletedAt: expect.any(String) })
    ]);
    expect(table.get("MINE0001")?.isDeleted).toBe(false);
  });

  it("does not re-tombstone a deleted record", () => {
    const table = new RecordTable();
    table.put(tombstone(newRecord("MINE0001", "https://example.com/1", "u1")));

    const plan = table.planDeletion("u1", ["MINE0001"]);

    expect(plan.result.deleted).toEqual(["MINE0001"]);
    expect(plan.tombstones).toEqual([]);
  });

  it("lists live records of one owner", () => {
    const table = new RecordTable();
    table.put(newRecord("A0000001", "https://example.com/1", "u1"));
    table.put(tombstone(newRecord("A0000002", "https://example.com/2", "u1")));
    table.put(newRecord("A0000003", "https://example.com/3", "u2"));

    expect(table.listByOwner("u1").map((r) => r.code)).toEqual(["A0000001"]);
  });
});
