import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { UrlStore } from "../../src/storage.js";

export interface StoreHarness {
  store: UrlStore;
  cleanup: () => Promise<void>;
}

const BASE = "http://x/";
const SHORT_URL = /^http:\/\/x\/[0-9a-zA-Z]{8}$/;

/** Behaviour every backend must share; `open` returns a bootstrapped, empty store. */
export function describeStoreContract(name: string, open: () => Promise<StoreHarness>): void {
  describe(`${name} store contract`, () => {
    let h: StoreHarness;

    beforeEach(async () => {
      h = await open();
    });

    afterEach(async () => {
      await h.cleanup();
    });

    it("resolves a saved url as not deleted", async () => {
      const res = await h.store.save("u1", "https://example.com", BASE);

      expect(res.status).toBe("created");
      expect(res.shortUrl).toMatch(SHORT_URL);
      expect(res.shortUrl).toBe(BASE + res.code);
      expect(await h.store.loadFull(res.code)).toEqual({ originalUrl: "https://example.com", isDeleted: false });
    });

    it("adds the missing trailing slash to the base url", async () => {
      const res = await h.store.save("u1", "https://example.com/slash", "http://x");
      expect(res.shortUrl).toBe(`http://x/${res.code}`);
    });

    it("returns the existing code with a conflict for a resubmitted url", async () => {
      const first = await h.store.save("u1", "https://example.com", BASE);
      const second = await h.store.save("u2", "https://example.com", BASE);

      expect(second).toEqual({ status: "conflict", code: first.code, shortUrl: first.shortUrl });
      expect(await h.store.loadUserUrls("u2", BASE)).toEqual([]);
    });

    it("returns null for a code that was never allocated", async () => {
      expect(await h.store.loadFull("nope1234")).toBeNull();
    });

    it("reports an owner-deleted code as gone and drops it from the listing", async () => {
      const kept = await h.store.save("u1", "https://example.com/kept", BASE);
      const gone = await h.store.save("u1", "https://example.com/gone", BASE);

      const res = await h.store.deleteBatch("u1", [gone.code]);

      expect(res).toEqual({ deleted: [gone.code], skipped: [] });
      expect(await h.store.loadFull(gone.code)).toEqual({ originalUrl: "https://example.com/gone", isDeleted: true });
      expect(await h.store.loadUserUrls("u1", BASE)).toEqual([
        { shortUrl: kept.shortUrl, originalUrl: "https://example.com/kept" }
      ]);
    });

    it("does not let another owner delete a code", async () => {
      const res = await h.store.save("ownerB", "https://example.com/b", BASE);

      expect(await h.store.deleteBatch("ownerA", [res.code])).toEqual({ deleted: [], skipped: [res.code] });
      expect(await h.store.loadFull(res.code)).toEqual({ originalUrl: "https://example.com/b", isDeleted: false });
      expect(await h.store.loadUserUrls("ownerB", BASE)).toHaveLength(1);
    });

    it("skips absent codes and collapses repeats", async () => {
      const res = await h.store.save("u1", "https://example.com/a", BASE);

      expect(await h.store.deleteBatch("u1", [res.code, "missing1", res.code])).toEqual({
        deleted: [res.code],
        skipped: ["missing1"]
      });
    });

    it("treats deleting an already deleted code as done", async () => {
      const res = await h.store.save("u1", "https://example.com/a", BASE);
      await h.store.deleteBatch("u1", [res.code]);

      expect(await h.store.deleteBatch("u1", [res.code])).toEqual({ deleted: [res.code], skipped: [] });
      expect(await h.store.loadFull(res.code)).toEqual({ originalUrl: "https://example.com/a", isDeleted: true });
    });

    it("keeps a deleted url's code reserved for that url", async () => {
      const first = await h.store.save("u1", "https://example.com/a", BASE);
      await h.store.deleteBatch("u1", [first.code]);

      const again = await h.store.save("u1", "https://example.com/a", BASE);
      expect(again).toEqual({ status: "conflict", code: first.code, shortUrl: first.shortUrl });
    });

    it("lists only the owner's entries", async () => {
      const a = await h.store.save("u1", "https://example.com/1", BASE);
      await h.store.save("u2", "https://example.com/2", BASE);
      const c = await h.store.save("u1", "https://example.com/3", BASE);

      const list = await h.store.loadUserUrls("u1", BASE);
      expect(list).toHaveLength(2);
      expect(list).toEqual(
        expect.arrayContaining([
          { shortUrl: a.shortUrl, originalUrl: "https://example.com/1" },
          { shortUrl: c.shortUrl, originalUrl: "https://example.com/3" }
        ])
      );
      expect(await h.store.loadUserUrls("nobody", BASE)).toEqual([]);
    });

    it("saves a batch in order with random codes and dedup", async () => {
      const existing = await h.store.save("u0", "https://example.com/old", BASE);

      const results = await h.store.saveBatch(
        "u1",
        ["https://example.com/new1", "https://example.com/old", "https://example.com/new2", "https://example.com/new1"],
        BASE
      );

      expect(results.map((r) => r.status)).toEqual(["created", "conflict", "created", "conflict"]);
      expect(results[0].shortUrl).toMatch(SHORT_URL);
      expect(results[2].shortUrl).toMatch(SHORT_URL);
      expect(results[1].code).toBe(existing.code);
      expect(results[3].code).toBe(results[0].code);
      expect(results[0].code).not.toBe(results[2].code);

      expect(await h.store.loadFull(results[2].code)).toEqual({
        originalUrl: "https://example.com/new2",
        isDeleted: false
      });
      expect(await h.store.loadUserUrls("u1", BASE)).toHaveLength(2);
    });

    it("returns nothing for an empty batch", async () => {
      expect(await h.store.saveBatch("u1", [], BASE)).toEqual([]);
    });

    it("answers ping", async () => {
      await expect(h.store.ping()).resolves.toBeUndefined();
    });
  });
}
