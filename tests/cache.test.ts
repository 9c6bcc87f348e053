import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, it, vi } from "vitest";
import { createSqliteCache, resolveTreeFileCache } from "../src/db/cache";
import type { ParsedTreeFile } from "../src/types/monophyly";

const parsed: ParsedTreeFile = {
  taxa: new Map([
    [1, "Homo_sapiens"],
    [2, "Pan_troglodytes"],
    [3, "Gorilla_gorilla"],
  ]),
  topologies: ["(1,2,3)", "((1,2),3)"],
};

describe("resolveTreeFileCache", () => {
  it("returns no cache when no database path is configured", () => {
    expect(resolveTreeFileCache({ cacheDbPath: null, cacheTtlHours: 24 })).toBeNull();
  });

  it("returns a database cache when a path is configured", () => {
    const cache = resolveTreeFileCache({ cacheDbPath: join(tmpdir(), "unused.sqlite"), cacheTtlHours: 24 });

    expect(cache).not.toBeNull();
    expect(typeof cache?.get).toBe("function");
  });
});

describe("sqlite cache", () => {
  const directory = mkdtempSync(join(tmpdir(), "monophyly-cache-"));

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("round-trips parsed files through the database", async () => {
    const cache = createSqliteCache(join(directory, "nested", "cache.sqlite"));
    await cache.set("abc", parsed);

    const restored = await cache.get("abc");

    expect(restored?.topologies).toEqual(parsed.topologies);
    expect(Array.from(restored?.taxa.entries() ?? [])).toEqual(Array.from(parsed.taxa.entries()));
    expect(await cache.get("missing")).toBeNull();
  });

  it("warns and misses when the database cannot be opened", async () => {
    const blocker = join(directory, "blocker");
    writeFileSync(blocker, "");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const cache = createSqliteCache(join(blocker, "cache.sqlite"));
    await cache.set("abc123def456789", parsed);

    expect(await cache.get("abc123def456789")).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0][0]).toMatch(/^\[cache\] write failed for abc123def456: /);
    warn.mockRestore();
  });
});
