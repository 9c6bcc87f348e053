import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type Database from "better-sqlite3";
import { config } from "../config";
import type { ParsedTreeFile } from "../types/monophyly";

const ONE_HOUR_MS = 60 * 60 * 1000;

type SerializedTreeFile = {
  taxa: Array<[number, string]>;
  topologies: string[];
};

type ParsedFileRow = {
  json: string;
  ts: number;
};

export type TreeFileCache = {
  get(hash: string): Promise<ParsedTreeFile | null>;
  set(hash: string, parsed: ParsedTreeFile): Promise<void>;
};

const clampTtl = (ttlHours?: number): number => {
  if (!ttlHours || !Number.isFinite(ttlHours) || ttlHours <= 0) return 0;
  return ttlHours;
};

const isExpired = (ts: number, ttlHours: number): boolean => {
  const ttl = clampTtl(ttlHours);
  if (!ttl) return false;
  return ts < Date.now() - ttl * ONE_HOUR_MS;
};

const warn = (message: string, error: unknown): void => {
  const reason = error instanceof Error ? error.message : String(error);
  console.warn(`[cache] ${message}: ${reason}`);
};

const serialize = (parsed: ParsedTreeFile): string =>
  JSON.stringify({ taxa: Array.from(parsed.taxa.entries()), topologies: parsed.topologies });

const isTaxonEntry = (value: unknown): value is [number, string] =>
  Array.isArray(value) && value.length === 2 && typeof value[0] === "number" && typeof value[1] === "string";

const isSerializedTreeFile = (value: unknown): value is SerializedTreeFile => {
  if (typeof value !== "object" || value === null || !("taxa" in value) || !("topologies" in value)) return false;
  const { taxa, topologies } = value;
  return (
    Array.isArray(taxa) &&
    taxa.every(isTaxonEntry) &&
    Array.isArray(topologies) &&
    topologies.every((entry) => typeof entry === "string")
  );
};

const deserialize = (json: string): ParsedTreeFile | null => {
  const value: unknown = JSON.parse(json);
  if (!isSerializedTreeFile(value)) return null;
  return { taxa: new Map(value.taxa), topologies: value.topologies };
};

const isParsedFileRow = (value: unknown): value is ParsedFileRow => {
  if (typeof value !== "object" || value === null || !("json" in value) || !("ts" in value)) return false;
  return typeof value.json === "string" && typeof value.ts === "number";
};

export const createSqliteCache = (dbPath: string, ttlHours = 0): TreeFileCache => {
  let opening: Promise<Database.Database> | null = null;

  const open = async (): Promise<Database.Database> => {
    const { default: DatabaseConstructor } = await import("better-sqlite3");
    const resolved = resolve(process.cwd(), dbPath);
    mkdirSync(dirname(resolved), { recursive: true });

    const db = new DatabaseConstructor(resolved);
    db.pragma("journal_mode = WAL");
    db.exec("CREATE TABLE IF NOT EXISTS parsed_files (hash TEXT PRIMARY KEY, json TEXT NOT NULL, ts INTEGER NOT NULL)");

    return db;
  };

  // Concurrent readers share one connection; a failed open is retried on the next call.
  const ensureDatabase = (): Promise<Database.Database> => {
    if (!opening) {
      opening = open().catch((error: unknown) => {
        opening = null;
        throw error;
      });
    }
    return opening;
  };

  const prune = (db: Database.Database): void => {
    const ttl = clampTtl(ttlHours);
    if (!ttl) return;
    db.prepare("DELETE FROM parsed_files WHERE ts < ?").run(Date.now() - ttl * ONE_HOUR_MS);
  };

  return {
    async get(hash) {
      try {
        const db = await ensureDatabase();
        const row: unknown = db.prepare("SELECT json, ts FROM parsed_files WHERE hash = ?").get(hash);
        if (!isParsedFileRow(row) || isExpired(row.ts, ttlHours)) return null;
        return deserialize(row.json);
      } catch (error) {
        warn(`read failed for ${hash.slice(0, 12)}`, error);
        return null;
      }
    },
    async set(hash, parsed) {
      try {
        const db = await ensureDatabase();
        db.prepare(
          "INSERT INTO parsed_files (hash, json, ts) VALUES (?, ?, ?) ON CONFLICT(hash) DO UPDATE SET json = excluded.json, ts = excluded.ts"
        ).run(hash, serialize(parsed), Date.now());
        prune(db);
      } catch (error) {
        warn(`write failed for ${hash.slice(0, 12)}`, error);
      }
    },
  };
};

type CacheSettings = { cacheDbPath: string | null; cacheTtlHours: number };

/** Parsed files are cached only when a database path is configured. */
export const resolveTreeFileCache = (settings: CacheSettings): TreeFileCache | null =>
  settings.cacheDbPath ? createSqliteCache(settings.cacheDbPath, settings.cacheTtlHours) : null;

let cache: TreeFileCache | null | undefined;

export const getTreeFileCache = (): TreeFileCache | null => {
  if (cache === undefined) {
    cache = resolveTreeFileCache(config);
  }
  return cache;
};
