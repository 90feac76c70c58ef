import fs from "node:fs";
import path from "node:path";
import { createRequire } from "node:module";

import type { Database } from "./types.ts";
import { runMigrations } from "./migrate.ts";

const IN_MEMORY = ":memory:";

function resolveDbPath(dbPath: string): string {
  const p = String(dbPath || "").trim() || "data/rag.sqlite";
  if (p === IN_MEMORY) { return p; }
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

function ensureParentDir(filePath: string): void {
  if (filePath === IN_MEMORY) { return; }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

// Loaded lazily so a missing native build only fails the sqlite provider.
function loadBetterSqlite3Ctor(): new (filename: string) => Database {
  const require = createRequire(import.meta.url);
  const mod: unknown = require("better-sqlite3");
  const ctor: unknown =
    typeof mod === "function" ? mod : mod && typeof mod === "object" ? (mod as { default?: unknown }).default : undefined;

  if (typeof ctor !== "function") {
    throw new Error("Failed to load better-sqlite3");
  }

  return ctor as new (filename: string) => Database;
}

/** Opens (creating if needed) the sqlite file and applies pending migrations. */
export function openSqliteDb(dbPath: string): Database {
  const filePath = resolveDbPath(dbPath);
  ensureParentDir(filePath);

  const DatabaseCtor = loadBetterSqlite3Ctor();
  const db = new DatabaseCtor(filePath);

  if (filePath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }

  runMigrations(db);
  return db;
}
