import fs from "fs";
import path from "path";
import { type DbPool } from "./db";
import { logInfo } from "./observability/logger";

const defaultMigrationsDir = path.join(process.cwd(), "migrations");

export type MigrationOptions = {
  migrationsDir?: string;
};

function listMigrationFiles(migrationsDir: string): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort();
}

async function ensureMigrationsTable(pool: DbPool): Promise<void> {
  await pool.query(
    `create table if not exists schema_migrations (
      id text primary key,
      applied_at timestamptz not null default now()
    )`
  );
}

export function splitSql(sql: string): string[] {
  const statements: string[] = [];
  let current = "";
  let inSingleQuote = false;
  let inLineComment = false;

  for (let i = 0; i < sql.length; i += 1) {
    const char = sql[i];
    const nextChar = sql[i + 1];

    if (inLineComment) {
      if (char === "\n") {
        inLineComment = false;
        current += char;
      }
      continue;
    }

    if (!inSingleQuote && char === "-" && nextChar === "-") {
      inLineComment = true;
      i += 1;
      continue;
    }

    if (char === "'") {
      current += char;
      if (inSingleQuote && nextChar === "'") {
        current += nextChar;
        i += 1;
      } else {
        inSingleQuote = !inSingleQuote;
      }
      continue;
    }

    if (char === ";" && !inSingleQuote) {
      const trimmed = current.trim();
      if (trimmed.length > 0) {
        statements.push(trimmed);
      }
      current = "";
      continue;
    }

    current += char;
  }

  const trimmed = current.trim();
  if (trimmed.length > 0) {
    statements.push(trimmed);
  }

  return statements;
}

async function fetchAppliedMigrations(pool: DbPool): Promise<Set<string>> {
  const res = await pool.query<{ id: string }>("select id from schema_migrations");
  return new Set(res.rows.map((row) => row.id));
}

export async function runMigrations(pool: DbPool, options: MigrationOptions = {}): Promise<string[]> {
  const migrationsDir = options.migrationsDir ?? defaultMigrationsDir;
  await ensureMigrationsTable(pool);
  const applied = await fetchAppliedMigrations(pool);
  const newlyApplied: string[] = [];

  for (const file of listMigrationFiles(migrationsDir)) {
    if (applied.has(file)) {
      continue;
    }
    const rawSql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    const client = await pool.connect();
    try {
      await client.query("begin");
      for (const statement of splitSql(rawSql)) {
        await client.query(statement);
      }
      await client.query("insert into schema_migrations (id, applied_at) values ($1, now())", [file]);
      await client.query("commit");
    } catch (err) {
      await client.query("rollback");
      throw err;
    } finally {
      client.release();
    }
    newlyApplied.push(file);
    logInfo("migration_applied", { migration: file });
  }

  return newlyApplied;
}

export async function getPendingMigrations(pool: DbPool, options: MigrationOptions = {}): Promise<string[]> {
  await ensureMigrationsTable(pool);
  const applied = await fetchAppliedMigrations(pool);
  return listMigrationFiles(options.migrationsDir ?? defaultMigrationsDir).filter(
    (file) => !applied.has(file)
  );
}

export async function assertNoPendingMigrations(pool: DbPool, options: MigrationOptions = {}): Promise<void> {
  const pending = await getPendingMigrations(pool, options);
  if (pending.length > 0) {
    throw new Error(`pending_migrations:${pending.join(",")}`);
  }
}
