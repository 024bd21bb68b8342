import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { Client } from "pg";

const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), "infra/db/migrations");
// Arbitrary key shared by every migrator process.
const MIGRATION_LOCK_KEY = 724_118_001;

export type MigratorOptions = {
  migrationsDir?: string;
};

type Migration = {
  version: string;
  upPath: string;
  downPath: string;
};

export type MigrationStatus = {
  applied: string[];
  pending: string[];
  /** Recorded as applied but missing locally. */
  unknown: string[];
};

async function listMigrations(migrationsDir: string): Promise<Migration[]> {
  const entries = await readdir(migrationsDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".up.sql"))
    .map((entry) => entry.name.slice(0, -".up.sql".length))
    .sort()
    .map((version) => ({
      version,
      upPath: path.join(migrationsDir, `${version}.up.sql`),
      downPath: path.join(migrationsDir, `${version}.down.sql`),
    }));
}

async function ensureBookkeeping(client: Client): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function appliedVersions(client: Client): Promise<string[]> {
  const result = await client.query<{ version: string }>(
    `SELECT version FROM schema_migrations ORDER BY version`,
  );
  return result.rows.map((row) => row.version);
}

/** Serializes concurrent migrators on one database. */
async function withMigrationLock<T>(client: Client, run: () => Promise<T>): Promise<T> {
  await client.query(`SELECT pg_advisory_lock($1)`, [MIGRATION_LOCK_KEY]);
  try {
    await ensureBookkeeping(client);
    return await run();
  } finally {
    await client.query(`SELECT pg_advisory_unlock($1)`, [MIGRATION_LOCK_KEY]);
  }
}

async function runInTransaction(
  client: Client,
  sql: string,
  bookkeeping: { text: string; version: string },
): Promise<void> {
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query(bookkeeping.text, [bookkeeping.version]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

export async function migrateUp(
  client: Client,
  options: MigratorOptions = {},
): Promise<{ applied: string[]; skipped: string[] }> {
  const migrations = await listMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR);

  return withMigrationLock(client, async () => {
    const done = new Set(await appliedVersions(client));
    const applied: string[] = [];
    const skipped: string[] = [];

    for (const migration of migrations) {
      if (done.has(migration.version)) {
        skipped.push(migration.version);
        continue;
      }
      await runInTransaction(client, await readFile(migration.upPath, "utf8"), {
        text: `INSERT INTO schema_migrations (version) VALUES ($1)`,
        version: migration.version,
      });
      applied.push(migration.version);
    }

    return { applied, skipped };
  });
}

export async function rollbackLast(
  client: Client,
  steps = 1,
  options: MigratorOptions = {},
): Promise<{ rolledBack: string[] }> {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new Error("steps must be a positive integer");
  }
  const migrations = await listMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR);
  const byVersion = new Map(migrations.map((migration) => [migration.version, migration]));

  return withMigrationLock(client, async () => {
    const latest = await client.query<{ version: string }>(
      `
      SELECT version
      FROM schema_migrations
      ORDER BY applied_at DESC, version DESC
      LIMIT $1
      `,
      [steps],
    );

    const rolledBack: string[] = [];
    for (const { version } of latest.rows) {
      const migration = byVersion.get(version);
      if (!migration) {
        throw new Error(`No local down migration for applied version ${version}`);
      }
      await runInTransaction(client, await readFile(migration.downPath, "utf8"), {
        text: `DELETE FROM schema_migrations WHERE version = $1`,
        version,
      });
      rolledBack.push(version);
    }

    return { rolledBack };
  });
}

export async function migrationStatus(client: Client, options: MigratorOptions = {}): Promise<MigrationStatus> {
  const local = (await listMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR)).map(
    (migration) => migration.version,
  );

  return withMigrationLock(client, async () => {
    const recorded = await appliedVersions(client);
    const recordedSet = new Set(recorded);
    const localSet = new Set(local);

    return {
      applied: local.filter((version) => recordedSet.has(version)),
      pending: local.filter((version) => !recordedSet.has(version)),
      unknown: recorded.filter((version) => !localSet.has(version)),
    };
  });
}
