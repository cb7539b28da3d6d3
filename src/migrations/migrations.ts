import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { QueryResult, QueryResultRow } from "pg";
import { getPostgresClient, withTransaction } from "../clients/postgres.js";
import { logInfo } from "../observability/logger.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface MigrationDependencies {
  migrationsDir?: string;
  readdirFn?: (directory: string) => Promise<string[]>;
  readFileFn?: (filePath: string, encoding: "utf8") => Promise<string>;
  withTransactionFn?: <T>(operation: (client: Queryable) => Promise<T>) => Promise<T>;
  getPostgresClientFn?: () => Promise<{ pool: Queryable }>;
}

const resolveDependencies = (dependencies: MigrationDependencies) => ({
  migrationsDir: dependencies.migrationsDir ?? defaultMigrationsDir,
  readdirFn: dependencies.readdirFn ?? ((directory: string) => readdir(directory)),
  readFileFn: dependencies.readFileFn ?? ((filePath: string, encoding: "utf8") => readFile(filePath, encoding)),
  withTransactionFn: dependencies.withTransactionFn ?? withTransaction,
  getPostgresClientFn: dependencies.getPostgresClientFn ?? getPostgresClient
});

export const listMigrationFiles = async (dependencies: MigrationDependencies = {}): Promise<string[]> => {
  const { migrationsDir, readdirFn } = resolveDependencies(dependencies);
  return (await readdirFn(migrationsDir)).filter((name) => name.endsWith(".sql")).sort();
};

const readAppliedMigrations = async (client: Queryable): Promise<Set<string>> => {
  await client.query(CREATE_MIGRATIONS_TABLE);
  const result = await client.query<{ filename: string }>("SELECT filename FROM schema_migrations");
  return new Set(result.rows.map((row) => row.filename));
};

/** Applies pending `.sql` files in filename order, one transaction each. */
export async function runMigrations(dependencies: MigrationDependencies = {}): Promise<string[]> {
  const resolved = resolveDependencies(dependencies);
  const filenames = await listMigrationFiles(dependencies);
  if (filenames.length === 0) {
    return [];
  }

  const alreadyApplied = await resolved.withTransactionFn((client) => readAppliedMigrations(client));
  const applied: string[] = [];

  for (const filename of filenames.filter((name) => !alreadyApplied.has(name))) {
    const migrationSql = (await resolved.readFileFn(path.join(resolved.migrationsDir, filename), "utf8")).replace(
      /^\uFEFF/,
      ""
    );
    await resolved.withTransactionFn(async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });
    logInfo("migrations.applied", {}, { filename });
    applied.push(filename);
  }

  return applied;
}

export async function findPendingMigrations(dependencies: MigrationDependencies = {}): Promise<string[]> {
  const files = await listMigrationFiles(dependencies);
  if (files.length === 0) {
    return [];
  }
  const { pool } = await resolveDependencies(dependencies).getPostgresClientFn();
  const applied = await readAppliedMigrations(pool);
  return files.filter((file) => !applied.has(file));
}

export async function assertMigrationsCurrent(dependencies: MigrationDependencies = {}): Promise<void> {
  const pending = await findPendingMigrations(dependencies);
  if (pending.length > 0) {
    throw new Error(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
  }
}
