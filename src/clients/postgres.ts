import { Pool, type PoolClient } from "pg";
import { config } from "../config/index.js";
import { withRetries } from "../lib/async.js";
import { logInfo, logWarn, serializeError } from "../observability/logger.js";

type HealthStatus = "ok" | "error";

export interface PostgresSingleton {
  pool: Pool;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

/** Whether a document database is configured; local runs fall back to memory otherwise. */
export const isPostgresConfigured = (): boolean =>
  Boolean(config.POSTGRES_URL) && process.env.MOCK_INFRA_CLIENTS !== "1";

async function initialize(): Promise<PostgresSingleton> {
  if (!config.POSTGRES_URL) {
    throw new Error("POSTGRES_URL is not configured.");
  }

  const pool = new Pool({
    connectionString: config.POSTGRES_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  pool.on("error", (error) => {
    logWarn("clients.postgres.idle_client_error", {}, serializeError(error));
  });

  await withRetries(
    async () => {
      await pool.query("SELECT 1");
    },
    {
      attempts: STARTUP_RETRIES,
      delayMs: STARTUP_RETRY_DELAY_MS
    }
  );

  logInfo("clients.postgres.initialized", {});

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  logInfo("clients.postgres.shutdown", {});
}

export async function withTransaction<T>(operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const { pool } = await getPostgresClient();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
