import { isPostgresConfigured } from "../clients/postgres.js";
import { config } from "../config/index.js";
import { assertMigrationsCurrent } from "../migrations/migrations.js";
import { logInfo } from "../observability/logger.js";

export interface StartupCheckOptions {
  enabled?: boolean;
  postgresConfigured?: () => boolean;
  assertMigrations?: () => Promise<void>;
}

export async function runStartupChecks(options: StartupCheckOptions = {}): Promise<void> {
  if (!(options.enabled ?? config.RUN_STARTUP_CHECKS)) {
    return;
  }

  if (!(options.postgresConfigured ?? isPostgresConfigured)()) {
    logInfo("startup.migrations_skipped", {}, { reason: "postgres not configured" });
    return;
  }

  await (options.assertMigrations ?? assertMigrationsCurrent)();
  logInfo("startup.migrations_current", {});
}
