import { fileURLToPath } from "node:url";
import { shutdownPostgresClient } from "../clients/postgres.js";
import { logError, logInfo, serializeError } from "../observability/logger.js";
import { assertMigrationsCurrent, runMigrations } from "./migrations.js";

const checkOnly = process.argv.includes("--check");

const main = async (): Promise<void> => {
  if (checkOnly) {
    await assertMigrationsCurrent();
    logInfo("migrations.current", {});
    return;
  }
  const applied = await runMigrations();
  logInfo("migrations.completed", {}, { applied });
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main()
    .finally(() => shutdownPostgresClient())
    .catch((error: unknown) => {
      logError("migrations.failed", {}, serializeError(error));
      process.exitCode = 1;
    });
}
