import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config, describeConfig } from "./config/index.js";
import { logError, logInfo, serializeError } from "./observability/logger.js";
import { runStartupChecks } from "./startup/startup-checks.js";

export async function bootstrap(): Promise<void> {
  await runStartupChecks();

  const app = await buildApp();
  const address = await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
  logInfo("server.listening", {}, { address, ...describeConfig(config) });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup_failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
