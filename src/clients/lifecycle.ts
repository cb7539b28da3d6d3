import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";
import { logInfo, logWarn, serializeError } from "../observability/logger.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<{ status: "ok" | "error"; details?: string }> };

export interface ManagedClient {
  name: string;
  get: () => Promise<HealthCheckedClient>;
  shutdown: () => Promise<void>;
}

/** Postgres is only managed when configured; otherwise documents live in memory. */
async function loadManagedClients(): Promise<ManagedClient[]> {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("./openai.js"),
    import("./postgres.js"),
    import("./qdrant.js")
  ]);

  const clients: ManagedClient[] = [
    { name: "openai", get: openaiModule.getOpenAIClient, shutdown: openaiModule.shutdownOpenAIClient },
    { name: "qdrant", get: qdrantModule.getQdrantClient, shutdown: qdrantModule.shutdownQdrantClient }
  ];
  if (postgresModule.isPostgresConfigured()) {
    clients.push({
      name: "postgres",
      get: postgresModule.getPostgresClient,
      shutdown: postgresModule.shutdownPostgresClient
    });
  }
  return clients;
}

async function hydrateSearchService(): Promise<void> {
  const { getCourtSearchService } = await import("../modules/court-search-factory.js");
  const service = await getCourtSearchService();
  await service.hydrate();
}

async function shutdownAllClients(source: string, loadClients: () => Promise<ManagedClient[]>): Promise<void> {
  const clients = await loadClients();
  logInfo("lifecycle.shutdown", {}, { source, clients: clients.map((client) => client.name) });
  const results = await Promise.allSettled(clients.map((client) => client.shutdown()));
  results.forEach((result, index) => {
    if (result.status === "rejected") {
      logWarn("lifecycle.shutdown_failed", {}, { client: clients[index]?.name, ...serializeError(result.reason) });
    }
  });
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClients?: () => Promise<ManagedClient[]>;
  /** Restores the in-process index from stored documents once clients are up. */
  hydrate?: () => Promise<void>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP;
  if (!enableBootstrap) {
    logInfo("lifecycle.bootstrap_disabled", {}, { hint: "set ENABLE_INFRA_BOOTSTRAP=true to enable" });
    return;
  }
  const loadClients = options?.loadClients ?? loadManagedClients;
  const hydrate = options?.hydrate ?? hydrateSearchService;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClients();
    const checks = await Promise.all(
      clients.map(async (client) => ({ name: client.name, health: await (await client.get()).healthCheck() }))
    );
    for (const check of checks) {
      if (check.health.status !== "ok") {
        logWarn("lifecycle.client_unhealthy", {}, { client: check.name, details: check.health.details ?? null });
      }
    }
    logInfo("lifecycle.clients_ready", {}, { clients: checks.map((check) => check.name) });
    await hydrate();
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("onClose", loadClients);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      logInfo("lifecycle.signal_received", {}, { signal });
      try {
        await shutdownAllClients("process", loadClients);
      } catch (error) {
        logWarn("lifecycle.shutdown_failed", {}, serializeError(error));
      }
      exit(0);
    };

    process.once("SIGINT", () => {
      void handleSignal("SIGINT");
    });
    process.once("SIGTERM", () => {
      void handleSignal("SIGTERM");
    });
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
