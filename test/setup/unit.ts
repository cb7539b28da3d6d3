import { afterEach, beforeEach, vi } from "vitest";

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  // Modules a test mocked away may not export their reset hook.
  await Promise.allSettled([
    import("../../src/clients/openai.js").then((m) => m.resetOpenAIClientForTests?.()),
    import("../../src/clients/postgres.js").then((m) => m.resetPostgresClientForTests?.()),
    import("../../src/clients/qdrant.js").then((m) => m.resetQdrantClientForTests?.()),
    import("../../src/clients/lifecycle.js").then((m) => m.resetClientLifecycleStateForTests?.()),
    import("../../src/modules/court-search-factory.js").then((m) => m.resetCourtSearchServiceForTests?.()),
    import("../../src/observability/metrics.js").then((m) => m.resetMetrics?.())
  ]);
});
