import type { FastifyInstance } from "fastify";

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/postgres.js"),
        import("../../clients/qdrant.js")
      ]);

      const [openai, qdrant] = await Promise.all([openaiModule.getOpenAIClient(), qdrantModule.getQdrantClient()]);
      const postgresHealth = postgresModule.isPostgresConfigured()
        ? await (await postgresModule.getPostgresClient()).healthCheck()
        : { status: "ok" as const, details: "not configured; documents kept in memory" };

      const [openaiHealth, qdrantHealth] = await Promise.all([openai.healthCheck(), qdrant.healthCheck()]);
      const clients = {
        postgres: postgresHealth,
        openai: { ...openaiHealth, mode: openai.mode },
        qdrant: { ...qdrantHealth, mode: qdrant.mode }
      };
      const degraded = Object.values(clients).some((client) => client.status !== "ok");
      if (degraded) {
        reply.code(503);
      }
      return { status: degraded ? "degraded" : "ok", clients };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
