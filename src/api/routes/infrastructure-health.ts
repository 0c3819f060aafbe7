import type { FastifyInstance } from "fastify";

type ClientHealth = { status: "ok" | "error"; details?: string };

export type InfrastructureHealthChecks = {
  postgres: () => Promise<ClientHealth>;
  openai: () => Promise<ClientHealth>;
  qdrant: () => Promise<ClientHealth>;
};

const loadDefaultHealthChecks = async (): Promise<InfrastructureHealthChecks> => {
  const [openaiModule, postgresModule, qdrantModule] = await Promise.all([
    import("../../clients/openai.js"),
    import("../../clients/postgres.js"),
    import("../../clients/qdrant.js")
  ]);

  return {
    postgres: async () => (await postgresModule.getPostgresClient()).healthCheck(),
    openai: async () => (await openaiModule.getOpenAIClient()).healthCheck(),
    qdrant: async () => (await qdrantModule.getQdrantClient()).healthCheck()
  };
};

export interface InfrastructureHealthRouteOptions {
  loadHealthChecks?: () => Promise<InfrastructureHealthChecks>;
}

export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  options?: InfrastructureHealthRouteOptions
): Promise<void> {
  const loadHealthChecks = options?.loadHealthChecks ?? loadDefaultHealthChecks;

  app.get("/infra/health", async (_request, reply) => {
    try {
      const checks = await loadHealthChecks();
      const [postgres, openai, qdrant] = await Promise.all([checks.postgres(), checks.openai(), checks.qdrant()]);
      const healthy = [postgres, openai, qdrant].every((client) => client.status === "ok");
      if (!healthy) {
        reply.code(503);
      }

      return {
        status: healthy ? "ok" : "degraded",
        clients: { postgres, openai, qdrant }
      };
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
