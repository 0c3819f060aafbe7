import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { ApiKeyUserDirectory } from "./auth/api-key.js";
import { registerClientLifecycle } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import {
  registerInfrastructureHealthRoute,
  type InfrastructureHealthRouteOptions
} from "./api/routes/infrastructure-health.js";
import { registerApiRoutes } from "./api/routes/index.js";
import type { QueryPipelinePort } from "./api/routes/query.js";
import { config, type Config } from "./config/index.js";
import { CollectionRepository } from "./modules/collections/collection-repository.js";
import { QueryPipeline } from "./modules/pipeline/query-pipeline.js";
import { createPolicyConfig } from "./modules/policy/policy-config.js";
import { PolicyEngine } from "./modules/policy/policy-engine.js";
import { createOpenAIAnswerGenerator } from "./modules/rag/answer-generator.js";
import { createOpenAIEmbeddingProvider } from "./modules/rag/embeddings.js";
import { createQdrantSimilaritySearch } from "./modules/rag/similarity-search.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";
import { createLoggingEventSink } from "./observability/pipeline-events.js";
import { registerRequestTraceHooks } from "./observability/request-tracing.js";

export interface BuildAppOptions {
  pipeline?: QueryPipelinePort;
  registerInfrastructureHealth?: boolean;
  infrastructureHealth?: InfrastructureHealthRouteOptions;
  enableInfraBootstrap?: boolean;
  logger?: boolean;
}

export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(configured && configured.length > 0 ? configured : ["http://localhost:5173"]);

  // localhost and 127.0.0.1 are interchangeable for local frontends.
  for (const origin of [...origins]) {
    if (!URL.canParse(origin)) {
      continue;
    }
    const url = new URL(origin);
    if (url.hostname === "localhost" || url.hostname === "127.0.0.1") {
      url.hostname = url.hostname === "localhost" ? "127.0.0.1" : "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export type PolicySettings = Pick<Config, "POLICY_ORGANIZATION_PATTERNS" | "POLICY_EXTRA_TOXIC_TERMS">;

export function createPolicyEngine(settings: PolicySettings = config): PolicyEngine {
  return new PolicyEngine(
    createPolicyConfig({
      organizationPatterns: settings.POLICY_ORGANIZATION_PATTERNS,
      extraToxicTerms: settings.POLICY_EXTRA_TOXIC_TERMS
    })
  );
}

/** Wires the production collaborators. The policy tables are built once here. */
export function createQueryPipeline(): QueryPipeline {
  return new QueryPipeline({
    policyEngine: createPolicyEngine(),
    users: new ApiKeyUserDirectory(),
    collections: new CollectionRepository(),
    embeddings: createOpenAIEmbeddingProvider(),
    similaritySearch: createQdrantSimilaritySearch(),
    generator: createOpenAIAnswerGenerator(),
    events: createLoggingEventSink()
  });
}

export async function buildApp(options?: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options?.logger ?? true });

  await app.register(cors, {
    origin: buildAllowedFrontendOrigins(config.FRONTEND_ORIGIN),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-API-Key", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  registerRequestTraceHooks(app);
  registerClientLifecycle(app, { enableBootstrap: options?.enableInfraBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP });
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (options?.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app, options?.infrastructureHealth);
  }
  await registerApiRoutes(app, { query: { pipeline: options?.pipeline ?? createQueryPipeline() } });

  return app;
}
