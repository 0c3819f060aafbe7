import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface RerankSummary {
  runs: number;
  degradedRuns: number;
  failedRuns: number;
  scoreFallbacks: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  pipelineLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  rerankLatency: LatencySummary;
  generationLatency: LatencySummary;
  rerank: RerankSummary;
  policyViolations: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createRerankSummary = (): RerankSummary => ({
  runs: 0,
  degradedRuns: 0,
  failedRuns: 0,
  scoreFallbacks: 0
});

const state: MetricsState = {
  requestLatency: createLatencySummary(),
  pipelineLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  rerankLatency: createLatencySummary(),
  generationLatency: createLatencySummary(),
  rerank: createRerankSummary(),
  policyViolations: {},
  errorRates: {}
};

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordPipelineLatency = (durationMs: number): void => {
  recordLatency(state.pipelineLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordGenerationLatency = (durationMs: number): void => {
  recordLatency(state.generationLatency, durationMs);
};

export const recordRerank = (outcome: {
  durationMs: number;
  degraded: boolean;
  failed: boolean;
  scoreFallbacks: number;
}): void => {
  recordLatency(state.rerankLatency, outcome.durationMs);
  state.rerank.runs += 1;
  state.rerank.degradedRuns += outcome.degraded ? 1 : 0;
  state.rerank.failedRuns += outcome.failed ? 1 : 0;
  state.rerank.scoreFallbacks += Math.max(0, outcome.scoreFallbacks);
};

export const recordPolicyViolation = (kind: string): void => {
  state.policyViolations[kind] = (state.policyViolations[kind] ?? 0) + 1;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  pipeline_latency: serializeLatency(state.pipelineLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  rerank_latency: serializeLatency(state.rerankLatency),
  generation_latency: serializeLatency(state.generationLatency),
  rerank: { ...state.rerank },
  policy_violations: { ...state.policyViolations },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state.requestLatency = createLatencySummary();
  state.pipelineLatency = createLatencySummary();
  state.retrievalLatency = createLatencySummary();
  state.rerankLatency = createLatencySummary();
  state.generationLatency = createLatencySummary();
  state.rerank = createRerankSummary();
  state.policyViolations = {};
  state.errorRates = {};
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
