import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { extractApiKey } from "../../auth/api-key.js";
import type { PipelineErrorPayload } from "../../modules/pipeline/errors.js";
import type { QueryPipeline } from "../../modules/pipeline/query-pipeline.js";
import type { PipelineResult } from "../../modules/pipeline/types.js";
import { logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

const queryBodySchema = z.object({
  question: z.string().min(1, "question is required"),
  collection_id: z.string().min(1, "collection_id is required"),
  session_id: z.string().min(1).optional(),
  top_k: z.number().int().optional(),
  score_threshold: z.number().optional(),
  enable_reranking: z.boolean().optional()
});

export type QueryPipelinePort = Pick<QueryPipeline, "run">;

export interface QueryRoutesDependencies {
  pipeline: QueryPipelinePort;
}

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export const toResponseData = (result: PipelineResult) => ({
  answer: result.answer,
  collection_id: result.collectionId,
  session_id: result.sessionId ?? null,
  sources: result.sources.map((source) => ({
    candidate_id: source.candidateId,
    document_label: source.documentLabel,
    chunk_index: source.chunkIndex,
    score: source.score
  })),
  context_chunks_used: result.contextChunksUsed,
  min_score: result.minScore,
  max_score: result.maxScore,
  rerank_applied: result.rerankApplied,
  rerank_degraded: result.rerankDegraded,
  latency_ms: result.latencyMs
});

export const toErrorBody = (error: PipelineErrorPayload) => ({
  success: false,
  error: {
    kind: error.kind,
    code: error.code,
    message: error.message,
    ...(error.details ? { details: error.details } : {})
  }
});

const buildQueryHandler = (dependencies: QueryRoutesDependencies) =>
  async (request: FastifyRequest, reply: FastifyReply) => {
    const requestId = resolveRequestId(request);
    const parsed = queryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    // Client disconnects abort the pipeline between stages.
    const controller = new AbortController();
    reply.raw.once("close", () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    const body = parsed.data;
    const outcome = await dependencies.pipeline.run(
      {
        apiKey: extractApiKey(request),
        question: body.question,
        collectionId: body.collection_id,
        sessionId: body.session_id,
        topK: body.top_k,
        scoreThreshold: body.score_threshold,
        enableReranking: body.enable_reranking
      },
      { requestId, signal: controller.signal }
    );

    if (!outcome.ok) {
      reply.code(outcome.error.statusCode);
      return toErrorBody(outcome.error);
    }

    logInfo(
      "api.query.complete",
      { requestId, sessionId: body.session_id ?? null, collectionId: body.collection_id },
      {
        context_chunks_used: outcome.result.contextChunksUsed,
        rerank_applied: outcome.result.rerankApplied,
        latency_ms: outcome.result.latencyMs
      }
    );
    return { success: true, data: toResponseData(outcome.result) };
  };

export async function registerQueryRoutes(app: FastifyInstance, dependencies: QueryRoutesDependencies): Promise<void> {
  app.post("/api/v1/chat/query", buildQueryHandler(dependencies));
}
