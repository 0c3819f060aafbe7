import { logError, truncateForLog, type CorrelationContext } from "../../observability/logger.js";
import {
  ANSWER_PREVIEW_MAX_CHARS,
  CHUNK_PREVIEW_MAX_CHARS,
  emitPipelineEvent,
  type PerformanceOperation,
  type PipelineEvent,
  type PipelineEventSink
} from "../../observability/pipeline-events.js";
import { NO_CONTEXT_ANSWER } from "../../prompts/index.js";
import type { UserDirectory } from "../../auth/api-key.js";
import { collectionLabel, READY_COLLECTION_STATUS, type CollectionStore } from "../collections/collection-repository.js";
import type { PolicyEngine } from "../policy/policy-engine.js";
import type { ContentType } from "../policy/types.js";
import { expandQuery } from "../rag/query-expansion.js";
import { MAX_RERANK_CANDIDATES, rerankCandidates, type RerankInput } from "../rag/reranker.js";
import type { AnswerGenerator, Candidate, EmbeddingProvider, GeneratedAnswer, RerankOutcome, SimilaritySearch } from "../rag/types.js";
import {
  CallerError,
  CollaboratorError,
  InternalError,
  PipelineCancelledError,
  PolicyViolationError,
  toPipelineError
} from "./errors.js";
import { buildProvenance, summarizeScores } from "./provenance.js";
import {
  DEFAULT_SCORE_THRESHOLD,
  DEFAULT_TOP_K,
  MAX_TOP_K,
  type PipelineOutcome,
  type PipelineQuery,
  type PipelineResult,
  type PipelineRunOptions,
  type PipelineStage
} from "./types.js";

export interface QueryPipelineDependencies {
  policyEngine: PolicyEngine;
  users: UserDirectory;
  collections: CollectionStore;
  embeddings: EmbeddingProvider;
  similaritySearch: SimilaritySearch;
  generator: AnswerGenerator;
  rerank?: (input: RerankInput) => Promise<RerankOutcome>;
  events?: PipelineEventSink;
  now?: () => number;
  logError?: typeof logError;
}

type ResolvedParameters = {
  question: string;
  collectionId: string;
  topK: number;
  scoreThreshold: number;
  enableReranking: boolean;
};

type RunTrace = {
  stage: PipelineStage;
  context: CorrelationContext;
  startedAt: number;
  signal?: AbortSignal;
};

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export const validateParameters = (query: PipelineQuery): ResolvedParameters => {
  const topK = query.topK ?? DEFAULT_TOP_K;
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new CallerError("INVALID_PARAMETER", `topK must be an integer between 1 and ${MAX_TOP_K}.`, {
      field: "topK",
      value: topK
    });
  }

  const scoreThreshold = query.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
  if (!Number.isFinite(scoreThreshold) || scoreThreshold < 0 || scoreThreshold > 1) {
    throw new CallerError("INVALID_PARAMETER", "scoreThreshold must be between 0.0 and 1.0.", {
      field: "scoreThreshold",
      value: scoreThreshold
    });
  }

  if (query.question.trim().length === 0) {
    throw new CallerError("INVALID_PARAMETER", "question must not be empty.", { field: "question" });
  }
  if (query.collectionId.trim().length === 0) {
    throw new CallerError("INVALID_PARAMETER", "collectionId must not be empty.", { field: "collectionId" });
  }

  return {
    question: query.question,
    collectionId: query.collectionId.trim(),
    topK,
    scoreThreshold,
    enableReranking: query.enableReranking ?? true
  };
};

export const retrievalLimit = (topK: number, enableReranking: boolean): number =>
  enableReranking ? Math.min(topK * 2, MAX_RERANK_CANDIDATES) : topK;

/**
 * Runs one question through validation, ownership checks, the three policy
 * gates, retrieval, optional rerank and answer generation. Every failure is
 * returned as a payload; `run` itself never rejects.
 */
export class QueryPipeline {
  private readonly now: () => number;

  private readonly rerank: (input: RerankInput) => Promise<RerankOutcome>;

  private readonly logError: typeof logError;

  constructor(private readonly dependencies: QueryPipelineDependencies) {
    this.now = dependencies.now ?? Date.now;
    this.rerank = dependencies.rerank ?? ((input) => rerankCandidates(input));
    this.logError = dependencies.logError ?? logError;
  }

  async run(query: PipelineQuery, options: PipelineRunOptions = {}): Promise<PipelineOutcome> {
    const trace: RunTrace = {
      stage: "validation",
      startedAt: this.now(),
      signal: options.signal,
      context: {
        requestId: options.requestId ?? null,
        sessionId: query.sessionId ?? null,
        collectionId: query.collectionId,
        userId: null
      }
    };

    try {
      const result = await this.execute(query, trace);
      this.emitPerformance(trace, "pipeline", trace.startedAt, true);
      return { ok: true, result };
    } catch (error) {
      const pipelineError = toPipelineError(error);
      if (pipelineError instanceof InternalError) {
        const cause = error instanceof Error ? error : new Error(String(error));
        this.logError("pipeline.unexpected_error", trace.context, {
          stage: trace.stage,
          error: cause.message,
          error_name: cause.name,
          stack: cause.stack ?? null
        });
      }
      this.emit(trace, {
        type: "error",
        kind: pipelineError.kind,
        code: pipelineError.code,
        message: pipelineError.message,
        stage: trace.stage
      });
      this.emitPerformance(trace, "pipeline", trace.startedAt, false);
      return { ok: false, error: pipelineError.toPayload() };
    }
  }

  private async execute(query: PipelineQuery, trace: RunTrace): Promise<PipelineResult> {
    this.throwIfCancelled(trace);
    const parameters = validateParameters(query);
    this.emit(trace, {
      type: "query_received",
      questionLength: parameters.question.length,
      topK: parameters.topK,
      scoreThreshold: parameters.scoreThreshold,
      enableReranking: parameters.enableReranking
    });

    this.enterStage(trace, "authorization");
    const { userId, documentLabel } = await this.authorize(query.apiKey, parameters.collectionId);
    trace.context = { ...trace.context, userId };

    this.enterStage(trace, "question_policy");
    this.enforcePolicy(parameters.question, "USER_QUERY", trace);

    this.enterStage(trace, "query_expansion");
    const expansion = expandQuery(parameters.question);

    this.enterStage(trace, "retrieval");
    const retrieved = await this.retrieve(expansion.query, userId, parameters, trace);

    let used: Candidate[];
    let rerank: RerankOutcome | null = null;
    if (parameters.enableReranking && retrieved.length > 1) {
      this.enterStage(trace, "rerank");
      const rerankStartedAt = this.now();
      rerank = await this.rerank({
        question: parameters.question,
        candidates: retrieved,
        maxResults: parameters.topK,
        signal: trace.signal,
        requestId: trace.context.requestId ?? undefined
      });
      this.emitPerformance(trace, "rerank", rerankStartedAt, rerank.applied);
      used = rerank.candidates;
    } else {
      used = retrieved.slice(0, parameters.topK);
    }

    this.enterStage(trace, "assembly");
    if (used.length === 0) {
      return {
        answer: NO_CONTEXT_ANSWER,
        collectionId: parameters.collectionId,
        ...(query.sessionId !== undefined ? { sessionId: query.sessionId } : {}),
        sources: [],
        contextChunksUsed: 0,
        minScore: 0,
        maxScore: 0,
        rerankApplied: false,
        rerankDegraded: false,
        latencyMs: this.now() - trace.startedAt
      };
    }

    const fusedScores = new Map<Candidate, number>(
      rerank?.applied ? rerank.scored.map((entry) => [entry.candidate, entry.fusedScore]) : []
    );
    const scoreOf = (candidate: Candidate): number => fusedScores.get(candidate) ?? candidate.score;
    const sources = buildProvenance(used, scoreOf, documentLabel);
    const scores = summarizeScores(sources.map((source) => source.score));

    this.enterStage(trace, "context_policy");
    const context = used.map((candidate) => candidate.text).join("\n\n");
    this.enforcePolicy(context, "CONTEXT_CHUNK", trace);
    this.emit(trace, {
      type: "context_used",
      chunksRetrieved: retrieved.length,
      chunksUsed: used.length,
      totalContextLength: context.length,
      minScore: scores.min,
      maxScore: scores.max,
      avgScore: scores.avg,
      rerankApplied: rerank?.applied ?? false,
      rerankDegraded: rerank?.degraded ?? false,
      chunks: used.map((candidate) => ({
        id: candidate.id,
        score: scoreOf(candidate),
        preview: truncateForLog(candidate.text, CHUNK_PREVIEW_MAX_CHARS)
      }))
    });

    this.enterStage(trace, "generation");
    const answer = await this.generate(context, parameters.question, trace);

    this.enterStage(trace, "answer_policy");
    this.enforcePolicy(answer.text, "AI_RESPONSE", trace);

    this.enterStage(trace, "assembly");
    const latencyMs = this.now() - trace.startedAt;
    this.emit(trace, {
      type: "answer_produced",
      model: answer.model,
      responseLength: answer.text.length,
      processingTimeMs: latencyMs,
      preview: truncateForLog(answer.text, ANSWER_PREVIEW_MAX_CHARS)
    });

    return {
      answer: answer.text,
      collectionId: parameters.collectionId,
      ...(query.sessionId !== undefined ? { sessionId: query.sessionId } : {}),
      sources,
      contextChunksUsed: used.length,
      minScore: scores.min,
      maxScore: scores.max,
      rerankApplied: rerank?.applied ?? false,
      rerankDegraded: rerank?.degraded ?? false,
      latencyMs
    };
  }

  private async authorize(
    apiKey: string | null | undefined,
    collectionId: string
  ): Promise<{ userId: string; documentLabel: string }> {
    const userId = apiKey ? await this.dependencies.users.findUserIdByApiKey(apiKey) : null;
    if (!userId) {
      throw new CallerError("UNAUTHORIZED", "A valid API key is required.");
    }

    const collection = await this.dependencies.collections.findCollection(collectionId);
    if (!collection) {
      throw new CallerError("NOT_FOUND", "Collection not found.", { collectionId });
    }
    if (collection.ownerId !== userId) {
      throw new CallerError("FORBIDDEN", "Access to this collection is not allowed.", { collectionId });
    }
    if (collection.status !== READY_COLLECTION_STATUS) {
      throw new CallerError("COLLECTION_NOT_READY", "Collection is not ready for queries.", {
        collectionId,
        status: collection.status
      });
    }

    return { userId, documentLabel: collectionLabel(collection) };
  }

  private async retrieve(
    expandedQuery: string,
    userId: string,
    parameters: ResolvedParameters,
    trace: RunTrace
  ): Promise<Candidate[]> {
    const startedAt = this.now();
    let candidates: Candidate[];
    try {
      const vector = await this.dependencies.embeddings.embed(expandedQuery);
      this.throwIfCancelled(trace);
      candidates = await this.dependencies.similaritySearch.query({
        userNamespace: userId,
        collectionId: parameters.collectionId,
        vector,
        limit: retrievalLimit(parameters.topK, parameters.enableReranking),
        minScore: parameters.scoreThreshold
      });
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        throw error;
      }
      this.emitPerformance(trace, "retrieval", startedAt, false);
      throw new CollaboratorError("RETRIEVAL_FAILED", "Candidate retrieval failed.", { cause: error });
    }

    this.emitPerformance(trace, "retrieval", startedAt, true);
    return candidates;
  }

  private async generate(context: string, question: string, trace: RunTrace): Promise<GeneratedAnswer> {
    const startedAt = this.now();
    let answer: GeneratedAnswer;
    try {
      answer = await this.dependencies.generator.generate({ context, question });
    } catch (error) {
      this.emitPerformance(trace, "generation", startedAt, false);
      throw new CollaboratorError("GENERATION_FAILED", "Answer generation failed.", { cause: error });
    }

    this.emitPerformance(trace, "generation", startedAt, true);
    return answer;
  }

  private enforcePolicy(text: string, contentType: ContentType, trace: RunTrace): void {
    try {
      this.dependencies.policyEngine.enforce(text, contentType);
    } catch (error) {
      if (error instanceof PolicyViolationError) {
        this.emit(trace, {
          type: "policy_violation",
          contentType,
          violations: error.violations.map((violation) => ({
            kind: violation.kind,
            pattern: violation.pattern,
            severity: violation.severity
          }))
        });
      }
      throw error;
    }
  }

  private enterStage(trace: RunTrace, stage: PipelineStage): void {
    this.throwIfCancelled(trace);
    trace.stage = stage;
  }

  private throwIfCancelled(trace: RunTrace): void {
    if (trace.signal?.aborted) {
      throw new PipelineCancelledError(trace.stage);
    }
  }

  private emitPerformance(trace: RunTrace, operation: PerformanceOperation, startedAt: number, success: boolean): void {
    this.emit(trace, { type: "performance", operation, durationMs: this.now() - startedAt, success });
  }

  private emit(trace: RunTrace, event: DistributiveOmit<PipelineEvent, "context">): void {
    emitPipelineEvent(this.dependencies.events, { ...event, context: trace.context });
  }
}
