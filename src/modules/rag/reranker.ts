import { logInfo, logWarn } from "../../observability/logger.js";
import { recordRerank } from "../../observability/metrics.js";
import { PipelineCancelledError } from "../pipeline/errors.js";
import { mapWithConcurrency } from "./concurrency.js";
import { scoreRelevance, type ScoreRelevanceInput } from "./relevance-scorer.js";
import type { Candidate, RankMovement, RelevanceScore, RerankOutcome, ScoredCandidate } from "./types.js";

export const RELEVANCE_WEIGHT = 0.7;
export const SIMILARITY_WEIGHT = 0.3;
export const MAX_RERANK_CANDIDATES = 20;

export interface RerankInput {
  question: string;
  candidates: readonly Candidate[];
  maxResults: number;
  signal?: AbortSignal;
  requestId?: string;
}

export interface RerankDependencies {
  now?: () => number;
  scoreRelevance?: (input: ScoreRelevanceInput) => Promise<RelevanceScore>;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordRerank?: typeof recordRerank;
}

const resolveDependencies = (dependencies?: RerankDependencies) => ({
  now: dependencies?.now ?? Date.now,
  scoreRelevance: dependencies?.scoreRelevance ?? ((input: ScoreRelevanceInput) => scoreRelevance(input)),
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn,
  recordRerank: dependencies?.recordRerank ?? recordRerank
});

export const fuseScores = (relevanceScore: number, similarityScore: number): number =>
  RELEVANCE_WEIGHT * relevanceScore + SIMILARITY_WEIGHT * similarityScore;

export const isDegraded = (fallbackCount: number, scoredCount: number): boolean =>
  scoredCount > 0 && fallbackCount * 2 >= scoredCount;

// Array.prototype.sort is stable, so equal fused scores keep input order.
const sortByFusedScore = (scored: ScoredCandidate[]): ScoredCandidate[] =>
  [...scored].sort((left, right) => right.fusedScore - left.fusedScore);

const toMovements = (ranked: ScoredCandidate[]): RankMovement[] =>
  ranked.map((entry, index) => ({
    id: entry.candidate.id,
    originalRank: entry.originalRank,
    newRank: index + 1,
    relevanceScore: entry.relevanceScore,
    fusedScore: entry.fusedScore
  }));

const unchanged = (candidates: readonly Candidate[]): RerankOutcome => ({
  candidates: [...candidates],
  scored: [],
  movements: [],
  applied: false,
  degraded: false,
  fallbackCount: 0
});

/**
 * Re-scores candidates with the language model, fuses each judgment with the
 * similarity score and returns the best `maxResults`. Any failure other than
 * cancellation degrades to the original order.
 */
export const rerankCandidates = async (
  input: RerankInput,
  dependencies?: RerankDependencies
): Promise<RerankOutcome> => {
  if (input.candidates.length <= 1) {
    return unchanged(input.candidates);
  }

  const resolved = resolveDependencies(dependencies);
  const startedAt = resolved.now();
  const maxResults = Math.max(1, Math.floor(input.maxResults));

  try {
    const concurrency = Math.min(input.candidates.length, MAX_RERANK_CANDIDATES);
    const scores = await mapWithConcurrency(input.candidates, concurrency, (candidate) =>
      resolved.scoreRelevance({
        question: input.question,
        passage: candidate.text,
        signal: input.signal,
        requestId: input.requestId,
        candidateId: candidate.id
      })
    );
    if (input.signal?.aborted) {
      throw new PipelineCancelledError("rerank");
    }

    const scored: ScoredCandidate[] = input.candidates.map((candidate, index) => {
      const relevance = scores[index];
      return {
        candidate,
        relevanceScore: relevance.value,
        fusedScore: fuseScores(relevance.value, candidate.score),
        originalRank: index + 1,
        scoringFailed: relevance.fallback
      };
    });
    const ranked = sortByFusedScore(scored).slice(0, maxResults);
    const fallbackCount = scored.filter((entry) => entry.scoringFailed).length;
    const degraded = isDegraded(fallbackCount, scored.length);
    const movements = toMovements(ranked);
    const latencyMs = resolved.now() - startedAt;

    resolved.recordRerank({ durationMs: latencyMs, degraded, failed: false, scoreFallbacks: fallbackCount });
    resolved.logInfo(
      "rag.rerank.complete",
      { requestId: input.requestId ?? null },
      {
        candidate_count: input.candidates.length,
        selected_count: ranked.length,
        fallback_count: fallbackCount,
        degraded,
        latency_ms: latencyMs,
        movements: movements.map(
          (movement) =>
            `${movement.id}:${movement.originalRank}->${movement.newRank}@${movement.fusedScore.toFixed(3)}`
        )
      }
    );

    return {
      candidates: ranked.map((entry) => entry.candidate),
      scored,
      movements,
      applied: true,
      degraded,
      fallbackCount
    };
  } catch (error) {
    if (error instanceof PipelineCancelledError) {
      throw error;
    }

    const message = error instanceof Error ? error.message : "unknown reranker error";
    const latencyMs = resolved.now() - startedAt;
    resolved.recordRerank({ durationMs: latencyMs, degraded: true, failed: true, scoreFallbacks: 0 });
    resolved.logWarn(
      "rag.rerank.fallback",
      { requestId: input.requestId ?? null },
      {
        candidate_count: input.candidates.length,
        selected_count: Math.min(maxResults, input.candidates.length),
        latency_ms: latencyMs,
        error: message
      }
    );

    return {
      candidates: input.candidates.slice(0, maxResults),
      scored: [],
      movements: [],
      applied: false,
      degraded: true,
      fallbackCount: 0
    };
  }
};
