import type { PipelineErrorPayload } from "./errors.js";

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 20;
export const DEFAULT_SCORE_THRESHOLD = 0.7;

export type PipelineQuery = {
  readonly apiKey?: string | null;
  readonly question: string;
  readonly collectionId: string;
  readonly sessionId?: string;
  readonly topK?: number;
  readonly scoreThreshold?: number;
  readonly enableReranking?: boolean;
};

export type PipelineRunOptions = {
  requestId?: string;
  signal?: AbortSignal;
};

export type SourceReference = {
  candidateId: string;
  documentLabel: string;
  chunkIndex: number;
  score: number;
};

export type PipelineResult = {
  answer: string;
  collectionId: string;
  sessionId?: string;
  sources: SourceReference[];
  contextChunksUsed: number;
  minScore: number;
  maxScore: number;
  rerankApplied: boolean;
  rerankDegraded: boolean;
  latencyMs: number;
};

export type PipelineOutcome =
  | { ok: true; result: PipelineResult }
  | { ok: false; error: PipelineErrorPayload };

export type PipelineStage =
  | "validation"
  | "authorization"
  | "question_policy"
  | "query_expansion"
  | "retrieval"
  | "rerank"
  | "context_policy"
  | "generation"
  | "answer_policy"
  | "assembly";
