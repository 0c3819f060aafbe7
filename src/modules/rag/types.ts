export type Candidate = {
  readonly id: string;
  readonly text: string;
  readonly score: number;
  readonly chunkIndex: number;
  readonly documentLabel?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export type ScoredCandidate = {
  readonly candidate: Candidate;
  readonly relevanceScore: number;
  readonly fusedScore: number;
  readonly originalRank: number;
  readonly scoringFailed: boolean;
};

export type RelevanceScore = {
  value: number;
  fallback: boolean;
};

export type RankMovement = {
  id: string;
  originalRank: number;
  newRank: number;
  relevanceScore: number;
  fusedScore: number;
};

export type RerankOutcome = {
  candidates: Candidate[];
  scored: ScoredCandidate[];
  movements: RankMovement[];
  applied: boolean;
  degraded: boolean;
  fallbackCount: number;
};

export type SimilarityQuery = {
  userNamespace: string;
  collectionId: string;
  vector: number[];
  limit: number;
  minScore: number;
};

export interface SimilaritySearch {
  query(request: SimilarityQuery): Promise<Candidate[]>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export interface ScoringBackend {
  complete(prompt: string, signal: AbortSignal): Promise<string>;
}

export type GenerationUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type GeneratedAnswer = {
  text: string;
  model: string;
  usage: GenerationUsage;
};

export interface AnswerGenerator {
  generate(input: { context: string; question: string }): Promise<GeneratedAnswer>;
}
