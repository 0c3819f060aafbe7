import type { Candidate } from "../rag/types.js";
import type { SourceReference } from "./types.js";

export type ScoreSummary = {
  min: number;
  max: number;
  avg: number;
};

export const summarizeScores = (scores: readonly number[]): ScoreSummary => {
  if (scores.length === 0) {
    return { min: 0, max: 0, avg: 0 };
  }
  const total = scores.reduce((sum, score) => sum + score, 0);
  return {
    min: Math.min(...scores),
    max: Math.max(...scores),
    avg: total / scores.length
  };
};

/** One entry per candidate, in the order the candidates were given to generation. */
export const buildProvenance = (
  candidates: readonly Candidate[],
  scoreOf: (candidate: Candidate) => number,
  fallbackLabel: string
): SourceReference[] =>
  candidates.map((candidate) => ({
    candidateId: candidate.id,
    documentLabel: candidate.documentLabel ?? fallbackLabel,
    chunkIndex: candidate.chunkIndex,
    score: scoreOf(candidate)
  }));
