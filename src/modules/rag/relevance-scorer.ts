import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { logDebug } from "../../observability/logger.js";
import { RELEVANCE_SCORER_SYSTEM_PROMPT, buildRelevancePrompt } from "../../prompts/index.js";
import { PipelineCancelledError } from "../pipeline/errors.js";
import type { RelevanceScore, ScoringBackend } from "./types.js";

export const RELEVANCE_FALLBACK_SCORE = 0.5;
const MAX_RAW_SCORE = 10;
const POSITIVE_CUE_SCORE = 7;
const NEGATIVE_CUE_SCORE = 3;
const POSITIVE_CUES = ["relevant", "good", "yes"];

export class ScoreTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Relevance scoring timed out after ${timeoutMs}ms.`);
    this.name = "ScoreTimeoutError";
  }
}

export interface ScoreRelevanceInput {
  question: string;
  passage: string;
  signal?: AbortSignal;
  requestId?: string;
  candidateId?: string;
}

export class ScoreResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScoreResponseError";
  }
}

export type ScoringCompletionRequest = {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: Array<{ role: "system"; content: string } | { role: "user"; content: string }>;
};

export type ScoringCompletionResponse = {
  choices: Array<{ message?: { content: string | null } }>;
};

export interface OpenAIScoringBackendDependencies {
  createCompletion?: (
    request: ScoringCompletionRequest,
    signal: AbortSignal
  ) => Promise<ScoringCompletionResponse>;
  model?: string;
}

const SCORING_TEMPERATURE = 0.1;
const SCORING_MAX_TOKENS = 10;

// No client retries: the per-call scoring timeout is the whole budget.
const createCompletionWithOpenAI = async (
  request: ScoringCompletionRequest,
  signal: AbortSignal
): Promise<ScoringCompletionResponse> => {
  const { client } = await getOpenAIClient();
  return client.chat.completions.create({ ...request, stream: false }, { signal, maxRetries: 0 });
};

/** Chat-completion scoring backend. A reply without message content is a malformed response. */
export const createOpenAIScoringBackend = (dependencies?: OpenAIScoringBackendDependencies): ScoringBackend => {
  const createCompletion = dependencies?.createCompletion ?? createCompletionWithOpenAI;

  return {
    async complete(prompt, signal) {
      const completion = await createCompletion(
        {
          model: dependencies?.model ?? config.OPENAI_RERANK_MODEL,
          temperature: SCORING_TEMPERATURE,
          max_tokens: SCORING_MAX_TOKENS,
          messages: [
            { role: "system", content: RELEVANCE_SCORER_SYSTEM_PROMPT },
            { role: "user", content: prompt }
          ]
        },
        signal
      );

      const content = completion.choices[0]?.message?.content;
      if (content === null || content === undefined) {
        throw new ScoreResponseError("Scoring response missing message content.");
      }
      return content;
    }
  };
};

export interface RelevanceScorerDependencies {
  complete?: ScoringBackend["complete"];
  timeoutMs?: number;
  logDebug?: typeof logDebug;
}

const defaultScoringBackend = createOpenAIScoringBackend();

const resolveDependencies = (dependencies?: RelevanceScorerDependencies) => ({
  complete: dependencies?.complete ?? defaultScoringBackend.complete,
  timeoutMs: dependencies?.timeoutMs ?? config.RERANK_SCORE_TIMEOUT_MS,
  logDebug: dependencies?.logDebug ?? logDebug
});

/**
 * Reads a 0-10 score out of a model reply. The first number wins and is
 * clamped; replies without digits fall back to a coarse lexical cue.
 */
export const parseRelevanceReply = (reply: string): number => {
  const match = reply.match(/\d+(?:\.\d+)?|\.\d+/);
  if (match) {
    const parsed = Number.parseFloat(match[0]);
    if (Number.isFinite(parsed)) {
      return Math.max(0, Math.min(MAX_RAW_SCORE, parsed));
    }
  }

  const lowered = reply.toLowerCase();
  return POSITIVE_CUES.some((cue) => lowered.includes(cue)) ? POSITIVE_CUE_SCORE : NEGATIVE_CUE_SCORE;
};

/**
 * Runs `operation` with its own abort signal. The returned promise settles on
 * whichever comes first: the operation, the timeout, or the parent signal.
 */
const runBounded = <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const onParentAbort = (): void => {
      controller.abort(parent?.reason);
      cleanup();
      reject(new PipelineCancelledError("rerank.score"));
    };
    const timeoutHandle = setTimeout(() => {
      const error = new ScoreTimeoutError(timeoutMs);
      controller.abort(error);
      cleanup();
      reject(error);
    }, timeoutMs);
    const cleanup = (): void => {
      clearTimeout(timeoutHandle);
      parent?.removeEventListener("abort", onParentAbort);
    };

    parent?.addEventListener("abort", onParentAbort, { once: true });
    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }
    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });

const fallback = (): RelevanceScore => ({ value: RELEVANCE_FALLBACK_SCORE, fallback: true });

export const scoreRelevance = async (
  input: ScoreRelevanceInput,
  dependencies?: RelevanceScorerDependencies
): Promise<RelevanceScore> => {
  const resolved = resolveDependencies(dependencies);
  if (input.signal?.aborted) {
    throw new PipelineCancelledError("rerank.score");
  }

  const prompt = buildRelevancePrompt(input.question, input.passage);
  try {
    const reply = await runBounded((signal) => resolved.complete(prompt, signal), resolved.timeoutMs, input.signal);
    return { value: parseRelevanceReply(reply) / MAX_RAW_SCORE, fallback: false };
  } catch (error) {
    if (error instanceof PipelineCancelledError || input.signal?.aborted) {
      throw error instanceof PipelineCancelledError ? error : new PipelineCancelledError("rerank.score");
    }

    resolved.logDebug(
      "rag.score.fallback",
      { requestId: input.requestId ?? null },
      {
        candidate_id: input.candidateId ?? null,
        error: error instanceof Error ? error.message : String(error)
      }
    );
    return fallback();
  }
};
