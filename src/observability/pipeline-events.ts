import type { ContentType, PolicySeverity, ViolationKind } from "../modules/policy/types.js";
import type { PipelineErrorCode, PipelineErrorKind } from "../modules/pipeline/errors.js";
import { logDebug, logError, logInfo, logWarn, type CorrelationContext } from "./logger.js";
import {
  recordErrorRate,
  recordGenerationLatency,
  recordPipelineLatency,
  recordPolicyViolation,
  recordRetrievalLatency
} from "./metrics.js";

export const CHUNK_PREVIEW_MAX_CHARS = 100;
export const ANSWER_PREVIEW_MAX_CHARS = 300;

export type PerformanceOperation = "pipeline" | "retrieval" | "rerank" | "generation";

export type PipelineEvent =
  | {
      type: "query_received";
      context: CorrelationContext;
      questionLength: number;
      topK: number;
      scoreThreshold: number;
      enableReranking: boolean;
    }
  | {
      type: "context_used";
      context: CorrelationContext;
      chunksRetrieved: number;
      chunksUsed: number;
      totalContextLength: number;
      minScore: number;
      maxScore: number;
      avgScore: number;
      rerankApplied: boolean;
      rerankDegraded: boolean;
      chunks: Array<{ id: string; score: number; preview: string }>;
    }
  | {
      type: "answer_produced";
      context: CorrelationContext;
      model: string;
      responseLength: number;
      processingTimeMs: number;
      preview: string;
    }
  | {
      type: "policy_violation";
      context: CorrelationContext;
      contentType: ContentType;
      violations: Array<{ kind: ViolationKind; pattern: string; severity: PolicySeverity }>;
    }
  | {
      type: "error";
      context: CorrelationContext;
      kind: PipelineErrorKind;
      code: PipelineErrorCode;
      message: string;
      stage: string;
    }
  | {
      type: "performance";
      context: CorrelationContext;
      operation: PerformanceOperation;
      durationMs: number;
      success: boolean;
    };

export interface PipelineEventSink {
  emit(event: PipelineEvent): void | Promise<void>;
}

/**
 * Hands the event to the sink without waiting on it. Sink failures, sync or
 * async, are reported at warn level and never reach the caller.
 */
export const emitPipelineEvent = (
  sink: PipelineEventSink | undefined,
  event: PipelineEvent,
  warn: typeof logWarn = logWarn
): void => {
  if (!sink) {
    return;
  }

  const report = (error: unknown): void => {
    warn("pipeline.event_sink.failed", event.context, {
      event_type: event.type,
      error: error instanceof Error ? error.message : String(error)
    });
  };

  try {
    const pending = sink.emit(event);
    if (pending instanceof Promise) {
      pending.catch(report);
    }
  } catch (error) {
    report(error);
  }
};

export interface LoggingEventSinkDependencies {
  logInfo?: typeof logInfo;
  logDebug?: typeof logDebug;
  logWarn?: typeof logWarn;
  logError?: typeof logError;
  recordPolicyViolation?: typeof recordPolicyViolation;
  recordErrorRate?: typeof recordErrorRate;
  recordPipelineLatency?: typeof recordPipelineLatency;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  recordGenerationLatency?: typeof recordGenerationLatency;
}

const resolveDependencies = (dependencies?: LoggingEventSinkDependencies) => ({
  logInfo: dependencies?.logInfo ?? logInfo,
  logDebug: dependencies?.logDebug ?? logDebug,
  logWarn: dependencies?.logWarn ?? logWarn,
  logError: dependencies?.logError ?? logError,
  recordPolicyViolation: dependencies?.recordPolicyViolation ?? recordPolicyViolation,
  recordErrorRate: dependencies?.recordErrorRate ?? recordErrorRate,
  recordPipelineLatency: dependencies?.recordPipelineLatency ?? recordPipelineLatency,
  recordRetrievalLatency: dependencies?.recordRetrievalLatency ?? recordRetrievalLatency,
  recordGenerationLatency: dependencies?.recordGenerationLatency ?? recordGenerationLatency
});

/** Default sink: one structured log line per event, plus the matching metric. */
export const createLoggingEventSink = (dependencies?: LoggingEventSinkDependencies): PipelineEventSink => {
  const resolved = resolveDependencies(dependencies);

  return {
    emit(event) {
      switch (event.type) {
        case "query_received":
          resolved.logInfo("pipeline.query_received", event.context, {
            question_length: event.questionLength,
            top_k: event.topK,
            score_threshold: event.scoreThreshold,
            enable_reranking: event.enableReranking
          });
          return;
        case "context_used":
          resolved.logInfo("pipeline.context_used", event.context, {
            chunks_retrieved: event.chunksRetrieved,
            chunks_used: event.chunksUsed,
            total_context_length: event.totalContextLength,
            min_score: event.minScore,
            max_score: event.maxScore,
            avg_score: event.avgScore,
            rerank_applied: event.rerankApplied,
            rerank_degraded: event.rerankDegraded,
            chunks: event.chunks
          });
          return;
        case "answer_produced":
          resolved.logInfo("pipeline.answer_produced", event.context, {
            model: event.model,
            response_length: event.responseLength,
            processing_time_ms: event.processingTimeMs,
            preview: event.preview
          });
          return;
        case "policy_violation":
          for (const violation of event.violations) {
            resolved.recordPolicyViolation(violation.kind);
          }
          resolved.logWarn("pipeline.policy_violation", event.context, {
            content_type: event.contentType,
            violations: event.violations
          });
          return;
        case "error":
          resolved.recordErrorRate(`pipeline_${event.code.toLowerCase()}`);
          (event.kind === "internal" ? resolved.logError : resolved.logWarn)("pipeline.error", event.context, {
            kind: event.kind,
            code: event.code,
            message: event.message,
            stage: event.stage
          });
          return;
        case "performance":
          if (event.operation === "pipeline") {
            resolved.recordPipelineLatency(event.durationMs);
          } else if (event.operation === "retrieval") {
            resolved.recordRetrievalLatency(event.durationMs);
          } else if (event.operation === "generation") {
            resolved.recordGenerationLatency(event.durationMs);
          }
          resolved.logDebug("pipeline.performance", event.context, {
            operation: event.operation,
            duration_ms: event.durationMs,
            success: event.success
          });
          return;
      }
    }
  };
};
