import { describe, expect, it, vi } from "vitest";
import {
  createLoggingEventSink,
  emitPipelineEvent,
  type PipelineEvent
} from "../../src/observability/pipeline-events.js";

const context = { requestId: "req-1", userId: "user-1" };

const performance = (operation: "pipeline" | "retrieval" | "rerank" | "generation"): PipelineEvent => ({
  type: "performance",
  context,
  operation,
  durationMs: 12,
  success: true
});

const sinkDependencies = () => ({
  logInfo: vi.fn(),
  logDebug: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
  recordPolicyViolation: vi.fn(),
  recordErrorRate: vi.fn(),
  recordPipelineLatency: vi.fn(),
  recordRetrievalLatency: vi.fn(),
  recordGenerationLatency: vi.fn()
});

describe("emitPipelineEvent", () => {
  it("does nothing without a sink", () => {
    const warn = vi.fn();

    emitPipelineEvent(undefined, performance("pipeline"), warn);

    expect(warn).not.toHaveBeenCalled();
  });

  it("reports a sink that throws", () => {
    const warn = vi.fn();

    emitPipelineEvent(
      {
        emit: () => {
          throw new Error("sink down");
        }
      },
      performance("retrieval"),
      warn
    );

    expect(warn).toHaveBeenCalledWith("pipeline.event_sink.failed", context, {
      event_type: "performance",
      error: "sink down"
    });
  });

  it("reports a sink that rejects without waiting on it", async () => {
    const warn = vi.fn();

    emitPipelineEvent({ emit: () => Promise.reject(new Error("queue full")) }, performance("generation"), warn);
    expect(warn).not.toHaveBeenCalled();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(warn).toHaveBeenCalledWith("pipeline.event_sink.failed", context, {
      event_type: "performance",
      error: "queue full"
    });
  });
});

describe("createLoggingEventSink", () => {
  it("counts every policy violation by kind", () => {
    const dependencies = sinkDependencies();

    createLoggingEventSink(dependencies).emit({
      type: "policy_violation",
      context,
      contentType: "USER_QUERY",
      violations: [
        { kind: "TOXIC_CONTENT", pattern: "kill", severity: "HIGH" },
        { kind: "THREAT", pattern: "threat_pattern", severity: "CRITICAL" }
      ]
    });

    expect(dependencies.recordPolicyViolation.mock.calls).toEqual([["TOXIC_CONTENT"], ["THREAT"]]);
    expect(dependencies.logWarn).toHaveBeenCalledWith(
      "pipeline.policy_violation",
      context,
      expect.objectContaining({ content_type: "USER_QUERY" })
    );
  });

  it("logs internal errors at error level and caller errors at warn level", () => {
    const dependencies = sinkDependencies();
    const sink = createLoggingEventSink(dependencies);

    sink.emit({ type: "error", context, kind: "internal", code: "PROCESSING_ERROR", message: "m", stage: "generation" });
    sink.emit({ type: "error", context, kind: "caller", code: "UNAUTHORIZED", message: "m", stage: "authorization" });

    expect(dependencies.logError).toHaveBeenCalledTimes(1);
    expect(dependencies.logWarn).toHaveBeenCalledWith("pipeline.error", context, {
      kind: "caller",
      code: "UNAUTHORIZED",
      message: "m",
      stage: "authorization"
    });
    expect(dependencies.recordErrorRate.mock.calls).toEqual([["pipeline_processing_error"], ["pipeline_unauthorized"]]);
  });

  it("routes performance events to the matching latency summary", () => {
    const dependencies = sinkDependencies();
    const sink = createLoggingEventSink(dependencies);

    for (const operation of ["pipeline", "retrieval", "rerank", "generation"] as const) {
      sink.emit(performance(operation));
    }

    expect(dependencies.recordPipelineLatency).toHaveBeenCalledWith(12);
    expect(dependencies.recordRetrievalLatency).toHaveBeenCalledWith(12);
    expect(dependencies.recordGenerationLatency).toHaveBeenCalledWith(12);
    expect(dependencies.logDebug).toHaveBeenCalledTimes(4);
  });

  it("logs answers with their preview", () => {
    const dependencies = sinkDependencies();

    createLoggingEventSink(dependencies).emit({
      type: "answer_produced",
      context,
      model: "gpt-test",
      responseLength: 5,
      processingTimeMs: 40,
      preview: "Hello"
    });

    expect(dependencies.logInfo).toHaveBeenCalledWith("pipeline.answer_produced", context, {
      model: "gpt-test",
      response_length: 5,
      processing_time_ms: 40,
      preview: "Hello"
    });
  });
});
