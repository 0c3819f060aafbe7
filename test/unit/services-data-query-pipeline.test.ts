import { describe, expect, it } from "vitest";
import { SAFE_PROCESSING_ERROR_MESSAGE } from "../../src/modules/pipeline/errors.js";
import { retrievalLimit, validateParameters } from "../../src/modules/pipeline/query-pipeline.js";
import type { PipelineOutcome, PipelineQuery } from "../../src/modules/pipeline/types.js";
import { NO_CONTEXT_ANSWER } from "../../src/prompts/index.js";
import { makeCandidate } from "../../tests/helpers/candidates.js";
import {
  createPipelineHarness,
  readyCollection,
  TEST_API_KEY,
  TEST_COLLECTION_ID,
  TEST_USER_ID
} from "../../tests/helpers/pipeline-harness.js";

const QUESTION = "What is the refund policy for annual plans?";

const query = (overrides: Partial<PipelineQuery> = {}): PipelineQuery => ({
  apiKey: TEST_API_KEY,
  question: QUESTION,
  collectionId: TEST_COLLECTION_ID,
  sessionId: "session-1",
  ...overrides
});

const refundPassage = makeCandidate("A", 0.9, {
  text: "Refunds are accepted within 30 days.",
  documentLabel: "policy.pdf"
});
const renewalPassage = makeCandidate("B", 0.8, { text: "Annual plans renew each year.", chunkIndex: 3 });

const errorOf = (outcome: PipelineOutcome) => (outcome.ok ? null : outcome.error);

describe("modules/pipeline/query-pipeline", () => {
  it("reranks candidates and reports provenance in generation order", async () => {
    const harness = createPipelineHarness({
      candidates: [refundPassage, renewalPassage],
      relevance: { [refundPassage.text]: 0.2, [renewalPassage.text]: 0.9 }
    });

    const outcome = await harness.pipeline.run(query(), { requestId: "req-1" });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }
    const { result } = outcome;
    expect(result.answer).toBe("Refunds are accepted within 30 days.");
    expect(result.collectionId).toBe(TEST_COLLECTION_ID);
    expect(result.sessionId).toBe("session-1");
    expect(result.sources.map((source) => [source.candidateId, source.documentLabel, source.chunkIndex])).toEqual([
      ["B", "Handbook", 3],
      ["A", "policy.pdf", 0]
    ]);
    expect(result.sources[0]?.score).toBeCloseTo(0.87, 10);
    expect(result.sources[1]?.score).toBeCloseTo(0.41, 10);
    expect(result.maxScore).toBeCloseTo(0.87, 10);
    expect(result.minScore).toBeCloseTo(0.41, 10);
    expect(result).toMatchObject({ contextChunksUsed: 2, rerankApplied: true, rerankDegraded: false, latencyMs: 0 });

    expect(harness.embeddings.embed).toHaveBeenCalledWith(`${QUESTION} refund policy annual plans`);
    expect(harness.similaritySearch.query).toHaveBeenCalledWith({
      userNamespace: TEST_USER_ID,
      collectionId: TEST_COLLECTION_ID,
      vector: [0.1, 0.2],
      limit: 10,
      minScore: 0.7
    });
    expect(harness.rerank).toHaveBeenCalledWith(
      expect.objectContaining({ question: QUESTION, maxResults: 5, requestId: "req-1" })
    );
    expect(harness.generator.generate).toHaveBeenCalledWith({
      context: "Annual plans renew each year.\n\nRefunds are accepted within 30 days.",
      question: QUESTION
    });
  });

  it("truncates to topK without calling the reranker when reranking is off", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage, renewalPassage] });

    const outcome = await harness.pipeline.run(query({ topK: 1, enableReranking: false }));

    expect(harness.similaritySearch.query).toHaveBeenCalledWith(expect.objectContaining({ limit: 1 }));
    expect(harness.rerank).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      ok: true,
      result: {
        sources: [{ candidateId: "A", documentLabel: "policy.pdf", chunkIndex: 0, score: 0.9 }],
        contextChunksUsed: 1,
        minScore: 0.9,
        maxScore: 0.9,
        rerankApplied: false
      }
    });
  });

  it("skips the reranker for a single candidate", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage] });

    const outcome = await harness.pipeline.run(query());

    expect(harness.rerank).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ ok: true, result: { contextChunksUsed: 1, rerankApplied: false } });
  });

  it("caps the candidate request at 20 when reranking", () => {
    expect(retrievalLimit(5, true)).toBe(10);
    expect(retrievalLimit(15, true)).toBe(20);
    expect(retrievalLimit(15, false)).toBe(15);
  });

  it("answers with the no-context message when nothing is retrieved", async () => {
    const harness = createPipelineHarness({ candidates: [] });

    const outcome = await harness.pipeline.run(query());

    expect(outcome).toEqual({
      ok: true,
      result: {
        answer: NO_CONTEXT_ANSWER,
        collectionId: TEST_COLLECTION_ID,
        sessionId: "session-1",
        sources: [],
        contextChunksUsed: 0,
        minScore: 0,
        maxScore: 0,
        rerankApplied: false,
        rerankDegraded: false,
        latencyMs: 0
      }
    });
    expect(harness.generator.generate).not.toHaveBeenCalled();
  });

  it.each([
    [{ topK: 0 }, "topK"],
    [{ topK: 21 }, "topK"],
    [{ topK: 2.5 }, "topK"],
    [{ scoreThreshold: -0.1 }, "scoreThreshold"],
    [{ scoreThreshold: 1.5 }, "scoreThreshold"],
    [{ question: "   " }, "question"]
  ])("rejects %o as an invalid parameter", async (overrides, field) => {
    const harness = createPipelineHarness();

    const error = errorOf(await harness.pipeline.run(query(overrides)));

    expect(error).toMatchObject({ kind: "caller", code: "INVALID_PARAMETER", statusCode: 400, details: { field } });
    expect(harness.users.findUserIdByApiKey).not.toHaveBeenCalled();
  });

  it("accepts the parameter bounds", () => {
    expect(validateParameters(query({ topK: 20, scoreThreshold: 0 }))).toMatchObject({ topK: 20, scoreThreshold: 0 });
    expect(validateParameters(query({ topK: 1, scoreThreshold: 1 }))).toMatchObject({ topK: 1, scoreThreshold: 1 });
    expect(validateParameters({ question: "q", collectionId: " col-1 " })).toEqual({
      question: "q",
      collectionId: "col-1",
      topK: 5,
      scoreThreshold: 0.7,
      enableReranking: true
    });
  });

  it("rejects unknown and missing API keys", async () => {
    const harness = createPipelineHarness();

    const unknown = errorOf(await harness.pipeline.run(query({ apiKey: "other-key" })));
    const missing = errorOf(await harness.pipeline.run(query({ apiKey: null })));

    expect(unknown).toEqual({
      kind: "caller",
      code: "UNAUTHORIZED",
      statusCode: 401,
      message: "A valid API key is required."
    });
    expect(missing?.code).toBe("UNAUTHORIZED");
    expect(harness.users.findUserIdByApiKey).toHaveBeenCalledTimes(1);
  });

  it("maps collection lookups to not found, forbidden and not ready", async () => {
    const missing = createPipelineHarness({ collection: null });
    const foreign = createPipelineHarness({ collection: readyCollection({ ownerId: "user-2" }) });
    const processing = createPipelineHarness({ collection: readyCollection({ status: "processing" }) });

    expect(errorOf(await missing.pipeline.run(query()))).toMatchObject({ code: "NOT_FOUND", statusCode: 404 });
    expect(errorOf(await foreign.pipeline.run(query()))).toMatchObject({ code: "FORBIDDEN", statusCode: 403 });
    expect(errorOf(await processing.pipeline.run(query()))).toEqual({
      kind: "caller",
      code: "COLLECTION_NOT_READY",
      statusCode: 412,
      message: "Collection is not ready for queries.",
      details: { collectionId: TEST_COLLECTION_ID, status: "processing" }
    });
  });

  it("stops a policy-violating question before retrieval", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage] });

    const error = errorOf(await harness.pipeline.run(query({ question: "My SSN is 123-45-6789" })));

    expect(error).toEqual({
      kind: "policy",
      code: "CONTENT_POLICY_VIOLATION",
      statusCode: 400,
      message: "Content policy violation detected: CONFIDENTIAL_DATA:SSN",
      details: { contentType: "USER_QUERY", violations: ["CONFIDENTIAL_DATA:SSN"] }
    });
    expect(harness.embeddings.embed).not.toHaveBeenCalled();
    expect(harness.events.find((event) => event.type === "policy_violation")).toMatchObject({
      contentType: "USER_QUERY",
      violations: [{ kind: "CONFIDENTIAL_DATA", pattern: "SSN", severity: "HIGH" }],
      context: { userId: TEST_USER_ID }
    });
  });

  it("stops when the merged context violates policy", async () => {
    const harness = createPipelineHarness({
      candidates: [makeCandidate("C", 0.9, { text: "Escalate to EMP123456." })]
    });

    const error = errorOf(await harness.pipeline.run(query()));

    expect(error).toMatchObject({
      code: "CONTENT_POLICY_VIOLATION",
      details: { contentType: "CONTEXT_CHUNK", violations: ["ORGANIZATION_CONFIDENTIAL:EMPLOYEE_ID"] }
    });
    expect(harness.generator.generate).not.toHaveBeenCalled();
  });

  it("stops when the generated answer violates policy", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage], answer: "Call 555-123-4567 for refunds." });

    const error = errorOf(await harness.pipeline.run(query()));

    expect(error).toMatchObject({
      code: "CONTENT_POLICY_VIOLATION",
      message: "Content policy violation detected: CONFIDENTIAL_DATA:PHONE",
      details: { contentType: "AI_RESPONSE" }
    });
  });

  it("reports embedding and search failures as retrieval failures", async () => {
    const embedFails = createPipelineHarness({ candidates: [refundPassage] });
    embedFails.embeddings.embed.mockRejectedValueOnce(new Error("openai down"));
    const searchFails = createPipelineHarness();
    searchFails.similaritySearch.query.mockRejectedValueOnce(new Error("qdrant down"));

    const expected = {
      kind: "collaborator",
      code: "RETRIEVAL_FAILED",
      statusCode: 502,
      message: "Candidate retrieval failed."
    };
    expect(errorOf(await embedFails.pipeline.run(query()))).toEqual(expected);
    expect(errorOf(await searchFails.pipeline.run(query()))).toEqual(expected);
  });

  it("reports generation failures", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage] });
    harness.generator.generate.mockRejectedValueOnce(new Error("rate limited"));

    expect(errorOf(await harness.pipeline.run(query()))).toEqual({
      kind: "collaborator",
      code: "GENERATION_FAILED",
      statusCode: 502,
      message: "Answer generation failed."
    });
  });

  it("hides unexpected errors behind a generic message and logs the detail", async () => {
    const harness = createPipelineHarness();
    harness.collections.findCollection.mockRejectedValueOnce(new Error("connection reset"));

    const error = errorOf(await harness.pipeline.run(query(), { requestId: "req-9" }));

    expect(error).toEqual({
      kind: "internal",
      code: "PROCESSING_ERROR",
      statusCode: 500,
      message: SAFE_PROCESSING_ERROR_MESSAGE
    });
    expect(harness.logError).toHaveBeenCalledWith(
      "pipeline.unexpected_error",
      expect.objectContaining({ requestId: "req-9" }),
      expect.objectContaining({ stage: "authorization", error: "connection reset", error_name: "Error" })
    );
  });

  it("emits lifecycle events in stage order", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage, renewalPassage] });

    await harness.pipeline.run(query());

    expect(
      harness.events.map((event) => (event.type === "performance" ? `performance:${event.operation}` : event.type))
    ).toEqual([
      "query_received",
      "performance:retrieval",
      "performance:rerank",
      "context_used",
      "performance:generation",
      "answer_produced",
      "performance:pipeline"
    ]);
    expect(harness.events[0]?.context.userId).toBeNull();
    expect(harness.events[1]?.context.userId).toBe(TEST_USER_ID);
  });

  it("emits an error event naming the failing stage", async () => {
    const harness = createPipelineHarness();

    await harness.pipeline.run(query({ apiKey: "other-key" }));

    expect(harness.events.find((event) => event.type === "error")).toMatchObject({
      kind: "caller",
      code: "UNAUTHORIZED",
      stage: "authorization"
    });
  });

  it("ignores a failing event sink", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage] });
    harness.sink.emit.mockImplementation(() => {
      throw new Error("sink down");
    });

    const outcome = await harness.pipeline.run(query());

    expect(outcome.ok).toBe(true);
  });

  it("returns a cancelled outcome for an already aborted request", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage] });
    const controller = new AbortController();
    controller.abort();

    const error = errorOf(await harness.pipeline.run(query(), { signal: controller.signal }));

    expect(error).toMatchObject({ code: "REQUEST_CANCELLED", statusCode: 499, details: { stage: "validation" } });
    expect(harness.users.findUserIdByApiKey).not.toHaveBeenCalled();
  });

  it("abandons the request when it is cancelled mid-retrieval", async () => {
    const harness = createPipelineHarness({ candidates: [refundPassage] });
    const controller = new AbortController();
    harness.embeddings.embed.mockImplementationOnce(async () => {
      controller.abort();
      return [0.1, 0.2];
    });

    const error = errorOf(await harness.pipeline.run(query(), { signal: controller.signal }));

    expect(error).toMatchObject({ code: "REQUEST_CANCELLED", details: { stage: "retrieval" } });
    expect(harness.similaritySearch.query).not.toHaveBeenCalled();
    expect(harness.generator.generate).not.toHaveBeenCalled();
  });
});
