import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import type { EmbeddingProvider } from "./types.js";

export class EmbeddingResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmbeddingResponseError";
  }
}

export type EmbeddingRequest = { model: string; input: string };

export type EmbeddingResponse = { data: Array<{ embedding: number[] }> };

export interface OpenAIEmbeddingDependencies {
  createEmbedding?: (request: EmbeddingRequest) => Promise<EmbeddingResponse>;
  model?: string;
}

const createEmbeddingWithOpenAI = async (request: EmbeddingRequest): Promise<EmbeddingResponse> => {
  const { client } = await getOpenAIClient();
  return client.embeddings.create(request);
};

export const createOpenAIEmbeddingProvider = (dependencies?: OpenAIEmbeddingDependencies): EmbeddingProvider => {
  const createEmbedding = dependencies?.createEmbedding ?? createEmbeddingWithOpenAI;
  const model = dependencies?.model ?? config.OPENAI_EMBEDDING_MODEL;

  return {
    async embed(text: string): Promise<number[]> {
      const response = await createEmbedding({ model, input: text });
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new EmbeddingResponseError("Embedding response missing vector payload.");
      }
      return embedding;
    }
  };
};
