import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { createLocalVectorStoreClient } from "./local-vector-store.js";
import type { VectorSearchClient } from "./vector-search.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  client: VectorSearchClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withRetries<T>(operation: () => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= REQUEST_RETRIES; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < REQUEST_RETRIES) {
        await delay(REQUEST_RETRY_DELAY_MS * attempt);
      }
    }
  }

  throw lastError;
}

export function wrapQdrantClient(client: QdrantClient): VectorSearchClient {
  return {
    async collectionExists(collection) {
      const response = await client.collectionExists(collection);
      return response.exists;
    },

    async search(collection, request) {
      const points = await client.search(collection, {
        vector: request.vector,
        limit: request.limit,
        score_threshold: request.scoreThreshold,
        filter: request.filter,
        with_payload: true,
        with_vector: false
      });
      return points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: point.payload ?? {}
      }));
    }
  };
}

async function initialize(): Promise<QdrantSingleton> {
  // Local mode without QDRANT_URL searches a JSON file instead of a server.
  if (!config.QDRANT_URL) {
    const localClient = createLocalVectorStoreClient();
    console.info("[clients/qdrant] initialized singleton (local file vector store)");
    return {
      client: localClient,
      async healthCheck() {
        try {
          await localClient.collectionExists(config.QDRANT_COLLECTION);
          return { status: "ok", details: "local file vector store" };
        } catch (error) {
          const details = error instanceof Error ? error.message : "unknown error";
          return { status: "error", details };
        }
      }
    };
  }

  const qdrant = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(async () => {
    await qdrant.getCollections();
  });

  console.info("[clients/qdrant] initialized singleton");

  const client = wrapQdrantClient(qdrant);
  return {
    client,
    async healthCheck() {
      try {
        const exists = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} does not exist` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
