import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config/index.js";
import type { VectorFilter, VectorPoint, VectorSearchClient, VectorSearchRequest } from "./vector-search.js";

const storedPointSchema = z.object({
  id: z.union([z.string(), z.number()]),
  vector: z.array(z.number()),
  payload: z.record(z.unknown()).default({})
});

const storeSchema = z.object({
  collections: z.record(z.array(storedPointSchema)).default({})
});

type StoreShape = z.infer<typeof storeSchema>;

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined = config.LOCAL_VECTOR_STORE_FILE): string {
  const relative = configured && configured.length > 0 ? configured : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative)
    ? relative
    : path.resolve(process.cwd(), relative);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matchesFilter(payload: Record<string, unknown>, filter?: VectorFilter): boolean {
  const must = filter?.must ?? [];
  return must.every((clause) => payload[clause.key] === clause.match.value);
}

async function readStore(filePath: string): Promise<StoreShape> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }

  const parsed = storeSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Local vector store ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return parsed.data;
}

/**
 * File-backed stand-in for Qdrant used in local mode. Points are scored with
 * cosine similarity; the file is re-read on every search.
 */
export function createLocalVectorStoreClient(filePath: string = resolveStorePath()): VectorSearchClient {
  return {
    async collectionExists(name: string) {
      const store = await readStore(filePath);
      return Array.isArray(store.collections[name]);
    },

    async search(collection: string, request: VectorSearchRequest): Promise<VectorPoint[]> {
      const store = await readStore(filePath);
      const points = store.collections[collection] ?? [];
      const threshold = request.scoreThreshold ?? Number.NEGATIVE_INFINITY;
      return points
        .filter((point) => matchesFilter(point.payload, request.filter))
        .map((point) => ({
          id: point.id,
          score: cosineSimilarity(point.vector, request.vector),
          payload: point.payload
        }))
        .filter((point) => point.score >= threshold)
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(1, request.limit));
    }
  };
}
