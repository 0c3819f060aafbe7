import { getQdrantClient } from "../../clients/qdrant.js";
import type { VectorFilter, VectorPoint } from "../../clients/vector-search.js";
import { config } from "../../config/index.js";
import type { Candidate, SimilarityQuery, SimilaritySearch } from "./types.js";

export interface QdrantSimilaritySearchDependencies {
  getQdrantClient?: typeof getQdrantClient;
  collection?: string;
}

const pickFirstString = (source: Record<string, unknown>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
};

const pickFirstInteger = (source: Record<string, unknown>, keys: string[]): number | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "number" && Number.isInteger(value)) {
      return value;
    }
    if (typeof value === "string" && /^\d+$/.test(value.trim())) {
      return Number.parseInt(value.trim(), 10);
    }
  }
  return undefined;
};

export const buildOwnershipFilter = (query: Pick<SimilarityQuery, "userNamespace" | "collectionId">): VectorFilter => ({
  must: [
    { key: "user_id", match: { value: query.userNamespace } },
    { key: "collection_id", match: { value: query.collectionId } }
  ]
});

/** Points without passage text are dropped. */
export const normalizePoint = (point: VectorPoint): Candidate | null => {
  const metadata = point.payload;
  const text = pickFirstString(metadata, ["text", "content", "chunk"]);
  if (text === undefined) {
    return null;
  }

  const documentLabel = pickFirstString(metadata, ["document_name", "file_name", "source", "title"]);
  return {
    id: String(point.id),
    text,
    score: point.score,
    chunkIndex: pickFirstInteger(metadata, ["chunk_index", "chunkIndex"]) ?? 0,
    ...(documentLabel !== undefined ? { documentLabel } : {}),
    metadata: Object.freeze({ ...metadata })
  };
};

export const createQdrantSimilaritySearch = (dependencies?: QdrantSimilaritySearchDependencies): SimilaritySearch => {
  const resolveClient = dependencies?.getQdrantClient ?? getQdrantClient;
  const collection = dependencies?.collection ?? config.QDRANT_COLLECTION;

  return {
    async query(request: SimilarityQuery): Promise<Candidate[]> {
      const { client } = await resolveClient();
      const points = await client.search(collection, {
        vector: request.vector,
        limit: request.limit,
        scoreThreshold: request.minScore,
        filter: buildOwnershipFilter(request)
      });

      const candidates: Candidate[] = [];
      for (const point of points) {
        const candidate = normalizePoint(point);
        if (candidate) {
          candidates.push(candidate);
        }
      }
      return candidates;
    }
  };
};
