export type VectorMatchClause = {
  key: string;
  match: { value: string };
};

export type VectorFilter = {
  must: VectorMatchClause[];
};

export type VectorSearchRequest = {
  vector: number[];
  limit: number;
  scoreThreshold?: number;
  filter?: VectorFilter;
};

export type VectorPoint = {
  id: string | number;
  score: number;
  payload: Record<string, unknown>;
};

export interface VectorSearchClient {
  search(collection: string, request: VectorSearchRequest): Promise<VectorPoint[]>;
  collectionExists(collection: string): Promise<boolean>;
}
