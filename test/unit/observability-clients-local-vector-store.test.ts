import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cosineSimilarity, createLocalVectorStoreClient, resolveStorePath } from "../../src/clients/local-vector-store.js";

describe("clients/local-vector-store", () => {
  let dir: string;
  let storePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vector-store-"));
    storePath = path.join(dir, "store.json");
    await fs.writeFile(
      storePath,
      JSON.stringify({
        collections: {
          chunks: [
            { id: "a", vector: [1, 0], payload: { user_id: "user-1", collection_id: "col-1", text: "A" } },
            { id: "b", vector: [0.6, 0.8], payload: { user_id: "user-1", collection_id: "col-1", text: "B" } },
            { id: "c", vector: [0, 1], payload: { user_id: "user-1", collection_id: "col-1", text: "C" } },
            { id: "d", vector: [1, 0], payload: { user_id: "user-2", collection_id: "col-1", text: "D" } }
          ]
        }
      }),
      "utf8"
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("scores with cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it("filters, applies the threshold and sorts by score", async () => {
    const client = createLocalVectorStoreClient(storePath);

    const points = await client.search("chunks", {
      vector: [1, 0],
      limit: 5,
      scoreThreshold: 0.5,
      filter: { must: [{ key: "user_id", match: { value: "user-1" } }] }
    });

    expect(points.map((point) => point.id)).toEqual(["a", "b"]);
    expect(points[0]?.score).toBe(1);
    expect(points[1]?.score).toBeCloseTo(0.6, 10);
  });

  it("honours the limit", async () => {
    const client = createLocalVectorStoreClient(storePath);

    const points = await client.search("chunks", { vector: [1, 0], limit: 1 });

    expect(points.map((point) => point.id)).toEqual(["a"]);
  });

  it("treats a missing file as an empty store", async () => {
    const client = createLocalVectorStoreClient(path.join(dir, "missing.json"));

    await expect(client.collectionExists("chunks")).resolves.toBe(false);
    await expect(client.search("chunks", { vector: [1, 0], limit: 3 })).resolves.toEqual([]);
  });

  it("reports known collections", async () => {
    await expect(createLocalVectorStoreClient(storePath).collectionExists("chunks")).resolves.toBe(true);
  });

  it("rejects a malformed store", async () => {
    await fs.writeFile(storePath, JSON.stringify({ collections: { chunks: [{ id: "x" }] } }), "utf8");

    await expect(createLocalVectorStoreClient(storePath).search("chunks", { vector: [1], limit: 1 })).rejects.toThrow(
      /is malformed/
    );
  });

  it("resolves relative paths against the working directory", () => {
    expect(resolveStorePath("/tmp/store.json")).toBe("/tmp/store.json");
    expect(resolveStorePath(undefined)).toBe(path.resolve(process.cwd(), "data/local-vector-store.json"));
  });
});
