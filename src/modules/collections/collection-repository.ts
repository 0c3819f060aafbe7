import { z } from "zod";
import { getPostgresClient } from "../../clients/postgres.js";

export interface CollectionRecord {
  id: string;
  ownerId: string;
  name: string | null;
  fileName: string | null;
  status: string;
}

export interface CollectionStore {
  findCollection(id: string): Promise<CollectionRecord | null>;
}

/** The slice of `pg.Pool` the repositories use. */
export interface QueryRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const defaultGetPool = async (): Promise<QueryRunner> => (await getPostgresClient()).pool;

const collectionRowSchema = z.object({
  id: z.coerce.string(),
  owner_id: z.coerce.string(),
  name: z.string().nullable(),
  file_name: z.string().nullable(),
  status: z.string()
});

export const READY_COLLECTION_STATUS = "ready";

export const collectionLabel = (collection: CollectionRecord): string =>
  collection.name ?? collection.fileName ?? collection.id;

export class CollectionRepository implements CollectionStore {
  constructor(private readonly getPool: () => Promise<QueryRunner> = defaultGetPool) {}

  async findCollection(id: string): Promise<CollectionRecord | null> {
    const pool = await this.getPool();
    const result = await pool.query(
      `
        SELECT id, owner_id, name, file_name, status
        FROM collections
        WHERE id = $1
        LIMIT 1
      `,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = collectionRowSchema.parse(result.rows[0]);
    return {
      id: row.id,
      ownerId: row.owner_id,
      name: row.name,
      fileName: row.file_name,
      status: row.status
    };
  }
}
