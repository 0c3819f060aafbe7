import { createHash } from "node:crypto";
import type { FastifyRequest } from "fastify";
import { z } from "zod";
import { defaultGetPool, type QueryRunner } from "../modules/collections/collection-repository.js";

export interface UserDirectory {
  findUserIdByApiKey(apiKey: string): Promise<string | null>;
}

const userRowSchema = z.object({ id: z.coerce.string() });

export const hashApiKey = (apiKey: string): string => createHash("sha256").update(apiKey, "utf8").digest("hex");

/** Reads the key from `X-API-Key`, falling back to the `api_key` query parameter. */
export const extractApiKey = (request: FastifyRequest): string | null => {
  const header = request.headers["x-api-key"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header.trim();
  }

  const query = request.query;
  if (query && typeof query === "object" && "api_key" in query) {
    const value = query.api_key;
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
};

// Keys are stored hashed; the plain key never reaches the database.
export class ApiKeyUserDirectory implements UserDirectory {
  constructor(private readonly getPool: () => Promise<QueryRunner> = defaultGetPool) {}

  async findUserIdByApiKey(apiKey: string): Promise<string | null> {
    if (apiKey.trim().length === 0) {
      return null;
    }

    const pool = await this.getPool();
    const result = await pool.query(
      `
        SELECT id
        FROM users
        WHERE api_key_hash = $1
        LIMIT 1
      `,
      [hashApiKey(apiKey)]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return userRowSchema.parse(result.rows[0]).id;
  }
}
