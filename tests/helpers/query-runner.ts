import type { QueryRunner } from "../../src/modules/collections/collection-repository.js";

export type RecordedQuery = { text: string; values?: unknown[] };

/** In-memory stand-in for a pg pool that answers every query with `rows`. */
export const createRecordingRunner = (rows: unknown[]) => {
  const calls: RecordedQuery[] = [];
  const runner: QueryRunner = {
    async query(text, values) {
      calls.push({ text, values });
      return { rows };
    }
  };
  return { runner, calls, getPool: async () => runner };
};
