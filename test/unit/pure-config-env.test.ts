import { describe, expect, it } from "vitest";
import { loadModeEnvFile, parseDotEnvLine, parseEnv } from "../../src/config/env.js";

const baseEnv = {
  APP_MODE: "local",
  OPENAI_API_KEY: "test-key",
  OPENAI_MODEL: "gpt-test",
  POSTGRES_URL: "postgres://localhost:5432/test",
  QDRANT_COLLECTION: "test-collection"
};

describe("config/env", () => {
  it("applies defaults", () => {
    const env = parseEnv(baseEnv);

    expect(env.PORT).toBe(3000);
    expect(env.ENABLE_INFRA_BOOTSTRAP).toBe(false);
    expect(env.RERANK_SCORE_TIMEOUT_MS).toBe(5000);
    expect(env.OPENAI_EMBEDDING_MODEL).toBe("text-embedding-3-small");
    expect(env.QDRANT_URL).toBeUndefined();
    expect(env.POLICY_ORGANIZATION_PATTERNS).toEqual({});
    expect(env.POLICY_EXTRA_TOXIC_TERMS).toEqual([]);
  });

  it("splits extra toxic terms on commas", () => {
    const env = parseEnv({ ...baseEnv, POLICY_EXTRA_TOXIC_TERMS: " scam, ,Fraudster ,swindle" });

    expect(env.POLICY_EXTRA_TOXIC_TERMS).toEqual(["scam", "Fraudster", "swindle"]);
  });

  it("requires QDRANT_URL in prod mode", () => {
    expect(() => parseEnv({ ...baseEnv, APP_MODE: "prod" })).toThrow(
      "- QDRANT_URL: QDRANT_URL is required in prod mode"
    );
    expect(parseEnv({ ...baseEnv, APP_MODE: "prod", QDRANT_URL: " http://qdrant:6333 " }).QDRANT_URL).toBe(
      "http://qdrant:6333"
    );
  });

  it("parses boolean flags and organization patterns", () => {
    const env = parseEnv({
      ...baseEnv,
      ENABLE_INFRA_BOOTSTRAP: "yes",
      POLICY_ORGANIZATION_PATTERNS: "PROJECT_CODE=\\bPRJ-\\d{5}\\b, TICKET=TCK-\\d+"
    });

    expect(env.ENABLE_INFRA_BOOTSTRAP).toBe(true);
    expect(env.POLICY_ORGANIZATION_PATTERNS).toEqual({
      PROJECT_CODE: "\\bPRJ-\\d{5}\\b",
      TICKET: "TCK-\\d+"
    });
  });

  it("rejects malformed organization patterns", () => {
    expect(() => parseEnv({ ...baseEnv, POLICY_ORGANIZATION_PATTERNS: "lowercase=abc" })).toThrow(
      'invalid organization pattern entry "lowercase=abc"'
    );
  });

  it("parses dotenv lines", () => {
    expect(parseDotEnvLine("# comment")).toBeNull();
    expect(parseDotEnvLine("   ")).toBeNull();
    expect(parseDotEnvLine("=value")).toBeNull();
    expect(parseDotEnvLine(" PORT = 8080 ")).toEqual(["PORT", "8080"]);
    expect(parseDotEnvLine("OPENAI_MODEL=\"gpt-test\"")).toEqual(["OPENAI_MODEL", "gpt-test"]);
  });

  it("loads the mode file without overriding the process environment", () => {
    const processEnv: NodeJS.ProcessEnv = { APP_MODE: "local", PORT: "4000" };

    const loaded = loadModeEnvFile({
      cwd: "/srv/app",
      processEnv,
      existsSync: (candidate) => candidate === "/srv/app/.env.local",
      readFileSync: () => "PORT=5000\nQDRANT_COLLECTION=docs\n# note"
    });

    expect(loaded).toBe("/srv/app/.env.local");
    expect(processEnv).toEqual({ APP_MODE: "local", PORT: "4000", QDRANT_COLLECTION: "docs" });
  });
});
