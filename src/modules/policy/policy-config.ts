import type { PolicyConfig, PolicyPattern, PolicySeverity, ViolationKind } from "./types.js";

export const REDACTION_TOKEN = "[REDACTED]";

const DEFAULT_TOXIC_TERMS: readonly string[] = [
  // profanity
  "fuck",
  "shit",
  "damn",
  "bitch",
  "asshole",
  "bastard",
  // hate
  "hate",
  "kill",
  "murder",
  "terrorist",
  "nazi",
  "fascist",
  // discriminatory; deployments extend this list with POLICY_EXTRA_TOXIC_TERMS
  "retard",
  // threats
  "bomb",
  "explosion",
  "attack",
  "violence",
  "harm"
];

const THREAT_PATTERN: PolicyPattern = {
  name: "threat_pattern",
  source: String.raw`\b(kill|murder|harm)\s+(you|yourself|me|us)\b`,
  flags: "i"
};

const CONFIDENTIAL_PATTERNS: readonly PolicyPattern[] = [
  { name: "SSN", source: String.raw`\b\d{3}-\d{2}-\d{4}\b|\b\d{9}\b`, flags: "" },
  { name: "CREDIT_CARD", source: String.raw`\b(?:\d{4}[- ]?){3}\d{4}\b`, flags: "" },
  { name: "EMAIL", source: String.raw`\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b`, flags: "" },
  { name: "PHONE", source: String.raw`\(?\b\d{3}\)?[- ]?\d{3}[- ]?\d{4}\b`, flags: "" },
  { name: "IP_ADDRESS", source: String.raw`\b(?:\d{1,3}\.){3}\d{1,3}\b`, flags: "" },
  { name: "API_KEY", source: String.raw`\b[A-Za-z0-9]{32,}\b`, flags: "" },
  { name: "PASSWORD", source: String.raw`password[\s:=]+[\w!@#$%^&*()]+`, flags: "i" }
];

const ORGANIZATION_PATTERNS: readonly PolicyPattern[] = [
  { name: "EMPLOYEE_ID", source: String.raw`\bEMP\d{6}\b`, flags: "" },
  { name: "CUSTOMER_ID", source: String.raw`\bCUST\d{8}\b`, flags: "" },
  { name: "INTERNAL_CODE", source: String.raw`\b[A-Z]{3}-\d{4}-[A-Z]{2}\b`, flags: "" }
];

const SEVERITIES: Readonly<Record<ViolationKind, PolicySeverity>> = {
  TOXIC_CONTENT: "HIGH",
  THREAT: "CRITICAL",
  CONFIDENTIAL_DATA: "HIGH",
  ORGANIZATION_CONFIDENTIAL: "MEDIUM"
};

export class PolicyConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyConfigError";
  }
}

export interface CreatePolicyConfigOptions {
  /** Extra organization-confidential patterns, keyed by pattern name. */
  organizationPatterns?: Record<string, string>;
  extraToxicTerms?: readonly string[];
}

const assertCompiles = (pattern: PolicyPattern): void => {
  try {
    new RegExp(pattern.source, pattern.flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid pattern";
    throw new PolicyConfigError(`Policy pattern ${pattern.name} does not compile: ${message}`);
  }
};

const freezePattern = (pattern: PolicyPattern): PolicyPattern => Object.freeze({ ...pattern });

/**
 * Builds the immutable pattern and severity tables the policy engine runs
 * against. Meant to be called once at startup and shared by reference.
 */
export const createPolicyConfig = (options: CreatePolicyConfigOptions = {}): PolicyConfig => {
  const reservedNames = new Set([...CONFIDENTIAL_PATTERNS, ...ORGANIZATION_PATTERNS].map((pattern) => pattern.name));
  const customPatterns: PolicyPattern[] = Object.entries(options.organizationPatterns ?? {}).map(([name, source]) => {
    if (reservedNames.has(name)) {
      throw new PolicyConfigError(`Policy pattern name ${name} is already defined.`);
    }
    return { name, source, flags: "" };
  });
  customPatterns.forEach(assertCompiles);

  const toxicTerms = [...DEFAULT_TOXIC_TERMS];
  for (const term of options.extraToxicTerms ?? []) {
    const normalized = term.trim().toLowerCase();
    if (normalized.length > 0 && !toxicTerms.includes(normalized)) {
      toxicTerms.push(normalized);
    }
  }

  return Object.freeze({
    toxicTerms: Object.freeze(toxicTerms),
    threatPattern: freezePattern(THREAT_PATTERN),
    confidentialPatterns: Object.freeze(CONFIDENTIAL_PATTERNS.map(freezePattern)),
    organizationPatterns: Object.freeze([...ORGANIZATION_PATTERNS, ...customPatterns].map(freezePattern)),
    severities: Object.freeze({ ...SEVERITIES }),
    redactionToken: REDACTION_TOKEN
  });
};
