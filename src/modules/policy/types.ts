export type ContentType = "USER_QUERY" | "AI_RESPONSE" | "CONTEXT_CHUNK" | "KNOWLEDGE_UPLOAD";

export type ViolationKind = "TOXIC_CONTENT" | "THREAT" | "CONFIDENTIAL_DATA" | "ORGANIZATION_CONFIDENTIAL";

export type PolicySeverity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export const SEVERITY_ORDER: readonly PolicySeverity[] = ["LOW", "MEDIUM", "HIGH", "CRITICAL"];

export interface PolicyViolation {
  readonly kind: ViolationKind;
  readonly pattern: string;
  readonly description: string;
  readonly severity: PolicySeverity;
}

export interface ValidationResult {
  readonly valid: boolean;
  readonly violations: readonly PolicyViolation[];
  readonly sanitized: string;
  readonly maxSeverity: PolicySeverity | null;
}

export interface PolicyPattern {
  readonly name: string;
  readonly source: string;
  readonly flags: string;
}

export interface PolicyConfig {
  readonly toxicTerms: readonly string[];
  readonly threatPattern: PolicyPattern;
  readonly confidentialPatterns: readonly PolicyPattern[];
  readonly organizationPatterns: readonly PolicyPattern[];
  readonly severities: Readonly<Record<ViolationKind, PolicySeverity>>;
  readonly redactionToken: string;
}
