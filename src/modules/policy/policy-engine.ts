import { PolicyViolationError } from "../pipeline/errors.js";
import {
  SEVERITY_ORDER,
  type ContentType,
  type PolicyConfig,
  type PolicyPattern,
  type PolicySeverity,
  type PolicyViolation,
  type ValidationResult,
  type ViolationKind
} from "./types.js";

interface CompiledPattern {
  name: string;
  detector: RegExp;
  redactor: RegExp;
}

const compile = (pattern: PolicyPattern): CompiledPattern => ({
  name: pattern.name,
  detector: new RegExp(pattern.source, pattern.flags.replace("g", "")),
  redactor: new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`)
});

export const compareSeverity = (left: PolicySeverity, right: PolicySeverity): number =>
  SEVERITY_ORDER.indexOf(left) - SEVERITY_ORDER.indexOf(right);

export const highestSeverity = (violations: readonly PolicyViolation[]): PolicySeverity | null =>
  violations.reduce<PolicySeverity | null>(
    (highest, violation) =>
      highest === null || compareSeverity(violation.severity, highest) > 0 ? violation.severity : highest,
    null
  );

const violation = (
  kind: ViolationKind,
  pattern: string,
  description: string,
  severity: PolicySeverity
): PolicyViolation => Object.freeze({ kind, pattern, description, severity });

export class PolicyEngine {
  private readonly threat: CompiledPattern;

  private readonly confidential: CompiledPattern[];

  private readonly organization: CompiledPattern[];

  constructor(private readonly config: PolicyConfig) {
    this.threat = compile(config.threatPattern);
    this.confidential = config.confidentialPatterns.map(compile);
    this.organization = config.organizationPatterns.map(compile);
  }

  validate(text: string, _contentType: ContentType): ValidationResult {
    const violations = [
      ...this.detectToxicContent(text),
      ...this.detectPatterns(text, this.confidential, "CONFIDENTIAL_DATA", "Confidential data pattern detected"),
      ...this.detectPatterns(
        text,
        this.organization,
        "ORGANIZATION_CONFIDENTIAL",
        "Organization confidential pattern detected"
      )
    ];

    return Object.freeze({
      valid: violations.length === 0,
      violations: Object.freeze(violations),
      sanitized: this.sanitize(text),
      maxSeverity: highestSeverity(violations)
    });
  }

  enforce(text: string, contentType: ContentType): ValidationResult {
    const result = this.validate(text, contentType);
    if (!result.valid) {
      throw new PolicyViolationError(contentType, result.violations);
    }
    return result;
  }

  /** Masks confidential and organization spans. Toxic terms are left in place. */
  sanitize(text: string): string {
    return [...this.confidential, ...this.organization].reduce(
      (current, pattern) => current.replace(pattern.redactor, this.config.redactionToken),
      text
    );
  }

  private detectToxicContent(text: string): PolicyViolation[] {
    const lowered = text.toLowerCase();
    const violations = this.config.toxicTerms
      .filter((term) => lowered.includes(term))
      .map((term) => violation("TOXIC_CONTENT", term, "Toxic language detected", this.config.severities.TOXIC_CONTENT));

    if (this.threat.detector.test(text)) {
      violations.push(
        violation("THREAT", this.threat.name, "Threatening language detected", this.config.severities.THREAT)
      );
    }

    return violations;
  }

  private detectPatterns(
    text: string,
    patterns: CompiledPattern[],
    kind: ViolationKind,
    description: string
  ): PolicyViolation[] {
    return patterns
      .filter((pattern) => pattern.detector.test(text))
      .map((pattern) => violation(kind, pattern.name, `${description}: ${pattern.name}`, this.config.severities[kind]));
  }
}
