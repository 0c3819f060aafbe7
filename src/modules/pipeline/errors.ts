import type { ContentType, PolicyViolation } from "../policy/types.js";

export type PipelineErrorKind = "caller" | "policy" | "collaborator" | "internal";

export type CallerErrorCode =
  | "INVALID_PARAMETER"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "COLLECTION_NOT_READY"
  | "REQUEST_CANCELLED";

export type CollaboratorErrorCode = "RETRIEVAL_FAILED" | "GENERATION_FAILED";

export type PipelineErrorCode =
  | CallerErrorCode
  | "CONTENT_POLICY_VIOLATION"
  | CollaboratorErrorCode
  | "PROCESSING_ERROR";

export interface PipelineErrorPayload {
  kind: PipelineErrorKind;
  code: PipelineErrorCode;
  statusCode: number;
  message: string;
  details?: Record<string, unknown>;
}

const CALLER_STATUS_CODES: Record<CallerErrorCode, number> = {
  INVALID_PARAMETER: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  COLLECTION_NOT_READY: 412,
  REQUEST_CANCELLED: 499
};

export const SAFE_PROCESSING_ERROR_MESSAGE = "The question could not be processed right now. Please try again.";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  readonly code: PipelineErrorCode;

  readonly statusCode: number;

  readonly context: Readonly<Record<string, unknown>>;

  protected constructor(
    message: string,
    code: PipelineErrorCode,
    statusCode: number,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.statusCode = statusCode;
    this.context = Object.freeze({ ...context });
  }

  /** Caller-facing shape; never includes stack or cause detail. */
  toPayload(): PipelineErrorPayload {
    const details = Object.keys(this.context).length > 0 ? { ...this.context } : undefined;
    return {
      kind: this.kind,
      code: this.code,
      statusCode: this.statusCode,
      message: this.message,
      ...(details ? { details } : {})
    };
  }
}

export class CallerError extends PipelineError {
  readonly kind = "caller" as const;

  constructor(code: CallerErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message, code, CALLER_STATUS_CODES[code], context);
    this.name = "CallerError";
  }
}

export class PipelineCancelledError extends CallerError {
  constructor(stage: string) {
    super("REQUEST_CANCELLED", "The request was cancelled before it completed.", { stage });
    this.name = "PipelineCancelledError";
  }
}

export class PolicyViolationError extends PipelineError {
  readonly kind = "policy" as const;

  readonly contentType: ContentType;

  readonly violations: readonly PolicyViolation[];

  readonly summary: string;

  constructor(contentType: ContentType, violations: readonly PolicyViolation[]) {
    const summary = violations.map((violation) => `${violation.kind}:${violation.pattern}`).join(", ");
    super(`Content policy violation detected: ${summary}`, "CONTENT_POLICY_VIOLATION", 400, {
      contentType,
      violations: violations.map((violation) => `${violation.kind}:${violation.pattern}`)
    });
    this.name = "PolicyViolationError";
    this.contentType = contentType;
    this.violations = violations;
    this.summary = summary;
  }
}

export class CollaboratorError extends PipelineError {
  readonly kind = "collaborator" as const;

  constructor(code: CollaboratorErrorCode, message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, code, 502, options?.context ?? {}, { cause: options?.cause });
    this.name = "CollaboratorError";
  }
}

export class InternalError extends PipelineError {
  readonly kind = "internal" as const;

  constructor(options?: { cause?: unknown }) {
    super(SAFE_PROCESSING_ERROR_MESSAGE, "PROCESSING_ERROR", 500, {}, { cause: options?.cause });
    this.name = "InternalError";
  }
}

export const isPipelineError = (error: unknown): error is PipelineError => error instanceof PipelineError;

export const toPipelineError = (error: unknown): PipelineError =>
  isPipelineError(error) ? error : new InternalError({ cause: error });
