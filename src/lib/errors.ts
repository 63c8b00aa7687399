import { ErrorKind } from '@/types';

/**
 * Base class for every failure the pipeline reports.
 * `kind` is what ends up in progress events and run summaries.
 */
export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.details = details;
  }
}

export type SourceFailureReason = 'navigation-timeout' | 'navigation-failed' | 'browser-crashed';

export class SourceUnavailableError extends PipelineError {
  readonly region: string;
  readonly reason: SourceFailureReason;

  constructor(region: string, reason: SourceFailureReason, cause?: string) {
    super(
      ErrorKind.SOURCE_UNAVAILABLE,
      `Map search unavailable for "${region}" (${reason})${cause ? `: ${cause}` : ''}`,
      { region, reason, cause }
    );
    this.name = 'SourceUnavailableError';
    this.region = region;
    this.reason = reason;
  }
}

export class RuleSetInvalidError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(ErrorKind.RULE_SET_INVALID, message, { issues });
    this.name = 'RuleSetInvalidError';
  }
}

export class VerificationFailedError extends PipelineError {
  readonly attempts: number;

  constructor(candidateName: string, attempts: number, cause: string) {
    super(
      ErrorKind.VERIFICATION_FAILED,
      `Verification failed for "${candidateName}" after ${attempts} attempt(s): ${cause}`,
      { candidate: candidateName, attempts, cause }
    );
    this.name = 'VerificationFailedError';
    this.attempts = attempts;
  }
}

export class PublishUnauthorizedError extends PipelineError {
  constructor(message: string, status?: number) {
    super(ErrorKind.PUBLISH_UNAUTHORIZED, message, { status });
    this.name = 'PublishUnauthorizedError';
  }
}

export class PublishUnavailableError extends PipelineError {
  constructor(message: string, status?: number) {
    super(ErrorKind.PUBLISH_UNAVAILABLE, message, { status });
    this.name = 'PublishUnavailableError';
  }
}

export class RunCancelledError extends PipelineError {
  constructor(runId: string) {
    super(ErrorKind.RUN_CANCELLED, `Run ${runId} was cancelled`, { runId });
    this.name = 'RunCancelledError';
  }
}

export class RunTimedOutError extends PipelineError {
  constructor(runId: string, timeoutMs: number) {
    super(ErrorKind.RUN_TIMED_OUT, `Run ${runId} exceeded its ${timeoutMs}ms deadline`, {
      runId,
      timeoutMs,
    });
    this.name = 'RunTimedOutError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ErrorKind.CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

export class InvalidRunRequestError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(ErrorKind.INVALID_REQUEST, message, { issues });
    this.name = 'InvalidRunRequestError';
  }
}

export type ClassificationErrorKind = 'rate-limited' | 'timeout' | 'malformed-response' | 'unavailable';

/**
 * Failure reported by the AI classification service boundary.
 * All kinds are considered transient by the verifier's retry policy.
 */
export class ClassificationServiceError extends Error {
  readonly kind: ClassificationErrorKind;

  constructor(kind: ClassificationErrorKind, message: string) {
    super(message);
    this.name = 'ClassificationServiceError';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
