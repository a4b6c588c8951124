export type PipelineErrorCode =
  | 'credential_error'
  | 'transient_service_error'
  | 'extraction_timeout'
  | 'extraction_failed'
  | 'malformed_response';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unusable service configuration. Raised before any network I/O. */
export class CredentialError extends PipelineError {
  readonly code = 'credential_error';
}

/**
 * One fallback tier failed. Collected by the gateway; never surfaced to
 * callers on its own.
 */
export class TransientServiceError extends PipelineError {
  readonly code = 'transient_service_error';

  constructor(
    message: string,
    readonly details: { method: string; apiVersion: string | null; status: number | null },
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ExtractionFailureReason =
  | 'auth_failed'
  | 'not_accepted'
  | 'missing_operation_location'
  | 'poll_http_error'
  | 'invalid_poll_body'
  | 'analysis_failed'
  | 'unknown_status'
  | 'empty_content';

export interface ExtractionAttempt {
  method: string;
  apiVersion: string | null;
  status: number | null;
  message: string;
}

export class ExtractionError extends PipelineError {
  readonly code = 'extraction_failed';

  constructor(
    message: string,
    readonly reason: ExtractionFailureReason,
    readonly attempts: ExtractionAttempt[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ExtractionTimeoutError extends PipelineError {
  readonly code = 'extraction_timeout';

  constructor(
    readonly lastStatus: string | null,
    readonly attempts: number,
  ) {
    super(`Analysis timed out after ${attempts} poll attempts (last status: ${lastStatus ?? 'none'})`);
  }
}

/** Decoder-internal: a reply that no parse strategy could read. */
export class MalformedResponseError extends PipelineError {
  readonly code = 'malformed_response';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
