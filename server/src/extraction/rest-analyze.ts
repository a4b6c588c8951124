import type { Logger } from '../lib/logger.js';
import {
  ExtractionError,
  ExtractionTimeoutError,
  TransientServiceError,
  errorMessage,
} from '../lib/errors.js';
import {
  analyzeOperationSchema,
  describeServiceError,
  toExtractionResult,
  type AnalyzeResult,
} from './response-schema.js';
import type { ExtractionMethod, ExtractionResult, RawDocument } from './types.js';

export const READ_MODEL_ID = 'prebuilt-read';
export const LEGACY_API_VERSION = '2022-08-31';

const ACCEPTED_STATUS = 202;
const UNAUTHORIZED_STATUS = 401;

export type TierOutcome =
  | { ok: true; result: ExtractionResult }
  | { ok: false; failure: TransientServiceError };

/** One fallback tier of the gateway. */
export interface ExtractionStrategy {
  readonly method: ExtractionMethod;
  readonly apiVersion: string | null;
  attempt(document: RawDocument): Promise<TierOutcome>;
}

export interface HttpDeps {
  fetch: typeof fetch;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
}

export interface PollOptions {
  key: string;
  intervalMs: number;
  maxAttempts: number;
  /** Per-request limit on each status GET. */
  requestTimeoutMs: number;
}

export function buildAnalyzeUrl(endpoint: string, apiVersion: string): string {
  return `${endpoint}/documentintelligence/documentModels/${READ_MODEL_ID}:analyze?api-version=${encodeURIComponent(apiVersion)}`;
}

export function buildLegacyAnalyzeUrl(endpoint: string): string {
  return `${endpoint}/formrecognizer/documentModels/${READ_MODEL_ID}:analyze?api-version=${LEGACY_API_VERSION}`;
}

/**
 * Polls an accepted analyze operation until it settles. Every failure here is
 * terminal for the extraction call: once a request is accepted the gateway
 * does not try further tiers.
 */
export async function pollAnalyzeOperation(
  operationLocation: string,
  options: PollOptions,
  deps: HttpDeps,
): Promise<AnalyzeResult> {
  let lastStatus: string | null = null;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    await deps.sleep(options.intervalMs);

    let response: Response;
    try {
      response = await deps.fetch(operationLocation, {
        method: 'GET',
        headers: { 'Ocp-Apim-Subscription-Key': options.key },
        signal: AbortSignal.timeout(options.requestTimeoutMs),
      });
    } catch (err) {
      throw new ExtractionError(
        `Failed to get results: ${errorMessage(err)}`,
        'poll_http_error',
        [],
        { cause: err },
      );
    }

    if (response.status !== 200) {
      const body = await response.text().catch(() => '');
      throw new ExtractionError(
        `Failed to get results: ${response.status} - ${body.slice(0, 500)}`,
        'poll_http_error',
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ExtractionError('Poll response was not valid JSON', 'invalid_poll_body', [], { cause: err });
    }

    const parsed = analyzeOperationSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExtractionError(
        `Poll response did not match the analyze operation shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'invalid_poll_body',
      );
    }

    const operation = parsed.data;
    lastStatus = operation.status;
    deps.logger.debug({ status: lastStatus, attempt, maxAttempts: options.maxAttempts }, 'Analysis status');

    switch (operation.status) {
      case 'succeeded':
        return operation.analyzeResult ?? { content: '', pages: [], styles: [] };
      case 'failed':
        throw new ExtractionError(
          `Analysis failed: ${describeServiceError(operation.error)}`,
          'analysis_failed',
        );
      case 'running':
      case 'notStarted':
        continue;
      default:
        throw new ExtractionError(`Unknown status: ${operation.status}`, 'unknown_status');
    }
  }

  throw new ExtractionTimeoutError(lastStatus, options.maxAttempts);
}

interface RestStrategyOptions {
  method: Extract<ExtractionMethod, 'REST' | 'LEGACY'>;
  apiVersion: string;
  url: string;
  key: string;
  submitTimeoutMs: number;
  intervalMs: number;
  maxAttempts: number;
}

/**
 * Raw-HTTP tier: submits the PDF bytes once and, when the service answers
 * 202, polls the returned Operation-Location.
 */
export class RestAnalyzeStrategy implements ExtractionStrategy {
  readonly method: RestStrategyOptions['method'];
  readonly apiVersion: string;

  constructor(
    private readonly options: RestStrategyOptions,
    private readonly deps: HttpDeps,
  ) {
    this.method = options.method;
    this.apiVersion = options.apiVersion;
  }

  async attempt(document: RawDocument): Promise<TierOutcome> {
    const { logger } = this.deps;
    const details = { method: this.method, apiVersion: this.apiVersion };

    logger.info(details, 'Submitting document for analysis');

    let response: Response;
    try {
      response = await this.deps.fetch(this.options.url, {
        method: 'POST',
        headers: {
          'Ocp-Apim-Subscription-Key': this.options.key,
          'Content-Type': 'application/pdf',
        },
        body: document.bytes,
        signal: AbortSignal.timeout(this.options.submitTimeoutMs),
      });
    } catch (err) {
      logger.warn({ ...details, error: errorMessage(err) }, 'Analyze submission failed');
      return {
        ok: false,
        failure: new TransientServiceError(
          `Submission failed: ${errorMessage(err)}`,
          { ...details, status: null },
          { cause: err },
        ),
      };
    }

    if (response.status !== ACCEPTED_STATUS) {
      const body = await response.text().catch(() => '');
      const message = response.status === UNAUTHORIZED_STATUS
        ? `Authentication failed with API version ${this.apiVersion}`
        : `API version ${this.apiVersion} returned ${response.status}`;
      logger.warn({ ...details, status: response.status }, message);
      return {
        ok: false,
        failure: new TransientServiceError(
          body ? `${message}: ${body.slice(0, 300)}` : message,
          { ...details, status: response.status },
        ),
      };
    }

    const operationLocation = response.headers.get('operation-location');
    if (!operationLocation) {
      throw new ExtractionError(
        'No operation location returned',
        'missing_operation_location',
        [{ ...details, status: response.status, message: 'accepted without Operation-Location' }],
      );
    }

    logger.info({ ...details }, 'Analysis accepted, polling for results');

    const result = await pollAnalyzeOperation(
      operationLocation,
      {
        key: this.options.key,
        intervalMs: this.options.intervalMs,
        maxAttempts: this.options.maxAttempts,
        requestTimeoutMs: this.options.submitTimeoutMs,
      },
      this.deps,
    );

    if (!result.content.trim()) {
      throw new ExtractionError('Analysis succeeded but returned no text', 'empty_content');
    }

    logger.info({ ...details, chars: result.content.length }, 'Extracted document text');
    return {
      ok: true,
      result: toExtractionResult(result, { method_used: this.method, api_version: this.apiVersion }),
    };
  }
}
