import defaultLogger, { type Logger } from '../lib/logger.js';
import type { DocumentServiceConfig } from '../lib/config.js';
import {
  CredentialError,
  ExtractionError,
  type ExtractionAttempt,
  type TransientServiceError,
} from '../lib/errors.js';
import {
  createAzureReadClient,
  type ReadClientOptions,
  type StructuredReadClient,
} from './azure-read-client.js';
import {
  LEGACY_API_VERSION,
  RestAnalyzeStrategy,
  buildAnalyzeUrl,
  buildLegacyAnalyzeUrl,
  type ExtractionStrategy,
  type HttpDeps,
} from './rest-analyze.js';
import { SdkReadStrategy } from './sdk-read-strategy.js';
import type { ExtractionResult, RawDocument } from './types.js';

export interface GatewayDeps {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  /** Builds the structured client; defaults to the Document Intelligence SDK. */
  createReadClient?: (endpoint: string, key: string, options: ReadClientOptions) => StructuredReadClient;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toAttempt(failure: TransientServiceError): ExtractionAttempt {
  return {
    method: failure.details.method,
    apiVersion: failure.details.apiVersion,
    status: failure.details.status,
    message: failure.message,
  };
}

function describeAttempts(attempts: ExtractionAttempt[]): string {
  return attempts
    .map((a) => {
      const label = a.apiVersion ? `${a.method} ${a.apiVersion}` : a.method;
      return `${label}: ${a.status ?? 'no response'}`;
    })
    .join('; ');
}

/**
 * Obtains text from a PDF by walking an ordered list of tiers: the structured
 * client, each REST API version newest first, then the legacy endpoint. The
 * first tier whose request is accepted decides the outcome.
 */
export class ExtractionGateway {
  private readonly deps: Required<GatewayDeps>;

  constructor(
    private readonly config: DocumentServiceConfig,
    deps: GatewayDeps = {},
  ) {
    this.deps = {
      fetch: deps.fetch ?? fetch,
      sleep: deps.sleep ?? delay,
      logger: deps.logger ?? defaultLogger,
      createReadClient: deps.createReadClient ?? createAzureReadClient,
    };
  }

  async extract(document: RawDocument, logger: Logger = this.deps.logger): Promise<ExtractionResult> {
    const { endpoint, key } = this.config;
    if (!endpoint || !key) {
      throw new CredentialError(
        'Document Intelligence credentials not found. Set DI_ENDPOINT and DI_KEY.',
      );
    }

    const attempts: ExtractionAttempt[] = [];
    for (const strategy of this.buildStrategies(endpoint, key, logger)) {
      const outcome = await strategy.attempt(document);
      if (outcome.ok) {
        return outcome.result;
      }
      attempts.push(toAttempt(outcome.failure));
    }

    const httpAttempts = attempts.filter((a) => a.method !== 'SDK_CLIENT');
    const allUnauthorized = httpAttempts.length > 0 && httpAttempts.every((a) => a.status === 401);
    const summary = describeAttempts(attempts);
    logger.error({ attempts: summary }, 'All extraction tiers failed');

    if (allUnauthorized) {
      throw new ExtractionError(
        `Authentication failed. Check the Document Intelligence key and endpoint. Attempts: ${summary}`,
        'auth_failed',
        attempts,
      );
    }
    throw new ExtractionError(`Failed to start analysis. Attempts: ${summary}`, 'not_accepted', attempts);
  }

  private buildStrategies(endpoint: string, key: string, logger: Logger): ExtractionStrategy[] {
    const http: HttpDeps = { fetch: this.deps.fetch, sleep: this.deps.sleep, logger };
    const polling = {
      key,
      submitTimeoutMs: this.config.submitTimeoutMs,
      intervalMs: this.config.pollIntervalMs,
      maxAttempts: this.config.pollMaxAttempts,
    };

    const strategies: ExtractionStrategy[] = [];
    if (this.config.useSdk) {
      const readOptions: ReadClientOptions = {
        submitTimeoutMs: this.config.submitTimeoutMs,
        pollIntervalMs: this.config.pollIntervalMs,
        pollMaxAttempts: this.config.pollMaxAttempts,
      };
      strategies.push(new SdkReadStrategy(() => this.deps.createReadClient(endpoint, key, readOptions), logger));
    }
    for (const apiVersion of this.config.apiVersions) {
      strategies.push(new RestAnalyzeStrategy(
        { ...polling, method: 'REST', apiVersion, url: buildAnalyzeUrl(endpoint, apiVersion) },
        http,
      ));
    }
    strategies.push(new RestAnalyzeStrategy(
      { ...polling, method: 'LEGACY', apiVersion: LEGACY_API_VERSION, url: buildLegacyAnalyzeUrl(endpoint) },
      http,
    ));
    return strategies;
  }
}
