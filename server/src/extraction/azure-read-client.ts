import DocumentIntelligence, { getLongRunningPoller, isUnexpected } from '@azure-rest/ai-document-intelligence';
import { READ_MODEL_ID } from './rest-analyze.js';

/**
 * Structured-client capability: submits a document to the read model and
 * resolves with the raw operation body once the service settles.
 */
export interface StructuredReadClient {
  analyzeRead(document: Uint8Array): Promise<unknown>;
}

export interface ReadClientOptions {
  submitTimeoutMs: number;
  pollIntervalMs: number;
  pollMaxAttempts: number;
}

export type DocumentClientOptions = NonNullable<Parameters<typeof DocumentIntelligence>[2]>;

/**
 * The whole polling run is bounded by interval × attempts, the same budget the
 * REST tier gets, so a stuck operation falls through to the next tier.
 */
export function createAzureReadClient(
  endpoint: string,
  key: string,
  options: ReadClientOptions,
  clientOptions: DocumentClientOptions = {},
): StructuredReadClient {
  const client = DocumentIntelligence(endpoint, { key }, clientOptions);

  return {
    async analyzeRead(document) {
      const initialResponse = await client
        .path('/documentModels/{modelId}:analyze', READ_MODEL_ID)
        .post({
          contentType: 'application/json',
          body: { base64Source: Buffer.from(document).toString('base64') },
          abortSignal: AbortSignal.timeout(options.submitTimeoutMs),
        });

      if (isUnexpected(initialResponse)) {
        throw new Error(
          `Analyze request rejected with status ${initialResponse.status}: ${initialResponse.body.error.message}`,
        );
      }

      const pollSignal = AbortSignal.timeout(options.pollIntervalMs * options.pollMaxAttempts);
      const poller = getLongRunningPoller(client, initialResponse, {
        intervalInMs: options.pollIntervalMs,
      });
      const response = await poller.pollUntilDone({ abortSignal: pollSignal });
      return response.body;
    },
  };
}
