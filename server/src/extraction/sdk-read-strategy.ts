import type { Logger } from '../lib/logger.js';
import { TransientServiceError, errorMessage } from '../lib/errors.js';
import type { StructuredReadClient } from './azure-read-client.js';
import { analyzeOperationSchema, toExtractionResult } from './response-schema.js';
import type { ExtractionStrategy, TierOutcome } from './rest-analyze.js';
import type { RawDocument } from './types.js';

const DETAILS = { method: 'SDK_CLIENT', apiVersion: null } as const;

/**
 * Preferred tier. Any failure (client construction, auth, transport or an
 * unexpected result shape) becomes a TransientServiceError so the gateway
 * falls through to the REST tier.
 */
export class SdkReadStrategy implements ExtractionStrategy {
  readonly method = 'SDK_CLIENT';
  readonly apiVersion = null;

  constructor(
    private readonly createClient: () => StructuredReadClient,
    private readonly logger: Logger,
  ) {}

  async attempt(document: RawDocument): Promise<TierOutcome> {
    try {
      const client = this.createClient();
      this.logger.info(DETAILS, 'Analyzing document with structured client');
      const raw = await client.analyzeRead(document.bytes);

      const parsed = analyzeOperationSchema.safeParse(raw);
      if (!parsed.success) {
        return this.fail('Structured client returned an unexpected result shape');
      }
      if (parsed.data.status !== 'succeeded' || !parsed.data.analyzeResult) {
        return this.fail(`Structured client finished with status ${parsed.data.status}`);
      }
      const result = parsed.data.analyzeResult;
      if (!result.content.trim()) {
        return this.fail('Structured client returned no text');
      }

      if (result.styles.some((style) => style.isHandwritten === true)) {
        this.logger.debug(DETAILS, 'Document contains handwritten content');
      }
      this.logger.info({ ...DETAILS, chars: result.content.length, pages: result.pages.length }, 'Extracted document text');
      return {
        ok: true,
        result: toExtractionResult(result, { method_used: 'SDK_CLIENT', api_version: null }),
      };
    } catch (err) {
      return this.fail(`Structured client failed: ${errorMessage(err)}`, err);
    }
  }

  private fail(message: string, cause?: unknown): TierOutcome {
    this.logger.warn(DETAILS, message);
    return {
      ok: false,
      failure: new TransientServiceError(message, { ...DETAILS, status: null }, { cause }),
    };
  }
}
