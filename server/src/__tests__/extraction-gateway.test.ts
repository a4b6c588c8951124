import { describe, it, expect, vi } from 'vitest';
import { ExtractionGateway } from '../extraction/gateway.js';
import type { StructuredReadClient } from '../extraction/azure-read-client.js';
import type { DocumentServiceConfig } from '../lib/config.js';
import { CredentialError, ExtractionError, ExtractionTimeoutError } from '../lib/errors.js';

const ENDPOINT = 'https://di.test';
const OPERATION_URL = 'https://di.test/operations/abc';
const DOCUMENT = { bytes: new Uint8Array([0x25, 0x50, 0x44, 0x46]), filename: 'resume.pdf' };

const BASE_CONFIG: DocumentServiceConfig = {
  endpoint: ENDPOINT,
  key: 'test-key',
  useSdk: false,
  apiVersions: ['v3', 'v2', 'v1'],
  pollIntervalMs: 2000,
  pollMaxAttempts: 5,
  submitTimeoutMs: 1000,
};

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function accepted(): Response {
  return new Response(null, { status: 202, headers: { 'Operation-Location': OPERATION_URL } });
}

function operation(status: string, extra: Record<string, unknown> = {}): Response {
  return new Response(JSON.stringify({ status, ...extra }), { status: 200 });
}

function succeeded(content: string): Response {
  return operation('succeeded', { analyzeResult: { content } });
}

/**
 * Fake document service: `submit` answers each POST by URL, `polls` answers
 * successive GETs (the last one repeats).
 */
function fakeService(submit: (url: string) => Response | Promise<Response>, polls: Array<() => Response> = []) {
  let pollIndex = 0;
  return vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = requestUrl(input);
    if (init?.method === 'POST') return submit(url);
    const next = polls[Math.min(pollIndex, polls.length - 1)];
    pollIndex += 1;
    if (!next) throw new Error(`unexpected GET ${url}`);
    return next();
  });
}

function postedUrls(fetchMock: ReturnType<typeof fakeService>): string[] {
  return fetchMock.mock.calls
    .filter(([, init]) => init?.method === 'POST')
    .map(([input]) => requestUrl(input));
}

function versionOf(url: string): string | null {
  return new URL(url).searchParams.get('api-version');
}

async function extractFailure(gateway: ExtractionGateway): Promise<unknown> {
  return gateway.extract(DOCUMENT).then(
    () => {
      throw new Error('expected extraction to fail');
    },
    (err: unknown) => err,
  );
}

describe('ExtractionGateway', () => {
  it('stops at the first REST version that accepts the document', async () => {
    const fetchMock = fakeService(() => accepted(), [() => succeeded('Jane Doe\nEngineer')]);
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    const result = await gateway.extract(DOCUMENT);

    expect(result).toEqual({
      text: 'Jane Doe\nEngineer',
      method_used: 'REST',
      api_version: 'v3',
      page_metadata: null,
      handwritten: false,
      lines: ['Jane Doe', 'Engineer'],
    });
    expect(postedUrls(fetchMock)).toEqual([
      `${ENDPOINT}/documentintelligence/documentModels/prebuilt-read:analyze?api-version=v3`,
    ]);
  });

  it('sends the key and PDF bytes on submission and the key on every poll', async () => {
    const fetchMock = fakeService(() => accepted(), [() => succeeded('text')]);
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    await gateway.extract(DOCUMENT);

    const [[, submitInit], [pollInput, pollInit]] = fetchMock.mock.calls;
    const submitHeaders = new Headers(submitInit?.headers);
    expect(submitHeaders.get('Ocp-Apim-Subscription-Key')).toBe('test-key');
    expect(submitHeaders.get('Content-Type')).toBe('application/pdf');
    expect(submitInit?.body).toBe(DOCUMENT.bytes);
    expect(requestUrl(pollInput)).toBe(OPERATION_URL);
    expect(new Headers(pollInit?.headers).get('Ocp-Apim-Subscription-Key')).toBe('test-key');
  });

  it('tries API versions in configured order after rejections', async () => {
    const fetchMock = fakeService(
      (url) => {
        const version = versionOf(url);
        if (version === 'v3') return new Response('denied', { status: 401 });
        if (version === 'v2') return new Response('no such version', { status: 404 });
        return accepted();
      },
      [() => succeeded('text')],
    );
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    const result = await gateway.extract(DOCUMENT);

    expect(result.method_used).toBe('REST');
    expect(result.api_version).toBe('v1');
    expect(postedUrls(fetchMock).map(versionOf)).toEqual(['v3', 'v2', 'v1']);
  });

  it('moves on when a submission never gets a response', async () => {
    const fetchMock = fakeService(
      (url) => {
        if (versionOf(url) === 'v3') throw new TypeError('fetch failed');
        return accepted();
      },
      [() => succeeded('text')],
    );
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    const result = await gateway.extract(DOCUMENT);

    expect(result.api_version).toBe('v2');
  });

  it('uses the legacy endpoint once after every version is rejected', async () => {
    const fetchMock = fakeService(
      (url) => (url.includes('/formrecognizer/') ? accepted() : new Response('', { status: 500 })),
      [() => succeeded('legacy text')],
    );
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    const result = await gateway.extract(DOCUMENT);

    expect(result.method_used).toBe('LEGACY');
    expect(result.api_version).toBe('2022-08-31');
    expect(result.text).toBe('legacy text');
    const urls = postedUrls(fetchMock);
    expect(urls).toHaveLength(4);
    expect(urls[3]).toBe(`${ENDPOINT}/formrecognizer/documentModels/prebuilt-read:analyze?api-version=2022-08-31`);
  });

  it('aggregates every attempt when no tier accepts', async () => {
    const statuses: Record<string, number> = { v3: 401, v2: 503, v1: 404, '2022-08-31': 400 };
    const fetchMock = fakeService((url) => new Response('', { status: statuses[versionOf(url) ?? ''] ?? 500 }));
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    const err = await extractFailure(gateway);

    if (!(err instanceof ExtractionError)) throw err;
    expect(err.reason).toBe('not_accepted');
    expect(err.message).toBe(
      'Failed to start analysis. Attempts: REST v3: 401; REST v2: 503; REST v1: 404; LEGACY 2022-08-31: 400',
    );
    expect(err.attempts.map((a) => a.status)).toEqual([401, 503, 404, 400]);
    expect(postedUrls(fetchMock).filter((url) => url.includes('/formrecognizer/'))).toHaveLength(1);
  });

  it('reports an authentication failure when every attempt is unauthorized', async () => {
    const fetchMock = fakeService(() => new Response('denied', { status: 401 }));
    const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

    const err = await extractFailure(gateway);

    if (!(err instanceof ExtractionError)) throw err;
    expect(err.reason).toBe('auth_failed');
    expect(err.attempts).toHaveLength(4);
    expect(err.attempts[0]?.message).toBe('Authentication failed with API version v3: denied');
  });

  it('raises a credential error without any network call', async () => {
    const fetchMock = fakeService(() => accepted());
    const gateway = new ExtractionGateway({ ...BASE_CONFIG, key: undefined }, { fetch: fetchMock });

    await expect(gateway.extract(DOCUMENT)).rejects.toBeInstanceOf(CredentialError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  describe('polling', () => {
    it('returns once the operation succeeds within the budget', async () => {
      const sleep = vi.fn(async (_ms: number) => {});
      const fetchMock = fakeService(() => accepted(), [
        () => operation('notStarted'),
        () => operation('running'),
        () => operation('running'),
        () => succeeded('done'),
      ]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep });

      const result = await gateway.extract(DOCUMENT);

      expect(result.text).toBe('done');
      expect(sleep).toHaveBeenCalledTimes(4);
      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it('times out after the configured number of polls', async () => {
      const fetchMock = fakeService(() => accepted(), [() => operation('running')]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionTimeoutError)) throw err;
      expect(err.lastStatus).toBe('running');
      expect(err.attempts).toBe(5);
      expect(err.message).toBe('Analysis timed out after 5 poll attempts (last status: running)');
      expect(fetchMock.mock.calls.filter(([, init]) => init?.method === 'GET')).toHaveLength(5);
    });

    it('surfaces a failed analysis without trying further tiers', async () => {
      const fetchMock = fakeService(() => accepted(), [
        () => operation('failed', { error: { code: 'InvalidRequest', message: 'corrupt file' } }),
      ]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('analysis_failed');
      expect(err.message).toBe('Analysis failed: InvalidRequest: corrupt file');
      expect(postedUrls(fetchMock)).toHaveLength(1);
    });

    it('rejects an unknown status', async () => {
      const fetchMock = fakeService(() => accepted(), [() => operation('canceled')]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('unknown_status');
      expect(err.message).toBe('Unknown status: canceled');
    });

    it('fails on a non-200 poll response', async () => {
      const fetchMock = fakeService(() => accepted(), [() => new Response('gone', { status: 404 })]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('poll_http_error');
      expect(err.message).toBe('Failed to get results: 404 - gone');
    });

    it('turns a network fault on a status request into an extraction error', async () => {
      const fetchMock = fakeService(() => accepted(), [() => {
        throw new TypeError('fetch failed');
      }]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('poll_http_error');
      expect(err.message).toBe('Failed to get results: fetch failed');
      expect(err.cause).toBeInstanceOf(TypeError);
    });

    it('abandons a status request that never answers', async () => {
      const hangUntilAborted = (signal: AbortSignal | null | undefined) => new Promise<Response>((_, reject) => {
        if (!signal) return;
        const abortSignal = signal;
        abortSignal.addEventListener('abort', () => reject(abortSignal.reason));
      });
      const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => (
        init?.method === 'POST' ? accepted() : hangUntilAborted(init?.signal)
      ));
      const gateway = new ExtractionGateway(
        { ...BASE_CONFIG, submitTimeoutMs: 20, pollMaxAttempts: 3 },
        { fetch: fetchMock, sleep: async () => {} },
      );

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('poll_http_error');
      expect(fetchMock.mock.calls.filter(([, init]) => init?.method === 'GET')).toHaveLength(1);
    });

    it('fails when an accepted request has no Operation-Location', async () => {
      const fetchMock = fakeService(() => new Response(null, { status: 202 }));
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('missing_operation_location');
      expect(postedUrls(fetchMock)).toHaveLength(1);
    });

    it('fails when the service succeeds with no text', async () => {
      const fetchMock = fakeService(() => accepted(), [() => succeeded('   ')]);
      const gateway = new ExtractionGateway(BASE_CONFIG, { fetch: fetchMock, sleep: async () => {} });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('empty_content');
    });
  });

  describe('structured client tier', () => {
    const SDK_CONFIG: DocumentServiceConfig = { ...BASE_CONFIG, useSdk: true };

    it('returns the structured result without touching REST', async () => {
      const client: StructuredReadClient = {
        analyzeRead: vi.fn(async () => ({
          status: 'succeeded',
          analyzeResult: {
            content: 'Jane Doe\nSkills\nTypeScript',
            pages: [{
              pageNumber: 1,
              width: 8.5,
              height: 11,
              unit: 'inch',
              lines: [{ content: 'Jane Doe' }, { content: 'Skills' }, { content: 'TypeScript' }],
              words: [{ content: 'Jane', confidence: 0.5 }, { content: 'Doe', confidence: 1 }],
            }],
            styles: [{ isHandwritten: true }],
          },
        })),
      };
      const fetchMock = fakeService(() => accepted());
      const createReadClient = vi.fn(() => client);
      const gateway = new ExtractionGateway(SDK_CONFIG, { fetch: fetchMock, createReadClient });

      const result = await gateway.extract(DOCUMENT);

      expect(createReadClient).toHaveBeenCalledWith(ENDPOINT, 'test-key', {
        submitTimeoutMs: 1000,
        pollIntervalMs: 2000,
        pollMaxAttempts: 5,
      });
      expect(client.analyzeRead).toHaveBeenCalledWith(DOCUMENT.bytes);
      expect(result).toEqual({
        text: 'Jane Doe\nSkills\nTypeScript',
        method_used: 'SDK_CLIENT',
        api_version: null,
        page_metadata: [{
          page_number: 1,
          width: 8.5,
          height: 11,
          unit: 'inch',
          line_count: 3,
          average_word_confidence: 0.75,
        }],
        handwritten: true,
        lines: ['Jane Doe', 'Skills', 'TypeScript'],
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('falls through to REST when the client throws', async () => {
      const fetchMock = fakeService(() => accepted(), [() => succeeded('rest text')]);
      const gateway = new ExtractionGateway(SDK_CONFIG, {
        fetch: fetchMock,
        sleep: async () => {},
        createReadClient: () => ({
          analyzeRead: async () => {
            throw new Error('401 Unauthorized');
          },
        }),
      });

      const result = await gateway.extract(DOCUMENT);

      expect(result.method_used).toBe('REST');
      expect(result.api_version).toBe('v3');
    });

    it('falls through to REST when the client returns an unexpected shape', async () => {
      const fetchMock = fakeService(() => accepted(), [() => succeeded('rest text')]);
      const gateway = new ExtractionGateway(SDK_CONFIG, {
        fetch: fetchMock,
        sleep: async () => {},
        createReadClient: () => ({ analyzeRead: async () => ({ unexpected: true }) }),
      });

      const result = await gateway.extract(DOCUMENT);

      expect(result.method_used).toBe('REST');
    });

    it('lists the structured attempt in the aggregate error', async () => {
      const fetchMock = fakeService(() => new Response('', { status: 500 }));
      const gateway = new ExtractionGateway(SDK_CONFIG, {
        fetch: fetchMock,
        sleep: async () => {},
        createReadClient: () => {
          throw new Error('bad endpoint');
        },
      });

      const err = await extractFailure(gateway);

      if (!(err instanceof ExtractionError)) throw err;
      expect(err.reason).toBe('not_accepted');
      expect(err.message).toBe(
        'Failed to start analysis. Attempts: SDK_CLIENT: no response; REST v3: 500; REST v2: 500; REST v1: 500; LEGACY 2022-08-31: 500',
      );
    });
  });
});
