import type { Context } from 'hono';

/** Room for multipart boundaries, part headers and the text fields next to the file. */
export const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function tooLarge(c: Context, maxUploadBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxUploadBytes} bytes)` }, 413);
}

/**
 * Rejects a request up front when its declared Content-Length cannot fit an
 * upload of `maxUploadBytes`. Returns null when the request may proceed.
 */
export function rejectOversizedBody(c: Context, maxUploadBytes: number): Response | null {
  const parsed = parsePositiveInt(c.req.header('content-length'), 0);
  if (parsed <= maxUploadBytes + MULTIPART_OVERHEAD_BYTES) return null;
  return tooLarge(c, maxUploadBytes);
}

export function isMultipartRequest(c: Context): boolean {
  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  return contentType.includes('multipart/form-data');
}

type BodyReadResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; response: Response };

async function readBodyWithLimit(c: Context, maxUploadBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json({ error: 'Request body is not readable' }, 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, bytes: new Uint8Array() };

  const maxBytes = maxUploadBytes + MULTIPART_OVERHEAD_BYTES;
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return { ok: false, response: tooLarge(c, maxUploadBytes) };
      }
      chunks.push(value);
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return { ok: true, bytes: merged };
}

export type MultipartParseResult =
  | { ok: true; form: FormData }
  | { ok: false; response: Response };

/**
 * Parses a multipart body with an actual byte-size guard, so an upload without
 * (or with a wrong) Content-Length is cut off while streaming.
 */
export async function parseMultipartWithLimit(c: Context, maxUploadBytes: number): Promise<MultipartParseResult> {
  const upfront = rejectOversizedBody(c, maxUploadBytes);
  if (upfront) return { ok: false, response: upfront };

  const read = await readBodyWithLimit(c, maxUploadBytes);
  if (!read.ok) return read;

  try {
    const buffered = new Request(c.req.url, {
      method: c.req.method,
      headers: c.req.raw.headers,
      body: read.bytes,
    });
    return { ok: true, form: await buffered.formData() };
  } catch {
    return { ok: false, response: c.json({ error: 'Malformed multipart body' }, 400) };
  }
}
