import { Hono } from 'hono';
import { z } from 'zod';
import type { ResumeAnalysisPipeline } from '../analysis/pipeline.js';
import { extractTargetRole } from '../analysis/target-role.js';
import {
  CredentialError,
  ExtractionError,
  ExtractionTimeoutError,
} from '../lib/errors.js';
import { isMultipartRequest, parseMultipartWithLimit, rejectOversizedBody } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';

const PDF_MIME = 'application/pdf';

const analyzeFieldsSchema = z.object({
  role: z.string().trim().min(3).max(200).optional(),
  message: z.string().trim().max(2000).optional(),
});

function isPdfUpload(file: { name: string; type: string }): boolean {
  if (file.type && file.type.toLowerCase().includes('pdf')) return true;
  return file.name.toLowerCase().endsWith('.pdf');
}

export function createAnalyzeRoutes(pipeline: ResumeAnalysisPipeline, maxUploadBytes: number) {
  const analyze = new Hono();

  // POST /api/analyze: multipart form with file (PDF) and role or message
  analyze.post('/', async (c) => {
    const logger = c.get('logger');

    const oversized = rejectOversizedBody(c, maxUploadBytes);
    if (oversized) return oversized;
    if (!isMultipartRequest(c)) {
      return c.json({ error: 'Unsupported content type. Use multipart/form-data.' }, 415);
    }

    const parsed = await parseMultipartWithLimit(c, maxUploadBytes);
    if (!parsed.ok) return parsed.response;
    const { form } = parsed;
    const file = form.get('file');
    if (!file || typeof file === 'string') {
      return c.json({ error: 'Please upload a PDF resume in the "file" field.' }, 400);
    }
    if (!isPdfUpload(file)) {
      return c.json({ error: 'Please upload a PDF file. Other file formats are not supported yet.' }, 400);
    }
    if (file.size > maxUploadBytes) {
      return c.json({ error: `Request too large (max ${maxUploadBytes} bytes)` }, 413);
    }
    if (file.size === 0) {
      return c.json({ error: 'File content is empty. Please check your PDF file.' }, 400);
    }

    const role = form.get('role');
    const message = form.get('message');
    const fields = validateBody(analyzeFieldsSchema, {
      role: typeof role === 'string' ? role : undefined,
      message: typeof message === 'string' ? message : undefined,
    });
    if (!fields.success) {
      return c.json({ error: 'Invalid request', details: fields.issues }, 400);
    }

    const targetRole = fields.data.role ?? extractTargetRole(fields.data.message);
    if (!targetRole) {
      return c.json({
        error: 'Please specify the target role, e.g. "Analyze this resume for a Senior Python Developer position".',
      }, 400);
    }

    const bytes = new Uint8Array(await file.arrayBuffer());
    try {
      const report = await pipeline.analyzeResume(
        { bytes, filename: file.name, contentType: file.type || PDF_MIME },
        targetRole,
        logger,
      );
      return c.json(report);
    } catch (err) {
      if (err instanceof CredentialError) {
        logger.error({ code: err.code }, err.message);
        return c.json({ error: err.message, code: err.code }, 503);
      }
      if (err instanceof ExtractionTimeoutError) {
        logger.error({ code: err.code, lastStatus: err.lastStatus }, err.message);
        return c.json({ error: err.message, code: err.code, last_status: err.lastStatus }, 502);
      }
      if (err instanceof ExtractionError) {
        logger.error({ code: err.code, reason: err.reason }, err.message);
        return c.json({ error: err.message, code: err.code, reason: err.reason, attempts: err.attempts }, 502);
      }
      throw err;
    }
  });

  return analyze;
}
