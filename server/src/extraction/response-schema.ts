import { z } from 'zod';
import type { ExtractionResult, PageMetadata } from './types.js';

/**
 * Versioned shape of the document service's analyze result, shared by the SDK
 * and REST tiers. Every optional field is defaulted here so nothing downstream
 * reads optional fields off the raw payload.
 */
const lineSchema = z.object({
  content: z.string().default(''),
});

const wordSchema = z.object({
  content: z.string().default(''),
  confidence: z.number().nullish(),
});

const pageSchema = z.object({
  pageNumber: z.number().int(),
  width: z.number().nullish(),
  height: z.number().nullish(),
  unit: z.string().nullish(),
  lines: z.array(lineSchema).nullish().transform((v) => v ?? []),
  words: z.array(wordSchema).nullish().transform((v) => v ?? []),
});

const styleSchema = z.object({
  isHandwritten: z.boolean().nullish(),
});

export const analyzeResultSchema = z.object({
  apiVersion: z.string().nullish(),
  modelId: z.string().nullish(),
  content: z.string().default(''),
  pages: z.array(pageSchema).nullish().transform((v) => v ?? []),
  styles: z.array(styleSchema).nullish().transform((v) => v ?? []),
});

export type AnalyzeResult = z.infer<typeof analyzeResultSchema>;

export const analyzeOperationSchema = z.object({
  status: z.string(),
  error: z
    .object({
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
  analyzeResult: analyzeResultSchema.nullish(),
});

export type AnalyzeOperation = z.infer<typeof analyzeOperationSchema>;

function averageConfidence(words: AnalyzeResult['pages'][number]['words']): number | null {
  const confidences = words
    .map((w) => w.confidence)
    .filter((c): c is number => typeof c === 'number');
  if (confidences.length === 0) return null;
  return confidences.reduce((sum, c) => sum + c, 0) / confidences.length;
}

export function toPageMetadata(result: AnalyzeResult): PageMetadata[] | null {
  if (result.pages.length === 0) return null;
  return result.pages.map((page) => ({
    page_number: page.pageNumber,
    width: page.width ?? null,
    height: page.height ?? null,
    unit: page.unit ?? null,
    line_count: page.lines.length,
    average_word_confidence: averageConfidence(page.words),
  }));
}

/**
 * Page lines when the service reports them, otherwise the content split on
 * newlines.
 */
export function toLines(result: AnalyzeResult): string[] {
  const pageLines = result.pages.flatMap((page) => page.lines.map((line) => line.content));
  if (pageLines.length > 0) return pageLines;
  return result.content.split(/\r?\n/);
}

export function toExtractionResult(
  result: AnalyzeResult,
  tier: Pick<ExtractionResult, 'method_used' | 'api_version'>,
): ExtractionResult {
  return {
    text: result.content,
    method_used: tier.method_used,
    api_version: tier.api_version,
    page_metadata: toPageMetadata(result),
    handwritten: result.styles.some((style) => style.isHandwritten === true),
    lines: toLines(result),
  };
}

export function describeServiceError(error: AnalyzeOperation['error']): string {
  if (!error) return 'no error details';
  const parts = [error.code, error.message].filter((p): p is string => typeof p === 'string' && p.length > 0);
  return parts.length > 0 ? parts.join(': ') : 'no error details';
}
