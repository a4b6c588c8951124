import defaultLogger, { type Logger } from '../lib/logger.js';
import type { ExtractionResult, RawDocument } from '../extraction/types.js';
import { hasDetectedHeaders, renderSections, segment } from '../extraction/section-segmenter.js';
import { decode } from './decoder.js';
import type { ResumeInference } from './inference.js';
import type { ResumeAnalysisReport } from './types.js';

export interface DocumentExtractor {
  extract(document: RawDocument, logger?: Logger): Promise<ExtractionResult>;
}

export interface PipelineDeps {
  extractor: DocumentExtractor;
  inference: ResumeInference;
}

/**
 * PDF bytes → extracted text → sections → model reply → AnalysisRecord.
 * Holds no per-call state; concurrent analyses share one instance.
 */
export class ResumeAnalysisPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async analyzeResume(
    document: RawDocument,
    targetRole: string,
    logger: Logger = defaultLogger,
  ): Promise<ResumeAnalysisReport> {
    logger.info({ filename: document.filename, bytes: document.bytes.byteLength }, 'Extracting text from PDF');
    const extraction = await this.deps.extractor.extract(document, logger);

    const sections = segment(extraction.lines);
    const segmented = hasDetectedHeaders(sections);
    const structuredText = segmented ? renderSections(sections) : extraction.text;
    logger.info(
      { method: extraction.method_used, apiVersion: extraction.api_version, sections: segmented ? sections.length : 0 },
      segmented ? 'Identified resume sections' : 'No clear sections detected, using original content',
    );

    const reply = await this.deps.inference.infer(structuredText, targetRole, logger);
    const { record, strategy } = decode(reply, { extractedText: structuredText, logger });

    return {
      target_role: targetRole,
      analysis: record,
      extraction: {
        method_used: extraction.method_used,
        api_version: extraction.api_version,
        page_metadata: extraction.page_metadata,
        handwritten: extraction.handwritten,
      },
      decode_strategy: strategy,
    };
  }
}
