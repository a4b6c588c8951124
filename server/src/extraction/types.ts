export interface RawDocument {
  readonly bytes: Uint8Array;
  readonly filename?: string;
  readonly contentType?: string;
}

/** Which fallback tier produced the text. */
export type ExtractionMethod = 'SDK_CLIENT' | 'REST' | 'LEGACY';

export interface PageMetadata {
  page_number: number;
  width: number | null;
  height: number | null;
  unit: string | null;
  line_count: number;
  average_word_confidence: number | null;
}

export interface ExtractionResult {
  text: string;
  method_used: ExtractionMethod;
  /** API version of the accepted REST or legacy request; null for the SDK tier. */
  api_version: string | null;
  page_metadata: PageMetadata[] | null;
  handwritten: boolean;
  /** Raw lines in document order. */
  lines: string[];
}

export interface Section {
  header: string;
  body: string;
}
