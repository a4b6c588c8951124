import type { ExtractionMethod, PageMetadata } from '../extraction/types.js';

export const SKILL_CATEGORIES = ['technical', 'soft', 'domain', 'other'] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export interface SkillMatch {
  skill: string;
  /** 0..1 */
  relevance_score: number;
  category: SkillCategory;
}

export interface AnalysisRecord {
  extracted_text: string;
  skills: SkillMatch[];
  /** 0..1 */
  role_match_score: number;
  strengths: string[];
  gaps: string[];
  recommendations: string[];
  summary: string;
}

/** Which parse stage produced the record; `fallback` means the safe default. */
export type DecodeStrategy = 'direct' | 'fenced' | 'greedy' | 'fallback';

export interface DecodeOutcome {
  record: AnalysisRecord;
  strategy: DecodeStrategy;
}

export interface ResumeAnalysisReport {
  target_role: string;
  analysis: AnalysisRecord;
  extraction: {
    method_used: ExtractionMethod;
    api_version: string | null;
    page_metadata: PageMetadata[] | null;
    handwritten: boolean;
  };
  decode_strategy: DecodeStrategy;
}
