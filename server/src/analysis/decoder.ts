import { z } from 'zod';
import defaultLogger, { type Logger } from '../lib/logger.js';
import { MalformedResponseError } from '../lib/errors.js';
import {
  SKILL_CATEGORIES,
  type AnalysisRecord,
  type DecodeOutcome,
  type DecodeStrategy,
  type SkillCategory,
  type SkillMatch,
} from './types.js';

const JSON_FENCE = '```json';
const FENCE = '```';

const score = z.coerce.number().catch(0).transform((n) => Math.min(1, Math.max(0, n)));
const list = z.array(z.unknown()).catch([]);

const skillEntrySchema = z.object({
  skill: z.string().trim().min(1),
  relevance_score: score,
  category: z.string().catch('other'),
});

const replySchema = z.object({
  skills: list,
  role_match_score: score,
  strengths: list,
  gaps: list,
  recommendations: list,
  summary: z.string().catch(''),
});

type ReplyObject = Record<string, unknown>;

function isReplyObject(value: unknown): value is ReplyObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses `text` as a JSON object. Only the direct stage accepts `{}`; the
 * fenced and greedy stages need at least one field.
 */
function parseObject(text: string, allowEmpty: boolean): ReplyObject | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isReplyObject(value)) return null;
  return allowEmpty || Object.keys(value).length > 0 ? value : null;
}

function fencedSpan(reply: string): string | null {
  const open = reply.indexOf(JSON_FENCE);
  if (open < 0) return null;
  const start = open + JSON_FENCE.length;
  const end = reply.indexOf(FENCE, start);
  if (end <= start) return null;
  return reply.slice(start, end).trim();
}

function greedySpan(reply: string): string | null {
  const first = reply.indexOf('{');
  const last = reply.lastIndexOf('}');
  if (first < 0 || last <= first) return null;
  return reply.slice(first, last + 1);
}

type ReplyParser = (reply: string) => ReplyObject | null;

const PARSE_CHAIN: ReadonlyArray<{ strategy: Exclude<DecodeStrategy, 'fallback'>; parse: ReplyParser }> = [
  { strategy: 'direct', parse: (reply) => parseObject(reply.trim(), true) },
  {
    strategy: 'fenced',
    parse: (reply) => {
      const span = fencedSpan(reply);
      return span === null ? null : parseObject(span, false);
    },
  },
  {
    strategy: 'greedy',
    parse: (reply) => {
      const span = greedySpan(reply);
      return span === null ? null : parseObject(span, false);
    },
  },
];

function toCategory(raw: string): SkillCategory {
  const normalized = raw.trim().toLowerCase();
  return SKILL_CATEGORIES.find((c) => c === normalized) ?? 'other';
}

function toSkill(entry: unknown): SkillMatch | null {
  if (typeof entry === 'string') {
    const skill = entry.trim();
    return skill ? { skill, relevance_score: 0, category: 'other' } : null;
  }
  const parsed = skillEntrySchema.safeParse(entry);
  if (!parsed.success) return null;
  return {
    skill: parsed.data.skill,
    relevance_score: parsed.data.relevance_score,
    category: toCategory(parsed.data.category),
  };
}

function toStringList(values: unknown[]): string[] {
  return values
    .filter((v): v is string | number => typeof v === 'string' || typeof v === 'number')
    .map((v) => String(v).trim())
    .filter(Boolean);
}

/** Applies per-field defaults to a reply object that passed a parse stage. */
export function normalizeReply(value: ReplyObject, extractedText: string): AnalysisRecord {
  const reply = replySchema.parse(value);
  return {
    extracted_text: extractedText,
    skills: reply.skills.map(toSkill).filter((s): s is SkillMatch => s !== null),
    role_match_score: reply.role_match_score,
    strengths: toStringList(reply.strengths),
    gaps: toStringList(reply.gaps),
    recommendations: toStringList(reply.recommendations),
    summary: reply.summary.trim(),
  };
}

export const FALLBACK_ROLE_MATCH_SCORE = 0.65;

/** Placeholder returned when no parse stage can read the reply. */
export function buildFallbackRecord(extractedText = ''): AnalysisRecord {
  return {
    extracted_text: extractedText,
    skills: [
      { skill: 'Communication', relevance_score: 0.7, category: 'soft' },
      { skill: 'Problem Solving', relevance_score: 0.8, category: 'soft' },
      { skill: 'Technical Skills', relevance_score: 0.6, category: 'technical' },
    ],
    role_match_score: FALLBACK_ROLE_MATCH_SCORE,
    strengths: ['Professional experience', 'Educational background'],
    gaps: ['Analysis incomplete due to response parsing issues'],
    recommendations: ['Review and update resume format', 'Consider professional resume review'],
    summary: 'Candidate shows potential but full analysis was limited due to technical issues.',
  };
}

export interface DecodeOptions {
  extractedText?: string;
  logger?: Logger;
}

/**
 * Turns a model reply into an AnalysisRecord. Never throws: each parse stage
 * falls through to the next, and the safe default closes the chain.
 */
export function decode(reply: string, options: DecodeOptions = {}): DecodeOutcome {
  const logger = options.logger ?? defaultLogger;
  const extractedText = options.extractedText ?? '';

  for (const { strategy, parse } of PARSE_CHAIN) {
    const value = parse(reply);
    if (value) {
      logger.debug({ strategy, chars: reply.length }, 'Decoded model reply');
      return { record: normalizeReply(value, extractedText), strategy };
    }
    logger.debug({ strategy }, 'Parse stage did not yield an analysis object');
  }

  const err = new MalformedResponseError('Model reply did not parse under any strategy');
  logger.warn({ err, rawSnippet: reply.substring(0, 300) }, 'Using fallback analysis record');
  return { record: buildFallbackRecord(extractedText), strategy: 'fallback' };
}
