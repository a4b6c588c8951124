import type { Section } from './types.js';

const SECTION_KEYWORDS = [
  'work experience',
  'experience',
  'employment',
  'professional experience',
  'education',
  'academic background',
  'qualifications',
  'skills',
  'technical skills',
  'core competencies',
  'expertise',
  'projects',
  'key projects',
  'notable projects',
  'certifications',
  'certificates',
  'achievements',
  'summary',
  'profile',
  'objective',
  'about',
  'contact',
  'personal information',
];

const MAX_HEADER_WORDS = 4;
const MAX_PARAGRAPH_LINES = 3;
const BULLET_PREFIXES = ['•', '-'];
const DECORATED_HEADER_RE = /^=+\s*(.*?)\s*=+$/;

function stripDecoration(line: string): string {
  const match = DECORATED_HEADER_RE.exec(line);
  return match ? match[1] : line;
}

function containsSectionKeyword(line: string): boolean {
  const lower = line.toLowerCase();
  return SECTION_KEYWORDS.some((keyword) => lower.includes(keyword));
}

// Also matches short factual lines such as "3.5 GPA" or "New York, NY".
function looksLikeHeader(line: string): boolean {
  const words = line.split(/\s+/).filter(Boolean);
  return (
    words.length <= MAX_HEADER_WORDS
    && !line.endsWith('.')
    && !BULLET_PREFIXES.some((prefix) => line.startsWith(prefix))
  );
}

export function isSectionHeader(line: string): boolean {
  const text = stripDecoration(line.trim());
  if (!text) return false;
  return containsSectionKeyword(text) || looksLikeHeader(text);
}

/**
 * Groups extracted lines into resume sections. Lines before the first header
 * form an implicit section with an empty header; when no header is found at
 * all the whole input comes back as a single implicit section.
 */
export function segment(lines: readonly string[]): Section[] {
  const sections: Section[] = [];
  let current: Section | null = null;
  let paragraph: string[] = [];
  let sawHeader = false;

  const appendToBody = (text: string, endParagraph: boolean) => {
    if (!current) current = { header: '', body: '' };
    const separator = current.body && !current.body.endsWith('\n') ? ' ' : '';
    current.body += `${separator}${text}${endParagraph ? '\n' : ''}`;
  };

  const flushParagraph = (endParagraph: boolean) => {
    if (paragraph.length === 0) return;
    appendToBody(paragraph.join(' '), endParagraph);
    paragraph = [];
  };

  const closeSection = () => {
    if (!current) return;
    sections.push({ header: current.header, body: current.body.trimEnd() });
    current = null;
  };

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (!line) {
      flushParagraph(false);
      continue;
    }

    if (isSectionHeader(line)) {
      flushParagraph(false);
      closeSection();
      current = { header: stripDecoration(line).toUpperCase(), body: '' };
      sawHeader = true;
      continue;
    }

    paragraph.push(line);
    if (line.endsWith('.') || line.endsWith(':') || paragraph.length > MAX_PARAGRAPH_LINES) {
      flushParagraph(true);
    }
  }

  flushParagraph(false);
  closeSection();

  if (!sawHeader) {
    return [{ header: '', body: lines.join('\n').trim() }];
  }
  return sections;
}

export function decorateHeader(header: string): string {
  return `=== ${header} ===`;
}

export function renderSections(sections: readonly Section[]): string {
  return sections
    .map((section) => {
      if (!section.header) return section.body;
      return section.body ? `${decorateHeader(section.header)}\n${section.body}` : decorateHeader(section.header);
    })
    .filter((block) => block.length > 0)
    .join('\n\n');
}

export function hasDetectedHeaders(sections: readonly Section[]): boolean {
  return sections.some((section) => section.header !== '');
}

