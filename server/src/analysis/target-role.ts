const ROLE_INDICATORS = ['for', 'as', 'position', 'role', 'job', 'analyze', 'evaluate'];

const LEAD_INS = [
  'analyze this resume for',
  'analyze for',
  'evaluate for',
  'check for',
  'how well does this fit',
  'analyze this for',
];

const TRAIL_OFFS = ['position', 'role', 'job', 'candidate'];

const MIN_MESSAGE_LENGTH = 5;
const MIN_ROLE_LENGTH = 3;

function stripLeadIn(text: string): string {
  const lower = text.toLowerCase();
  const leadIn = LEAD_INS.find((phrase) => lower.startsWith(phrase));
  return leadIn ? text.slice(leadIn.length).trim() : text;
}

function stripTrailOff(text: string): string {
  const lower = text.toLowerCase();
  const trailOff = TRAIL_OFFS.find((phrase) => lower.endsWith(phrase));
  return trailOff ? text.slice(0, text.length - trailOff.length).trim() : text;
}

/**
 * Pulls the target role out of a casual request such as
 * "Analyze this resume for a Senior Python Developer position".
 */
export function extractTargetRole(message: string | null | undefined): string | null {
  const trimmed = message?.trim() ?? '';
  if (trimmed.length < MIN_MESSAGE_LENGTH) return null;

  const lower = trimmed.toLowerCase();
  if (!ROLE_INDICATORS.some((indicator) => lower.includes(indicator))) {
    return trimmed;
  }

  const role = stripTrailOff(stripLeadIn(trimmed));
  return role.length >= MIN_ROLE_LENGTH ? role : null;
}
