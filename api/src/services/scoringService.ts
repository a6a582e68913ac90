import type { BatchResult, ScoreReport, SpamRisk, SubjectLineInput } from '../types';

// Order matters: warnings are emitted in this order.
export const SPAM_TERMS: readonly string[] = [
  'free',
  'guarantee',
  'guaranteed',
  'urgent',
  'act now',
  'limited time',
  'winner',
  'cash',
  '100%',
];

// Unicode whitespace plus the C0 separators U+001C-U+001F; U+FEFF is not whitespace here
const EDGE_WHITESPACE =
  /^[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g;

const TOO_LONG_THRESHOLD = 60;
const LONG_THRESHOLD = 45;
const TOO_LONG_PENALTY = 25;
const LONG_PENALTY = 15;
const SPAM_TERM_PENALTY = 20;
const EXCLAMATION_PENALTY = 10;
const ALL_CAPS_PENALTY = 10;

// A run of 4+ A-Z with no letter, digit or underscore on either side.
const ALL_CAPS_PATTERN = /(?<![\p{L}\p{N}_])[A-Z]{4,}(?![\p{L}\p{N}_])/u;

export function computeSpamRisk(score: number): SpamRisk {
  if (score >= 80) return 'Low';
  if (score >= 60) return 'Medium';
  return 'High';
}

function countExclamations(subject: string): number {
  let count = 0;
  for (const ch of subject) {
    if (ch === '!') count++;
  }
  return count;
}

export function scoreSubjectLine(raw: SubjectLineInput): ScoreReport {
  const subject = (typeof raw === 'string' ? raw : '').replace(EDGE_WHITESPACE, '');
  // Code points, so an emoji counts as one character
  const length = Array.from(subject).length;

  if (length === 0) {
    return {
      subject,
      score: 0,
      length: 0,
      spam_risk: 'High',
      warnings: ['Empty subject line'],
    };
  }

  let score = 100;
  const warnings: string[] = [];

  if (length > TOO_LONG_THRESHOLD) {
    score -= TOO_LONG_PENALTY;
    warnings.push('Too long (60+ characters)');
  } else if (length > LONG_THRESHOLD) {
    score -= LONG_PENALTY;
    warnings.push('Long (45+ characters)');
  }

  const lower = subject.toLowerCase();
  for (const term of SPAM_TERMS) {
    if (lower.includes(term)) {
      score -= SPAM_TERM_PENALTY;
      warnings.push(`Spam term detected: '${term}'`);
    }
  }

  if (countExclamations(subject) >= 2) {
    score -= EXCLAMATION_PENALTY;
    warnings.push('Too many exclamation marks');
  }

  if (ALL_CAPS_PATTERN.test(subject)) {
    score -= ALL_CAPS_PENALTY;
    warnings.push('Contains ALL CAPS words');
  }

  score = Math.max(0, Math.min(100, score));

  return {
    subject,
    score,
    length,
    spam_risk: computeSpamRisk(score),
    warnings,
  };
}

/** First report with the highest score wins; empty string for no reports. */
export function pickBestSubject(results: ScoreReport[]): string {
  let best: ScoreReport | null = null;
  for (const report of results) {
    if (best === null || report.score > best.score) {
      best = report;
    }
  }
  return best ? best.subject : '';
}

export function scoreSubjectLines(lines: readonly SubjectLineInput[]): BatchResult {
  const results = lines.map(scoreSubjectLine);
  return {
    results,
    best_subject: pickBestSubject(results),
  };
}
