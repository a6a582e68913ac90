import type { SubjectLineInput } from '../types';

export type SubjectLinesParseResult =
  | { ok: true; lines: SubjectLineInput[] }
  | { ok: false; status: 400 | 413; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls `subject_lines` out of a request body. Entries that are not strings
 * come back as null so the scorer treats them as empty lines.
 */
export function parseSubjectLines(body: unknown, maxLines: number): SubjectLinesParseResult {
  if (!isRecord(body) || !Array.isArray(body.subject_lines)) {
    return { ok: false, status: 400, message: 'subject_lines must be an array of strings' };
  }

  const raw: unknown[] = body.subject_lines;
  if (raw.length > maxLines) {
    return { ok: false, status: 413, message: `subject_lines exceeds limit of ${maxLines} entries` };
  }

  return {
    ok: true,
    lines: raw.map((entry) => (typeof entry === 'string' ? entry : null)),
  };
}

/** Opal sends tool arguments under `parameters`; a bare body is accepted too. */
export function unwrapToolParameters(body: unknown): unknown {
  if (isRecord(body) && isRecord(body.parameters)) {
    return body.parameters;
  }
  return body;
}
