/**
 * JSON extraction for chat model output.
 * Handles markdown fences, surrounding prose, truncation markers and the
 * usual near-JSON mistakes before handing the value to a zod schema.
 */

import { jsonrepair } from 'jsonrepair';
import type { ZodType, ZodTypeDef } from 'zod';

export type LlmJsonErrorKind = 'parse-error' | 'truncated' | 'schema-error';

export interface LlmJsonError {
  kind: LlmJsonErrorKind;
  message: string;
  raw: string;
  sanitized: string;
}

export type LlmJsonResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LlmJsonError };

const TRUNCATION_RE = /^[\s]*([⋮…⋯]+|\.{3,})[\s]*$/u;

/**
 * Parse JSON from model output with sanitization and repair.
 */
export function parseLlmJson(raw: string): LlmJsonResult<unknown> {
  const candidate = extractJsonCandidate(raw);
  const { sanitized, sawTruncation } = sanitize(candidate);
  const repaired = repairCommonIssues(sanitized);

  try {
    return { ok: true, value: JSON.parse(repaired) };
  } catch {
    try {
      return { ok: true, value: JSON.parse(jsonrepair(repaired)) };
    } catch (e) {
      return {
        ok: false,
        error: {
          kind: sawTruncation ? 'truncated' : 'parse-error',
          message: e instanceof Error ? e.message : 'JSON parse failed',
          raw,
          sanitized: repaired,
        },
      };
    }
  }
}

/**
 * Parse and validate in one step. Schema defaults are applied, so the
 * returned value is the schema's output type.
 */
export function parseLlmJsonAs<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): LlmJsonResult<T> {
  const parsed = parseLlmJson(raw);
  if (!parsed.ok) return parsed;

  const validated = schema.safeParse(parsed.value);
  if (validated.success) return { ok: true, value: validated.data };

  return {
    ok: false,
    error: {
      kind: 'schema-error',
      message: validated.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
      raw,
      sanitized: JSON.stringify(parsed.value),
    },
  };
}

/**
 * Find the largest balanced {} block in the string.
 */
function extractLargestBraceBlock(s: string): string | null {
  let braceLevel = 0;
  let maxLen = 0;
  let bestMatch: string | null = null;
  let startIndex = -1;

  for (let i = 0; i < s.length; i++) {
    const char = s[i];
    if (char === '{') {
      if (braceLevel === 0) startIndex = i;
      braceLevel++;
    } else if (char === '}' && braceLevel > 0) {
      braceLevel--;
      if (braceLevel === 0 && startIndex !== -1) {
        const len = i - startIndex + 1;
        if (len > maxLen) {
          maxLen = len;
          bestMatch = s.slice(startIndex, i + 1);
        }
      }
    }
  }
  return bestMatch;
}

function extractJsonCandidate(raw: string): string {
  if (!raw) return '{}';

  const trimmed = raw.trim();
  if (trimmed.startsWith('{')) {
    const braceResult = extractLargestBraceBlock(trimmed);
    if (braceResult) return braceResult;
  }

  const jsonFence = raw.match(/```json\s*([\s\S]*?)```/i);
  if (jsonFence?.[1]) return jsonFence[1].trim();

  const anyFence = raw.match(/```\s*([\s\S]*?)```/);
  if (anyFence?.[1]) {
    const content = anyFence[1].trim();
    if (content.startsWith('{') || content.startsWith('[')) return content;
  }

  const braceResult = extractLargestBraceBlock(raw);
  if (braceResult) return braceResult;

  const first = raw.indexOf('[');
  const last = raw.lastIndexOf(']');
  if (first !== -1 && last > first) return raw.slice(first, last + 1);

  return trimmed;
}

function sanitize(s: string): { sanitized: string; sawTruncation: boolean } {
  let sawTruncation = false;

  s = s.replace(/^\uFEFF/, '');
  s = s.replace(/[\u200B-\u200F\u202A-\u202E\u2060\u2066-\u2069]/g, '');

  const lines = s.split(/\r?\n/).filter(line => {
    if (TRUNCATION_RE.test(line)) {
      sawTruncation = true;
      return false;
    }
    if (line.trim() === '```') return false;
    if (/^here is (the )?json[:：]/i.test(line.trim())) return false;
    return true;
  });

  return { sanitized: lines.join('\n').trim() || '{}', sawTruncation };
}

function repairCommonIssues(s: string): string {
  s = s.replace(/\bTrue\b/g, 'true');
  s = s.replace(/\bFalse\b/g, 'false');
  s = s.replace(/\bNone\b/g, 'null');

  // Trailing commas before } or ]
  s = s.replace(/,\s*([\}\]])/g, '$1');

  // 'key': → "key":
  s = s.replace(/'([a-zA-Z_]\w*)'(\s*:)/g, '"$1"$2');

  // { key: → { "key":
  s = s.replace(/([{,]\s*)([a-zA-Z_]\w*)(\s*:)/g, '$1"$2"$3');

  return escapeNewlinesInStrings(s);
}

function escapeNewlinesInStrings(s: string): string {
  const result: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of s) {
    if (!inString) {
      if (char === '"') inString = true;
      result.push(char);
    } else if (escaped) {
      escaped = false;
      result.push(char);
    } else if (char === '\\') {
      escaped = true;
      result.push(char);
    } else if (char === '"') {
      inString = false;
      result.push(char);
    } else if (char === '\n' || char === '\r') {
      result.push('\\n');
    } else {
      result.push(char);
    }
  }

  return result.join('');
}
