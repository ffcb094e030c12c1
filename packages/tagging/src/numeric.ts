/**
 * Numeric value detection and tagging.
 *
 * Span extraction is pure; identifiers are drawn from a caller-supplied
 * source so that numbering follows emission order across a whole document.
 */
import {
  MASK_CHAR,
  WHOLE_TOKEN_MASK,
  formatPadded,
  type NumericPolicy,
  type NumericSpan,
} from '@colstream/types';

/** Optional sign, a digit, digits/separators/points ending in a digit, optional percent. */
const EMBEDDED_NUMBER = /[-△▲]?[0-9０-９](?:[0-9０-９,，.]*[0-9０-９])?[%％]?/g;

const WHOLE_TOKEN_NUMBER = /^-?[0-9０-９]+(?:\.[0-9０-９]+)?$/;

const DIGIT = /[0-9０-９]/g;

/**
 * Anything that hands out value identifiers in increasing order.
 */
export interface ValueIdSource {
  nextValueId(): number;
}

export interface TagOptions {
  policy: NumericPolicy;
  mask: boolean;
}

export interface TaggedValue {
  id: number;
  span: NumericSpan;
}

export interface TagResult {
  /** Text with every numeric span replaced by a value marker */
  text: string;
  /** Assigned identifiers, in span order */
  values: TaggedValue[];
}

/**
 * Find the numeric spans of a (normalized) token text.
 *
 * @param text - Token text, normally already passed through normalizeText
 * @param policy - 'embedded' finds every numeric substring, 'whole-token'
 *   matches only when the entire text is a signed integer or decimal
 * @returns Spans in left-to-right order
 */
export function extractNumericSpans(text: string, policy: NumericPolicy = 'embedded'): NumericSpan[] {
  if (policy === 'whole-token') {
    if (!WHOLE_TOKEN_NUMBER.test(text)) return [];
    return [{ start: 0, end: text.length, raw: text, value: text }];
  }

  const spans: NumericSpan[] = [];
  for (const match of text.matchAll(EMBEDDED_NUMBER)) {
    const start = match.index ?? 0;
    const raw = match[0];
    spans.push({
      start,
      end: start + raw.length,
      raw,
      value: raw.replace(/[,，]/g, ''),
    });
  }
  return spans;
}

/**
 * Render the payload shown inside a value marker.
 *
 * Masking under 'whole-token' discards the value entirely; under 'embedded'
 * each digit is replaced by the mask character so the digit count survives.
 */
export function renderPayload(value: string, policy: NumericPolicy, mask: boolean): string {
  if (!mask) return value;
  if (policy === 'whole-token') return WHOLE_TOKEN_MASK;
  return value.replace(DIGIT, MASK_CHAR);
}

/**
 * Format a value marker, e.g. `<v_007:1234>`.
 */
export function formatValueMarker(id: number, payload: string): string {
  return `<v_${formatPadded(id)}:${payload}>`;
}

/**
 * Replace the numeric content of a token text with value markers.
 * Draws one identifier per span from `ids`, whether or not masking is on.
 */
export function tagText(text: string, options: TagOptions, ids: ValueIdSource): TagResult {
  const spans = extractNumericSpans(text, options.policy);
  if (spans.length === 0) {
    return { text, values: [] };
  }

  const values: TaggedValue[] = [];
  let out = '';
  let cursor = 0;

  for (const span of spans) {
    const id = ids.nextValueId();
    out += text.slice(cursor, span.start);
    out += formatValueMarker(id, renderPayload(span.value, options.policy, options.mask));
    cursor = span.end;
    values.push({ id, span });
  }
  out += text.slice(cursor);

  return { text: out, values };
}
