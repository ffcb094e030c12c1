/**
 * Text canonicalization applied to every token before numeric detection.
 */

const NEGATIVE_GLYPHS = /[△▲]/g;
const THOUSANDS_SEPARATORS = /[,，]/g;
const PARENTHESIZED_NUMERAL = /^(?:\(([0-9０-９]+(?:\.[0-9０-９]+)?)\)|（([0-9０-９]+(?:\.[0-9０-９]+)?)）)$/;

/**
 * Replace the triangle sign glyphs (△ ▲) with a minus sign.
 */
export function replaceNegativeGlyphs(text: string): string {
  return text.replace(NEGATIVE_GLYPHS, '-');
}

/**
 * Remove ASCII and full-width thousands separators.
 */
export function stripThousandsSeparators(text: string): string {
  return text.replace(THOUSANDS_SEPARATORS, '');
}

/**
 * Rewrite a fully parenthesized numeral, e.g. `(567)` or `（12.5）`, as a
 * negative value. Any other text is returned unchanged.
 */
export function convertParenthesizedNegative(text: string): string {
  const match = PARENTHESIZED_NUMERAL.exec(text);
  if (match === null) return text;
  const numeral = match[1] ?? match[2] ?? '';
  return `-${numeral}`;
}

/**
 * Canonicalize a token's raw text.
 *
 * Sign glyphs become `-`, thousands separators are dropped and parenthesized
 * numerals become negatives, in that order. Units, currency symbols and
 * percent signs are left alone. Normalizing twice gives the same result.
 *
 * @example normalizeText('△1,234') === '-1234'
 * @example normalizeText('(567)') === '-567'
 * @example normalizeText('1,200百万円') === '1200百万円'
 */
export function normalizeText(text: string): string {
  return convertParenthesizedNegative(stripThousandsSeparators(replaceNegativeGlyphs(text)));
}
