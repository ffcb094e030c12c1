// Text normalization
export {
  normalizeText,
  replaceNegativeGlyphs,
  stripThousandsSeparators,
  convertParenthesizedNegative,
} from './normalize.js';

// Numeric tagging
export {
  extractNumericSpans,
  renderPayload,
  formatValueMarker,
  tagText,
} from './numeric.js';

export type { ValueIdSource, TagOptions, TaggedValue, TagResult } from './numeric.js';
