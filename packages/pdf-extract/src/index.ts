// Document loading (PDF or JSON tokens)
export {
  loadDocumentTokens,
  detectInputFormat,
  isInputFormat,
  INPUT_FORMATS,
} from './pdf-extractor.js';

export type { DocumentTokens, InputFormat } from './pdf-extractor.js';

// Token extraction using pdfjs-dist
export {
  extractPageTokens,
  extractPageTokensFromBuffer,
  textItemToTokens,
  isTextItem,
} from './layout-pdfjs.js';

export type { TokenExtractedPDF, PdfjsTextItemLike } from './layout-pdfjs.js';

// Pre-extracted token documents
export { parseTokenDocument, loadTokenDocument } from './token-loader.js';

// Layout utilities (rows + baselines + columns)
export * from './layout/index.js';
