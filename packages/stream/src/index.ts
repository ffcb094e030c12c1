// Run counters
export { RunCounters } from './counters.js';

// Page serialization
export {
  serializePage,
  serializeRow,
  renderPage,
  formatPageHeader,
  formatRowPrefix,
  formatFragment,
} from './serializer.js';

export type { SerializedPage, SerializedRow } from './serializer.js';

// Document orchestration
export { FinancialStreamer, streamDocument } from './streamer.js';

// Batch processing
export {
  processBatch,
  type ParseError,
  type BatchDocument,
  type BatchProcessResult,
  type BatchProcessOptions,
} from './batch-processor.js';

// Directory scanner
export {
  scanDirectoryForInputs,
  validateDirectory,
  type InputFileInfo,
  type ScanResult,
} from './directory-scanner.js';
