/**
 * Document-level orchestration: one run over all pages of a document.
 */
import {
  StreamerOptionsSchema,
  type PageSummary,
  type StreamerOptions,
  type StreamerOptionsInput,
  type StreamResult,
  type Token,
  type ValueRecord,
} from '@colstream/types';
import { RunCounters } from './counters.js';
import { renderPage, serializePage } from './serializer.js';

/**
 * Reconstructs row/column layout and tags numeric values for whole documents.
 *
 * Each call to `processDocument` is its own run with fresh counters, so one
 * instance can be reused across documents.
 *
 * @example
 * const streamer = new FinancialStreamer({ xTolerance: 20, yTolerance: 5 });
 * const { text } = streamer.processDocument([pageOneTokens, pageTwoTokens]);
 */
export class FinancialStreamer {
  readonly options: StreamerOptions;

  constructor(options: StreamerOptionsInput = {}) {
    this.options = StreamerOptionsSchema.parse(options);
  }

  processDocument(pages: ReadonlyArray<readonly Token[]>): StreamResult {
    const counters = new RunCounters();
    const rendered: string[] = [];
    const summaries: PageSummary[] = [];
    const values: ValueRecord[] = [];
    const skippedPages: number[] = [];

    // Strictly in page order: ids depend on it
    pages.forEach((tokens, index) => {
      const pageNumber = index + 1;
      const page = serializePage(tokens, pageNumber, this.options, counters);
      if (page === null) {
        skippedPages.push(pageNumber);
        return;
      }

      rendered.push(renderPage(page));
      summaries.push({
        pageNumber,
        columnCount: page.baselines.length,
        rowCount: page.lines.length,
        valueCount: page.values.length,
        baselines: page.baselines,
      });
      values.push(...page.values);
    });

    return {
      text: rendered.join('\n\n'),
      pages: summaries,
      values,
      skippedPages,
    };
  }
}

/**
 * Convenience wrapper for a single run.
 */
export function streamDocument(
  pages: ReadonlyArray<readonly Token[]>,
  options: StreamerOptionsInput = {}
): StreamResult {
  return new FinancialStreamer(options).processDocument(pages);
}
