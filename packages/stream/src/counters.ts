/**
 * Identifier counters shared by all pages of one document run.
 *
 * Both counters start at zero and only move forward. Create one instance per
 * run and hand it to every page in document order; ids are then unique within
 * the run and follow top-to-bottom, left-to-right emission order.
 */
export class RunCounters {
  private rows = 0;
  private values = 0;

  /** Last row id handed out (0 before the first row) */
  get rowCounter(): number {
    return this.rows;
  }

  /** Last value id handed out (0 before the first value) */
  get valueCounter(): number {
    return this.values;
  }

  nextRowId(): number {
    this.rows += 1;
    return this.rows;
  }

  nextValueId(): number {
    this.values += 1;
    return this.values;
  }

  /** Start a new run. */
  reset(): void {
    this.rows = 0;
    this.values = 0;
  }
}
