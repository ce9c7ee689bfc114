export const DEFAULT_REPORT_EVERY = 10_000_000;

export type CounterReport = (movesApplied: number) => void;

/**
 * Counts move applications during a search and reports the running total
 * every `reportEvery` applications. Diagnostic only; results never depend
 * on it. Share one instance across a whole search.
 */
export class MoveCounter {
  private count = 0;
  private readonly reportEvery: number;
  private readonly onReport?: CounterReport;

  constructor(onReport?: CounterReport, reportEvery: number = DEFAULT_REPORT_EVERY) {
    if (!Number.isInteger(reportEvery) || reportEvery < 1) {
      throw new Error(`reportEvery must be a positive integer, got ${reportEvery}`);
    }
    this.onReport = onReport;
    this.reportEvery = reportEvery;
  }

  increment(): void {
    this.count++;
    if (this.onReport && this.count % this.reportEvery === 0) {
      this.onReport(this.count);
    }
  }

  get value(): number {
    return this.count;
  }
}
