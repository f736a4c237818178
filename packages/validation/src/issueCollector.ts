/**
 * Issue Collector
 *
 * Accumulates records from any number of workers. Each worker appends to its
 * own buffer; buffers are merged and sorted once, at finalize().
 */

import {
  CollectorStateError,
  compareIssues,
  emptyCategoryCounts,
  type IssueCategory,
  type IssueRecord,
  type IssueSeverity,
} from '@drive-verify/core';

export type CategoryCounts = Record<IssueCategory, number>;
export type SeverityCounts = Record<IssueSeverity, number>;

/**
 * Append-only buffer owned by one worker
 */
export class IssueBuffer {
  /** @internal */
  readonly records: IssueRecord[] = [];

  constructor(private readonly owner: IssueCollector) {}

  submit(record: IssueRecord): void {
    this.submitAll([record]);
  }

  /**
   * Append every record of one file in a single step
   */
  submitAll(records: readonly IssueRecord[]): void {
    this.owner.assertOpen();
    for (const record of records) {
      this.records.push(record);
      this.owner.tally(record);
    }
  }
}

export class IssueCollector {
  private readonly buffers: IssueBuffer[] = [];
  private readonly shared: IssueBuffer;
  private readonly categoryCounts: CategoryCounts = emptyCategoryCounts();
  private readonly severityCounts: SeverityCounts = { error: 0, warning: 0, info: 0 };
  private finalized = false;

  constructor() {
    this.shared = this.createBuffer();
  }

  /**
   * A buffer for one worker
   */
  createBuffer(): IssueBuffer {
    this.assertOpen();
    const buffer = new IssueBuffer(this);
    this.buffers.push(buffer);
    return buffer;
  }

  submit(record: IssueRecord): void {
    this.shared.submit(record);
  }

  submitAll(records: readonly IssueRecord[]): void {
    this.shared.submitAll(records);
  }

  /**
   * Running tally per category; safe to read at any time
   */
  counts(): CategoryCounts {
    return { ...this.categoryCounts };
  }

  severities(): SeverityCounts {
    return { ...this.severityCounts };
  }

  /**
   * Merge every buffer and sort into report order. Callable once.
   */
  finalize(): IssueRecord[] {
    if (this.finalized) {
      throw new CollectorStateError('finalize() has already been called');
    }
    this.finalized = true;
    return this.buffers.flatMap((buffer) => buffer.records).sort(compareIssues);
  }

  /** @internal */
  assertOpen(): void {
    if (this.finalized) {
      throw new CollectorStateError('Issue collector is finalized; no further submissions are accepted');
    }
  }

  /** @internal */
  tally(record: IssueRecord): void {
    this.categoryCounts[record.category]++;
    this.severityCounts[record.severity]++;
  }
}
