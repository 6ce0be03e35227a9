/**
 * Call Log - per-function history of observed calls for one session
 */

import { LookupFailureError } from '../errors.js';
import type { CallRecord } from '../types/index.js';

/**
 * Read-only view handed to inference and annotation
 */
export interface ReadonlyCallLog {
  readonly size: number;
  readonly totalCalls: number;
  has(functionName: string): boolean;
  records(functionName: string): readonly CallRecord[];
  names(): string[];
  entries(): Array<[string, readonly CallRecord[]]>;
}

/**
 * Function names keep first-call order; records within a name keep
 * return order.
 */
export class CallLog implements ReadonlyCallLog {
  private readonly calls = new Map<string, CallRecord[]>();

  get size(): number {
    return this.calls.size;
  }

  get totalCalls(): number {
    let total = 0;
    for (const records of this.calls.values()) {
      total += records.length;
    }
    return total;
  }

  /**
   * Register a function name without recording anything yet
   */
  open(functionName: string): void {
    if (!this.calls.has(functionName)) {
      this.calls.set(functionName, []);
    }
  }

  append(functionName: string, record: CallRecord): void {
    const frozen: CallRecord = Object.freeze({
      ...record,
      arguments: Object.freeze(record.arguments.map((binding) => Object.freeze(binding))),
    });
    const existing = this.calls.get(functionName);
    if (existing) {
      existing.push(frozen);
    } else {
      this.calls.set(functionName, [frozen]);
    }
  }

  has(functionName: string): boolean {
    return this.calls.has(functionName);
  }

  records(functionName: string): readonly CallRecord[] {
    const records = this.calls.get(functionName);
    if (!records) {
      throw new LookupFailureError(functionName, 'no calls were observed');
    }
    return records;
  }

  names(): string[] {
    return [...this.calls.keys()];
  }

  entries(): Array<[string, readonly CallRecord[]]> {
    return [...this.calls.entries()];
  }

  clear(): void {
    this.calls.clear();
  }
}
