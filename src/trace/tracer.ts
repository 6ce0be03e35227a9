/**
 * Execution Tracer
 *
 * Pairs call and return events through a stack of open frames and turns
 * every completed pair into a CallRecord. Every instrumented function
 * reached during a session is recorded, not only the one under study, so
 * recursive and higher-order calls stay paired.
 */

import { StackCorruptionError } from '../errors.js';
import type { Binding, CallObserver, StackFrame } from '../types/index.js';
import { CallLog, type ReadonlyCallLog } from './call-log.js';
import { setObserver } from './hook.js';
import { formatCallLine, formatReturnLine, type ReprOptions } from './repr.js';

export interface TracerOptions {
  /** Write one line per call and per return to the sink */
  log?: boolean;
  /** Where log lines go */
  sink?: (line: string) => void;
  /** Nesting depth of logged values */
  reprDepth?: number;
  /** Maximum length of one logged value */
  maxReprLength?: number;
}

export const DEFAULT_TRACER_OPTIONS: Required<TracerOptions> = {
  log: false,
  sink: (line) => console.log(line),
  reprDepth: 2,
  maxReprLength: 80,
};

export class ExecutionTracer implements CallObserver {
  private readonly options: Required<TracerOptions>;
  private readonly reprOptions: ReprOptions;
  private readonly callLog = new CallLog();
  private readonly stack: StackFrame[] = [];
  private previous: CallObserver | undefined;
  private started = false;
  private corruption: StackCorruptionError | undefined;

  constructor(options: TracerOptions = {}) {
    this.options = { ...DEFAULT_TRACER_OPTIONS, ...options };
    this.reprOptions = { depth: this.options.reprDepth, maxLength: this.options.maxReprLength };
  }

  get log(): ReadonlyCallLog {
    return this.callLog;
  }

  /** Number of open frames */
  get depth(): number {
    return this.stack.length;
  }

  get active(): boolean {
    return this.started;
  }

  /** The error that aborted this tracer, kept after `stop()` */
  get failure(): StackCorruptionError | undefined {
    return this.corruption;
  }

  /**
   * Install this tracer, remembering whatever observer was there before
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.callLog.clear();
    this.stack.length = 0;
    this.corruption = undefined;
    this.previous = setObserver(this);
    this.started = true;
  }

  /**
   * Put the previous observer back
   */
  stop(): void {
    if (!this.started) {
      return;
    }
    setObserver(this.previous);
    this.previous = undefined;
    this.started = false;
  }

  onCall(functionName: string, bindings: readonly Binding[]): void {
    this.assertIntact();
    const args = [...bindings];
    // Log first: a throwing repr or sink must not leave a frame behind
    if (this.options.log) {
      this.options.sink(formatCallLine(functionName, args, this.reprOptions));
    }
    this.stack.push({ functionName, arguments: args });
    this.callLog.open(functionName);
  }

  onReturn(functionName: string, value: unknown): void {
    this.assertIntact();
    const frame = this.stack.pop();
    if (!frame || frame.functionName !== functionName) {
      this.corruption = new StackCorruptionError(frame?.functionName, functionName);
      throw this.corruption;
    }
    this.callLog.append(functionName, { arguments: frame.arguments, returnValue: { value } });
    if (this.options.log) {
      this.options.sink(formatReturnLine(functionName, frame.arguments, value, this.reprOptions));
    }
  }

  private assertIntact(): void {
    if (this.corruption) {
      throw this.corruption;
    }
  }
}
