/**
 * Trace data model
 *
 * Shapes shared by the tracer, the call log and everything that reads it.
 */

/** One parameter binding: name and the value it held at entry */
export type Binding = readonly [parameterName: string, value: unknown];

/**
 * Presence wrapper for an observed value. `undefined` is itself a value
 * a function can return, so absence is modelled by omitting the wrapper.
 */
export interface Observed {
  readonly value: unknown;
}

/**
 * One observed invocation, created when the function returns
 */
export interface CallRecord {
  /** Parameter bindings in declaration order */
  readonly arguments: readonly Binding[];
  /** Returned value; absent when the return carried nothing */
  readonly returnValue?: Observed;
}

/**
 * A pushed, not yet returned, call
 */
export interface StackFrame {
  readonly functionName: string;
  readonly arguments: readonly Binding[];
}

/**
 * Receiver of call/return events. At most one is installed at a time.
 */
export interface CallObserver {
  onCall(functionName: string, bindings: readonly Binding[]): void;
  onReturn(functionName: string, value: unknown): void;
}
