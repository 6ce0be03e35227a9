/**
 * The process-wide observer slot
 *
 * Instrumented code reports every call and return here. Whatever observer
 * occupies the slot receives the events; with an empty slot they are dropped.
 */

import type { Binding, CallObserver } from '../types/index.js';

let activeObserver: CallObserver | undefined;

export function getObserver(): CallObserver | undefined {
  return activeObserver;
}

/**
 * Install an observer and return the one it replaced
 */
export function setObserver(observer: CallObserver | undefined): CallObserver | undefined {
  const previous = activeObserver;
  activeObserver = observer;
  return previous;
}

/**
 * Bridge object injected into instrumented programs
 */
export interface TraceBridge {
  enter(functionName: string, bindings: readonly Binding[]): void;
  leave(functionName: string, value: unknown): void;
}

export function createTraceBridge(): TraceBridge {
  return {
    enter(functionName, bindings) {
      activeObserver?.onCall(functionName, bindings);
    },
    leave(functionName, value) {
      activeObserver?.onReturn(functionName, value);
    },
  };
}
