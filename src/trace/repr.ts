/**
 * Human-readable call/return lines for the tracer log
 */

import { inspect } from 'node:util';
import type { Binding } from '../types/index.js';

export interface ReprOptions {
  /** Nesting depth shown for objects and arrays */
  depth: number;
  /** Longer reprs are cut and end in '...' */
  maxLength: number;
}

export function repr(value: unknown, options: ReprOptions): string {
  const text = inspect(value, { depth: options.depth, breakLength: Infinity });
  if (text.length <= options.maxLength) {
    return text;
  }
  return text.slice(0, Math.max(0, options.maxLength - 3)) + '...';
}

/**
 * `name(a=1, b='x')`
 */
export function formatCallLine(functionName: string, bindings: readonly Binding[], options: ReprOptions): string {
  const params = bindings.map(([name, value]) => `${name}=${repr(value, options)}`);
  return `${functionName}(${params.join(', ')})`;
}

/**
 * `name(a=1, b='x') returns 2`
 */
export function formatReturnLine(
  functionName: string,
  bindings: readonly Binding[],
  value: unknown,
  options: ReprOptions
): string {
  return `${formatCallLine(functionName, bindings, options)} returns ${repr(value, options)}`;
}
