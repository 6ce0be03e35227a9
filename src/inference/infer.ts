/**
 * Type Inference - reduce a function's call records to one TypeMapping
 */

import type { CallRecord, TypeMapping } from '../types/index.js';
import { typeOf } from './value-typer.js';

export type MergeStrategy =
  /** Each slot keeps the type of its most recent observation */
  | 'last'
  /** Each slot keeps every distinct type observed, first-seen first */
  | 'union';

export interface InferenceOptions {
  strategy?: MergeStrategy;
}

export const DEFAULT_INFERENCE_OPTIONS: Required<InferenceOptions> = {
  strategy: 'last',
};

/**
 * Single linear pass over the records
 */
export function inferTypeMapping(records: readonly CallRecord[], options: InferenceOptions = {}): TypeMapping {
  const { strategy } = { ...DEFAULT_INFERENCE_OPTIONS, ...options };
  const observe = strategy === 'union' ? addToUnion : overwrite;

  const parameterSlots = new Map<string, string[]>();
  let returnSlot: string[] | undefined;

  for (const record of records) {
    for (const [name, value] of record.arguments) {
      parameterSlots.set(name, observe(parameterSlots.get(name), typeOf(value)));
    }
    if (record.returnValue) {
      returnSlot = observe(returnSlot, typeOf(record.returnValue.value));
    }
  }

  const parameterTypes: Record<string, string> = Object.create(null);
  for (const [name, types] of parameterSlots) {
    parameterTypes[name] = types.join(' | ');
  }

  return returnSlot ? { parameterTypes, returnType: returnSlot.join(' | ') } : { parameterTypes };
}

function overwrite(_previous: string[] | undefined, typeName: string): string[] {
  return [typeName];
}

function addToUnion(previous: string[] | undefined, typeName: string): string[] {
  if (!previous) return [typeName];
  return previous.includes(typeName) ? previous : [...previous, typeName];
}
