/**
 * Inference module exports
 */

export { classify, typeOf } from './value-typer.js';
export type { ValueCategory } from './value-typer.js';
export { inferTypeMapping, DEFAULT_INFERENCE_OPTIONS } from './infer.js';
export type { InferenceOptions, MergeStrategy } from './infer.js';
