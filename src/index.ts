/**
 * sigmine - mine type signatures for JavaScript functions from traced runs
 *
 * Instrument a program, observe every call and return while it runs,
 * reduce the observations per function, and print each function's
 * declaration with the inferred TypeScript annotations.
 */

export * from './errors.js';
export type * from './types/index.js';
export * from './parser/index.js';
export * from './trace/index.js';
export * from './inference/index.js';
export * from './instrument/index.js';
export * from './program/index.js';
export * from './transform/index.js';
export * from './session/index.js';
export * from './output/index.js';
