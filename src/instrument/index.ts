/**
 * Instrument module exports
 */

export { instrumentProgram, boundParameterNames, DEFAULT_INSTRUMENT_OPTIONS } from './instrument.js';
export type { InstrumentOptions, InstrumentResult } from './instrument.js';
export { forEachFunction, isFunctionNode, childNodes } from './walk.js';
export type { FunctionSite } from './walk.js';
export { functionName, classNameOf, ANONYMOUS } from './naming.js';
