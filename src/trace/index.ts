/**
 * Trace module exports
 */

export { CallLog } from './call-log.js';
export type { ReadonlyCallLog } from './call-log.js';
export { getObserver, setObserver, createTraceBridge } from './hook.js';
export type { TraceBridge } from './hook.js';
export { ExecutionTracer, DEFAULT_TRACER_OPTIONS } from './tracer.js';
export type { TracerOptions } from './tracer.js';
export { repr, formatCallLine, formatReturnLine } from './repr.js';
export type { ReprOptions } from './repr.js';
