/**
 * Session module exports
 */

export {
  withSession,
  isSessionActive,
  annotate,
  annotateFunction,
  render,
  mine,
  DEFAULT_RENDER_OPTIONS,
} from './session.js';
export type { AnnotateOptions, AnnotationReport, RenderOptions, RenderInput, MineOptions, MineResult } from './session.js';
