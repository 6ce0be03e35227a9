/**
 * Type exports
 */

export type { Binding, Observed, CallRecord, StackFrame, CallObserver } from './trace.js';
export type {
  TypeMapping,
  FunctionNode,
  Declaration,
  MemberDeclaration,
  Enclosure,
  SymbolTable,
} from './signature.js';
