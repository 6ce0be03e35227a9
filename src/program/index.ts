/**
 * Program module exports
 */

export { Program, createProgram, DEFAULT_PROGRAM_OPTIONS } from './program.js';
export type { ProgramOptions, HostFunction } from './program.js';
export { DeclarationTable, collectDeclarations } from './symbols.js';
