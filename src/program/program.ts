/**
 * Program - an instrumented JavaScript program ready to run
 *
 * The source is parsed once. The original AST backs the symbol table, and an
 * instrumented copy is compiled with node:vm into a fresh context whose
 * global tracing bridge forwards events to the observer slot.
 */

import * as vm from 'node:vm';
import type * as t from '@babel/types';
import { LookupFailureError, ProgramError } from '../errors.js';
import { generateCode, parse } from '../parser/index.js';
import { DEFAULT_INSTRUMENT_OPTIONS, instrumentProgram, type InstrumentResult } from '../instrument/index.js';
import { createTraceBridge } from '../trace/index.js';
import type { Declaration, Enclosure, SymbolTable } from '../types/index.js';
import { collectDeclarations, type DeclarationTable } from './symbols.js';

export interface ProgramOptions {
  /** Name used in stack traces and error messages */
  filename?: string;
  /** Extra globals visible to the program */
  globals?: Record<string, unknown>;
  /** Global through which instrumented code reaches the tracer */
  runtimeName?: string;
}

export const DEFAULT_PROGRAM_OPTIONS: Required<ProgramOptions> = {
  filename: 'program.js',
  globals: {},
  runtimeName: DEFAULT_INSTRUMENT_OPTIONS.runtimeName,
};

/** A live function of the program, callable from the host */
export type HostFunction = (...args: unknown[]) => unknown;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export class Program implements SymbolTable {
  private executed = false;

  constructor(
    readonly filename: string,
    readonly source: string,
    /** Original, uninstrumented AST */
    readonly ast: t.File,
    /** Source text that actually runs */
    readonly instrumentedCode: string,
    readonly instrumentation: Omit<InstrumentResult, 'ast'>,
    private readonly symbols: DeclarationTable,
    private readonly script: vm.Script,
    private readonly context: vm.Context
  ) {}

  /**
   * Run the top-level code. Later calls do nothing.
   */
  execute(): void {
    if (this.executed) return;
    this.executed = true;
    this.script.runInContext(this.context);
  }

  /**
   * Run extra (uninstrumented) script code against the program's globals
   */
  evaluate(code: string): unknown {
    return vm.runInContext(code, this.context, { filename: `${this.filename} <eval>` });
  }

  /**
   * Live function bound to a top-level name
   */
  resolve(functionName: string): HostFunction {
    if (!IDENTIFIER.test(functionName)) {
      throw new LookupFailureError(functionName, 'not a top-level identifier');
    }
    const value: unknown = vm.runInContext(
      `typeof ${functionName} === 'undefined' ? undefined : ${functionName}`,
      this.context
    );
    if (typeof value !== 'function') {
      throw new LookupFailureError(functionName, value === undefined ? 'not defined' : 'not a function');
    }
    return (...args) => Reflect.apply(value, undefined, args);
  }

  declarationOf(functionName: string): Declaration | undefined {
    return this.symbols.declarationOf(functionName);
  }

  enclosureOf(functionName: string): Enclosure | undefined {
    return this.symbols.enclosureOf(functionName);
  }

  /** Declared function names in source order */
  functionNames(): string[] {
    return this.symbols.names();
  }
}

export function createProgram(source: string, options: ProgramOptions = {}): Program {
  const opts = { ...DEFAULT_PROGRAM_OPTIONS, ...options };

  const { ast, errors } = parse(source, { filename: opts.filename, sourceType: 'script' });
  const [firstError] = errors;
  if (firstError) {
    throw new ProgramError(
      `cannot parse ${opts.filename} (${firstError.line}:${firstError.column}): ${firstError.message}`,
      errors
    );
  }

  const symbols = collectDeclarations(ast);
  const { ast: instrumentedAst, instrumented, skipped } = instrumentProgram(ast, { runtimeName: opts.runtimeName });
  const code = generateCode(instrumentedAst);

  let script: vm.Script;
  try {
    script = new vm.Script(code, { filename: opts.filename });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProgramError(`cannot compile ${opts.filename}: ${message}`);
  }

  const context = vm.createContext({
    ...opts.globals,
    console,
    [opts.runtimeName]: createTraceBridge(),
  });

  return new Program(opts.filename, source, ast, code, { instrumented, skipped }, symbols, script, context);
}
