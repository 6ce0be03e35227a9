/**
 * Session Orchestrator
 *
 * Ties tracer lifecycle, call log, inference and the signature transformer
 * together. Only one session may be checked out at a time; the slot and the
 * previous observer are restored on every exit path.
 */

import type * as t from '@babel/types';
import { LookupFailureError, SessionError, isRecoverable } from '../errors.js';
import { inferTypeMapping, type InferenceOptions } from '../inference/index.js';
import { generateCode } from '../parser/index.js';
import { createProgram, type Program, type ProgramOptions } from '../program/index.js';
import { ExecutionTracer, type ReadonlyCallLog, type TracerOptions } from '../trace/index.js';
import { applySignature, enclose, isMemberDeclaration } from '../transform/index.js';
import type { Declaration, Enclosure, MemberDeclaration, SymbolTable, TypeMapping } from '../types/index.js';

let sessionOpen = false;

export function isSessionActive(): boolean {
  return sessionOpen;
}

/**
 * Run `body` with every instrumented call traced and return what was seen.
 * The body runs synchronously; calls made after it returns are not traced.
 * A corrupted call stack fails the session even when the program caught
 * the error itself.
 */
export function withSession(body: () => void, options: TracerOptions = {}): ReadonlyCallLog {
  if (sessionOpen) {
    throw new SessionError('a tracing session is already active');
  }
  sessionOpen = true;
  const tracer = new ExecutionTracer(options);
  try {
    tracer.start();
    try {
      body();
    } finally {
      tracer.stop();
    }
  } finally {
    sessionOpen = false;
  }
  if (tracer.failure) {
    throw tracer.failure;
  }
  return tracer.log;
}

export interface AnnotateOptions {
  /** Functions to annotate; defaults to every function in the log */
  names?: readonly string[];
  inference?: InferenceOptions;
}

export interface AnnotationReport {
  /** Annotated declarations, in log order */
  declarations: Map<string, Declaration>;
  /** Inferred mappings for every function that got one */
  mappings: Map<string, TypeMapping>;
  /** Functions that could not be annotated */
  failures: Map<string, Error>;
  /** Class or object literal of every annotated member declaration */
  enclosures: Map<string, Enclosure>;
}

/**
 * Annotate one function; lookup and type errors are thrown
 */
export function annotateFunction(
  functionName: string,
  log: ReadonlyCallLog,
  symbols: SymbolTable,
  options: InferenceOptions = {}
): { declaration: Declaration; mapping: TypeMapping } {
  const records = log.records(functionName);
  const declaration = symbols.declarationOf(functionName);
  if (!declaration) {
    throw new LookupFailureError(functionName, 'no declaration found');
  }
  const mapping = inferTypeMapping(records, options);
  return { declaration: applySignature(declaration, mapping), mapping };
}

/**
 * Annotate a batch. A failure is recorded against its function and the
 * batch goes on; only structural errors escape.
 */
export function annotate(log: ReadonlyCallLog, symbols: SymbolTable, options: AnnotateOptions = {}): AnnotationReport {
  const report: AnnotationReport = {
    declarations: new Map(),
    mappings: new Map(),
    failures: new Map(),
    enclosures: new Map(),
  };

  for (const name of options.names ?? log.names()) {
    try {
      const { declaration, mapping } = annotateFunction(name, log, symbols, options.inference);
      report.declarations.set(name, declaration);
      report.mappings.set(name, mapping);
      const enclosure = symbols.enclosureOf?.(name);
      if (enclosure) report.enclosures.set(name, enclosure);
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      report.failures.set(name, error);
    }
  }

  return report;
}

export interface RenderOptions {
  /** Text placed between declarations */
  separator?: string;
}

export const DEFAULT_RENDER_OPTIONS: Required<RenderOptions> = {
  separator: '\n\n',
};

export interface RenderInput {
  declarations: ReadonlyMap<string, Declaration>;
  enclosures?: ReadonlyMap<string, Enclosure>;
}

/**
 * Print declarations in map order. Members of the same class or object
 * literal are printed together inside it, at the position of the first one.
 */
export function render(input: RenderInput, options: RenderOptions = {}): string {
  const { separator } = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const statements: Array<Declaration | { enclosure?: Enclosure; members: MemberDeclaration[] }> = [];
  const shells = new Map<t.Node, MemberDeclaration[]>();

  for (const [name, declaration] of input.declarations) {
    if (!isMemberDeclaration(declaration)) {
      statements.push(declaration);
      continue;
    }
    const enclosure = input.enclosures?.get(name);
    const members = enclosure && shells.get(enclosure.node);
    if (members) {
      members.push(declaration);
      continue;
    }
    const shell = { enclosure, members: [declaration] };
    statements.push(shell);
    if (enclosure) shells.set(enclosure.node, shell.members);
  }

  return statements
    .map((statement) =>
      generateCode('members' in statement ? enclose(statement.enclosure, statement.members) : statement)
    )
    .join(separator);
}

export interface MineOptions {
  /** Runs after the top-level code, inside the same session */
  driver?: (program: Program) => void;
  program?: ProgramOptions;
  tracer?: TracerOptions;
  inference?: InferenceOptions;
  render?: RenderOptions;
}

export interface MineResult {
  program: Program;
  log: ReadonlyCallLog;
  report: AnnotationReport;
  /** Annotated declarations as source text */
  code: string;
}

/**
 * Trace a program's run and annotate every function it called
 */
export function mine(source: string, options: MineOptions = {}): MineResult {
  const program = createProgram(source, options.program);
  const log = withSession(() => {
    program.execute();
    options.driver?.(program);
  }, options.tracer);
  const report = annotate(log, program, { inference: options.inference });
  return { program, log, report, code: render(report, options.render) };
}
