/**
 * JavaScript Parser wrapper
 *
 * Uses @babel/parser to turn source text into an AST
 */

import { parse as babelParse, type ParserOptions, type ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Enable JSX parsing */
  jsx?: boolean;
  /** Enable TypeScript parsing (needed to read annotations back) */
  typescript?: boolean;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
  /** Keep parsing after recoverable errors (default: true) */
  errorRecovery?: boolean;
}

export interface ParseResult {
  /** The parsed AST */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

/**
 * Parse JavaScript source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const plugins: ParserPlugin[] = [];
  if (options.jsx) {
    plugins.push('jsx');
  }
  if (options.typescript) {
    plugins.push('typescript');
  }

  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? 'unambiguous',
    sourceFilename: options.filename,
    errorRecovery: options.errorRecovery ?? true,
    plugins,
  };

  try {
    const ast = babelParse(source, parserOptions);
    const errors = (ast.errors ?? []).map(toParseError);
    return { ast, errors };
  } catch (error) {
    // Unrecoverable syntax errors still throw under errorRecovery
    if (error instanceof SyntaxError) {
      return {
        ast: t.file(t.program([], [], 'script')),
        errors: [toParseError(error)],
      };
    }
    throw error;
  }
}

/**
 * Parse a single expression
 */
export function parseExpression(source: string): t.Expression {
  const result = parse(`(${source})`);
  const stmt = result.ast.program.body[0];
  if (result.errors.length === 0 && stmt && stmt.type === 'ExpressionStatement') {
    return stmt.expression;
  }
  throw new Error('Failed to parse expression');
}

function toParseError(error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const loc: unknown = typeof error === 'object' && error !== null && 'loc' in error ? error.loc : undefined;
  if (typeof loc === 'object' && loc !== null && 'line' in loc && 'column' in loc) {
    return {
      message,
      line: typeof loc.line === 'number' ? loc.line : 0,
      column: typeof loc.column === 'number' ? loc.column : 0,
    };
  }
  return { message, line: 0, column: 0 };
}
