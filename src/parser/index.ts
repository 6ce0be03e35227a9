/**
 * Parser module exports
 */

export { parse, parseExpression } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
export { generateCode } from './generator.js';
export type { GenerateOptions } from './generator.js';
