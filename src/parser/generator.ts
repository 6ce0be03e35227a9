/**
 * Code generator wrapper
 *
 * Uses @babel/generator to print AST nodes back to source text
 */

import babelGenerator from '@babel/generator';
import type * as t from '@babel/types';

// @babel/generator is CommonJS: depending on the loader the default import is
// either the function itself or the module object carrying it.
const generate = typeof babelGenerator === 'function' ? babelGenerator : babelGenerator.default;

export interface GenerateOptions {
  /** Drop comments attached to the nodes */
  comments?: boolean;
  /** Print with minimal whitespace */
  compact?: boolean;
}

/**
 * Print a node as source text
 */
export function generateCode(node: t.Node, options: GenerateOptions = {}): string {
  return generate(node, {
    comments: options.comments ?? true,
    compact: options.compact ?? false,
  }).code;
}
