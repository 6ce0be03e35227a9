/**
 * Type names to TypeScript annotation nodes
 */

import * as t from '@babel/types';
import { MalformedTypeError } from '../errors.js';
import { parse } from '../parser/index.js';

/**
 * Parse a type name such as `number`, `unknown[]` or `[any]` into a type node.
 *
 * The name is read as the annotation of `let _: <name>;`; anything other
 * than one bare declarator with an annotation is rejected.
 */
export function parseTypeAnnotation(typeName: string): t.TSType {
  if (typeName.trim() === '') {
    throw new MalformedTypeError(typeName, 'empty type name');
  }

  const { ast, errors } = parse(`let _: ${typeName};`, {
    typescript: true,
    sourceType: 'module',
    errorRecovery: false,
  });
  const [firstError] = errors;
  if (firstError) {
    throw new MalformedTypeError(typeName, firstError.message);
  }

  const [statement, ...rest] = ast.program.body;
  if (rest.length > 0 || !t.isVariableDeclaration(statement) || statement.declarations.length !== 1) {
    throw new MalformedTypeError(typeName, 'does not form a single type');
  }
  const [declarator] = statement.declarations;
  if (
    !declarator ||
    declarator.init ||
    !t.isIdentifier(declarator.id) ||
    !t.isTSTypeAnnotation(declarator.id.typeAnnotation)
  ) {
    throw new MalformedTypeError(typeName, 'does not form a single type');
  }

  return t.cloneNode(declarator.id.typeAnnotation.typeAnnotation, true, true);
}
