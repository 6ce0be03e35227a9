/**
 * Names that traced functions are logged and looked up under
 */

import * as t from '@babel/types';
import type { FunctionNode } from '../types/index.js';

export const ANONYMOUS = '<anonymous>';

/**
 * Name of a function from its own id or the place it is defined:
 *
 * - `function f() {}`, `const f = function g() {}` → own id first
 * - `const f = () => {}` → the variable
 * - `{ f() {} }`, `{ f: () => {} }` → the key
 * - `class C { m() {} }`, `class C { m = () => {} }` → `C.m`
 */
export function functionName(
  node: FunctionNode,
  ancestors: readonly t.Node[],
  className: string | undefined
): string {
  if ((t.isFunctionDeclaration(node) || t.isFunctionExpression(node)) && node.id) {
    return node.id.name;
  }

  if (t.isClassMethod(node)) {
    return qualify(className, propertyKeyName(node.key, node.computed));
  }
  if (t.isObjectMethod(node)) {
    return propertyKeyName(node.key, node.computed) ?? ANONYMOUS;
  }

  const parent = ancestors[ancestors.length - 1];
  if (t.isVariableDeclarator(parent) && parent.init === node && t.isIdentifier(parent.id)) {
    return parent.id.name;
  }
  if (t.isObjectProperty(parent) && parent.value === node) {
    return propertyKeyName(parent.key, parent.computed) ?? ANONYMOUS;
  }
  if (t.isClassProperty(parent) && parent.value === node) {
    return qualify(className, propertyKeyName(parent.key, parent.computed));
  }

  return ANONYMOUS;
}

/**
 * Name of a class: its id, else the variable it initialises
 */
export function classNameOf(node: t.Class, ancestors: readonly t.Node[]): string {
  if (node.id) return node.id.name;
  const parent = ancestors[ancestors.length - 1];
  if (t.isVariableDeclarator(parent) && t.isIdentifier(parent.id)) {
    return parent.id.name;
  }
  return ANONYMOUS;
}

function qualify(className: string | undefined, member: string | undefined): string {
  if (member === undefined) return ANONYMOUS;
  return `${className ?? ANONYMOUS}.${member}`;
}

function propertyKeyName(key: t.Node, computed: boolean): string | undefined {
  if (computed) return undefined;
  if (t.isIdentifier(key)) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  if (t.isNumericLiteral(key)) return String(key.value);
  return undefined;
}
