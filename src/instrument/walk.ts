/**
 * Function discovery over a Babel AST
 */

import * as t from '@babel/types';
import type { FunctionNode } from '../types/index.js';
import { functionName, classNameOf } from './naming.js';

/**
 * A function found in the tree, with the name it is traced under
 */
export interface FunctionSite {
  node: FunctionNode;
  name: string;
  /** Enclosing nodes, nearest last */
  ancestors: readonly t.Node[];
}

export function isFunctionNode(node: t.Node): node is FunctionNode {
  return (
    t.isFunctionDeclaration(node) ||
    t.isFunctionExpression(node) ||
    t.isArrowFunctionExpression(node) ||
    t.isClassMethod(node) ||
    t.isObjectMethod(node)
  );
}

/**
 * Visit every function below `root`, innermost first
 */
export function forEachFunction(root: t.Node, visit: (site: FunctionSite) => void): void {
  walk(root, [], undefined, visit);
}

function walk(
  node: t.Node,
  ancestors: t.Node[],
  className: string | undefined,
  visit: (site: FunctionSite) => void
): void {
  const innerClass = t.isClass(node) ? classNameOf(node, ancestors) : className;

  ancestors.push(node);
  for (const child of childNodes(node)) {
    walk(child, ancestors, innerClass, visit);
  }
  ancestors.pop();

  if (isFunctionNode(node)) {
    visit({ node, name: functionName(node, ancestors, className), ancestors: [...ancestors] });
  }
}

/**
 * Direct child nodes, in visitor-key order
 */
export function childNodes(node: t.Node): t.Node[] {
  const children: t.Node[] = [];
  for (const key of t.VISITOR_KEYS[node.type] ?? []) {
    const value: unknown = Reflect.get(node, key);
    if (Array.isArray(value)) {
      for (const item of value) {
        if (t.isNode(item)) children.push(item);
      }
    } else if (t.isNode(value)) {
      children.push(value);
    }
  }
  return children;
}
