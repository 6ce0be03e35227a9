/**
 * Symbol table - function names to their declarations in the original AST
 */

import * as t from '@babel/types';
import type { Declaration, Enclosure, SymbolTable } from '../types/index.js';
import { ANONYMOUS, classNameOf, forEachFunction, type FunctionSite } from '../instrument/index.js';

export class DeclarationTable implements SymbolTable {
  constructor(
    private readonly declarations: ReadonlyMap<string, Declaration>,
    private readonly enclosures: ReadonlyMap<string, Enclosure> = new Map()
  ) {}

  declarationOf(functionName: string): Declaration | undefined {
    return this.declarations.get(functionName);
  }

  enclosureOf(functionName: string): Enclosure | undefined {
    return this.enclosures.get(functionName);
  }

  names(): string[] {
    return [...this.declarations.keys()];
  }

  get size(): number {
    return this.declarations.size;
  }
}

/**
 * Index every named function under the name the tracer logs it with.
 * A name declared twice resolves to the later declaration.
 */
export function collectDeclarations(ast: t.File): DeclarationTable {
  const found: Array<{ name: string; start: number; declaration: Declaration; enclosure?: Enclosure }> = [];

  forEachFunction(ast.program, (site) => {
    if (site.name === ANONYMOUS || site.name.startsWith(`${ANONYMOUS}.`)) return;
    found.push({
      name: site.name,
      start: site.node.start ?? 0,
      declaration: declarationFor(site),
      enclosure: enclosureFor(site),
    });
  });

  // Discovery is innermost-first; keep source order instead
  found.sort((a, b) => a.start - b.start);

  const declarations = new Map<string, Declaration>();
  const enclosures = new Map<string, Enclosure>();
  for (const { name, declaration, enclosure } of found) {
    declarations.delete(name);
    declarations.set(name, declaration);
    if (enclosure) {
      enclosures.set(name, enclosure);
    } else {
      enclosures.delete(name);
    }
  }
  return new DeclarationTable(declarations, enclosures);
}

/**
 * The statement-level node that introduces a function
 */
function declarationFor(site: FunctionSite): Declaration {
  const { node, ancestors } = site;
  if (!t.isFunctionExpression(node) && !t.isArrowFunctionExpression(node)) {
    return node;
  }

  const parent = ancestors[ancestors.length - 1];
  const grandparent = ancestors[ancestors.length - 2];
  if (
    t.isVariableDeclarator(parent) &&
    parent.init === node &&
    t.isVariableDeclaration(grandparent) &&
    grandparent.declarations.length === 1
  ) {
    return grandparent;
  }
  if ((t.isObjectProperty(parent) || t.isClassProperty(parent)) && parent.value === node) {
    return parent;
  }
  return node;
}

/**
 * The class or object literal directly holding a member function
 */
function enclosureFor(site: FunctionSite): Enclosure | undefined {
  const { node, ancestors } = site;
  let index = ancestors.length - 1;
  const parent = ancestors[index];
  const isMember =
    t.isClassMethod(node) ||
    t.isObjectMethod(node) ||
    ((t.isObjectProperty(parent) || t.isClassProperty(parent)) && parent.value === node);
  if (!isMember) return undefined;

  // Property-held functions sit one level further down
  if (!t.isClassMethod(node) && !t.isObjectMethod(node)) index -= 1;
  if (t.isClassBody(ancestors[index])) index -= 1;

  const container = ancestors[index];
  const outer = ancestors.slice(0, index);
  if (t.isClass(container)) {
    return { kind: 'class', node: container, name: classNameOf(container, outer) };
  }
  if (t.isObjectExpression(container)) {
    const declarator = outer[outer.length - 1];
    const statement = outer[outer.length - 2];
    if (
      t.isVariableDeclarator(declarator) &&
      declarator.init === container &&
      t.isIdentifier(declarator.id) &&
      t.isVariableDeclaration(statement)
    ) {
      return { kind: 'object', node: container, binding: { name: declarator.id.name, kind: statement.kind } };
    }
    return { kind: 'object', node: container };
  }
  return undefined;
}
