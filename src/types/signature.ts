/**
 * Signature data model
 */

import type * as t from '@babel/types';

/**
 * Inferred parameter/return type names for one function
 */
export interface TypeMapping {
  readonly parameterTypes: Readonly<Record<string, string>>;
  readonly returnType?: string;
}

/** Function nodes that carry a parameter list and a return slot */
export type FunctionNode =
  | t.FunctionDeclaration
  | t.FunctionExpression
  | t.ArrowFunctionExpression
  | t.ClassMethod
  | t.ObjectMethod;

/**
 * Declaration of one named function, as found in the program:
 *
 * - `function f() {}`
 * - `const f = () => {}` (a single declarator)
 * - class and object methods
 * - `class C { f = () => {} }` class fields
 * - `{ f: function () {} }` object members
 * - bare function expressions and arrows
 */
export type Declaration =
  | t.FunctionDeclaration
  | t.VariableDeclaration
  | t.ClassMethod
  | t.ClassProperty
  | t.ObjectMethod
  | t.ObjectProperty
  | t.FunctionExpression
  | t.ArrowFunctionExpression;

/** Declarations that only make sense inside a class body or an object literal */
export type MemberDeclaration = t.ClassMethod | t.ClassProperty | t.ObjectMethod | t.ObjectProperty;

/**
 * The class or object literal a member is declared in
 */
export type Enclosure =
  | { kind: 'class'; node: t.Class; name: string }
  | {
      kind: 'object';
      node: t.ObjectExpression;
      /** Variable the literal initialises, if any */
      binding?: { name: string; kind: t.VariableDeclaration['kind'] };
    };

/**
 * Resolves function names to their declarations
 */
export interface SymbolTable {
  declarationOf(functionName: string): Declaration | undefined;
  /** Where a member declaration lives; undefined for top-level declarations */
  enclosureOf?(functionName: string): Enclosure | undefined;
}
