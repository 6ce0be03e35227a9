/**
 * Signature Transformer
 *
 * Applies a TypeMapping to a declaration and returns a new declaration.
 * Only the nodes on the path to the annotated slots are copied; the body
 * and everything else is shared with the input and left untouched.
 */

import * as t from '@babel/types';
import type { Declaration, FunctionNode, TypeMapping } from '../types/index.js';
import { parseTypeAnnotation } from './annotation.js';

type Parameter = FunctionNode['params'][number];

/**
 * Annotation nodes for one mapping
 */
interface ResolvedSignature {
  params: Map<string, t.TSType>;
  returnType?: t.TSType;
}

export function applySignature(declaration: Declaration, mapping: TypeMapping): Declaration {
  // Parse everything up front so a bad type name never leaves a half-built node
  const signature = resolveSignature(mapping);

  switch (declaration.type) {
    case 'VariableDeclaration': {
      const [declarator, ...others] = declaration.declarations;
      if (!declarator || others.length > 0 || !isFunctionValue(declarator.init)) {
        throw new Error('Variable declaration does not hold exactly one function');
      }
      return {
        ...declaration,
        declarations: [{ ...declarator, init: withSignature(declarator.init, signature) }],
      };
    }
    case 'ObjectProperty':
    case 'ClassProperty': {
      if (!isFunctionValue(declaration.value)) {
        throw new Error('Property does not hold a function');
      }
      return { ...declaration, value: withSignature(declaration.value, signature) };
    }
    default:
      return withSignature(declaration, signature);
  }
}

/**
 * The function node a declaration defines
 */
export function functionOf(declaration: Declaration): FunctionNode {
  switch (declaration.type) {
    case 'VariableDeclaration': {
      const [declarator, ...others] = declaration.declarations;
      if (!declarator || others.length > 0 || !isFunctionValue(declarator.init)) {
        throw new Error('Variable declaration does not hold exactly one function');
      }
      return declarator.init;
    }
    case 'ObjectProperty':
    case 'ClassProperty':
      if (!isFunctionValue(declaration.value)) {
        throw new Error('Property does not hold a function');
      }
      return declaration.value;
    default:
      return declaration;
  }
}

export function isFunctionValue(
  node: t.Node | null | undefined
): node is t.FunctionExpression | t.ArrowFunctionExpression {
  return t.isFunctionExpression(node) || t.isArrowFunctionExpression(node);
}

function resolveSignature(mapping: TypeMapping): ResolvedSignature {
  const params = new Map<string, t.TSType>();
  for (const [name, typeName] of Object.entries(mapping.parameterTypes)) {
    params.set(name, parseTypeAnnotation(typeName));
  }
  if (mapping.returnType === undefined) {
    return { params };
  }
  return { params, returnType: parseTypeAnnotation(mapping.returnType) };
}

function withSignature<F extends FunctionNode>(fn: F, signature: ResolvedSignature): F {
  const params: readonly Parameter[] = fn.params;
  // Constructors take no return annotation
  const isConstructor = t.isClassMethod(fn) && fn.kind === 'constructor';
  return {
    ...fn,
    params: params.map((param) => annotateParameter(param, signature.params)),
    returnType:
      signature.returnType && !isConstructor ? t.tsTypeAnnotation(signature.returnType) : fn.returnType,
  };
}

/**
 * `x` → `x: T`, `x = d` → `x: T = d`, `...xs` → `...xs: T`
 */
function annotateParameter(param: Parameter, types: ReadonlyMap<string, t.TSType>): Parameter {
  if (t.isIdentifier(param)) {
    const type = types.get(param.name);
    return type ? { ...param, typeAnnotation: t.tsTypeAnnotation(type) } : param;
  }
  if (t.isAssignmentPattern(param) && t.isIdentifier(param.left)) {
    const type = types.get(param.left.name);
    return type ? { ...param, left: { ...param.left, typeAnnotation: t.tsTypeAnnotation(type) } } : param;
  }
  if (t.isRestElement(param) && t.isIdentifier(param.argument)) {
    const type = types.get(param.argument.name);
    return type ? { ...param, typeAnnotation: t.tsTypeAnnotation(type) } : param;
  }
  return param;
}
