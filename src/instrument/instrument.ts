/**
 * Instrumentation - make calls and returns observable
 *
 * Each eligible function is rewritten so that it reports its parameter
 * bindings on entry and its return value on exit:
 *
 *   function f(x, y = 1) {
 *     __sigmine__.enter("f", [["x", x], ["y", y]]);
 *     let __sigmine_ret__;
 *     try {
 *       ...body, `return e` becoming `return __sigmine_ret__ = e`
 *     } finally {
 *       __sigmine__.leave("f", __sigmine_ret__);
 *     }
 *   }
 *
 * The `finally` clause reports a return on every exit path. When the body
 * throws, the reported value is `undefined`.
 */

import * as t from '@babel/types';
import type { FunctionNode } from '../types/index.js';
import { childNodes, forEachFunction, type FunctionSite } from './walk.js';

export interface InstrumentOptions {
  /** Global through which instrumented code reaches the tracer */
  runtimeName?: string;
  /** Local holding the value being returned */
  returnSlotName?: string;
}

export const DEFAULT_INSTRUMENT_OPTIONS: Required<InstrumentOptions> = {
  runtimeName: '__sigmine__',
  returnSlotName: '__sigmine_ret__',
};

export interface InstrumentResult {
  /** Rewritten copy of the input */
  ast: t.File;
  /** Names of instrumented functions, innermost first */
  instrumented: string[];
  /** Functions left as they were, with the reason */
  skipped: Array<{ name: string; reason: string }>;
}

export function instrumentProgram(ast: t.File, options: InstrumentOptions = {}): InstrumentResult {
  const opts = { ...DEFAULT_INSTRUMENT_OPTIONS, ...options };
  const copy = t.cloneNode(ast, true, false);
  const instrumented: string[] = [];
  const skipped: InstrumentResult['skipped'] = [];

  forEachFunction(copy.program, (site) => {
    const reason = ineligibility(site.node);
    if (reason) {
      skipped.push({ name: site.name, reason });
      return;
    }
    instrumentFunction(site, opts);
    instrumented.push(site.name);
  });

  return { ast: copy, instrumented, skipped };
}

/**
 * Why a function cannot be traced, or undefined when it can
 */
function ineligibility(node: FunctionNode): string | undefined {
  if (node.async) return 'async function';
  if (node.generator) return 'generator';
  if ((t.isClassMethod(node) || t.isObjectMethod(node)) && (node.kind === 'get' || node.kind === 'set')) {
    return 'accessor';
  }
  return undefined;
}

function instrumentFunction(site: FunctionSite, opts: Required<InstrumentOptions>): void {
  const { node, name } = site;
  const body = t.isBlockStatement(node.body) ? node.body : t.blockStatement([t.returnStatement(node.body)]);
  rewriteReturns(body, opts.returnSlotName);

  const runtimeCall = (method: string, args: t.Expression[]): t.ExpressionStatement =>
    t.expressionStatement(
      t.callExpression(t.memberExpression(t.identifier(opts.runtimeName), t.identifier(method)), args)
    );

  const enter = runtimeCall('enter', [t.stringLiteral(name), t.arrayExpression(parameterBindings(node))]);
  const slot = t.variableDeclaration('let', [t.variableDeclarator(t.identifier(opts.returnSlotName))]);
  const leave = runtimeCall('leave', [t.stringLiteral(name), t.identifier(opts.returnSlotName)]);

  node.body = t.blockStatement(
    [enter, slot, t.tryStatement(t.blockStatement(body.body), null, t.blockStatement([leave]))],
    body.directives
  );
}

/**
 * `[["x", x], ...]` for every parameter bound to a plain identifier
 */
function parameterBindings(node: FunctionNode): t.ArrayExpression[] {
  const bindings: t.ArrayExpression[] = [];
  for (const name of boundParameterNames(node)) {
    bindings.push(t.arrayExpression([t.stringLiteral(name), t.identifier(name)]));
  }
  return bindings;
}

/**
 * Parameters that carry a single name: `x`, `x = 1` and `...xs`.
 * Destructured parameters bind no name of their own.
 */
export function boundParameterNames(node: FunctionNode): string[] {
  const names: string[] = [];
  for (const param of node.params) {
    if (t.isIdentifier(param)) {
      names.push(param.name);
    } else if (t.isAssignmentPattern(param) && t.isIdentifier(param.left)) {
      names.push(param.left.name);
    } else if (t.isRestElement(param) && t.isIdentifier(param.argument)) {
      names.push(param.argument.name);
    }
  }
  return names;
}

/**
 * Route every `return e` of this function (not of nested ones) through the slot
 */
function rewriteReturns(node: t.Node, slotName: string): void {
  for (const child of childNodes(node)) {
    if (t.isFunction(child)) continue;
    if (t.isReturnStatement(child) && child.argument) {
      child.argument = t.assignmentExpression('=', t.identifier(slotName), child.argument);
      continue;
    }
    rewriteReturns(child, slotName);
  }
}
