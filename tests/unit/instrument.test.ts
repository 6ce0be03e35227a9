/**
 * Tests for function naming and instrumentation
 */

import { describe, it, expect } from 'vitest';
import * as t from '@babel/types';
import { generateCode, parse } from '../../src/parser/index.js';
import { ANONYMOUS, forEachFunction, instrumentProgram } from '../../src/instrument/index.js';

function namesIn(source: string): string[] {
  const { ast } = parse(source, { sourceType: 'script' });
  const names: string[] = [];
  forEachFunction(ast.program, (site) => names.push(site.name));
  return names;
}

describe('Function naming', () => {
  it('should name declarations and bound expressions', () => {
    expect(namesIn('function a() {} const b = () => 1; var c = function () {};')).toEqual(['a', 'b', 'c']);
  });

  it('should prefer the own name of a named expression', () => {
    expect(namesIn('const outer = function inner() {};')).toEqual(['inner']);
  });

  it('should name object members by key', () => {
    expect(namesIn("const o = { m() {}, 'k': () => 1, [dyn]: () => 2 };")).toEqual(['m', 'k', ANONYMOUS]);
  });

  it('should qualify class members with the class name', () => {
    const source = 'class Shape { constructor(n) {} area() {} static of() {} handler = () => {} }';
    expect(namesIn(source)).toEqual(['Shape.constructor', 'Shape.area', 'Shape.of', 'Shape.handler']);
  });

  it('should name class expressions after their variable', () => {
    expect(namesIn('const Box = class { open() {} };')).toEqual(['Box.open']);
  });

  it('should visit nested functions before their parent', () => {
    expect(namesIn('function outer() { return [1].map((x) => x); }')).toEqual([ANONYMOUS, 'outer']);
  });
});

describe('Instrumentation', () => {
  it('should report entry bindings and route returns through the slot', () => {
    const { ast } = parse('function f(x) { return x * 2; }', { sourceType: 'script' });
    const code = generateCode(instrumentProgram(ast).ast);

    expect(code).toContain('__sigmine__.enter("f", [["x", x]]);');
    expect(code).toContain('let __sigmine_ret__;');
    expect(code).toContain('return __sigmine_ret__ = x * 2;');
    expect(code).toContain('__sigmine__.leave("f", __sigmine_ret__);');
  });

  it('should not mutate the input tree', () => {
    const { ast } = parse('const g = (a) => a + 1;', { sourceType: 'script' });
    const before = generateCode(ast);
    instrumentProgram(ast);
    expect(generateCode(ast)).toBe(before);
  });

  it('should bind defaulted and rest parameters but not patterns', () => {
    const { ast } = parse('function f(a, b = 1, { c }, ...rest) {}', { sourceType: 'script' });
    const code = generateCode(instrumentProgram(ast).ast);
    expect(code).toContain('__sigmine__.enter("f", [["a", a], ["b", b], ["rest", rest]]);');
  });

  it('should give expression-bodied arrows a block body', () => {
    const { ast } = parse('const sq = (n) => n * n;', { sourceType: 'script' });
    const result = instrumentProgram(ast);
    const declaration = result.ast.program.body[0];

    expect(t.isVariableDeclaration(declaration)).toBe(true);
    if (t.isVariableDeclaration(declaration)) {
      const init = declaration.declarations[0]?.init;
      expect(t.isArrowFunctionExpression(init) && t.isBlockStatement(init.body)).toBe(true);
    }
    expect(generateCode(result.ast)).toContain('return __sigmine_ret__ = n * n;');
  });

  it('should leave returns of nested functions to those functions', () => {
    const { ast } = parse('function outer() { const inner = () => { return 1; }; return inner(); }', {
      sourceType: 'script',
    });
    const code = generateCode(instrumentProgram(ast).ast);
    expect(code).toContain('return __sigmine_ret__ = 1;');
    expect(code).toContain('return __sigmine_ret__ = inner();');
    expect(code.match(/__sigmine_ret__ = /g)).toHaveLength(2);
  });

  it('should skip async functions, generators and accessors', () => {
    const source = `
      async function load(x) { return x; }
      function* count() { yield 1; }
      const o = { get size() { return 1; }, plain() { return 2; } };
    `;
    const result = instrumentProgram(parse(source, { sourceType: 'script' }).ast);

    expect(result.instrumented).toEqual(['plain']);
    expect(result.skipped).toEqual([
      { name: 'load', reason: 'async function' },
      { name: 'count', reason: 'generator' },
      { name: 'size', reason: 'accessor' },
    ]);
  });

  it('should use the configured runtime name', () => {
    const { ast } = parse('function f() {}', { sourceType: 'script' });
    const code = generateCode(instrumentProgram(ast, { runtimeName: '__probe__', returnSlotName: '__out__' }).ast);
    expect(code).toContain('__probe__.enter("f", []);');
    expect(code).toContain('__probe__.leave("f", __out__);');
  });
});
