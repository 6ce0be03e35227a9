/**
 * Tests for the report, JSON and declaration formatters
 */

import { describe, it, expect } from 'vitest';
import { formatDTS, formatJSON, formatReport, summarize } from '../../src/output/index.js';
import { mine } from '../../src/session/index.js';

const SOURCE = `
function g(a, b = 1) { return a + b; }
const h = ({ k }) => k;
class Counter { bump(by) { return by; } }
g(1);
h({ k: 'x' });
new Counter().bump(2);
`;

describe('Output formatters', () => {
  it('should summarize functions in log order', () => {
    const { log, report } = mine(SOURCE);
    expect(summarize(log, report)).toEqual([
      { name: 'g', calls: 1, parameterTypes: { a: 'number', b: 'number' }, returnType: 'number' },
      { name: 'h', calls: 1, parameterTypes: {}, returnType: 'string' },
      { name: 'Counter.bump', calls: 1, parameterTypes: { by: 'number' }, returnType: 'number' },
    ]);
  });

  it('should keep functions without a declaration out of the summary mappings', () => {
    const { log, report } = mine('[0].forEach((x) => x);');
    expect(summarize(log, report)).toEqual([
      { name: '<anonymous>', calls: 1, parameterTypes: null, returnType: null },
    ]);
  });

  it('should format JSON with failures', () => {
    const { log, report } = mine('[0].forEach((x) => x);');
    expect(JSON.parse(formatJSON(log, report))).toEqual({
      functions: [{ name: '<anonymous>', calls: 1, parameterTypes: null, returnType: null }],
      failures: [{ name: '<anonymous>', error: "cannot resolve '<anonymous>': no declaration found" }],
    });
  });

  it('should format a readable report', () => {
    const { log, report } = mine('function g(a, b = 1) { return a + b; }\ng(1);');
    const lines = formatReport(log, report, 'sample.js').split('\n');

    expect(lines[1]).toBe('  Mined Signatures: sample.js');
    expect(lines).toContain('    Functions:  1');
    expect(lines).toContain('    Calls:      1');
    expect(lines).toContain('    Annotated:  1');
    expect(lines).toContain('    Failures:   0');
    expect(lines).toContain(`  ${'g'.padEnd(24)} 1 call`);
    expect(lines).toContain('             ├─ a: number');
    expect(lines).toContain('             ├─ b: number');
    expect(lines).toContain('             └─ returns number');
    expect(lines).not.toContain('  Failures:');
  });

  it('should list failures in the report', () => {
    const { log, report } = mine('[0].forEach((x) => x);');
    const lines = formatReport(log, report).split('\n');

    expect(lines).toContain('  Failures:');
    expect(lines).toContain("    <anonymous> - cannot resolve '<anonymous>': no declaration found");
  });

  it('should format ambient declarations for plain names', () => {
    const { report } = mine('function g(a, b = 1) { return a + b; }\nclass Counter { bump(by) { return by; } }\ng(1);\nnew Counter().bump(2);');
    expect(formatDTS(report)).toBe('declare function g(a: number, b?: number): number;');
  });
});
