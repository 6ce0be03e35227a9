/**
 * Result formatters
 *
 * 1. Report (human-readable summary per function)
 * 2. JSON (machine-readable)
 * 3. DTS-like (TypeScript ambient declarations)
 *
 * The annotated source itself comes from `render`.
 */

import * as t from '@babel/types';
import { generateCode } from '../parser/index.js';
import type { AnnotationReport } from '../session/index.js';
import type { ReadonlyCallLog } from '../trace/index.js';
import { functionOf } from '../transform/index.js';
import type { FunctionNode } from '../types/index.js';

const RULE = '═══════════════════════════════════════════════════════════════';
const THIN_RULE = '───────────────────────────────────────────────────────────────';

export interface FunctionSummary {
  name: string;
  calls: number;
  parameterTypes: Record<string, string> | null;
  returnType: string | null;
}

export interface FailureSummary {
  name: string;
  error: string;
}

/**
 * Per-function summary, in log order
 */
export function summarize(log: ReadonlyCallLog, report: AnnotationReport): FunctionSummary[] {
  return log.entries().map(([name, records]) => {
    const mapping = report.mappings.get(name);
    return {
      name,
      calls: records.length,
      parameterTypes: mapping ? { ...mapping.parameterTypes } : null,
      returnType: mapping?.returnType ?? null,
    };
  });
}

/**
 * Format a run as a human-readable report
 */
export function formatReport(log: ReadonlyCallLog, report: AnnotationReport, title = 'session'): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(`  Mined Signatures: ${title}`);
  lines.push(RULE);
  lines.push('');
  lines.push('  Summary:');
  lines.push(`    Functions:  ${log.size}`);
  lines.push(`    Calls:      ${log.totalCalls}`);
  lines.push(`    Annotated:  ${report.declarations.size}`);
  lines.push(`    Failures:   ${report.failures.size}`);
  lines.push('');

  if (report.failures.size > 0) {
    lines.push(THIN_RULE);
    lines.push('  Failures:');
    lines.push(THIN_RULE);
    for (const [name, error] of report.failures) {
      lines.push(`    ${name} - ${error.message}`);
    }
    lines.push('');
  }

  lines.push(THIN_RULE);
  lines.push('  Signatures:');
  lines.push(THIN_RULE);
  lines.push('');

  for (const summary of summarize(log, report)) {
    if (!summary.parameterTypes) continue;
    lines.push(`  ${summary.name.padEnd(24)} ${summary.calls} call${summary.calls === 1 ? '' : 's'}`);
    for (const [param, type] of Object.entries(summary.parameterTypes)) {
      lines.push(`             ├─ ${param}: ${type}`);
    }
    lines.push(`             └─ returns ${summary.returnType ?? '(not observed)'}`);
    lines.push('');
  }

  lines.push(RULE);

  return lines.join('\n');
}

/**
 * Format a run as JSON
 */
export function formatJSON(log: ReadonlyCallLog, report: AnnotationReport, indent = 2): string {
  const failures: FailureSummary[] = [...report.failures].map(([name, error]) => ({
    name,
    error: error.message,
  }));
  return JSON.stringify({ functions: summarize(log, report), failures }, null, indent);
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

type DeclareParameter = Parameters<typeof t.tsDeclareFunction>[2][number];

/**
 * Format annotated functions as ambient declarations. Methods and other
 * names that are not plain identifiers are left out.
 */
export function formatDTS(report: AnnotationReport): string {
  const lines: string[] = [];

  for (const [name, declaration] of report.declarations) {
    if (!IDENTIFIER.test(name)) continue;
    const fn = functionOf(declaration);

    const parameters: ReadonlyArray<FunctionNode['params'][number]> = fn.params;
    const params = parameters.flatMap((param): DeclareParameter[] => {
      if (t.isTSParameterProperty(param)) return [];
      // Defaults have no place in an ambient signature
      if (t.isAssignmentPattern(param)) {
        const { left } = param;
        if (t.isIdentifier(left)) return [{ ...left, optional: true }];
        return t.isObjectPattern(left) || t.isArrayPattern(left) ? [left] : [];
      }
      return [param];
    });
    const returnType = t.isTSTypeAnnotation(fn.returnType) ? fn.returnType : null;

    const node = t.tsDeclareFunction(t.identifier(name), null, params, returnType);
    lines.push(generateCode({ ...node, declare: true }));
  }

  return lines.join('\n');
}
