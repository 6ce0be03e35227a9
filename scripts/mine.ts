#!/usr/bin/env npx tsx
/**
 * CLI script to mine type signatures from a run of a JavaScript file
 * Usage: npx tsx scripts/mine.ts <file.js> [options]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { mine, type MineResult } from '../src/session/index.js';
import { formatDTS, formatJSON, formatReport } from '../src/output/index.js';
import { SigmineError } from '../src/errors.js';

function usage(): void {
  console.log('Usage: npx tsx scripts/mine.ts <file.js> [options]');
  console.log('');
  console.log('Runs the file with every function traced and prints the annotated declarations.');
  console.log('');
  console.log('Options:');
  console.log('  --format=source   Annotated declarations (default)');
  console.log('  --format=report   Human-readable summary');
  console.log('  --format=json     Machine-readable JSON output');
  console.log('  --format=dts      TypeScript declaration file format');
  console.log('  --driver=<code>   Extra code to run after the file, e.g. --driver="f(1); f(2)"');
  console.log('  --union           Annotate every observed type instead of the last one');
  console.log('  --log             Print each traced call and return to stderr');
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    usage();
    process.exit(1);
  }

  let filePath = '';
  let format = 'source';
  let driver: string | undefined;
  let union = false;
  let log = false;

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg.startsWith('--driver=')) {
      driver = arg.slice('--driver='.length);
    } else if (arg === '--union') {
      union = true;
    } else if (arg === '--log') {
      log = true;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    process.exit(1);
  }

  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;

  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch {
    console.error(`Error: Could not read file '${absolutePath}'`);
    process.exit(1);
  }

  const driverCode = driver;
  console.error(`Tracing ${filePath}...`);
  const startTime = Date.now();
  let result: MineResult;

  try {
    result = mine(source, {
      program: { filename: filePath },
      tracer: { log, sink: (line) => console.error(line) },
      inference: { strategy: union ? 'union' : 'last' },
      driver: driverCode === undefined ? undefined : (program) => void program.evaluate(driverCode),
    });
  } catch (err) {
    if (err instanceof SigmineError) {
      console.error(`${err.errorType}: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const elapsed = Date.now() - startTime;
  console.error(`Traced ${result.log.totalCalls} calls to ${result.log.size} functions in ${elapsed}ms`);
  if (result.report.failures.size > 0) {
    console.error(`Could not annotate ${result.report.failures.size} functions`);
  }
  console.error('');

  let output: string;
  switch (format) {
    case 'json':
      output = formatJSON(result.log, result.report);
      break;
    case 'dts':
      output = formatDTS(result.report);
      break;
    case 'report':
      output = formatReport(result.log, result.report, filePath);
      break;
    case 'source':
    default:
      output = result.code;
      break;
  }

  console.log(output);
}

main();
