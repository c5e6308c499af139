#!/usr/bin/env npx tsx
/**
 * CLI script to run flow analysis on a source file
 * Usage: npx tsx scripts/analyze.ts <file.ts> [options]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { analyze } from '../src/analysis/index.js';
import { formatAsReport, formatAsInlineComments, formatAsDTS, formatAsJSON } from '../src/output/index.js';
import { isLogLevel, type LogLevel } from '../src/utils/logger.js';

type OutputFormat = 'report' | 'json' | 'dts' | 'inline';

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'report' || value === 'json' || value === 'dts' || value === 'inline';
}

function usage(): void {
  console.log('Usage: npx tsx scripts/analyze.ts <file.ts> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --format=report      Human-readable analysis report (default)');
  console.log('  --format=json        Machine-readable JSON output');
  console.log('  --format=dts         Final bindings as declarations');
  console.log('  --format=inline      Source code with inline type comments');
  console.log('  --log-level=<level>  silent | errors | warnings | info | debug');
  console.log('  --js                 Parse without TypeScript syntax');
}

function main(): number {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    usage();
    return 1;
  }

  let filePath = '';
  let format: OutputFormat = 'report';
  let logLevel: LogLevel = 'warnings';
  let typescript = true;

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      const value = arg.slice('--format='.length);
      if (!isOutputFormat(value)) {
        console.error(`Error: Unknown format '${value}'`);
        return 1;
      }
      format = value;
    } else if (arg.startsWith('--log-level=')) {
      const value = arg.slice('--log-level='.length);
      if (!isLogLevel(value)) {
        console.error(`Error: Unknown log level '${value}'`);
        return 1;
      }
      logLevel = value;
    } else if (arg === '--js') {
      typescript = false;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    return 1;
  }

  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;
  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    console.error(`Error: Could not read file '${absolutePath}'`, err);
    return 1;
  }

  const result = analyze(source, { filename: filePath, logLevel, typescript });

  switch (format) {
    case 'json':
      console.log(formatAsJSON(result));
      break;
    case 'dts':
      console.log(formatAsDTS(result));
      break;
    case 'inline':
      console.log(formatAsInlineComments(source, result));
      break;
    case 'report':
      console.log(formatAsReport(result));
      break;
  }

  return result.errors.length > 0 ? 2 : 0;
}

process.exitCode = main();
