#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for the grove binary.
 * Handles file execution, configuration and stdin wiring for input.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'node:url';
import {
  parse,
  execute,
  createRuntimeContext,
  createLineReader,
} from './index.js';
import type {
  ExecutionResult,
  LineReader,
  RuntimeCallbacks,
} from './index.js';
import { loadConfig } from './cli-config.js';
import { createTraceObserver, formatError, formatOutput } from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'exec'; file: string; trace: boolean }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let trace = false;
  const positional: string[] = [];
  for (const arg of argv) {
    if (arg === '--trace') {
      trace = true;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const file = positional[0];
  if (!file) {
    throw new Error('Missing file argument');
  }
  if (positional.length > 1) {
    throw new Error(`Unexpected argument: ${positional[1]}`);
  }

  return { mode: 'exec', file, trace };
}

export interface ExecuteScriptOptions {
  /** Log observability events to stderr */
  trace?: boolean;
  /** Directory searched for grove.config.yaml (default: process.cwd()) */
  cwd?: string;
  /** Replaces the stdout/stdin wiring */
  callbacks?: Partial<RuntimeCallbacks>;
}

/**
 * Execute a Grove script file
 *
 * @param file - Path to the script
 * @returns Execution result with top-level return value and variables
 * @throws Error if file not found, configuration is invalid or execution fails
 */
export async function executeScript(
  file: string,
  options: ExecuteScriptOptions = {}
): Promise<ExecutionResult> {
  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }
  const source = await fs.readFile(file, 'utf-8');

  const ast = parse(source);
  const config = loadConfig(options.cwd ?? process.cwd());

  let reader: LineReader | undefined;
  const trace = options.trace === true || config.trace === true;
  const ctx = createRuntimeContext({
    callbacks: {
      onPrint: (value) => console.log(formatOutput(value)),
      onInput: () => {
        reader ??= createLineReader(process.stdin);
        return reader.readLine();
      },
      ...options.callbacks,
    },
    observability: trace ? createTraceObserver() : {},
    loopScope: config.loopScope,
    maxCallDepth: config.maxCallDepth,
  });

  try {
    return await execute(ast, ctx);
  } finally {
    reader?.close();
  }
}

const FALLBACK_VERSION = '0.1.0';

async function readVersion(): Promise<string> {
  const packageJsonPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../package.json'
  );
  try {
    const packageJson: unknown = JSON.parse(
      await fs.readFile(packageJsonPath, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    return FALLBACK_VERSION;
  }
  return FALLBACK_VERSION;
}

/**
 * Entry point for the grove binary
 *
 * Parses command-line arguments and executes the script. Program output
 * goes to stdout and errors to stderr. Sets exit code 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(`Usage:
  grove <script.grv>            Execute a Grove script file
  grove <script.grv> --trace    Log execution events to stderr
  grove --help                  Show this help message
  grove --version               Show version information

Configuration:
  grove.config.yaml in the working directory may set
  loopScope (per-iteration | shared), maxCallDepth and trace.

Examples:
  grove hello.grv
  grove factorial.grv --trace`);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'exec':
        await executeScript(parsed.file, { trace: parsed.trace });
        return;
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
