// CLI for the IFJ25 semantic analyzer

import { promises as fs, readFileSync } from 'fs';
import path from 'path';
import { AstFormatError, parseProgramJson } from './ast/ast-json';
import { BuiltinExtension, BuiltinExtensions } from './builtins';
import { ErrorCode } from './errors';
import { logger, LogLevel } from './logger';
import { formatGlobals, formatScopedSymbols } from './symbols/symbol-dump';
import { Program } from './types';
import { SemanticAnalyzer } from './validation/analyzer';

// Get version from package.json
function getVersion(): string {
  let dir = __dirname;
  // Walk up to find package.json (handles both src/ and dist/)
  for (let i = 0; i < 5; i++) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(path.join(dir, 'package.json'), 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    } catch {
      dir = path.dirname(dir);
    }
  }
  return '0.0.0';
}

export interface CliOptions {
  input?: string;
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  dumpSymbols?: boolean;
  globals?: boolean;
  extensions?: Partial<BuiltinExtensions>;
}

function isBuiltinExtension(name: string): name is BuiltinExtension {
  return name === 'boolthen' || name === 'statican';
}

function parseExtensions(value: string): Partial<BuiltinExtensions> {
  const extensions: Partial<BuiltinExtensions> = {};
  for (const name of value.split(',').map(s => s.trim().toLowerCase()).filter(s => s.length > 0)) {
    if (!isBuiltinExtension(name)) {
      throw new Error(`Unknown extension: ${name}. Must be 'boolthen' or 'statican'`);
    }
    extensions[name] = true;
  }
  return extensions;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '--ext':
      case '--extensions':
        if (i + 1 >= args.length) {
          throw new Error(`Option ${arg} needs a value`);
        }
        options.extensions = { ...options.extensions, ...parseExtensions(args[++i]) };
        break;
      case '--dump-symbols':
        options.dumpSymbols = true;
        break;
      case '--globals':
        options.globals = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (options.input !== undefined) {
          throw new Error(`Only one input file is accepted, got '${options.input}' and '${arg}'`);
        }
        options.input = arg;
        break;
    }
  }
  return options;
}

export function showHelp(): void {
  console.log(`
ifj25-sema - semantic analyzer for IFJ25 syntax trees

Usage: ifj25-sema [options] <ast.json | ->

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --verbose               Log every analysis step
  --ext <list>            Enable builtin extensions: boolthen, statican (comma separated)
  --dump-symbols          Print every declared symbol grouped by scope
  --globals               Print global identifiers with their learned types

Exit status is 0 on success, otherwise the code of the first error:
  2 malformed AST, 3 undefined, 4 redefined, 5 argument count/kind,
  6 expression type, 10 break/continue outside loop, 99 internal

Examples:
  ifj25-sema program.json
  ifj25-sema --ext boolthen --dump-symbols program.json
  parser < program.ifj | ifj25-sema -
`);
}

export function showVersion(): void {
  console.log(`ifj25-sema ${getVersion()}`);
}

export interface CheckOutcome {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Analyzes one serialized AST. Never throws for malformed or invalid programs;
 * the failure is reported through the exit code and stderr.
 */
export function checkProgramText(text: string, options: CliOptions, filename?: string): CheckOutcome {
  let program: Program;
  try {
    program = parseProgramJson(text, filename);
  } catch (error) {
    if (error instanceof AstFormatError) {
      return { code: ErrorCode.SYNTAX, stdout: '', stderr: `Error: ${error.message}\n` };
    }
    throw error;
  }

  const analyzer = new SemanticAnalyzer({ extensions: options.extensions, verbose: options.verbose });
  const result = analyzer.analyze(program);
  if (!result.success) {
    return { code: result.code, stdout: '', stderr: `Error: ${result.error.message}\n` };
  }

  let stdout = '';
  if (options.dumpSymbols) {
    stdout += formatScopedSymbols(result.symbols);
  }
  if (options.globals) {
    stdout += formatGlobals(result.globals, result.globalTypes);
  }
  return { code: ErrorCode.SUCCESS, stdout, stderr: '' };
}

async function readInput(input: string): Promise<string> {
  if (input === '-') {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf-8');
  }
  return fs.readFile(input, 'utf-8');
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseArgs(args);

  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (options.help) {
    showHelp();
    return 0;
  }

  if (options.version) {
    showVersion();
    return 0;
  }

  if (options.input === undefined) {
    console.error('Error: No input file specified');
    console.error('Use --help for usage information');
    return 1;
  }

  const text = await readInput(options.input);
  const outcome = checkProgramText(text, options, options.input === '-' ? undefined : options.input);
  process.stdout.write(outcome.stdout);
  process.stderr.write(outcome.stderr);
  return outcome.code;
}
