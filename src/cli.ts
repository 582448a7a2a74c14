#!/usr/bin/env node

// CLI for stubdecl: prints the canonical form of stub files

import { promises as fs, readFileSync } from 'fs';
import path from 'path';
import { parse } from './parse';
import { ParseOptions } from './options';
import { print, FormatterOptions } from './formatter';
import { logger, LogLevel } from './logger';

// Get version from package.json
function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
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
  inputs?: string[];
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  parseOptions?: Partial<ParseOptions>;
  formatOptions?: Partial<FormatterOptions>;
}

/** `3.7.0` to `[3, 7, 0]`. */
export function parseVersion(text: string): number[] {
  const parts = text.split('.');
  if (parts.some(part => !/^\d+$/.test(part))) {
    throw new Error(`Invalid target version: ${text}. Expected digits separated by dots, e.g. 3.7.0`);
  }
  return parts.map(part => parseInt(part, 10));
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};
  const takeValue = (i: number, flag: string): string => {
    if (i + 1 >= args.length) {
      throw new Error(`Missing value for ${flag}`);
    }
    return args[i + 1];
  };

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
      case '-n':
      case '--name':
        options.parseOptions = { ...options.parseOptions, name: takeValue(i++, arg) };
        break;
      case '--target-version':
        options.parseOptions = { ...options.parseOptions, targetVersion: parseVersion(takeValue(i++, arg)) };
        break;
      case '--platform':
        options.parseOptions = { ...options.parseOptions, targetPlatform: takeValue(i++, arg) };
        break;
      case '--indent-size': {
        const value = takeValue(i++, arg);
        if (!/^\d+$/.test(value) || parseInt(value, 10) === 0) {
          throw new Error(`Invalid indent size: ${value}`);
        }
        options.formatOptions = { ...options.formatOptions, indentSize: parseInt(value, 10) };
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputs = options.inputs || [];
        options.inputs.push(arg);
        break;
    }
  }
  return options;
}

export function showHelp(): void {
  console.log(`
stubdecl - parser and canonical printer for type stub files

Usage: stubdecl [options] <input-file>...

Options:
  -h, --help                 Show this help message
  -v, --version              Show version number
  -n, --name <module>        Module name; prefixes top-level names
  --target-version <x.y.z>   Version that conditions are evaluated against (default: 2.7.6)
  --platform <name>          Platform that conditions are evaluated against (default: linux)
  --indent-size <n>          Spaces per indentation level (default: 4)
  --verbose                  Print debug output to stderr

Examples:
  stubdecl foo.pyi
  stubdecl --target-version 3.7.0 --platform win32 foo.pyi
  stubdecl --name foo foo.pyi
`);
}

export function showVersion(): void {
  console.log(`stubdecl ${getVersion()}`);
}

/** Prints every input; returns false when one of them failed to parse. */
async function printStubs(options: CliOptions, inputFiles: string[]): Promise<boolean> {
  let succeeded = true;
  for (const inputFile of inputFiles) {
    logger.debug(`Reading ${inputFile}`);
    const source = await fs.readFile(inputFile, 'utf-8');
    const module = parse(source, { ...options.parseOptions, filename: inputFile });
    if (!module.ok) {
      console.error(module.error.format());
      succeeded = false;
      continue;
    }
    process.stdout.write(print(module.value, { ...options.formatOptions, insertFinalNewline: true }));
  }
  return succeeded;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  if (!options.inputs || options.inputs.length === 0) {
    console.error('Error: No input files specified');
    console.error('Use --help for usage information');
    process.exit(1);
  }

  for (const inputFile of options.inputs) {
    try {
      await fs.access(inputFile);
    } catch {
      console.error(`Error: Input file '${inputFile}' does not exist`);
      process.exit(1);
    }
  }

  if (!(await printStubs(options, options.inputs))) {
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  });
}
