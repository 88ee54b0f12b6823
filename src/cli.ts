#!/usr/bin/env node

/**
 * cdlc - compiles a .cdl command definition into TypeScript
 *
 * Usage: cdlc <path/to/file.cdl> <namespace>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { compile, formatCompileError } from './index';
import { emit } from './emitter';

export const EXIT_USAGE = 2;
export const EXIT_FAILURE = 1;

const SourcePath = z
  .string()
  .refine((p) => path.extname(p) === '.cdl', {
    message: 'input must be a .cdl file',
  });

const Namespace = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'invalid namespace' });

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(chalk.red(line)),
};

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Compiles one file and writes `<base>.ts` and `<base>.support.ts` beside
 * it. Returns the process exit code.
 */
export function compileFile(
  sourceArg: string,
  namespaceArg: string,
  io: CliIO
): number {
  const source = SourcePath.safeParse(sourceArg);
  if (!source.success) {
    io.err(`${source.error.issues[0].message}: ${sourceArg}`);
    return EXIT_USAGE;
  }
  const sourcePath = path.resolve(source.data);
  io.out(`Processing ${sourcePath}`);

  let text: string;
  try {
    text = fs.readFileSync(sourcePath, 'utf-8');
  } catch (e) {
    io.err(`read ${sourceArg}: ${message(e)}`);
    return EXIT_FAILURE;
  }

  const { tree, errors } = compile(text);
  if (!tree) {
    io.err(`parse ${sourceArg}: ${errors.map(formatCompileError).join('; ')}`);
    return EXIT_FAILURE;
  }

  const namespace = Namespace.safeParse(namespaceArg);
  if (!namespace.success) {
    io.err(`${namespace.error.issues[0].message} "${namespaceArg}"`);
    return EXIT_FAILURE;
  }

  const baseName = path.basename(sourcePath, '.cdl');
  const { files, errors: emitErrors } = emit(tree, {
    namespace: namespace.data,
    baseName,
    definition: text,
    sourceName: path.basename(sourcePath),
  });
  if (!files) {
    io.err(`generate: ${emitErrors.map(formatCompileError).join('; ')}`);
    return EXIT_FAILURE;
  }

  const dir = path.dirname(sourcePath);
  const outputs: [string, string][] = [
    [path.join(dir, `${baseName}.ts`), files.source],
    [path.join(dir, `${baseName}.support.ts`), files.support],
  ];
  for (const [outPath, content] of outputs) {
    try {
      fs.writeFileSync(outPath, content, 'utf-8');
    } catch (e) {
      io.err(`write ${outPath}: ${message(e)}`);
      return EXIT_FAILURE;
    }
    io.out(`Writing ${outPath}`);
  }
  return 0;
}

export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();
  program
    .name('cdlc')
    .description('Compile a command definition (.cdl) into TypeScript')
    .argument('<source>', 'path to the .cdl file')
    .argument('<namespace>', 'namespace for the generated declarations')
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .action((source: string, namespace: string) => {
      process.exitCode = compileFile(source, namespace, io);
    });
  return program;
}

if (require.main === module) {
  createProgram().parse(process.argv);
}
