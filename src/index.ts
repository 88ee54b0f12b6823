// src/index.ts
// Entry point
import { parse } from './parser';
import { resolve } from './resolver';
import { CompileError, ResolvedTree } from './types';

export interface CompileResult {
  tree: ResolvedTree | null;
  errors: CompileError[];
}

export function compile(source: string): CompileResult {
  // Full pipeline: lex → parse → resolve
  const { tree, errors: parseErrors } = parse(source);
  if (parseErrors.length > 0 || !tree) {
    return { tree: null, errors: parseErrors };
  }
  return resolve(tree);
}

export function formatCompileError(error: CompileError): string {
  return error.line !== undefined
    ? `line ${error.line}: ${error.message}`
    : error.message;
}

export * from './types';
export * from './lexer';
export * from './parser';
export * from './resolver';
export * from './naming';
export * from './dispatcher';
export * from './help';
export * from './runtime';
export * from './emitter';
