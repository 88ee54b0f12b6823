// src/emitter.ts - TypeScript artifacts for a resolved tree
import { isValidIdentifier } from './naming';
import { attributeValue } from './resolver';
import {
  AttributeKind,
  AttributeValue,
  CompileError,
  Flag,
  ResolvedCommand,
  ResolvedTree,
} from './types';

export const RUNTIME_MODULE = 'cdl-compiler';

export interface EmitOptions {
  namespace: string;
  baseName: string; // Output file stem; the support file imports './<baseName>'
  definition: string; // Source text, embedded in the support file
  sourceName?: string; // Shown in the header
}

export interface EmittedFiles {
  source: string;
  support: string;
}

export interface EmitResult {
  files: EmittedFiles | null;
  errors: CompileError[];
}

function tsType(kind: AttributeKind): string {
  switch (kind) {
    case 'bool':
      return 'boolean';
    case 'string':
      return 'string';
    case 'int':
      return 'number';
  }
}

function literal(value: AttributeValue): string {
  switch (value.kind) {
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'string':
      return JSON.stringify(value.value);
    case 'int':
      return String(value.value);
  }
}

function key(name: string): string {
  return isValidIdentifier(name) ? name : JSON.stringify(name);
}

function access(record: string, name: string): string {
  return `${record}[${JSON.stringify(name)}]`;
}

function docLine(text: string, indent: string): string[] {
  return text ? [`${indent}/** ${text.replace(/\*\//g, '*\\/')} */`] : [];
}

function paramsName(command: ResolvedCommand): string {
  return `${command.identifier}Params`;
}

function handlerName(command: ResolvedCommand): string {
  return `run${command.identifier}`;
}

function header(options: EmitOptions): string {
  const from = options.sourceName ? ` from ${options.sourceName}` : '';
  return `// Code generated by cdlc${from}. DO NOT EDIT.`;
}

function flagFields(flags: readonly Flag[], indent: string): string[] {
  return flags.flatMap((f) => [
    ...docLine(f.description, indent),
    `${indent}${key(f.name)}: ${tsType(f.kind)};`,
  ]);
}

function emitSource(tree: ResolvedTree, options: EmitOptions): string {
  const leaves = tree.leaves.map((id) => tree.commands[id]);
  const lines: string[] = [
    header(options),
    `import type { HelpScope } from '${RUNTIME_MODULE}';`,
    '',
    `export namespace ${options.namespace} {`,
  ];
  for (const command of leaves) {
    lines.push(
      ...docLine(`Parameters for '${command.segments.join(' ')}'.`, '  '),
      `  export interface ${paramsName(command)} {`,
      '    flags: {',
      ...flagFields(command.flags, '      '),
      '    };',
      '    args: {',
      ...command.args.flatMap((a) => [
        ...docLine(a.description, '      '),
        `      ${key(a.name)}: string;`,
      ]),
      '    };',
      '    globals: {',
      ...flagFields(tree.globalFlags, '      '),
      '    };',
      '  }',
      ''
    );
  }
  lines.push(
    '  export interface Attributes {',
    ...tree.attributeTable.map((d) => `    ${key(d.name)}: ${tsType(d.kind)};`),
    '  }',
    '',
    '  export interface Handlers<R> {',
    '    help(scope: HelpScope): R;',
    ...leaves.map(
      (c) => `    ${handlerName(c)}(params: ${paramsName(c)}): R;`
    ),
    '  }',
    '}',
    ''
  );
  return lines.join('\n');
}

function convertFlags(
  flags: readonly Flag[],
  record: string,
  indent: string
): string[] {
  return flags.map((f) =>
    f.kind === 'bool'
      ? `${indent}${key(f.name)}: ${access(record, f.name)} === true,`
      : `${indent}${key(f.name)}: String(${access(record, f.name)} ?? ''),`
  );
}

function emitSupport(tree: ResolvedTree, options: EmitOptions): string {
  const ns = options.namespace;
  const leaves = tree.leaves.map((id) => tree.commands[id]);
  const lines: string[] = [
    header(options),
    `import { compile, execute, formatCompileError } from '${RUNTIME_MODULE}';`,
    `import type { ExecutionOutcome, ResolvedTree } from '${RUNTIME_MODULE}';`,
    `import type { ${ns} } from './${options.baseName}';`,
    '',
    `const DEFINITION = ${JSON.stringify(options.definition)};`,
    '',
    'function load(): ResolvedTree {',
    '  const { tree, errors } = compile(DEFINITION);',
    '  if (!tree) {',
    "    throw new Error(errors.map(formatCompileError).join('\\n'));",
    '  }',
    '  return tree;',
    '}',
    '',
    'export const tree = load();',
    '',
    `export const attributes: Record<string, ${ns}.Attributes> = {`,
  ];
  for (const command of leaves) {
    lines.push(`  ${JSON.stringify(command.path)}: {`);
    for (const def of tree.attributeTable) {
      const value = attributeValue(tree, command.id, def);
      lines.push(`    ${key(def.name)}: ${literal(value)},`);
    }
    lines.push('  },');
  }
  lines.push(
    '};',
    '',
    'export function run<R>(',
    `  handlers: ${ns}.Handlers<R>,`,
    '  argv: string[]',
    '): ExecutionOutcome<R> {',
    '  return execute(tree, argv, {',
    '    help: (scope) => handlers.help(scope),',
    '    commands: {'
  );
  for (const command of leaves) {
    lines.push(
      `      ${JSON.stringify(command.path)}: (p) =>`,
      `        handlers.${handlerName(command)}({`,
      '          flags: {',
      ...convertFlags(command.flags, 'p.flags', '            '),
      '          },',
      '          args: {',
      ...command.args.map(
        (a) =>
          `            ${key(a.name)}: ${access('p.args', a.name)} ?? '',`
      ),
      '          },',
      '          globals: {',
      ...convertFlags(tree.globalFlags, 'p.globals', '            '),
      '          },',
      '        }),'
    );
  }
  lines.push('    },', '  });', '}', '');
  return lines.join('\n');
}

/**
 * Produces the declarations file and its support module.
 */
export function emit(tree: ResolvedTree, options: EmitOptions): EmitResult {
  if (!isValidIdentifier(options.namespace)) {
    return {
      files: null,
      errors: [
        {
          type: 'semantic',
          message: `invalid namespace "${options.namespace}"`,
        },
      ],
    };
  }
  return {
    files: {
      source: emitSource(tree, options),
      support: emitSupport(tree, options),
    },
    errors: [],
  };
}
