// src/resolver.ts - Semantic checks and enrichment of the declaration tree
import { identifierForPath } from './naming';
import {
  AttributeDef,
  AttributeKind,
  AttributeMap,
  AttributeValue,
  CommandDecl,
  CompileError,
  DeclarationTree,
  Flag,
  FlagDecl,
  FlagKind,
  ResolvedCommand,
  ResolvedTree,
  flagKinds,
} from './types';

export interface ResolveResult {
  tree: ResolvedTree | null;
  errors: CompileError[];
}

/**
 * Implicit global flag present in every tree.
 */
export const HELP_FLAG: Flag = {
  name: 'help',
  short: 'h',
  kind: 'bool',
  description: 'Show help information',
};

function isFlagKind(kind: string): kind is FlagKind {
  return flagKinds.some((k) => k === kind);
}

/**
 * Depth-first declaration order: each command before its children.
 */
export function walkCommands(
  tree: DeclarationTree,
  visit: (command: CommandDecl) => void
): void {
  const walk = (ids: number[]) => {
    for (const id of ids) {
      const command = tree.commands[id];
      visit(command);
      walk(command.children);
    }
  };
  walk(tree.roots);
}

export function commandSegments(
  commands: readonly { name: string; parent: number | null }[],
  id: number
): string[] {
  const segments: string[] = [];
  let current: number | null = id;
  while (current !== null) {
    segments.unshift(commands[current].name);
    current = commands[current].parent;
  }
  return segments;
}

function checkFlags(
  flags: FlagDecl[],
  scope: string,
  reserved: Flag[]
): { flags: Flag[]; error?: CompileError } {
  const names = new Set(reserved.map((f) => f.name));
  const shorts = new Set(
    reserved.flatMap((f) => (f.short !== undefined ? [f.short] : []))
  );
  const checked: Flag[] = [];
  for (const decl of flags) {
    if (!isFlagKind(decl.kind)) {
      return {
        flags: checked,
        error: {
          type: 'semantic',
          message: `flag "${decl.name}" has unsupported kind "${decl.kind}" (expected bool or string)`,
          line: decl.line,
        },
      };
    }
    if (names.has(decl.name)) {
      return {
        flags: checked,
        error: {
          type: 'semantic',
          message: `duplicate flag "--${decl.name}" in ${scope}`,
          line: decl.line,
        },
      };
    }
    if (decl.short !== undefined && shorts.has(decl.short)) {
      return {
        flags: checked,
        error: {
          type: 'semantic',
          message: `duplicate short flag "-${decl.short}" in ${scope}`,
          line: decl.line,
        },
      };
    }
    names.add(decl.name);
    if (decl.short !== undefined) shorts.add(decl.short);
    checked.push({
      name: decl.name,
      kind: decl.kind,
      description: decl.description,
      ...(decl.short !== undefined ? { short: decl.short } : {}),
    });
  }
  return { flags: checked };
}

/**
 * Records the first-seen kind of every attribute, globals first, then
 * commands in declaration order. The table is sorted by name.
 */
export function collectAttributeKinds(tree: DeclarationTree): {
  table: AttributeDef[];
  error?: CompileError;
} {
  const kinds = new Map<string, AttributeKind>();
  const sources: AttributeMap[] = [tree.globalAttributes];
  walkCommands(tree, (command) => sources.push(command.attributes));
  for (const attributes of sources) {
    for (const [name, entry] of attributes) {
      const existing = kinds.get(name);
      if (existing !== undefined && existing !== entry.value.kind) {
        return {
          table: [],
          error: {
            type: 'semantic',
            message: `attribute "${name}" has conflicting kinds: ${existing} vs ${entry.value.kind}`,
            line: entry.line,
          },
        };
      }
      kinds.set(name, entry.value.kind);
    }
  }
  const table = [...kinds.entries()]
    .map(([name, kind]) => ({ name, kind }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return { table };
}

function valuesOf(
  attributes: AttributeMap
): ReadonlyMap<string, AttributeValue> {
  const values = new Map<string, AttributeValue>();
  for (const [name, entry] of attributes) {
    values.set(name, entry.value);
  }
  return values;
}

export function resolve(tree: DeclarationTree | null): ResolveResult {
  if (!tree) {
    return {
      tree: null,
      errors: [
        { type: 'semantic', message: 'Invalid or null tree from parser' },
      ],
    };
  }

  const globals = checkFlags(tree.globalFlags, 'global scope', [HELP_FLAG]);
  if (globals.error) return { tree: null, errors: [globals.error] };

  // Local flags may not shadow a global name or alias.
  const reserved = [HELP_FLAG, ...globals.flags];
  const commands: ResolvedCommand[] = [];
  const identifiers = new Map<string, string>();
  for (const decl of tree.commands) {
    const segments = commandSegments(tree.commands, decl.id);
    const path = segments.join('/');
    const local = checkFlags(decl.flags, `command "${path}"`, reserved);
    if (local.error) return { tree: null, errors: [local.error] };
    const identifier = identifierForPath(segments);
    const taken = identifiers.get(identifier);
    if (taken !== undefined) {
      return {
        tree: null,
        errors: [
          {
            type: 'semantic',
            message: `commands "${taken}" and "${path}" share identifier "${identifier}"`,
            line: decl.line,
          },
        ],
      };
    }
    identifiers.set(identifier, path);
    commands.push({
      id: decl.id,
      name: decl.name,
      path,
      segments,
      identifier,
      description: decl.description,
      flags: local.flags,
      args: decl.args.map((a) => ({ ...a })),
      examples: [...decl.examples],
      attributes: valuesOf(decl.attributes),
      children: [...decl.children],
      parent: decl.parent,
    });
  }

  const { table, error } = collectAttributeKinds(tree);
  if (error) return { tree: null, errors: [error] };

  const leaves = commands
    .filter((c) => c.children.length === 0)
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((c) => c.id);

  return {
    tree: {
      ...(tree.app ? { app: { ...tree.app } } : {}),
      helpFlag: HELP_FLAG,
      declaredGlobalFlags: globals.flags,
      globalFlags: [HELP_FLAG, ...globals.flags],
      globalAttributes: valuesOf(tree.globalAttributes),
      commands,
      roots: [...tree.roots],
      topics: tree.topics.map((t) => ({ ...t })),
      attributeTable: table,
      leaves,
    },
    errors: [],
  };
}

/**
 * Local override, else global default, else undefined.
 */
export function resolveAttribute(
  tree: ResolvedTree,
  command: number | null,
  name: string
): AttributeValue | undefined {
  if (command !== null) {
    const local = tree.commands[command].attributes.get(name);
    if (local) return local;
  }
  return tree.globalAttributes.get(name);
}

export function zeroValue(kind: AttributeKind): AttributeValue {
  switch (kind) {
    case 'bool':
      return { kind: 'bool', value: false };
    case 'string':
      return { kind: 'string', value: '' };
    case 'int':
      return { kind: 'int', value: 0 };
  }
}

/**
 * The one place where an absent attribute becomes its kind's zero value.
 */
export function attributeValue(
  tree: ResolvedTree,
  command: number | null,
  def: AttributeDef
): AttributeValue {
  return resolveAttribute(tree, command, def.name) ?? zeroValue(def.kind);
}
