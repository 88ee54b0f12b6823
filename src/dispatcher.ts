// src/dispatcher.ts - Resolves an argument vector against a resolved tree
import {
  DispatchFailure,
  DispatchResult,
  Flag,
  FlagValue,
  HelpScope,
  ParamBundle,
  ResolvedCommand,
  ResolvedTree,
} from './types';

type PathOutcome =
  | { ok: true; command: number | null; consumed: number }
  | { ok: false; command: number | null; failure: DispatchFailure };

export function isFlagShaped(token: string): boolean {
  return token.length > 1 && token.startsWith('-');
}

export function flagMatches(flag: Flag, token: string): boolean {
  return (
    token === `--${flag.name}` ||
    (flag.short !== undefined && token === `-${flag.short}`)
  );
}

function zeroValues(flags: readonly Flag[]): Record<string, FlagValue> {
  const values: Record<string, FlagValue> = {};
  for (const flag of flags) {
    values[flag.name] = flag.kind === 'bool' ? false : '';
  }
  return values;
}

function segmentsOf(tree: ResolvedTree, command: number | null): string[] {
  return command === null ? [] : [...tree.commands[command].segments];
}

/**
 * Sibling rule: an exact name wins, otherwise every sibling the token
 * prefixes.
 */
export function matchSiblings(
  tree: ResolvedTree,
  siblings: readonly number[],
  token: string
): number[] {
  const exact = siblings.find((id) => tree.commands[id].name === token);
  if (exact !== undefined) return [exact];
  if (token === '') return [];
  return siblings.filter((id) => tree.commands[id].name.startsWith(token));
}

/**
 * Commands below the top level that the token names, applying the sibling
 * rule under each parent. Sorted by path.
 */
export function findOmitted(tree: ResolvedTree, token: string): number[] {
  const matches: number[] = [];
  for (const parent of tree.commands) {
    if (parent.children.length > 0) {
      matches.push(...matchSiblings(tree, parent.children, token));
    }
  }
  return matches.sort((a, b) =>
    tree.commands[a].path < tree.commands[b].path ? -1 : 1
  );
}

/**
 * Removes every global flag (and its value) from the token list.
 */
export function extractGlobals(
  tree: ResolvedTree,
  argv: readonly string[]
):
  | { ok: true; globals: Record<string, FlagValue>; rest: string[] }
  | { ok: false; failure: DispatchFailure } {
  const globals = zeroValues(tree.globalFlags);
  const rest: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const flag = tree.globalFlags.find((f) => flagMatches(f, token));
    if (!flag) {
      rest.push(token);
      continue;
    }
    if (flag.kind === 'bool') {
      globals[flag.name] = true;
    } else if (i + 1 < argv.length) {
      globals[flag.name] = argv[++i];
    } else {
      return {
        ok: false,
        failure: { kind: 'missingFlagValue', flag: flag.name, path: [] },
      };
    }
  }
  return { ok: true, globals, rest };
}

/**
 * Walks the tree from the root, one token per level. Command omission is
 * tried for the first token only.
 */
export function resolvePath(
  tree: ResolvedTree,
  tokens: readonly string[]
): PathOutcome {
  let current: number | null = null;
  let children = tree.roots;
  let consumed = 0;
  while (consumed < tokens.length && children.length > 0) {
    const token = tokens[consumed];
    const path = segmentsOf(tree, current);
    const matches = matchSiblings(tree, children, token);
    if (matches.length > 1) {
      return {
        ok: false,
        command: current,
        failure: {
          kind: 'ambiguousCommand',
          token,
          candidates: matches.map((id) => tree.commands[id].name),
          path,
        },
      };
    }
    if (matches.length === 0) {
      if (current !== null) break;
      if (isFlagShaped(token)) {
        return {
          ok: false,
          command: null,
          failure: { kind: 'unknownFlag', token, path },
        };
      }
      const omitted = findOmitted(tree, token);
      if (omitted.length > 1) {
        return {
          ok: false,
          command: null,
          failure: {
            kind: 'ambiguousCommand',
            token,
            candidates: omitted.map((id) => tree.commands[id].path),
            path,
          },
        };
      }
      if (omitted.length === 0) {
        return {
          ok: false,
          command: null,
          failure: { kind: 'unknownCommand', token, path },
        };
      }
      matches.push(omitted[0]);
    }
    current = matches[0];
    children = tree.commands[current].children;
    consumed++;
  }
  return { ok: true, command: current, consumed };
}

/**
 * Binds flags (anywhere) and positional arguments (in order) for a leaf.
 */
export function bindParams(
  command: ResolvedCommand,
  tokens: readonly string[],
  globals: Record<string, FlagValue>
): { ok: true; params: ParamBundle } | { ok: false; failure: DispatchFailure } {
  const path = [...command.segments];
  const flags = zeroValues(command.flags);
  const args: Record<string, string> = {};
  let argIndex = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isFlagShaped(token)) {
      const flag = command.flags.find((f) => flagMatches(f, token));
      if (!flag) {
        return { ok: false, failure: { kind: 'unknownFlag', token, path } };
      }
      if (flag.kind === 'bool') {
        flags[flag.name] = true;
      } else if (i + 1 < tokens.length) {
        flags[flag.name] = tokens[++i];
      } else {
        return {
          ok: false,
          failure: { kind: 'missingFlagValue', flag: flag.name, path },
        };
      }
      continue;
    }
    if (argIndex >= command.args.length) {
      return { ok: false, failure: { kind: 'surplusArgument', token, path } };
    }
    args[command.args[argIndex].name] = token;
    argIndex++;
  }
  if (argIndex < command.args.length) {
    return {
      ok: false,
      failure: {
        kind: 'missingArgument',
        argument: command.args[argIndex].name,
        path,
      },
    };
  }
  return { ok: true, params: { flags, args, globals } };
}

function findTopic(tree: ResolvedTree, token: string): number | undefined {
  const exact = tree.topics.findIndex((t) => t.name === token);
  if (exact !== -1) return exact;
  if (token === '') return undefined;
  const prefixed = tree.topics.flatMap((t, i) =>
    t.name.startsWith(token) ? [i] : []
  );
  return prefixed.length === 1 ? prefixed[0] : undefined;
}

function helpScope(
  tree: ResolvedTree,
  command: number | null,
  rest: readonly string[]
): HelpScope {
  if (command !== null) return { kind: 'command', command };
  if (rest.length > 0) {
    const topic = findTopic(tree, rest[0]);
    if (topic !== undefined) return { kind: 'topic', topic };
  }
  return { kind: 'root' };
}

export const HELP_WORD = 'help';

/**
 * `help <command|topic>` as the first word, unless a top-level command is
 * itself named `help`.
 */
export function isHelpWord(
  tree: ResolvedTree,
  tokens: readonly string[]
): boolean {
  return (
    tokens.length > 0 &&
    tokens[0] === HELP_WORD &&
    !tree.roots.some((id) => tree.commands[id].name === HELP_WORD)
  );
}

export function dispatch(
  tree: ResolvedTree,
  argv: readonly string[]
): DispatchResult {
  const extracted = extractGlobals(tree, argv);
  if (!extracted.ok) return { status: 'failed', failure: extracted.failure };
  const { globals } = extracted;
  let { rest } = extracted;

  const helpWord = isHelpWord(tree, rest);
  if (helpWord) rest = rest.slice(1);
  const outcome = resolvePath(tree, rest);
  if (helpWord || globals[tree.helpFlag.name] === true) {
    return {
      status: 'help',
      scope: helpScope(tree, outcome.command, rest),
      globals,
    };
  }
  if (!outcome.ok) return { status: 'failed', failure: outcome.failure };

  const { command, consumed } = outcome;
  if (command === null) {
    if (rest.length === 0) {
      return { status: 'help', scope: { kind: 'root' }, globals };
    }
    return {
      status: 'failed',
      failure: { kind: 'unknownCommand', token: rest[0], path: [] },
    };
  }

  const resolved = tree.commands[command];
  const remaining = rest.slice(consumed);
  if (resolved.children.length > 0) {
    if (remaining.length === 0) {
      return { status: 'help', scope: { kind: 'command', command }, globals };
    }
    const token = remaining[0];
    const path = [...resolved.segments];
    return {
      status: 'failed',
      failure: isFlagShaped(token)
        ? { kind: 'unknownFlag', token, path }
        : { kind: 'unknownCommand', token, path },
    };
  }

  const bound = bindParams(resolved, remaining, globals);
  if (!bound.ok) return { status: 'failed', failure: bound.failure };
  return {
    status: 'command',
    command,
    path: resolved.path,
    params: bound.params,
  };
}
