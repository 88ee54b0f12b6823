// src/runtime.ts - Binds dispatch results to command handlers
import { dispatch } from './dispatcher';
import {
  DispatchFailure,
  HelpScope,
  ParamBundle,
  ResolvedTree,
} from './types';

/**
 * One handler per leaf command, keyed by path ('user/add'), plus help.
 */
export interface Handlers<R> {
  help: (scope: HelpScope, tree: ResolvedTree) => R;
  commands: Record<string, (params: ParamBundle) => R>;
}

export type RuntimeFailure =
  | DispatchFailure
  | { kind: 'missingHandler'; path: string[] };

export type ExecutionOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; failure: RuntimeFailure };

export function execute<R>(
  tree: ResolvedTree,
  argv: readonly string[],
  handlers: Handlers<R>
): ExecutionOutcome<R> {
  const result = dispatch(tree, argv);
  switch (result.status) {
    case 'failed':
      return { ok: false, failure: result.failure };
    case 'help':
      return { ok: true, value: handlers.help(result.scope, tree) };
    case 'command': {
      if (!Object.hasOwn(handlers.commands, result.path)) {
        return {
          ok: false,
          failure: {
            kind: 'missingHandler',
            path: [...tree.commands[result.command].segments],
          },
        };
      }
      return { ok: true, value: handlers.commands[result.path](result.params) };
    }
  }
}

function where(path: string[]): string {
  return path.length > 0 ? ` (in ${path.join(' ')})` : '';
}

/**
 * Caller-facing message for a failure.
 */
export function formatFailure(failure: RuntimeFailure): string {
  switch (failure.kind) {
    case 'unknownCommand':
      return `unknown command: ${[...failure.path, failure.token].join(' ')}`;
    case 'ambiguousCommand':
      return `ambiguous command: ${failure.token} (candidates: ${failure.candidates.join(', ')})`;
    case 'unknownFlag':
      return `unknown flag: ${failure.token}${where(failure.path)}`;
    case 'missingFlagValue':
      return `flag --${failure.flag} requires a value${where(failure.path)}`;
    case 'missingArgument':
      return `argument ${failure.argument} is missing${where(failure.path)}`;
    case 'surplusArgument':
      return `unexpected argument: ${failure.token}${where(failure.path)}`;
    case 'missingHandler':
      return `no handler registered for command: ${failure.path.join('/')}`;
  }
}
