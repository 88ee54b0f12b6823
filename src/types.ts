// src/types.ts - Core interfaces and types for the CDL compiler

/**
 * Token: Basic unit from lexing, with kind, value, and line.
 */
export interface Token {
  kind: 'identifier' | 'string' | 'number' | 'equals' | 'eof' | 'error';
  value: string; // For 'error' tokens, the diagnostic message
  line: number;
}

/**
 * Compile Error: Structured error details for lex/parse/resolve.
 */
export interface CompileError {
  type: 'lexical' | 'syntax' | 'semantic';
  message: string;
  line?: number;
}

/**
 * Allowed value kinds for attributes and flags.
 */
export const attributeKinds = ['bool', 'string', 'int'] as const;
export type AttributeKind = (typeof attributeKinds)[number];

export const flagKinds = ['bool', 'string'] as const;
export type FlagKind = (typeof flagKinds)[number];

/**
 * Attribute Value: exactly one of bool, string or int.
 */
export type AttributeValue =
  | { kind: 'bool'; value: boolean }
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: number };

export interface AttributeEntry {
  value: AttributeValue;
  line: number;
}

export type AttributeMap = Map<string, AttributeEntry>;

/**
 * Flag as written in the source. The kind is not checked until resolution.
 */
export interface FlagDecl {
  name: string;
  short?: string;
  kind: string;
  description: string;
  line: number;
}

export interface Flag {
  name: string;
  short?: string;
  kind: FlagKind;
  description: string;
}

/**
 * Positional argument. The kind is advisory and kept verbatim.
 */
export interface Arg {
  name: string;
  kind: string;
  description: string;
}

export interface Topic {
  name: string;
  description: string;
  text?: string;
}

export interface AppIdentity {
  name: string;
  tagline: string;
}

/**
 * Command node in the declaration arena. `parent` and `children` are arena
 * indices.
 */
export interface CommandDecl {
  id: number;
  name: string;
  description: string;
  flags: FlagDecl[];
  args: Arg[];
  examples: string[];
  attributes: AttributeMap;
  children: number[];
  parent: number | null;
  line: number;
}

/**
 * Declaration Tree: output of the parser for one source.
 */
export interface DeclarationTree {
  app?: AppIdentity;
  globalFlags: FlagDecl[];
  globalAttributes: AttributeMap;
  commands: CommandDecl[];
  roots: number[];
  topics: Topic[];
}

/**
 * Attribute table row: one per attribute name, sorted by name.
 */
export interface AttributeDef {
  name: string;
  kind: AttributeKind;
}

export interface ResolvedCommand {
  readonly id: number;
  readonly name: string;
  readonly path: string; // Segments joined by '/'
  readonly segments: readonly string[];
  readonly identifier: string; // e.g. 'UserAdd' for user/add
  readonly description: string;
  readonly flags: readonly Flag[];
  readonly args: readonly Arg[];
  readonly examples: readonly string[];
  readonly attributes: ReadonlyMap<string, AttributeValue>;
  readonly children: readonly number[];
  readonly parent: number | null;
}

/**
 * Resolved Tree: validated, enriched and read-only.
 */
export interface ResolvedTree {
  readonly app?: AppIdentity;
  readonly helpFlag: Flag;
  readonly declaredGlobalFlags: readonly Flag[];
  readonly globalFlags: readonly Flag[]; // helpFlag first
  readonly globalAttributes: ReadonlyMap<string, AttributeValue>;
  readonly commands: readonly ResolvedCommand[];
  readonly roots: readonly number[];
  readonly topics: readonly Topic[];
  readonly attributeTable: readonly AttributeDef[];
  readonly leaves: readonly number[]; // Ordered by path
}

export type FlagValue = boolean | string;

/**
 * Parameter Bundle: fully bound values handed to a leaf command's handler.
 */
export interface ParamBundle {
  flags: Record<string, FlagValue>;
  args: Record<string, string>;
  globals: Record<string, FlagValue>;
}

/**
 * Dispatch Failure: classified, terminal. `path` holds the segments resolved
 * before the failure.
 */
export type DispatchFailure =
  | { kind: 'unknownCommand'; token: string; path: string[] }
  | {
      kind: 'ambiguousCommand';
      token: string;
      candidates: string[];
      path: string[];
    }
  | { kind: 'unknownFlag'; token: string; path: string[] }
  | { kind: 'missingFlagValue'; flag: string; path: string[] }
  | { kind: 'missingArgument'; argument: string; path: string[] }
  | { kind: 'surplusArgument'; token: string; path: string[] };

export type HelpScope =
  | { kind: 'root' }
  | { kind: 'command'; command: number }
  | { kind: 'topic'; topic: number };

export type DispatchResult =
  | { status: 'command'; command: number; path: string; params: ParamBundle }
  | { status: 'help'; scope: HelpScope; globals: Record<string, FlagValue> }
  | { status: 'failed'; failure: DispatchFailure };
