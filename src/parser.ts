// src/parser.ts - CDL statement parser
import { Lexer } from './lexer';
import {
  AttributeValue,
  CommandDecl,
  CompileError,
  DeclarationTree,
  Token,
} from './types';

export interface ParseResult {
  tree: DeclarationTree | null;
  errors: CompileError[];
}

/**
 * Thrown inside the parser to unwind to `parse()` at the first failure.
 */
class ParseHalt extends Error {
  constructor(readonly error: CompileError) {
    super(error.message);
    this.name = 'ParseHalt';
  }
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case 'identifier':
    case 'string':
    case 'number':
      return `${token.kind} "${token.value}"`;
    case 'equals':
      return "'='";
    case 'eof':
      return 'end of input';
    case 'error':
      return token.value;
  }
}

class Parser {
  private readonly lexer: Lexer;
  private token: Token;
  private readonly tree: DeclarationTree = {
    globalFlags: [],
    globalAttributes: new Map(),
    commands: [],
    roots: [],
    topics: [],
  };
  // Attachment context, as arena / topic indices
  private currentCommand: number | null = null;
  private currentTopic: number | null = null;

  constructor(source: string) {
    this.lexer = new Lexer(source);
    this.token = this.lexer.next();
  }

  parse(): ParseResult {
    try {
      this.checkLexical();
      while (this.token.kind !== 'eof') {
        this.parseStatement();
        this.checkLexical();
      }
    } catch (e) {
      if (e instanceof ParseHalt) {
        return { tree: null, errors: [e.error] };
      }
      throw e;
    }
    return { tree: this.tree, errors: [] };
  }

  private parseStatement() {
    if (this.token.kind !== 'identifier') {
      this.fail(`expected keyword, got ${describeToken(this.token)}`);
    }
    const keyword = this.token.value;
    switch (keyword) {
      case 'global':
        this.currentCommand = null;
        this.currentTopic = null;
        this.advance();
        return;
      case 'cmd':
        return this.parseCommand();
      case 'flag':
        return this.parseFlag();
      case 'arg':
        return this.parseArg();
      case 'attr':
      case 'param':
        return this.parseAttribute();
      case 'name':
        return this.parseName();
      case 'example':
        return this.parseExample();
      case 'topic':
        return this.parseTopic();
      case 'text':
        return this.parseText();
      default:
        this.fail(`unknown keyword "${keyword}"`);
    }
  }

  private parseCommand() {
    const line = this.token.line;
    this.advance(); // skip 'cmd'
    const path: string[] = [];
    while (this.token.kind === 'identifier' && !this.onLaterLine(line)) {
      path.push(this.token.value);
      this.advance();
    }
    if (path.length === 0) {
      this.fail(
        `expected command name or path, got ${describeToken(this.token)}`
      );
    }
    let description: string | undefined;
    if (this.token.kind === 'string') {
      description = this.token.value;
      this.advance();
    }

    let parent: number | null = null;
    let current: CommandDecl | undefined;
    for (const name of path) {
      const siblings: number[] =
        parent === null ? this.tree.roots : this.tree.commands[parent].children;
      current = siblings
        .map((id) => this.tree.commands[id])
        .find((c) => c.name === name);
      if (!current) {
        current = {
          id: this.tree.commands.length,
          name,
          description: '',
          flags: [],
          args: [],
          examples: [],
          attributes: new Map(),
          children: [],
          parent,
          line,
        };
        this.tree.commands.push(current);
        siblings.push(current.id);
      }
      parent = current.id;
    }
    if (current && description !== undefined) {
      current.description = description;
    }
    this.currentCommand = parent;
  }

  private parseFlag() {
    const line = this.token.line;
    this.advance(); // skip 'flag'
    const name = this.expect('identifier', 'flag name');
    const kind = this.expect('identifier', 'flag type');
    const description = this.expect('string', 'flag description');
    let short: string | undefined;
    if (this.token.kind === 'identifier' && !this.onLaterLine(line)) {
      short = this.token.value;
      this.advance();
    }
    const flag = { name, kind, description, line, ...(short ? { short } : {}) };
    if (this.currentCommand === null) {
      this.tree.globalFlags.push(flag);
    } else {
      this.tree.commands[this.currentCommand].flags.push(flag);
    }
  }

  private parseArg() {
    const command = this.requireCommand('arg');
    this.advance(); // skip 'arg'
    const name = this.expect('identifier', 'arg name');
    const kind = this.expect('identifier', 'arg type');
    const description = this.expect('string', 'arg description');
    command.args.push({ name, kind, description });
  }

  private parseAttribute() {
    this.advance(); // skip 'attr'
    const name = this.expect('identifier', 'attribute name');
    this.expect('equals', "'=' after attribute name");
    const line = this.token.line;
    let value: AttributeValue;
    if (this.token.kind === 'string') {
      value = { kind: 'string', value: this.token.value };
    } else if (
      this.token.kind === 'identifier' &&
      (this.token.value === 'true' || this.token.value === 'false')
    ) {
      value = { kind: 'bool', value: this.token.value === 'true' };
    } else if (this.token.kind === 'number') {
      const parsed = Number(this.token.value);
      if (!Number.isSafeInteger(parsed)) {
        this.fail(`invalid number "${this.token.value}"`);
      }
      value = { kind: 'int', value: parsed };
    } else {
      this.fail(
        `expected bool, string or int attribute value, got ${describeToken(this.token)}`
      );
    }
    this.advance();
    const target =
      this.currentCommand === null
        ? this.tree.globalAttributes
        : this.tree.commands[this.currentCommand].attributes;
    target.set(name, { value, line });
  }

  private parseName() {
    if (this.currentCommand !== null) {
      this.fail("'name' must be under 'global'");
    }
    if (this.tree.app) {
      this.fail('app name already set');
    }
    this.advance(); // skip 'name'
    const name = this.expect('string', 'app name string');
    const tagline = this.expect('string', 'tagline string');
    this.tree.app = { name, tagline };
  }

  private parseExample() {
    const command = this.requireCommand('example');
    this.advance(); // skip 'example'
    command.examples.push(this.expect('string', 'example string'));
  }

  private parseTopic() {
    this.advance(); // skip 'topic'
    const name = this.expect('identifier', 'topic name');
    const description = this.expect('string', 'topic description');
    this.tree.topics.push({ name, description });
    this.currentTopic = this.tree.topics.length - 1;
  }

  private parseText() {
    if (this.currentTopic === null) {
      this.fail("'text' must follow a 'topic'");
    }
    const topic = this.tree.topics[this.currentTopic];
    this.advance(); // skip 'text'
    topic.text = this.expect('string', 'text string');
  }

  /**
   * Path segments and short aliases share their statement's line; an
   * identifier on a later line starts the next statement.
   */
  private onLaterLine(statementLine: number): boolean {
    return this.token.line !== statementLine;
  }

  private requireCommand(keyword: string): CommandDecl {
    if (this.currentCommand === null) {
      this.fail(`'${keyword}' must follow a 'cmd'`);
    }
    return this.tree.commands[this.currentCommand];
  }

  private expect(kind: Token['kind'], what: string): string {
    this.checkLexical();
    if (this.token.kind !== kind) {
      this.fail(`expected ${what}, got ${describeToken(this.token)}`);
    }
    const value = this.token.value;
    this.advance();
    return value;
  }

  private advance() {
    this.token = this.lexer.next();
  }

  private checkLexical() {
    if (this.token.kind === 'error') {
      throw new ParseHalt({
        type: 'lexical',
        message: this.token.value,
        line: this.token.line,
      });
    }
  }

  private fail(message: string): never {
    this.checkLexical();
    throw new ParseHalt({ type: 'syntax', message, line: this.token.line });
  }
}

export function parse(source: string): ParseResult {
  return new Parser(source).parse();
}
