// src/lexer.ts - CDL Tokenizer
import { Token } from './types';

function isAlpha(char: string): boolean {
  return /[A-Za-z]/.test(char);
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierStart(char: string): boolean {
  return isAlpha(char) || char === '_' || char === '.';
}

function isIdentifierPart(char: string): boolean {
  return /[\w.:-]/.test(char);
}

/**
 * Drops leading and trailing blank lines and strips each line's leading
 * indentation from a triple-quoted string body.
 */
export function processMultiline(raw: string): string {
  const lines = raw.split('\n');
  let start = 0;
  while (start < lines.length && lines[start].trim() === '') start++;
  let end = lines.length - 1;
  while (end >= start && lines[end].trim() === '') end--;
  if (start > end) return '';
  return lines
    .slice(start, end + 1)
    .map((l) => l.replace(/^[ \t]+/, '').replace(/\r$/, ''))
    .join('\n');
}

/**
 * Forward-only token stream over one source. `reset()` rewinds to the start.
 */
export class Lexer {
  private pos = 0;
  private line = 1;

  constructor(private readonly input: string) {}

  reset(): void {
    this.pos = 0;
    this.line = 1;
  }

  next(): Token {
    this.skipWhitespaceAndComments();
    if (this.pos >= this.input.length) {
      return { kind: 'eof', value: '', line: this.line };
    }
    const char = this.input[this.pos];
    if (char === '"') {
      return this.readString();
    }
    if (char === '=') {
      this.pos++;
      return { kind: 'equals', value: '=', line: this.line };
    }
    if (isDigit(char)) {
      return this.readWhile('number', isDigit);
    }
    if (isIdentifierStart(char)) {
      return this.readWhile('identifier', isIdentifierPart);
    }
    this.pos++;
    return {
      kind: 'error',
      value: `unexpected character '${char}'`,
      line: this.line,
    };
  }

  private skipWhitespaceAndComments() {
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      if (char === '\n') {
        this.line++;
        this.pos++;
      } else if (/\s/.test(char)) {
        this.pos++;
      } else if (char === '#') {
        while (this.pos < this.input.length && this.input[this.pos] !== '\n') {
          this.pos++;
        }
      } else {
        return;
      }
    }
  }

  private readWhile(
    kind: 'identifier' | 'number',
    accept: (char: string) => boolean
  ): Token {
    const start = this.pos;
    while (this.pos < this.input.length && accept(this.input[this.pos])) {
      this.pos++;
    }
    return {
      kind,
      value: this.input.slice(start, this.pos),
      line: this.line,
    };
  }

  private readString(): Token {
    const line = this.line;
    if (this.input.startsWith('"""', this.pos)) {
      return this.readMultilineString(line);
    }
    this.pos++; // opening quote
    const start = this.pos;
    while (this.pos < this.input.length && this.input[this.pos] !== '"') {
      if (this.input[this.pos] === '\n') {
        return { kind: 'error', value: 'unterminated string', line };
      }
      this.pos++;
    }
    if (this.pos >= this.input.length) {
      return { kind: 'error', value: 'unterminated string', line };
    }
    const value = this.input.slice(start, this.pos);
    this.pos++; // closing quote
    return { kind: 'string', value, line };
  }

  private readMultilineString(line: number): Token {
    this.pos += 3;
    const end = this.input.indexOf('"""', this.pos);
    if (end === -1) {
      this.line += countNewlines(this.input.slice(this.pos));
      this.pos = this.input.length;
      return { kind: 'error', value: 'unterminated multiline string', line };
    }
    const raw = this.input.slice(this.pos, end);
    this.line += countNewlines(raw);
    this.pos = end + 3;
    return { kind: 'string', value: processMultiline(raw), line };
  }
}

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

/**
 * Collects the whole stream, ending with the 'eof' token or the first 'error'
 * token.
 */
export function lex(input: string): Token[] {
  const lexer = new Lexer(input);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.next();
    tokens.push(token);
    if (token.kind === 'eof' || token.kind === 'error') return tokens;
  }
}
