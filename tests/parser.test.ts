import { parse } from '../src/parser';
import { DeclarationTree } from '../src/types';

function parseOk(input: string): DeclarationTree {
  const { tree, errors } = parse(input);
  expect(errors).toHaveLength(0);
  if (!tree) throw new Error('expected a tree');
  return tree;
}

describe('CDL Parser', () => {
  it('should parse commands with flags, args and examples', () => {
    const tree = parseOk(`cmd user "User management"
cmd user add "Add a user"
  flag force bool "Force it" f
  arg name string "User name"
  example "user add alice"`);
    expect(tree.roots).toEqual([0]);
    expect(tree.commands[0]).toMatchObject({
      name: 'user',
      description: 'User management',
      children: [1],
      parent: null,
    });
    expect(tree.commands[1]).toMatchObject({
      name: 'add',
      description: 'Add a user',
      parent: 0,
      examples: ['user add alice'],
    });
    expect(tree.commands[1].flags).toEqual([
      { name: 'force', kind: 'bool', description: 'Force it', short: 'f', line: 3 },
    ]);
    expect(tree.commands[1].args).toEqual([
      { name: 'name', kind: 'string', description: 'User name' },
    ]);
  });

  it('should reuse existing nodes and describe only the last segment', () => {
    const tree = parseOk(`cmd project init "Init"
cmd project "Projects"
cmd project init`);
    expect(tree.commands).toHaveLength(2);
    expect(tree.commands[0].description).toBe('Projects');
    expect(tree.commands[1].description).toBe('Init');
    expect(tree.commands[0].children).toEqual([1]);
  });

  it('should attach flags to global scope until the next cmd', () => {
    const tree = parseOk(`flag verbose bool "Verbose" v
cmd a
flag x string "X"
global
flag config string "Config"`);
    expect(tree.globalFlags.map((f) => f.name)).toEqual(['verbose', 'config']);
    expect(tree.globalFlags[0].short).toBe('v');
    expect(tree.commands[0].flags).toHaveLength(1);
    expect(tree.commands[0].flags[0].short).toBeUndefined();
  });

  it('should not take a keyword on the next line as a short alias', () => {
    const tree = parseOk('cmd a\nflag one bool "One"\nflag two bool "Two"');
    expect(tree.commands[0].flags.map((f) => [f.name, f.short])).toEqual([
      ['one', undefined],
      ['two', undefined],
    ]);
  });

  it('should keep the flag kind as written', () => {
    const tree = parseOk('flag count int "Count"');
    expect(tree.globalFlags[0].kind).toBe('int');
  });

  it('should parse typed attributes globally and per command', () => {
    const tree = parseOk(`attr safe = false
attr label = "x"
cmd a
attr safe = true
param retries = 3`);
    expect(tree.globalAttributes.get('safe')).toEqual({
      value: { kind: 'bool', value: false },
      line: 1,
    });
    expect(tree.globalAttributes.get('label')?.value).toEqual({
      kind: 'string',
      value: 'x',
    });
    expect(tree.commands[0].attributes.get('safe')).toEqual({
      value: { kind: 'bool', value: true },
      line: 4,
    });
    expect(tree.commands[0].attributes.get('retries')).toEqual({
      value: { kind: 'int', value: 3 },
      line: 5,
    });
  });

  it('should let the last attribute write win', () => {
    const tree = parseOk('cmd a\nattr n = 1\nattr n = 2');
    expect(tree.commands[0].attributes.get('n')).toEqual({
      value: { kind: 'int', value: 2 },
      line: 3,
    });
  });

  it('should set the app identity', () => {
    const tree = parseOk('name "tool" "Does things"');
    expect(tree.app).toEqual({ name: 'tool', tagline: 'Does things' });
  });

  it('should parse topics independently of the current command', () => {
    const tree = parseOk(`topic config "Configuration"
text """
  Set things.
  """
cmd a
text "Replaced"
topic env "Environment"`);
    expect(tree.topics).toEqual([
      { name: 'config', description: 'Configuration', text: 'Replaced' },
      { name: 'env', description: 'Environment' },
    ]);
  });

  it('should reproduce the same tree when parsed twice', () => {
    const input = `flag verbose bool "Verbose" v
attr safe = false
cmd user add "Add"
  arg name string "Name"
topic t "T"`;
    expect(parse(input)).toEqual(parse(input));
  });

  it.each([
    ['cmd a\nname "x" "y"', "'name' must be under 'global'", 2],
    ['name "a" "b"\nname "c" "d"', 'app name already set', 2],
    ['arg x string "d"', "'arg' must follow a 'cmd'", 1],
    ['example "x"', "'example' must follow a 'cmd'", 1],
    ['text "x"', "'text' must follow a 'topic'", 1],
    ['topic t "T"\nglobal\ntext "x"', "'text' must follow a 'topic'", 3],
    ['bogus a', 'unknown keyword "bogus"', 1],
    ['"stray"', 'expected keyword, got string "stray"', 1],
    ['cmd "desc"', 'expected command name or path, got string "desc"', 1],
    ['cmd a\nflag v bool', 'expected flag description, got end of input', 2],
    [
      'attr x = maybe',
      'expected bool, string or int attribute value, got identifier "maybe"',
      1,
    ],
    ['attr x 3', "expected '=' after attribute name, got number \"3\"", 1],
  ])('should reject %j', (input, message, line) => {
    const { tree, errors } = parse(input);
    expect(tree).toBeNull();
    expect(errors).toEqual([{ type: 'syntax', message, line }]);
  });

  it('should surface lexical faults with their line', () => {
    const { tree, errors } = parse('cmd a\nflag v bool "oops');
    expect(tree).toBeNull();
    expect(errors).toEqual([
      { type: 'lexical', message: 'unterminated string', line: 2 },
    ]);
  });
});
