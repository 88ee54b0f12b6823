import {
  compile,
  execute,
  formatCompileError,
  formatFailure,
  plainTheme,
  renderHelp,
  resolveAttribute,
} from '../src/index';

describe('CDL Full Pipeline Integration', () => {
  const source = `# Deployment tool
name "deploy" "Ship builds"
flag verbose bool "Verbose output" v
attr confirm = false

cmd env "Environments"
cmd env list "List environments"
cmd env push "Push a build"
  flag force bool "Skip checks" f
  arg target string "Environment name"
  attr confirm = true
  example "deploy env push staging"

topic targets "Deployment targets"
text """
  staging
  production
  """
`;

  it('should compile, dispatch and run handlers', () => {
    const { tree, errors } = compile(source);
    expect(errors).toEqual([]);
    if (!tree) throw new Error('expected a tree');

    const calls: string[] = [];
    const handlers = {
      help: () => 'help',
      commands: {
        'env/list': () => {
          calls.push('list');
          return 'listed';
        },
        'env/push': (p: { args: Record<string, string> }) => {
          calls.push(`push ${p.args.target}`);
          return 'pushed';
        },
      },
    };

    expect(execute(tree, ['e', 'l'], handlers)).toEqual({
      ok: true,
      value: 'listed',
    });
    expect(execute(tree, ['push', '-v', 'staging'], handlers)).toEqual({
      ok: true,
      value: 'pushed',
    });
    expect(calls).toEqual(['list', 'push staging']);

    const unknown = execute(tree, ['env', 'drop'], handlers);
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) {
      expect(formatFailure(unknown.failure)).toBe('unknown command: env drop');
    }
  });

  it('should resolve attributes and render help for the same tree', () => {
    const { tree } = compile(source);
    if (!tree) throw new Error('expected a tree');
    const push = tree.commands.findIndex((c) => c.path === 'env/push');
    const list = tree.commands.findIndex((c) => c.path === 'env/list');
    expect(resolveAttribute(tree, push, 'confirm')).toEqual({
      kind: 'bool',
      value: true,
    });
    expect(resolveAttribute(tree, list, 'confirm')).toEqual({
      kind: 'bool',
      value: false,
    });
    expect(
      renderHelp(tree, { kind: 'topic', topic: 0 }, plainTheme())
    ).toBe('Topic: targets\nDescription: Deployment targets\n\nstaging\nproduction');
  });

  it('should stop at the first error and report its line', () => {
    const { tree, errors } = compile('cmd a\n  flag x bool "X"\n  arg');
    expect(tree).toBeNull();
    expect(errors.map(formatCompileError)).toEqual([
      'line 3: expected arg name, got end of input',
    ]);
  });
});
