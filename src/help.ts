// src/help.ts - Help text for the root, a command, or a topic
import chalk from 'chalk';
import { Flag, HelpScope, ResolvedCommand, ResolvedTree } from './types';

export interface Theme {
  title: (text: string) => string;
  heading: (text: string) => string;
  command: (text: string) => string;
  flag: (text: string) => string;
  argument: (text: string) => string;
  dim: (text: string) => string;
  prompt: (text: string) => string;
}

function themeFrom(c: chalk.Chalk): Theme {
  return {
    title: (text) => c.cyan.bold(text),
    heading: (text) => c.bold(text),
    command: (text) => c.cyan(text),
    flag: (text) => c.cyan(text),
    argument: (text) => c.yellow(text),
    dim: (text) => c.dim(text),
    prompt: (text) => c.green(text),
  };
}

/**
 * Colours follow chalk's terminal detection.
 */
export function defaultTheme(): Theme {
  return themeFrom(chalk);
}

export function plainTheme(): Theme {
  return themeFrom(new chalk.Instance({ level: 0 }));
}

const DEFAULT_PROGRAM = 'app';

export function flagLabel(flag: Flag): string {
  const short = flag.short !== undefined ? `, -${flag.short}` : '';
  const value = flag.kind === 'string' ? ' <value>' : '';
  return `--${flag.name}${short}${value}`;
}

function table(
  rows: [string, string][],
  style: (text: string) => string,
  theme: Theme
): string[] {
  const width = Math.max(0, ...rows.map(([label]) => label.length));
  return rows.map(([label, description]) =>
    description
      ? `  ${style(label)}${' '.repeat(width - label.length + 2)}${theme.dim(description)}`
      : `  ${style(label)}`
  );
}

function section(
  lines: string[],
  title: string,
  body: string[],
  theme: Theme
): void {
  if (body.length === 0) return;
  lines.push(theme.heading(title), ...body, '');
}

function commandRows(
  tree: ResolvedTree,
  ids: readonly number[],
  depth: number
): [string, string][] {
  return ids.flatMap((id) => {
    const command = tree.commands[id];
    const row: [string, string] = [
      `${'  '.repeat(depth)}${command.name}`,
      command.description,
    ];
    return [row, ...commandRows(tree, command.children, depth + 1)];
  });
}

function finish(lines: string[]): string {
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n');
}

function renderRoot(tree: ResolvedTree, theme: Theme): string {
  const program = tree.app?.name ?? DEFAULT_PROGRAM;
  const lines: string[] = [];
  if (tree.app) {
    const tagline = tree.app.tagline ? ` - ${tree.app.tagline}` : '';
    lines.push(`${theme.title(tree.app.name)}${tagline}`, '');
  }
  section(lines, 'Usage:', [`  ${program} [flags] <command>`], theme);
  section(
    lines,
    'Global Flags:',
    table(
      tree.globalFlags.map((f) => [flagLabel(f), f.description]),
      theme.flag,
      theme
    ),
    theme
  );
  section(
    lines,
    'Commands:',
    table(commandRows(tree, tree.roots, 0), theme.command, theme),
    theme
  );
  section(
    lines,
    'Topics:',
    table(
      tree.topics.map((t) => [t.name, t.description]),
      theme.command,
      theme
    ),
    theme
  );
  lines.push(`Run '${program} <command> --help' for more details.`);
  return finish(lines);
}

export function usageLine(tree: ResolvedTree, command: ResolvedCommand): string {
  return [
    tree.app?.name ?? DEFAULT_PROGRAM,
    ...command.segments,
    ...(command.children.length > 0 ? ['<command>'] : []),
    ...(command.flags.length > 0 ? ['[flags]'] : []),
    ...command.args.map((a) => `<${a.name}>`),
  ].join(' ');
}

function renderCommand(
  tree: ResolvedTree,
  command: ResolvedCommand,
  theme: Theme
): string {
  const lines: string[] = [
    `${theme.heading('Command:')} ${theme.command(command.segments.join(' '))}`,
  ];
  if (command.description) {
    lines.push(`${theme.heading('Description:')} ${command.description}`);
  }
  lines.push('');
  section(lines, 'Usage:', [`  ${usageLine(tree, command)}`], theme);
  section(
    lines,
    'Subcommands:',
    table(
      command.children.map((id) => [
        tree.commands[id].name,
        tree.commands[id].description,
      ]),
      theme.command,
      theme
    ),
    theme
  );
  section(
    lines,
    'Arguments:',
    table(
      command.args.map((a) => [`<${a.name}>`, a.description]),
      theme.argument,
      theme
    ),
    theme
  );
  section(
    lines,
    'Flags:',
    table(
      command.flags.map((f) => [flagLabel(f), f.description]),
      theme.flag,
      theme
    ),
    theme
  );
  section(
    lines,
    'Examples:',
    command.examples.map((e) => `  ${theme.prompt('$')} ${e}`),
    theme
  );
  return finish(lines);
}

function renderTopic(tree: ResolvedTree, index: number, theme: Theme): string {
  const topic = tree.topics[index];
  const lines: string[] = [
    `${theme.heading('Topic:')} ${theme.command(topic.name)}`,
  ];
  if (topic.description) {
    lines.push(`${theme.heading('Description:')} ${topic.description}`);
  }
  if (topic.text) {
    lines.push('', topic.text);
  }
  return finish(lines);
}

export function renderHelp(
  tree: ResolvedTree,
  scope: HelpScope,
  theme: Theme = defaultTheme()
): string {
  switch (scope.kind) {
    case 'root':
      return renderRoot(tree, theme);
    case 'command':
      return renderCommand(tree, tree.commands[scope.command], theme);
    case 'topic':
      return renderTopic(tree, scope.topic, theme);
  }
}
