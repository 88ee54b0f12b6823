import {
  attributeKinds,
  AttributeValue,
  DispatchResult,
  flagKinds,
  HelpScope,
  Token,
} from '../src/types';

describe('Core Data Structures', () => {
  it('should list the supported kinds', () => {
    expect(attributeKinds).toEqual(['bool', 'string', 'int']);
    expect(flagKinds).toEqual(['bool', 'string']);
  });

  it('should narrow attribute values by kind', () => {
    const values: AttributeValue[] = [
      { kind: 'bool', value: true },
      { kind: 'string', value: 'x' },
      { kind: 'int', value: 7 },
    ];
    const rendered = values.map((v) => {
      switch (v.kind) {
        case 'bool':
          return v.value ? 'yes' : 'no';
        case 'string':
          return v.value.toUpperCase();
        case 'int':
          return (v.value * 2).toString();
      }
    });
    expect(rendered).toEqual(['yes', 'X', '14']);
  });

  it('should carry a line on every token', () => {
    const token: Token = { kind: 'identifier', value: 'cmd', line: 3 };
    expect(token.line).toBe(3);
  });

  it('should distinguish dispatch outcomes by status', () => {
    const scope: HelpScope = { kind: 'topic', topic: 1 };
    const results: DispatchResult[] = [
      { status: 'help', scope, globals: {} },
      {
        status: 'failed',
        failure: { kind: 'unknownCommand', token: 'x', path: [] },
      },
    ];
    expect(results.map((r) => r.status)).toEqual(['help', 'failed']);
  });
});
