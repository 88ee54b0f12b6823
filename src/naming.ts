// src/naming.ts - Identifier helpers shared by the resolver and emitter

const SEPARATORS = /[-_.:]/;

export function splitIdentifier(name: string): string[] {
  return name.split(SEPARATORS).filter((part) => part !== '');
}

/**
 * 'add-key' -> 'AddKey'. Falls back to 'X' when nothing is left, and prefixes
 * 'X' when the result would start with a digit.
 */
export function fieldName(name: string): string {
  const out = splitIdentifier(name)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join('');
  if (out === '') return 'X';
  if (/^[0-9]/.test(out)) return `X${out}`;
  return out;
}

/**
 * Canonical identifier for a command path: 'user/add-key' -> 'UserAddKey'.
 */
export function identifierForPath(segments: readonly string[]): string {
  return segments.map(fieldName).join('');
}

export function isValidIdentifier(name: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name);
}
