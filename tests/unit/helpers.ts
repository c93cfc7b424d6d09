import { readFileSync } from 'node:fs';

export function readFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}

/** Wraps statements in a rule block. */
export function ruleBlock(...statements: string[]): string {
  return ['allowed contains x if {', ...statements.map((s) => `    ${s}`), '}', ''].join('\n');
}
