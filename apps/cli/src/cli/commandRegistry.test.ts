import { describe, expect, it } from 'vitest';
import { readFlag } from './args';
import { commandRegistry } from './commandRegistry';

describe('readFlag', () => {
  it('reads separated and inline values', () => {
    expect(readFlag(['--email', 'user@example.com'], 'email')).toBe('user@example.com');
    expect(readFlag(['--name=desk-1'], 'name')).toBe('desk-1');
    expect(readFlag(['--names', 'x'], 'name')).toBeUndefined();
    expect(readFlag(['--email'], 'email')).toBeUndefined();
  });
});

describe('commandRegistry', () => {
  it('exposes the user-facing commands', () => {
    expect(Object.keys(commandRegistry).sort()).toEqual(['login', 'logout', 'start', 'status']);
  });
});
