import { describe, it, expect } from 'vitest';
import { join, normalizePath, isWindows } from './path';

describe('path helpers', () => {
  it('converts backslashes to forward slashes', () => {
    expect(normalizePath('target\\x86_64-pc-windows-msvc\\release')).toBe(
      'target/x86_64-pc-windows-msvc/release',
    );
  });

  it('leaves forward-slash paths alone', () => {
    expect(normalizePath('target/release/tool')).toBe('target/release/tool');
  });

  it('joins and collapses segments', () => {
    expect(join('.tagship', 'runs', '..', 'store')).toBe('.tagship/store');
  });

  it('reports the host platform as a boolean', () => {
    expect(typeof isWindows()).toBe('boolean');
  });
});
