import { describe, it, expect } from 'vitest';
import { parseCommand, formatCommand, quoteArg } from './parser';

describe('parseCommand', () => {
  it('splits a plain command line', () => {
    expect(parseCommand('cargo build --release --target x86_64-unknown-linux-musl')).toEqual({
      bin: 'cargo',
      args: ['build', '--release', '--target', 'x86_64-unknown-linux-musl'],
      env: {},
      raw: 'cargo build --release --target x86_64-unknown-linux-musl',
    });
  });

  it('keeps quoted whitespace inside one argument', () => {
    const parsed = parseCommand(`strip "target/release/my tool"`);
    expect(parsed.args).toEqual(['target/release/my tool']);
  });

  it('keeps empty quoted arguments', () => {
    expect(parseCommand(`echo '' x`).args).toEqual(['', 'x']);
  });

  it('honours backslash escapes outside single quotes', () => {
    expect(parseCommand('echo a\\ b').args).toEqual(['a b']);
  });

  it('collects leading environment assignments', () => {
    const parsed = parseCommand('DEBIAN_FRONTEND=noninteractive sudo apt-get install -y musl-tools');
    expect(parsed.env).toEqual({ DEBIAN_FRONTEND: 'noninteractive' });
    expect(parsed.bin).toBe('sudo');
    expect(parsed.args).toEqual(['apt-get', 'install', '-y', 'musl-tools']);
  });

  it('returns an empty bin when only assignments are given', () => {
    expect(parseCommand('A=1').bin).toBe('');
  });
});

describe('formatCommand', () => {
  it('leaves safe arguments bare and quotes the rest', () => {
    expect(formatCommand('strip', ['target/release/tool'])).toBe('strip target/release/tool');
    expect(quoteArg('my tool')).toBe("'my tool'");
    expect(quoteArg('')).toBe("''");
  });

  it('round-trips through parseCommand', () => {
    const line = formatCommand('tar', ['-czf', "it's here.tar.gz"]);
    expect(parseCommand(line).args).toEqual(['-czf', "it's here.tar.gz"]);
  });
});
