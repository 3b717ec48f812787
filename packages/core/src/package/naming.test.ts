import { describe, it, expect } from 'vitest';
import { artifactName, isPlainFileName } from './naming';

describe('artifactName', () => {
  it('combines tool, version and triple', () => {
    expect(artifactName('mytool', '1.2.3', 'x86_64-unknown-linux-musl')).toBe(
      'mytool-v1.2.3-x86_64-unknown-linux-musl.tar.gz',
    );
  });

  it('differs per target so stores never collide', () => {
    expect(artifactName('t', '1.0.0', 'a-b-c')).not.toBe(artifactName('t', '1.0.0', 'a-b-d'));
  });
});

describe('isPlainFileName', () => {
  it('accepts archive names', () => {
    expect(isPlainFileName('mytool-v1.2.3-x86_64-apple-darwin.tar.gz')).toBe(true);
  });

  it.each(['', '../escape.tar.gz', 'dir/file', 'dir\\file', '.hidden'])('rejects %j', (name) => {
    expect(isPlainFileName(name)).toBe(false);
  });
});
