import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { gunzipSync } from 'zlib';
import { PackagingError } from '@tagship/shared';
import { ArtifactPackager, sha256File } from './packager';
import type { BuiltBinary } from '../build/executor';

interface TarEntry {
  name: string;
  mode: number;
  size: number;
  mtime: number;
  body: Buffer;
}

function readField(header: Buffer, start: number, length: number): string {
  return header.subarray(start, start + length).toString('utf8').replace(/\0.*$/s, '').trim();
}

function readTarEntries(archivePath: string): TarEntry[] {
  const tar = gunzipSync(fs.readFileSync(archivePath));
  const entries: TarEntry[] = [];
  let offset = 0;
  while (offset + 512 <= tar.length) {
    const header = tar.subarray(offset, offset + 512);
    const name = readField(header, 0, 100);
    if (!name) break;
    const size = parseInt(readField(header, 124, 12), 8);
    entries.push({
      name,
      mode: parseInt(readField(header, 100, 8), 8),
      size,
      mtime: parseInt(readField(header, 136, 12), 8),
      body: tar.subarray(offset + 512, offset + 512 + size),
    });
    offset += 512 + Math.ceil(size / 512) * 512;
  }
  return entries;
}

describe('ArtifactPackager', () => {
  let tmpDir: string;
  let binary: BuiltBinary;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tagship-pack-'));
    const relativePath = 'target/x86_64-unknown-linux-gnu/release/mytool';
    const binaryPath = path.join(tmpDir, 'project', relativePath);
    await fs.outputFile(binaryPath, Buffer.from('\x7fELF fake binary bytes'));
    await fs.chmod(binaryPath, 0o700);
    binary = {
      target: {
        triple: 'x86_64-unknown-linux-gnu',
        runsOn: 'ubuntu-latest',
        host: false,
        systemPackages: [],
      },
      binaryPath,
      relativePath,
    };
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('writes a single-entry tar.gz at the release path', async () => {
    const packager = new ArtifactPackager('mytool', path.join(tmpDir, 'out'));

    const artifact = await packager.pack(binary, '1.2.3');

    expect(artifact.name).toBe('mytool-v1.2.3-x86_64-unknown-linux-gnu.tar.gz');
    expect(artifact.path).toBe(path.join(tmpDir, 'out', artifact.name));
    expect(artifact.triple).toBe('x86_64-unknown-linux-gnu');

    const entries = readTarEntries(artifact.path);
    expect(entries).toHaveLength(1);
    expect(entries[0].name).toBe('target/x86_64-unknown-linux-gnu/release/mytool');
    expect(entries[0].mode).toBe(0o755);
    expect(entries[0].mtime).toBe(0);
    expect(entries[0].body.toString()).toBe('\x7fELF fake binary bytes');
  });

  it('reports the checksum and size of the archive', async () => {
    const artifact = await new ArtifactPackager('mytool', path.join(tmpDir, 'out')).pack(
      binary,
      '1.2.3',
    );

    expect(artifact.sha256).toBe(await sha256File(artifact.path));
    expect(artifact.sha256).toMatch(/^[0-9a-f]{64}$/);
    expect(artifact.sizeBytes).toBe((await fs.stat(artifact.path)).size);
  });

  it('produces identical bytes for identical binaries', async () => {
    const first = await new ArtifactPackager('mytool', path.join(tmpDir, 'a')).pack(binary, '1.2.3');
    await fs.utimes(binary.binaryPath, new Date(), new Date());
    const second = await new ArtifactPackager('mytool', path.join(tmpDir, 'b')).pack(binary, '1.2.3');

    expect(second.sha256).toBe(first.sha256);
  });

  it('raises PackagingError when the binary is missing', async () => {
    await fs.remove(binary.binaryPath);
    const packager = new ArtifactPackager('mytool', path.join(tmpDir, 'out'));

    await expect(packager.pack(binary, '1.2.3')).rejects.toThrow(PackagingError);
  });
});
