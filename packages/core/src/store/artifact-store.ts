import { promises as fs } from 'fs';
import path from 'path';
import { ensureDir, pathExists, remove } from 'fs-extra';
import { ArtifactStoreError, atomicCopy, atomicWrite } from '@tagship/shared';
import { isPlainFileName } from '../package/naming';
import { sha256File } from '../package/packager';

export interface StoredArtifact {
  name: string;
  sha256: string;
  sizeBytes: number;
}

/**
 * Hand-off point between build jobs and the publisher. Keys are the
 * archives' own file names; every key can be written at most once.
 */
export interface ArtifactStore {
  put(name: string, sourcePath: string): Promise<StoredArtifact>;
  /** Copies the entry into `destDir` and returns the copied file's path */
  get(name: string, destDir: string): Promise<string>;
  has(name: string): Promise<boolean>;
  list(): Promise<StoredArtifact[]>;
}

const CHECKSUM_SUFFIX = '.sha256';

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Directory-backed store. Each entry is `<dir>/<name>` with a
 * `<name>.sha256` sidecar in `sha256sum` format.
 */
export class LocalArtifactStore implements ArtifactStore {
  constructor(private readonly dir: string) {}

  async put(name: string, sourcePath: string): Promise<StoredArtifact> {
    this.assertName(name);
    const target = path.join(this.dir, name);

    // An archive without its sidecar is a deposit that never finished; it is overwritten.
    if (await this.has(name)) {
      throw new ArtifactStoreError('exists', `Artifact "${name}" is already in the store`, {
        details: { name },
      });
    }

    try {
      await ensureDir(this.dir);
      const sha256 = await sha256File(sourcePath);
      await atomicCopy(sourcePath, target);
      await atomicWrite(`${target}${CHECKSUM_SUFFIX}`, `${sha256}  ${name}\n`);
      const stat = await fs.stat(target);
      return { name, sha256, sizeBytes: stat.size };
    } catch (err) {
      if (!(await this.has(name))) {
        await remove(target);
      }
      throw new ArtifactStoreError('io', `Failed to store "${name}"`, {
        cause: err,
        details: { name, sourcePath },
      });
    }
  }

  async get(name: string, destDir: string): Promise<string> {
    this.assertName(name);
    const source = path.join(this.dir, name);
    if (!(await this.has(name))) {
      throw new ArtifactStoreError('missing', `Artifact "${name}" is not in the store`, {
        details: { name },
      });
    }

    const expected = await this.readChecksum(name);
    const actual = await sha256File(source);
    if (expected !== actual) {
      throw new ArtifactStoreError('checksum', `Checksum mismatch for "${name}"`, {
        details: { name, expected, actual },
      });
    }

    const dest = path.join(destDir, name);
    await atomicCopy(source, dest);
    return dest;
  }

  async has(name: string): Promise<boolean> {
    this.assertName(name);
    const target = path.join(this.dir, name);
    // The sidecar is written last and marks a complete entry.
    return (await pathExists(target)) && (await isFile(`${target}${CHECKSUM_SUFFIX}`));
  }

  async list(): Promise<StoredArtifact[]> {
    if (!(await pathExists(this.dir))) {
      return [];
    }
    const names = (await fs.readdir(this.dir))
      .filter((file) => file.endsWith(CHECKSUM_SUFFIX))
      .map((file) => file.slice(0, -CHECKSUM_SUFFIX.length))
      .sort();

    const entries: StoredArtifact[] = [];
    for (const name of names) {
      const stat = await fs.stat(path.join(this.dir, name));
      entries.push({ name, sha256: await this.readChecksum(name), sizeBytes: stat.size });
    }
    return entries;
  }

  private async readChecksum(name: string): Promise<string> {
    const content = await fs.readFile(path.join(this.dir, `${name}${CHECKSUM_SUFFIX}`), 'utf8');
    return content.split(/\s+/)[0];
  }

  private assertName(name: string): void {
    if (!isPlainFileName(name)) {
      throw new ArtifactStoreError('invalid-name', `Invalid artifact name "${name}"`, {
        details: { name },
      });
    }
  }
}
