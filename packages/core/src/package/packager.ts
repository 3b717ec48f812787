import fs from 'fs';
import { createHash } from 'crypto';
import path from 'path';
import archiver from 'archiver';
import { ensureDir } from 'fs-extra';
import { PackagingError } from '@tagship/shared';
import { BuiltBinary } from '../build/executor';
import { artifactName } from './naming';

export interface PackagedArtifact {
  name: string;
  path: string;
  sha256: string;
  sizeBytes: number;
  triple: string;
}

/** Pinned so the archive bytes depend only on the binary. */
const ENTRY_DATE = new Date(0);
const ENTRY_MODE = 0o755;

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export class ArtifactPackager {
  constructor(
    private readonly tool: string,
    private readonly outDir: string,
  ) {}

  async pack(binary: BuiltBinary, version: string): Promise<PackagedArtifact> {
    const name = artifactName(this.tool, version, binary.target.triple);
    const dest = path.join(this.outDir, name);

    let contents: Buffer;
    try {
      contents = await fs.promises.readFile(binary.binaryPath);
    } catch (err) {
      throw new PackagingError(`Cannot read binary ${binary.binaryPath}`, {
        cause: err,
        details: { target: binary.target.triple },
      });
    }

    try {
      await ensureDir(this.outDir);
      await writeTarGz(dest, contents, binary.relativePath);
      const stat = await fs.promises.stat(dest);
      return {
        name,
        path: dest,
        sha256: await sha256File(dest),
        sizeBytes: stat.size,
        triple: binary.target.triple,
      };
    } catch (err) {
      throw new PackagingError(`Failed to write ${name}`, {
        cause: err,
        details: { target: binary.target.triple, path: dest },
      });
    }
  }
}

function writeTarGz(dest: string, contents: Buffer, entryName: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(dest);
    const archive = archiver('tar', { gzip: true, gzipOptions: { level: 9 } });

    output.on('close', () => resolve());
    output.on('error', reject);
    archive.on('warning', reject);
    archive.on('error', reject);

    archive.pipe(output);
    archive.append(contents, { name: entryName, mode: ENTRY_MODE, date: ENTRY_DATE });
    archive.finalize().catch(reject);
  });
}
