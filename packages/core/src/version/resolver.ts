import { promises as fs } from 'fs';
import path from 'path';
import { execa } from 'execa';
import { z } from 'zod';
import { VersionError } from '@tagship/shared';

export type MetadataSource = 'cargo' | 'npm';

export interface ResolvedVersion {
  version: string;
  source: MetadataSource | 'explicit';
}

/** Runs a read-only command and returns its trimmed stdout. */
export type CommandOutputReader = (bin: string, args: string[], cwd: string) => Promise<string>;

const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export function isSemver(version: string): boolean {
  return SEMVER_PATTERN.test(version);
}

const PackageJsonSchema = z.object({ version: z.string() });

const readWithExeca: CommandOutputReader = async (bin, args, cwd) => {
  const { stdout } = await execa(bin, args, { cwd });
  return stdout.trim();
};

/**
 * Extracts the version from `cargo pkgid` output. Handles the
 * `path+file:///p/name#1.2.3`, `path+file:///p#name@1.2.3` and
 * `registry+...#name:1.2.3` forms.
 */
export function parseCargoPkgid(output: string): string {
  const line = output.trim();
  const hash = line.lastIndexOf('#');
  if (hash === -1) {
    throw new VersionError(`Unrecognised cargo pkgid output: ${line}`);
  }
  const fragment = line.slice(hash + 1);
  const separator = Math.max(fragment.lastIndexOf('@'), fragment.lastIndexOf(':'));
  return separator === -1 ? fragment : fragment.slice(separator + 1);
}

export interface VersionResolverOptions {
  source: MetadataSource;
  readOutput?: CommandOutputReader;
}

/**
 * Derives the release version from the project's own metadata. The tag is
 * never consulted here; see `assertTagMatchesVersion`.
 */
export class VersionResolver {
  private readonly readOutput: CommandOutputReader;

  constructor(private readonly options: VersionResolverOptions) {
    this.readOutput = options.readOutput ?? readWithExeca;
  }

  async resolve(projectRoot: string): Promise<ResolvedVersion> {
    const raw =
      this.options.source === 'cargo'
        ? await this.fromCargo(projectRoot)
        : await this.fromPackageJson(projectRoot);

    if (!isSemver(raw)) {
      throw new VersionError(`Project version "${raw}" is not a semantic version`, {
        details: { source: this.options.source, projectRoot },
      });
    }
    return { version: raw, source: this.options.source };
  }

  private async fromCargo(projectRoot: string): Promise<string> {
    let output: string;
    try {
      output = await this.readOutput('cargo', ['pkgid'], projectRoot);
    } catch (err) {
      throw new VersionError(`cargo pkgid failed in ${projectRoot}`, { cause: err });
    }
    return parseCargoPkgid(output);
  }

  private async fromPackageJson(projectRoot: string): Promise<string> {
    const file = path.join(projectRoot, 'package.json');
    let content: string;
    try {
      content = await fs.readFile(file, 'utf8');
    } catch (err) {
      throw new VersionError(`Cannot read ${file}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw new VersionError(`Invalid JSON in ${file}`, { cause: err });
    }

    const parsed = PackageJsonSchema.safeParse(json);
    if (!parsed.success) {
      throw new VersionError(`${file} has no "version" string`);
    }
    return parsed.data.version;
  }
}

/**
 * Uses an explicitly supplied version when present, otherwise resolves it.
 */
export async function resolveVersion(
  resolver: VersionResolver,
  projectRoot: string,
  explicit?: string,
): Promise<ResolvedVersion> {
  if (explicit === undefined) {
    return resolver.resolve(projectRoot);
  }
  if (!isSemver(explicit)) {
    throw new VersionError(`Version "${explicit}" is not a semantic version`);
  }
  return { version: explicit, source: 'explicit' };
}
