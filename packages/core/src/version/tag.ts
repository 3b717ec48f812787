import { Logger, UsageError, VersionMismatchError } from '@tagship/shared';
import { isSemver } from './resolver';

const REF_PREFIX = 'refs/tags/';

/**
 * Returns the version part of a release tag such as `v1.2.3` or
 * `refs/tags/v1.2.3-rc.1`.
 */
export function parseReleaseTag(tag: string): string {
  const bare = tag.startsWith(REF_PREFIX) ? tag.slice(REF_PREFIX.length) : tag;
  const version = bare.startsWith('v') ? bare.slice(1) : '';
  if (!isSemver(version)) {
    throw new UsageError(`Tag "${tag}" is not a release tag of the form v<major>.<minor>.<patch>`);
  }
  return version;
}

export function releaseTagFor(version: string): string {
  return `v${version}`;
}

export function assertTagMatchesVersion(tag: string, version: string): void {
  if (parseReleaseTag(tag) !== version) {
    throw new VersionMismatchError(tag, version);
  }
}

/**
 * Compares tag and version. A mismatch throws when `requireMatch` is set
 * and is only logged otherwise; the release is named from the version either way.
 */
export async function checkTag(
  tag: string,
  version: string,
  requireMatch: boolean,
  logger: Logger,
): Promise<boolean> {
  if (requireMatch) {
    assertTagMatchesVersion(tag, version);
    return true;
  }
  if (parseReleaseTag(tag) !== version) {
    await logger.warn(
      `Tag "${tag}" does not match project version "${version}"; releasing as ${releaseTagFor(version)}`,
    );
    return false;
  }
  return true;
}
