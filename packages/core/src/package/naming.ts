const ARCHIVE_EXTENSION = '.tar.gz';

/**
 * Deterministic archive name; also the artifact store key.
 */
export function artifactName(tool: string, version: string, triple: string): string {
  return `${tool}-v${version}-${triple}${ARCHIVE_EXTENSION}`;
}

/** Plain file name: no separators, no traversal, no leading dot. */
export function isPlainFileName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= 255 &&
    !name.startsWith('.') &&
    !/[/\\\0]/.test(name)
  );
}
