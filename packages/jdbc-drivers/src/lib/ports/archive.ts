/**
 * Abstraction for unpacking downloaded driver archives.
 */
export interface ArchiveExtractor {
  /**
   * Unpack every entry of the archive into the target directory.
   * Resolves with the absolute paths of the extracted files.
   */
  extract(archivePath: string, targetDir: string): Promise<string[]>;
}
