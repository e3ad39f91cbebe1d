import AdmZip from "adm-zip";
import { resolve } from "path";
import type { ArchiveExtractor } from "../ports/archive.js";

/**
 * Zip extractor backed by adm-zip. Existing files with the same name are overwritten.
 */
export function createZipExtractor(): ArchiveExtractor {
  return {
    async extract(archivePath: string, targetDir: string): Promise<string[]> {
      const zip = new AdmZip(archivePath);
      const files = zip
        .getEntries()
        .filter((entry) => !entry.isDirectory)
        .map((entry) => resolve(targetDir, entry.entryName));

      zip.extractAllTo(targetDir, true);
      return files;
    },
  };
}

export const zipExtractor = createZipExtractor();
