/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /** Download a file from URL to local path, replacing any existing file */
  download(url: string, outputPath: string): Promise<void>;
}

/** Transport used for downloads; `auto` picks global fetch when the runtime has it */
export type DownloadMethod = "auto" | "fetch" | "node-fetch";

export const DOWNLOAD_METHODS = ["auto", "fetch", "node-fetch"] as const satisfies readonly DownloadMethod[];
