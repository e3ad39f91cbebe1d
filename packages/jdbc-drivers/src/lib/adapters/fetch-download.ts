import { writeFile } from "fs/promises";
import nodeFetch from "node-fetch";
import type { DownloadMethod, DownloadService } from "../ports/download.js";

/** The part of a fetch response a download needs; global fetch and node-fetch both satisfy it */
export interface DownloadResponse {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string) => Promise<DownloadResponse>;

/**
 * Create a download service on top of a fetch implementation.
 */
export function createFetchDownloadService(fetchImpl: FetchLike): DownloadService {
  return {
    async download(url: string, outputPath: string): Promise<void> {
      const response = await fetchImpl(url);

      if (!response.ok) {
        throw new Error(`Failed to download ${url}: ${response.status} ${response.statusText}`);
      }

      await writeFile(outputPath, Buffer.from(await response.arrayBuffer()));
    },
  };
}

const globalFetch: FetchLike | undefined =
  typeof globalThis.fetch === "function" ? (url) => globalThis.fetch(url) : undefined;

const nodeFetchImpl: FetchLike = (url) => nodeFetch(url);

/**
 * Download service for the requested transport.
 */
export function createDownloadService(method: DownloadMethod = "auto"): DownloadService {
  switch (method) {
    case "fetch":
      if (!globalFetch) {
        throw new Error("This Node.js runtime has no global fetch; use the node-fetch method");
      }
      return createFetchDownloadService(globalFetch);
    case "node-fetch":
      return createFetchDownloadService(nodeFetchImpl);
    case "auto":
      return createFetchDownloadService(globalFetch ?? nodeFetchImpl);
  }
}
