export type { DownloadService, DownloadMethod } from "./download.js";
export { DOWNLOAD_METHODS } from "./download.js";
export type { PromptService } from "./prompt.js";
export type { ArchiveExtractor } from "./archive.js";
export type { DriverRuntime } from "./driver-runtime.js";
