export { interactivePrompts } from "./interactive-prompts.js";
export { createFetchDownloadService, createDownloadService, type FetchLike } from "./fetch-download.js";
export { createZipExtractor, zipExtractor } from "./zip-extractor.js";
export { createJarClassPathRuntime, type JarClassPathRuntime, type JarDriverHandle } from "./jar-runtime.js";
