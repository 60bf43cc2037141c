/**
 * Utility exports
 */

// Naming and hashing
export { computeHash } from "./compute-hash";
export { sanitizeFilename } from "./sanitize-filename";
export { getFileExtension, DEFAULT_EXTENSION } from "./get-file-extension";
export { buildImageFilename } from "./build-image-filename";

// Work units
export {
  generateFilterCombinations,
  formatFilterDisplay,
  resolveFilterAxes,
} from "./filter-combinations";
export type { FilterAxes, FilterFlags } from "./filter-combinations";

// Input files
export { readQueries, parseQueries } from "./read-queries";

// Network utilities
export { withTimeout } from "./with-timeout";
export {
  createCustomSearchClient,
  QUOTA_ERROR_REASONS,
} from "./custom-search-client";
export type { CustomSearchClientOptions } from "./custom-search-client";
export { createImageDownloader } from "./image-downloader";
export type { ImageDownloaderOptions } from "./image-downloader";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";
export { loadCredentials } from "./load-credentials";
export type { EnvRecord } from "./load-credentials";

// Classes
export { ContentLedger } from "./content-ledger";
export type { SerializedLedger } from "./content-ledger";
export { CredentialRotator } from "./credential-rotator";
export { SearchDriver } from "./search-driver";
export type { SearchDriverOptions } from "./search-driver";
export { CheckpointStore } from "./checkpoint-store";
export type { CheckpointStoreOptions } from "./checkpoint-store";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
