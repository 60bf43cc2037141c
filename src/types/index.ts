/**
 * Central type exports
 */

// Configuration
export type {
  HarvestConfig,
  PartialHarvestConfig,
  SearchConfig,
  DownloadConfig,
  FiltersConfig,
  OutputConfig,
  QueriesConfig,
  CheckpointConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  HarvestConfigSchema,
  PartialHarvestConfigSchema,
} from "./config";

// Search
export type {
  FilterCombination,
  WorkUnit,
  Credential,
  RotatorStatus,
  SearchItem,
  SearchPageRequest,
  SearchPageResult,
  SearchTransport,
  SearchOutcome,
  DownloadedImage,
  ImageTransport,
} from "./search";

// Checkpoint
export type {
  CheckpointFile,
  CheckpointStatus,
  CheckpointProgress,
  HarvestStats,
  SessionInfo,
  DiscardedSession,
} from "./checkpoint";
export { CheckpointFileSchema } from "./checkpoint";

// Context
export type {
  HarvestContext,
  HarvestStatus,
  HarvestOutcome,
  Issue,
  IssueType,
  SearchIssue,
  ImageIssue,
  ResourceIssue,
  SearchIssueReason,
  ImageIssueReason,
  ResourceIssueReason,
  NoResultEntry,
  SessionSummary,
} from "./context";
