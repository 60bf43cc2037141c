/**
 * Harvest context - flows through the entire pipeline
 * Each module reads what it needs from it
 */

import type { HarvestConfig } from "./config";
import type { HarvestStats } from "./checkpoint";
import type {
  FilterCombination,
  ImageTransport,
  RotatorStatus,
  WorkUnit,
} from "./search";
import type { Tracker } from "../utils/tracker";
import type { CheckpointStore } from "../utils/checkpoint-store";
import type { CredentialRotator } from "../utils/credential-rotator";
import type { SearchDriver } from "../utils/search-driver";
import type { Logger } from "../utils/logger";

// ============================================================================
// Issues
// ============================================================================

// Type-safe reasons for each issue type
export type SearchIssueReason = "request-failed" | "invalid-response" | "timeout";
export type ImageIssueReason =
  | "download-failed"
  | "timeout"
  | "invalid-response"
  | "write-error"
  | "missing-url";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface SearchIssue {
  type: "search";
  path: string;
  reason: SearchIssueReason;
  details?: string;
}

export interface ImageIssue {
  type: "image";
  path: string;
  reason: ImageIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = SearchIssue | ImageIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface NoResultEntry extends WorkUnit {
  query: string;
  filters: string;
}

export interface SessionSummary {
  processedUnits: number;
  skippedUnits: number;
  noResultUnits: number;
  issues: number;
  duration: number;
}

// ============================================================================
// Pipeline
// ============================================================================

export interface HarvestContext {
  config: HarvestConfig;

  // Ordered inputs; together they define the work units
  queries: string[];
  filters: FilterCombination[];

  checkpoint: CheckpointStore;
  rotator: CredentialRotator;
  search: SearchDriver;
  images: ImageTransport;

  // Unified tracking for issues and no-result units
  tracker: Tracker;
  logger: Logger;

  // Cooperative cancellation (SIGINT/SIGTERM)
  signal?: AbortSignal;
  onUnitStart?: (unit: WorkUnit, index: number, total: number) => void;
}

export type HarvestStatus = "completed" | "paused-exhausted" | "interrupted";

export interface HarvestOutcome {
  status: HarvestStatus;
  stats: HarvestStats;
  completedUnits: number;
  totalUnits: number;
  // Units left for a later run (transient search failures)
  pendingUnits: number;
  position: WorkUnit;
  credentials: RotatorStatus;
}
