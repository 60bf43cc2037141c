/**
 * Search and download domain types
 * Shapes shared by the credential pool, the search driver and the transports
 */

// ============================================================================
// Work units
// ============================================================================

/**
 * Optional pair of orthogonal search facets
 * An empty object means "no filters"
 */
export interface FilterCombination {
  dateRestrict?: string;
  imgSize?: string;
}

/**
 * One (query, filter combination) pair, addressed by index into the run's
 * query list and filter-combination list
 */
export interface WorkUnit {
  queryIndex: number;
  filterIndex: number;
}

// ============================================================================
// Credentials
// ============================================================================

export interface Credential {
  key: string; // API key
  scope: string; // Search engine ID (cx)
}

export interface RotatorStatus {
  currentOrdinal: number; // 1-based
  total: number;
  exhausted: number;
  available: number;
}

// ============================================================================
// Search
// ============================================================================

export interface SearchItem {
  url: string;
  sourcePageUrl: string;
  title: string;
}

export interface SearchPageRequest {
  query: string;
  filters: FilterCombination;
  startIndex: number; // 1-based
  pageSize: number;
  credential: Credential;
  signal?: AbortSignal;
}

// Discriminated union returned by the search transport for a single page
export type SearchPageResult =
  | { status: "ok"; items: SearchItem[] }
  | { status: "quota-exceeded"; reason: string }
  | { status: "error"; error: unknown };

export interface SearchTransport {
  searchPage(request: SearchPageRequest): Promise<SearchPageResult>;
}

// What the search driver hands back for a whole work unit
export type SearchOutcome =
  | { kind: "ok"; items: SearchItem[] }
  | { kind: "all-credentials-exhausted" }
  | { kind: "transient-error"; items: SearchItem[]; error: unknown };

// ============================================================================
// Download
// ============================================================================

export interface DownloadedImage {
  bytes: Buffer;
  contentType: string;
}

/**
 * Fetches raw image bytes
 * Rejects on network failure, timeout or a non-OK response
 */
export interface ImageTransport {
  downloadBytes(url: string, signal?: AbortSignal): Promise<DownloadedImage>;
}
