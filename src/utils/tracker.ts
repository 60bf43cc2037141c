/**
 * Harvest Tracker
 * Session-scoped issue tracking, no-result units and timing
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  SearchIssue,
  SearchIssueReason,
  ImageIssue,
  ImageIssueReason,
  ResourceIssue,
  ResourceIssueReason,
  NoResultEntry,
  SessionSummary,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return { reason: "read-error", details: describe(error) };
}

function mapSearchError(error: unknown): IssueInfo<SearchIssueReason> {
  if (isAbortError(error)) {
    return { reason: "timeout", details: describe(error) };
  }
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return { reason: "invalid-response", details: describe(error) };
  }
  if (error instanceof Error && error.message.startsWith("HTTP ")) {
    return { reason: "invalid-response", details: error.message };
  }
  return { reason: "request-failed", details: describe(error) };
}

function mapImageError(
  error: unknown,
  context: "download" | "write",
): IssueInfo<ImageIssueReason> {
  if (context === "write") {
    return { reason: "write-error", details: describe(error) };
  }
  if (isAbortError(error)) {
    return { reason: "timeout", details: describe(error) };
  }
  if (error instanceof Error && error.message.startsWith("HTTP ")) {
    return { reason: "invalid-response", details: error.message };
  }
  return { reason: "download-failed", details: describe(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private issues: Issue[] = [];
  private noResults: NoResultEntry[] = [];
  private skippedUnits = 0;
  private processedUnits = 0;
  private startTime = new Date();

  // ============================================================================
  // Counters
  // ============================================================================

  incrementSkippedUnits(): void {
    this.skippedUnits++;
  }

  incrementProcessedUnits(): void {
    this.processedUnits++;
  }

  trackNoResults(entry: NoResultEntry): void {
    this.noResults.push(entry);
  }

  getNoResults(): NoResultEntry[] {
    return [...this.noResults];
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackSearchError(path: string, error: unknown): void {
    const { reason, details } = mapSearchError(error);
    this.issues.push({ type: "search", path, reason, details });
  }

  trackImageError(
    path: string,
    error: unknown,
    context: "download" | "write" = "download",
  ): void {
    const { reason, details } = mapImageError(error, context);
    this.issues.push({ type: "image", path, reason, details });
  }

  trackMissingUrl(path: string): void {
    this.issues.push({ type: "image", path, reason: "missing-url" });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(): Issue[];
  getIssues(type: "search"): SearchIssue[];
  getIssues(type: "image"): ImageIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getSummary(): SessionSummary {
    return {
      processedUnits: this.processedUnits,
      skippedUnits: this.skippedUnits,
      noResultUnits: this.noResults.length,
      issues: this.issues.length,
      duration: new Date().getTime() - this.startTime.getTime(),
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportReport(outputDir: string): Promise<void> {
    const exported = {
      summary: this.getSummary(),
      noResults: this.noResults,
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "report.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): Record<
    IssueType,
    Record<string, Issue[]>
  > {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      search: {},
      image: {},
      resource: {},
    };

    for (const issue of this.issues) {
      const bucket = grouped[issue.type];
      (bucket[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
