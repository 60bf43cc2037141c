/**
 * Checkpoint Store
 * Durable record of work-unit completion, position, stats and the content ledger
 */

import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname } from "node:path";
import { CheckpointFileSchema } from "../types";
import type {
  CheckpointFile,
  CheckpointProgress,
  CheckpointStatus,
  DiscardedSession,
  HarvestStats,
  SessionInfo,
  WorkUnit,
} from "../types";
import { ContentLedger } from "./content-ledger";
import type { Logger } from "./logger";

export interface CheckpointStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

function unitKey(unit: WorkUnit): string {
  return `${unit.queryIndex}:${unit.filterIndex}`;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function emptyStats(): HarvestStats {
  return { imagesSaved: 0, duplicatesSkipped: 0, errors: 0 };
}

export class CheckpointStore {
  private status: CheckpointStatus = "in_progress";
  private startedAt: string;
  private updatedAt: string | null = null;
  private queriesFile: string | null = null;
  private totalQueries = 0;
  private totalCombinations = 0;
  private position: WorkUnit = { queryIndex: 0, filterIndex: 0 };
  private completed = new Map<string, WorkUnit>();
  private stats: HarvestStats = emptyStats();
  private contentLedger = new ContentLedger();
  private discarded: DiscardedSession | null = null;
  private restored = false;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(
    readonly path: string,
    options: CheckpointStoreOptions = {},
  ) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.timestamp();
  }

  // ============================================================================
  // Persistence
  // ============================================================================

  /**
   * Restore a previous unfinished session
   *
   * @returns True when an in-progress checkpoint was restored. A missing,
   * unreadable or completed checkpoint starts a fresh session instead.
   */
  async load(): Promise<boolean> {
    let data: CheckpointFile;
    try {
      const content = await readFile(this.path, "utf-8");
      data = CheckpointFileSchema.parse(JSON.parse(content));
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      const details = error instanceof Error ? error.message : String(error);
      this.logger?.warn(
        `Ignoring unreadable checkpoint ${this.path}: ${details}`,
      );
      return false;
    }

    if (data.status === "completed") {
      this.discarded = {
        updatedAt: data.updated_at,
        imagesSaved: data.stats.images_saved,
      };
      return false;
    }

    this.restore(data);
    return true;
  }

  /**
   * Write the full state to disk via a temp file and rename
   */
  async save(): Promise<void> {
    this.updatedAt = this.timestamp();
    const tempPath = `${this.path}.tmp`;

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tempPath, JSON.stringify(this.serialize(), null, 2), "utf-8");
    await rename(tempPath, this.path);
  }

  /**
   * Remove the checkpoint file (fresh start)
   */
  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    await rm(`${this.path}.tmp`, { force: true });
  }

  serialize(): CheckpointFile {
    const completed = [...this.completed.values()].sort(
      (a, b) => a.queryIndex - b.queryIndex || a.filterIndex - b.filterIndex,
    );
    const ledger = this.contentLedger.serialize();

    return {
      status: this.status,
      started_at: this.startedAt,
      updated_at: this.updatedAt,
      queries_file: this.queriesFile,
      total_queries: this.totalQueries,
      total_combinations: this.totalCombinations,
      current_position: {
        query_index: this.position.queryIndex,
        filter_index: this.position.filterIndex,
      },
      completed: completed.map((unit) => ({
        query_index: unit.queryIndex,
        filter_index: unit.filterIndex,
      })),
      stats: {
        images_saved: this.stats.imagesSaved,
        duplicates_skipped: this.stats.duplicatesSkipped,
        errors: this.stats.errors,
      },
      seen_hashes: ledger.seenHashes,
      image_counter: ledger.imageCounter,
    };
  }

  private restore(data: CheckpointFile): void {
    this.restored = true;
    this.status = data.status;
    this.startedAt = data.started_at;
    this.updatedAt = data.updated_at;
    this.queriesFile = data.queries_file;
    this.totalQueries = data.total_queries;
    this.totalCombinations = data.total_combinations;
    this.position = {
      queryIndex: data.current_position.query_index,
      filterIndex: data.current_position.filter_index,
    };
    this.completed = new Map(
      data.completed.map((item) => {
        const unit = {
          queryIndex: item.query_index,
          filterIndex: item.filter_index,
        };
        return [unitKey(unit), unit];
      }),
    );
    this.stats = {
      imagesSaved: data.stats.images_saved,
      duplicatesSkipped: data.stats.duplicates_skipped,
      errors: data.stats.errors,
    };
    this.contentLedger = ContentLedger.fromSerialized({
      seenHashes: data.seen_hashes,
      imageCounter: data.image_counter,
    });
  }

  // ============================================================================
  // Session
  // ============================================================================

  setSessionInfo(info: SessionInfo): void {
    if (
      this.restored &&
      (this.totalQueries !== info.totalQueries ||
        this.totalCombinations !== info.totalCombinations)
    ) {
      this.logger?.warn(
        `Checkpoint was created for ${this.totalQueries} queries / ${this.totalCombinations} combinations, ` +
          `current run has ${info.totalQueries} / ${info.totalCombinations}; completed units may not line up`,
      );
    }

    this.queriesFile = info.queriesFile;
    this.totalQueries = info.totalQueries;
    this.totalCombinations = info.totalCombinations;
  }

  async markSessionFinished(): Promise<void> {
    this.status = "completed";
    await this.save();
  }

  get sessionStatus(): CheckpointStatus {
    return this.status;
  }

  /**
   * The completed session discarded by the last load(), if any
   */
  get discardedSession(): DiscardedSession | null {
    return this.discarded;
  }

  // ============================================================================
  // Work units
  // ============================================================================

  updatePosition(unit: WorkUnit): void {
    this.position = { ...unit };
  }

  getPosition(): WorkUnit {
    return { ...this.position };
  }

  isUnitDone(unit: WorkUnit): boolean {
    return this.completed.has(unitKey(unit));
  }

  markUnitDone(unit: WorkUnit): void {
    this.completed.set(unitKey(unit), { ...unit });
    this.updatePosition(unit);
  }

  get completedCount(): number {
    return this.completed.size;
  }

  // ============================================================================
  // Stats and ledger
  // ============================================================================

  get ledger(): ContentLedger {
    return this.contentLedger;
  }

  recordSaved(): void {
    this.stats.imagesSaved++;
  }

  recordDuplicate(): void {
    this.stats.duplicatesSkipped++;
  }

  recordError(): void {
    this.stats.errors++;
  }

  getStats(): HarvestStats {
    return { ...this.stats };
  }

  getProgress(): CheckpointProgress {
    return {
      status: this.status,
      startedAt: this.startedAt,
      updatedAt: this.updatedAt,
      queryIndex: this.position.queryIndex,
      filterIndex: this.position.filterIndex,
      completedCount: this.completed.size,
      totalCombinations: this.totalCombinations,
      imagesSaved: this.stats.imagesSaved,
      hashesLoaded: this.contentLedger.size,
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
