/**
 * Harvester Module
 * Walks queries × filter combinations, fetching, deduplicating and saving
 * images one work unit at a time with a checkpoint after every unit
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import {
  buildImageFilename,
  computeHash,
  formatFilterDisplay,
} from "../utils";
import type {
  DownloadedImage,
  FilterCombination,
  HarvestContext,
  HarvestOutcome,
  HarvestStatus,
  SearchItem,
  WorkUnit,
} from "../types";

type ItemResult = "saved" | "duplicate" | "error" | "interrupted";
type UnitResult = "done" | "skipped" | "retry-later" | "exhausted" | "interrupted";

interface PlannedUnit {
  unit: WorkUnit;
  query: string;
  filters: FilterCombination;
  ordinal: number; // 1-based position in the run
}

/**
 * Work units in row-major order: query outer, filter combination inner
 */
function* enumerateUnits(
  queries: string[],
  filters: FilterCombination[],
): Generator<PlannedUnit> {
  let ordinal = 0;
  for (let queryIndex = 0; queryIndex < queries.length; queryIndex++) {
    for (let filterIndex = 0; filterIndex < filters.length; filterIndex++) {
      ordinal++;
      yield {
        unit: { queryIndex, filterIndex },
        query: queries[queryIndex],
        filters: filters[filterIndex],
        ordinal,
      };
    }
  }
}

/**
 * Clamp the per-unit target to 1..maxResults
 */
export function clampCount(count: number, maxResults: number): number {
  return Math.min(Math.max(1, count), maxResults);
}

// ============================================================================
// Main Harvest Function
// ============================================================================

export async function harvest(ctx: HarvestContext): Promise<HarvestOutcome> {
  const { config, queries, filters, checkpoint, rotator, logger } = ctx;
  const totalUnits = queries.length * filters.length;

  await mkdir(config.output.directory, { recursive: true });

  let status: HarvestStatus = "completed";

  for (const planned of enumerateUnits(queries, filters)) {
    if (ctx.signal?.aborted) {
      status = "interrupted";
      break;
    }

    const result = await processUnit(ctx, planned, totalUnits);

    if (result === "exhausted") {
      logger.warn("All API keys exhausted, pausing");
      status = "paused-exhausted";
      break;
    }
    if (result === "interrupted") {
      status = "interrupted";
      break;
    }
  }

  // Only units of the current grid count; a resumed checkpoint may hold others
  let completedUnits = 0;
  for (const { unit } of enumerateUnits(queries, filters)) {
    if (checkpoint.isUnitDone(unit)) completedUnits++;
  }

  // A pass that left failed units behind stays resumable so they get retried
  const pendingUnits = totalUnits - completedUnits;
  if (status === "completed" && pendingUnits === 0) {
    await checkpoint.markSessionFinished();
  } else {
    await checkpoint.save();
  }

  return {
    status,
    stats: checkpoint.getStats(),
    completedUnits,
    totalUnits,
    pendingUnits,
    position: checkpoint.getPosition(),
    credentials: rotator.status(),
  };
}

// ============================================================================
// Unit Processing
// ============================================================================

async function processUnit(
  ctx: HarvestContext,
  planned: PlannedUnit,
  totalUnits: number,
): Promise<UnitResult> {
  const { config, checkpoint, search, rotator, tracker, logger, signal } = ctx;
  const { unit, query, filters, ordinal } = planned;
  const label = formatFilterDisplay(filters);

  if (checkpoint.isUnitDone(unit)) {
    tracker.incrementSkippedUnits();
    logger.debug(`Skipping "${query}" (${label}): already completed`);
    return "skipped";
  }

  checkpoint.updatePosition(unit);
  ctx.onUnitStart?.(unit, ordinal, totalUnits);
  logger.info(
    `[${ordinal}/${totalUnits}] "${query}" (${label}) using API key #${rotator.currentOrdinal()}`,
  );

  const count = clampCount(
    config.output.count,
    config.search.maxResultsPerQuery,
  );
  const outcome = await search.fetchResults(query, filters, count, signal);

  if (signal?.aborted) {
    return "interrupted";
  }

  if (outcome.kind === "all-credentials-exhausted") {
    return "exhausted";
  }

  if (outcome.kind === "transient-error") {
    checkpoint.recordError();
    tracker.trackSearchError(`${query} (${label})`, outcome.error);
    logger.warn(`Search failed for "${query}" (${label}), will retry on next run`);
    await checkpoint.save();
    return "retry-later";
  }

  if (outcome.items.length === 0) {
    logger.info(`No images found for "${query}" (${label})`);
    tracker.trackNoResults({ ...unit, query, filters: label });
  } else {
    logger.debug(`Found ${outcome.items.length} image(s)`);
    for (const item of outcome.items) {
      if (signal?.aborted) {
        return "interrupted";
      }
      const result = await saveItem(ctx, item);
      if (result === "interrupted") {
        return "interrupted";
      }
    }
  }

  checkpoint.markUnitDone(unit);
  tracker.incrementProcessedUnits();
  await checkpoint.save();
  return "done";
}

// ============================================================================
// Item Processing
// ============================================================================

async function saveItem(
  ctx: HarvestContext,
  item: SearchItem,
): Promise<ItemResult> {
  const { config, checkpoint, images, tracker, signal } = ctx;
  const ledger = checkpoint.ledger;

  if (!item.url) {
    checkpoint.recordError();
    tracker.trackMissingUrl(item.sourcePageUrl || item.title);
    return "error";
  }

  let downloaded: DownloadedImage;
  try {
    downloaded = await images.downloadBytes(item.url, signal);
  } catch (error) {
    if (signal?.aborted) {
      return "interrupted";
    }
    checkpoint.recordError();
    tracker.trackImageError(item.url, error);
    return "error";
  }

  const hash = computeHash(downloaded.bytes);
  if (ledger.isDuplicate(hash)) {
    checkpoint.recordDuplicate();
    return "duplicate";
  }

  // The sequence number is spent even if the write fails
  const sequence = ledger.nextSequenceNumber();
  const filename = buildImageFilename(
    config.output.prefix,
    sequence,
    item.url,
    downloaded.contentType,
  );

  try {
    await writeFile(join(config.output.directory, filename), downloaded.bytes);
  } catch (error) {
    checkpoint.recordError();
    tracker.trackImageError(item.url, error, "write");
    return "error";
  }

  ledger.accept(hash);
  checkpoint.recordSaved();
  return "saved";
}
