/**
 * Checkpoint file schema
 * Mirrors the on-disk JSON layout (snake_case) and validates it on load
 */

import { z } from "zod";

const UnitRefSchema = z.object({
  query_index: z.number().int().nonnegative(),
  filter_index: z.number().int().nonnegative(),
});

export const CheckpointStatsSchema = z.object({
  images_saved: z.number().int().nonnegative(),
  duplicates_skipped: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
});

export const CheckpointFileSchema = z.object({
  status: z.enum(["in_progress", "completed"]),
  started_at: z.string(),
  updated_at: z.string().nullable(),
  queries_file: z.string().nullable(),
  total_queries: z.number().int().nonnegative(),
  total_combinations: z.number().int().nonnegative(),
  current_position: UnitRefSchema,
  completed: z.array(UnitRefSchema),
  stats: CheckpointStatsSchema,
  seen_hashes: z.array(z.string()),
  image_counter: z.number().int().nonnegative(),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;
export type CheckpointStatus = CheckpointFile["status"];

export interface HarvestStats {
  imagesSaved: number;
  duplicatesSkipped: number;
  errors: number;
}

export interface SessionInfo {
  queriesFile: string;
  totalQueries: number;
  totalCombinations: number;
}

/**
 * Summary of a finished session that load() discarded
 */
export interface DiscardedSession {
  updatedAt: string | null;
  imagesSaved: number;
}

export interface CheckpointProgress {
  status: CheckpointStatus;
  startedAt: string;
  updatedAt: string | null;
  queryIndex: number;
  filterIndex: number;
  completedCount: number;
  totalCombinations: number;
  imagesSaved: number;
  hashesLoaded: number;
}
