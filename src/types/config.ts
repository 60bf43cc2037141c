/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SearchConfigSchema = z.object({
  endpoint: z.string().url(),
  resultsPerPage: z.number().int().positive(),
  maxResultsPerQuery: z.number().int().positive(),
  timeout: z.number().int().positive(), // In milliseconds
});

export const DownloadConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
});

export const FiltersConfigSchema = z.object({
  // Values accepted by the search API's dateRestrict parameter (d30 = last 30 days, y1 = last year, ...)
  dateRestrict: z.array(z.string()).min(1),
  imgSize: z.array(z.string()).min(1),
  useDate: z.boolean(),
  useSize: z.boolean(),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  prefix: z.string().min(1),
  count: z.number().int().positive(),
});

export const QueriesConfigSchema = z.object({
  file: z.string(),
});

export const CheckpointConfigSchema = z.object({
  path: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const HarvestConfigSchema = z.object({
  search: SearchConfigSchema,
  download: DownloadConfigSchema,
  filters: FiltersConfigSchema,
  output: OutputConfigSchema,
  queries: QueriesConfigSchema,
  checkpoint: CheckpointConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialHarvestConfigSchema = HarvestConfigSchema.partial().extend({
  search: SearchConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  filters: FiltersConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  queries: QueriesConfigSchema.partial().optional(),
  checkpoint: CheckpointConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type FiltersConfig = z.infer<typeof FiltersConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type QueriesConfig = z.infer<typeof QueriesConfigSchema>;
export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type PartialHarvestConfig = z.infer<typeof PartialHarvestConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
