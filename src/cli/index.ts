#!/usr/bin/env tsx

/**
 * CLI entry point for the image harvester
 * Handles command-line argument parsing and user interaction
 */

import { Command, InvalidArgumentError } from "commander";
import { harvestCommand } from "./commands/harvest";
import { configCommand } from "./commands/config";
import { statusCommand } from "./commands/status";

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

const program = new Command();

program
  .name("image-harvest")
  .description(
    "Search and download images with deduplication, API key rotation and resume support",
  )
  .version("0.1.0");

// Main harvest command (default action)
program
  .option("-q, --queries <path>", "Text file with one search query per line")
  .option(
    "-n, --count <number>",
    "Images to fetch per query/filter combination (max 100)",
    parseCount,
  )
  .option("-o, --output <dir>", "Output directory for images")
  .option("-p, --prefix <name>", "Prefix for image filenames")
  .option("--no-filters", "Skip all filters (base queries only)")
  .option("--date-only", "Use only date filters")
  .option("--size-only", "Use only size filters")
  .option("--fresh", "Ignore the checkpoint and start fresh")
  .option("--checkpoint <path>", "Checkpoint file location")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(harvestCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

// Status command - show checkpoint progress without running
program
  .command("status")
  .description("Show progress stored in the checkpoint file")
  .option("--checkpoint <path>", "Checkpoint file location")
  .option("-c, --config <path>", "Path to custom config file")
  .action(statusCommand);

await program.parseAsync();
