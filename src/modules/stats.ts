/**
 * Stats Module
 * Displays the harvest summary, resume notices and issues
 */

import chalk from "chalk";
import type {
  CheckpointProgress,
  DiscardedSession,
  HarvestOutcome,
  HarvestStatus,
} from "../types";
import type { Tracker } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

const STATUS_TITLES: Record<HarvestStatus, string> = {
  completed: "Harvest Complete",
  "paused-exhausted": "Paused · API quota exhausted",
  interrupted: "Interrupted · progress saved",
};

// ============================================================================
// Pre-run notices
// ============================================================================

export function displayResumeInfo(progress: CheckpointProgress): void {
  console.log(sectionHeader("Resuming previous session"));
  console.log(statRow(chalk.cyan("◉"), "Last run", progress.updatedAt ?? "-"));
  console.log(
    statRow(
      chalk.cyan("◉"),
      "Position",
      `query ${progress.queryIndex + 1}, filter ${progress.filterIndex + 1}`,
    ),
  );
  console.log(
    statRow(
      chalk.cyan("◉"),
      "Units completed",
      `${progress.completedCount}/${progress.totalCombinations}`,
    ),
  );
  console.log(statRow(chalk.green("◉"), "Images saved", progress.imagesSaved));
  console.log(statRow(chalk.dim("◉"), "Hashes loaded", progress.hashesLoaded));
  console.log("");
}

export function displayPreviousCompletion(
  session: DiscardedSession,
  startingFresh = true,
): void {
  console.log(sectionHeader("Previous session completed"));
  console.log(statRow(chalk.green("✔"), "Completed", session.updatedAt ?? "-"));
  console.log(statRow(chalk.green("◉"), "Images saved", session.imagesSaved));
  if (startingFresh) {
    console.log(`\n   ${chalk.dim("Starting a fresh run...")}`);
  }
  console.log("");
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export the session report and print the final summary
 */
export async function stats(
  outcome: HarvestOutcome,
  tracker: Tracker,
  options: { outputDir: string; verbose?: boolean },
): Promise<void> {
  await tracker.exportReport(options.outputDir);

  const summary = tracker.getSummary();
  const statusIcon =
    outcome.status === "completed"
      ? outcome.stats.errors > 0 || outcome.pendingUnits > 0
        ? chalk.yellow("◆")
        : chalk.green("✔")
      : chalk.yellow("⏸");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(STATUS_TITLES[outcome.status])} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayUnitsSection(outcome, tracker);
  displayImagesSection(outcome);
  displayCredentialsSection(outcome);
  displayNoResultsSection(tracker, options.verbose);
  displayIssuesSection(tracker, options.verbose);

  if (outcome.status !== "completed") {
    console.log(
      `\n   ${chalk.dim(`Stopped at query ${outcome.position.queryIndex + 1}, filter ${outcome.position.filterIndex + 1}. Run again to continue.`)}`,
    );
  } else if (outcome.pendingUnits > 0) {
    console.log(
      `\n   ${chalk.yellow(`${outcome.pendingUnits} unit(s) failed to fetch. Run again to retry them.`)}`,
    );
  }
  console.log(`\n   ${chalk.dim(`Output: ${options.outputDir}`)}`);
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayUnitsSection(outcome: HarvestOutcome, tracker: Tracker): void {
  const summary = tracker.getSummary();
  console.log(sectionHeader("Work units"));
  console.log(`   ${progressBar(outcome.completedUnits, outcome.totalUnits)}`);
  console.log(
    statRow(
      chalk.green("◉"),
      "Completed",
      `${outcome.completedUnits}/${outcome.totalUnits}`,
      chalk.green,
    ),
  );

  if (summary.skippedUnits > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Already done", summary.skippedUnits, chalk.cyan),
    );
  }

  if (summary.noResultUnits > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "No results",
        summary.noResultUnits,
        chalk.yellow,
      ),
    );
  }
}

function displayImagesSection(outcome: HarvestOutcome): void {
  const { imagesSaved, duplicatesSkipped, errors } = outcome.stats;
  console.log(sectionHeader("Images"));
  console.log(statRow(chalk.green("◉"), "Saved", imagesSaved, chalk.green));
  console.log(
    statRow(chalk.cyan("◉"), "Duplicates", duplicatesSkipped, chalk.cyan),
  );
  if (errors > 0) {
    console.log(statRow(chalk.red("◉"), "Errors", errors, chalk.red));
  }
}

function displayCredentialsSection(outcome: HarvestOutcome): void {
  const { currentOrdinal, total, exhausted } = outcome.credentials;
  console.log(sectionHeader("API keys"));
  console.log(
    statRow(chalk.cyan("◉"), "In use", `#${currentOrdinal} of ${total}`),
  );
  if (exhausted > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Exhausted", exhausted, chalk.yellow),
    );
  }
}

function displayNoResultsSection(tracker: Tracker, verbose?: boolean): void {
  const noResults = tracker.getNoResults();
  if (noResults.length === 0) {
    return;
  }

  console.log(sectionHeader(`No results (${noResults.length})`));
  const shown = verbose ? noResults : noResults.slice(0, 5);
  for (const entry of shown) {
    console.log(`      ${chalk.dim("·")} "${entry.query}" ${chalk.dim(entry.filters)}`);
  }
  if (shown.length < noResults.length) {
    console.log(`      ${chalk.dim(`  +${noResults.length - shown.length} more`)}`);
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const searchIssues = tracker.getIssues("search");
  const imageIssues = tracker.getIssues("image");
  const resourceIssues = tracker.getIssues("resource");

  if (
    searchIssues.length === 0 &&
    imageIssues.length === 0 &&
    resourceIssues.length === 0
  ) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (searchIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Searches failed", searchIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of searchIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (imageIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Images failed",
        imageIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of imageIssues.slice(0, 5)) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      }
      if (imageIssues.length > 5) {
        console.log(`      ${chalk.dim(`  +${imageIssues.length - 5} more`)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config files failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
      }
    }
  }
}
