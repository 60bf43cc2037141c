/**
 * Harvest command - Loads config, credentials and queries, then runs the
 * resumable harvest pipeline
 */

import "dotenv/config";
import ora from "ora";
import { z } from "zod";
import {
  CheckpointStore,
  CredentialRotator,
  Logger,
  SearchDriver,
  Tracker,
  createCustomSearchClient,
  createImageDownloader,
  formatFilterDisplay,
  generateFilterCombinations,
  loadConfig,
  loadCredentials,
  readQueries,
  resolveFilterAxes,
} from "../../utils";
import * as modules from "../../modules";
import type { HarvestContext } from "../../types";

const HarvestOptionsSchema = z.object({
  queries: z.string().optional(),
  count: z.number().int().optional(),
  output: z.string().optional(),
  prefix: z.string().min(1).optional(),
  filters: z.boolean().optional(),
  dateOnly: z.boolean().optional(),
  sizeOnly: z.boolean().optional(),
  fresh: z.boolean().optional(),
  checkpoint: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof HarvestOptionsSchema>;

// Conventional exit status for a run stopped by Ctrl+C
const EXIT_INTERRUPTED = 130;

export async function harvestCommand(opts: Options): Promise<void> {
  const options = HarvestOptionsSchema.parse(opts);
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !options.verbose,
  }).start();

  function fail(message: string): never {
    spinner.fail(message);
    process.exit(1);
  }

  // Load configuration (default → user → custom)
  const { config, errors } = await loadConfig(options.config);

  // Override with CLI options
  if (options.queries) config.queries.file = options.queries;
  if (options.count !== undefined) config.output.count = options.count;
  if (options.output) config.output.directory = options.output;
  if (options.prefix) config.output.prefix = options.prefix;
  if (options.checkpoint) config.checkpoint.path = options.checkpoint;

  const logger = new Logger(options.verbose ? "debug" : config.logging.level);
  const tracker = new Tracker();

  for (const err of errors) {
    tracker.trackResourceError(err.path, err.error);
    logger.warn(`Ignoring config file ${err.path}`);
  }

  // Fail fast: nothing below may touch the checkpoint until inputs are valid
  spinner.text = "Validating configuration...";
  const credentials = loadCredentials(process.env);
  if (credentials.length === 0) {
    fail(
      "No API credentials found. Set API_KEY_1 and CX_1 (or API_KEY and CX) in the environment or a .env file.",
    );
  }

  let queries: string[];
  try {
    queries = await readQueries(config.queries.file);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    fail(`Cannot read queries file ${config.queries.file}: ${details}`);
  }
  if (queries.length === 0) {
    fail(`No queries found in ${config.queries.file}`);
  }

  const axes = resolveFilterAxes(options, config.filters);
  const filters = generateFilterCombinations(config.filters, axes);
  const totalCombinations = queries.length * filters.length;

  logger.info(
    `Loaded ${credentials.length} API key pair(s), ${queries.length} queries, ${filters.length} filter combination(s)`,
  );

  // Checkpoint: fresh start or resume
  const checkpoint = new CheckpointStore(config.checkpoint.path, { logger });
  let resuming = false;
  if (options.fresh) {
    await checkpoint.clear();
    logger.info("Starting fresh (--fresh)");
  } else {
    resuming = await checkpoint.load();
  }
  checkpoint.setSessionInfo({
    queriesFile: config.queries.file,
    totalQueries: queries.length,
    totalCombinations,
  });

  spinner.stop();
  if (resuming) {
    modules.displayResumeInfo(checkpoint.getProgress());
  } else if (checkpoint.discardedSession) {
    modules.displayPreviousCompletion(checkpoint.discardedSession);
  }

  const rotator = new CredentialRotator(credentials);
  const search = new SearchDriver(
    createCustomSearchClient({
      endpoint: config.search.endpoint,
      timeout: config.search.timeout,
    }),
    rotator,
    {
      pageSize: config.search.resultsPerPage,
      maxResults: config.search.maxResultsPerQuery,
      logger,
    },
  );
  const images = createImageDownloader(config.download);

  // Cooperative cancellation: finish the current item, save, exit
  const controller = new AbortController();
  const onSignal = () => {
    spinner.text = "Interrupted, saving progress...";
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const ctx: HarvestContext = {
    config,
    queries,
    filters,
    checkpoint,
    rotator,
    search,
    images,
    tracker,
    logger,
    signal: controller.signal,
    onUnitStart: (unit, ordinal, total) => {
      const query = queries[unit.queryIndex];
      const label = formatFilterDisplay(filters[unit.filterIndex]);
      spinner.text = `[${ordinal}/${total}] "${query}" · ${label} · key #${rotator.currentOrdinal()}`;
    },
  };

  try {
    spinner.start("Harvesting...");
    const outcome = await modules.harvest(ctx);

    spinner.clear();
    spinner.stop();

    await modules.stats(outcome, tracker, {
      outputDir: config.output.directory,
      verbose: options.verbose,
    });

    if (outcome.status === "interrupted") {
      process.exitCode = EXIT_INTERRUPTED;
    }
  } catch (error) {
    spinner.fail("Harvest failed");
    console.error(error);
    process.exit(1);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
