/**
 * Status command - Show checkpoint progress without harvesting
 */

import { z } from "zod";
import { CheckpointStore, Logger, loadConfig } from "../../utils";
import { displayPreviousCompletion, displayResumeInfo } from "../../modules";

const StatusOptionsSchema = z.object({
  checkpoint: z.string().optional(),
  config: z.string().optional(),
});

type Options = z.infer<typeof StatusOptionsSchema>;

export async function statusCommand(opts: Options): Promise<void> {
  const options = StatusOptionsSchema.parse(opts);
  const { config } = await loadConfig(options.config);
  const path = options.checkpoint ?? config.checkpoint.path;

  const checkpoint = new CheckpointStore(path, {
    logger: new Logger(config.logging.level),
  });

  if (await checkpoint.load()) {
    displayResumeInfo(checkpoint.getProgress());
    return;
  }

  const previous = checkpoint.discardedSession;
  if (previous) {
    displayPreviousCompletion(previous, false);
    return;
  }

  console.log(`No resumable checkpoint at ${path}`);
}
