/**
 * Pipeline modules export
 */

export { harvest, clampCount } from "./harvester";
export {
  stats,
  displayResumeInfo,
  displayPreviousCompletion,
  formatDuration,
} from "./stats";
