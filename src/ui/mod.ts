/**
 * UIモジュールのエクスポート
 */

export * from "./colors.js";
export { showBanner, showVersion } from "./banner.js";
export {
  closeLogger,
  initLogger,
  logClearSummary,
  logCollectSummary,
  logError,
  logInfo,
  logRunInfo,
  logSection,
  logSectionLine,
  logSuccess,
  logSuccessBox,
  logVerbose,
  logWarning,
  logWarningBox,
  stripAnsi,
} from "./logger.js";

export type { CollectSummary, RunInfo } from "./logger.js";
