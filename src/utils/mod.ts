/**
 * ユーティリティモジュール
 */

export { formatFileSize, formatUtcTimestamp, pluralize } from "./format.js";
export {
  getErrorCode,
  isFileNotFoundError,
  isPermissionDeniedError,
  toError,
} from "./error.js";
export { runCommand } from "./command.js";
export type { CommandOutput, CommandRunner } from "./command.js";
export { BINARY_CHECK, CONFIG, OUTPUT } from "./constants.js";
