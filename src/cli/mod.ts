/**
 * CLIモジュールのエクスポート
 */

export { parseArgs, showHelp, UsageError } from "./args.js";
export { clearCommand } from "./clear.js";
