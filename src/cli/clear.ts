/**
 * clear コマンド
 */

import { removeOutputDirectory } from "../file/clear.js";
import type { ClearArgs, FileSystem } from "../types/mod.js";
import { logClearSummary } from "../ui/logger.js";

/**
 * 出力ディレクトリを削除する
 *
 * 存在しない場合は何もせず成功として扱う
 *
 * @returns 削除した（dry-run では削除予定の）ファイル数
 */
export async function clearCommand(
  args: Pick<ClearArgs, "output" | "dryRun">,
  fs?: FileSystem,
): Promise<number> {
  const removed = await removeOutputDirectory(args.output, {
    fs,
    dryRun: args.dryRun,
  });
  logClearSummary(removed, args.output, args.dryRun);
  return removed;
}
