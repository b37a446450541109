/**
 * パスの展開
 */

import { homedir } from "node:os";

/**
 * チルダ(~)をホームディレクトリに展開する
 *
 * `--output=~/dir` のようにシェルが展開しない位置で指定されたパスを扱う
 *
 * @param filePath ファイルパス
 * @returns 展開されたパス
 */
export function expandTilde(filePath: string): string {
  if (filePath === "~") {
    return homedir();
  }
  if (filePath.startsWith("~/")) {
    return homedir() + filePath.slice(1);
  }
  return filePath;
}
