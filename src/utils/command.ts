/**
 * 外部コマンド実行
 */

import { spawn } from "node:child_process";

/** コマンドの実行結果 */
export interface CommandOutput {
  code: number;
  stdout: string;
  stderr: string;
}

/** コマンド実行関数（テスト用に差し替え可能） */
export type CommandRunner = (
  command: string,
  args: string[],
) => Promise<CommandOutput>;

/**
 * コマンドを実行して出力を取得する
 *
 * 終了コードが0以外でも reject しない。コマンドが起動できない場合
 * （ENOENT など）は reject する。
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
