/**
 * 出力ディレクトリの削除
 *
 * - `--clear` フラグ: プレースホルダ（.gitkeep）以外の中身を削除し、ディレクトリは残す
 * - `clear` コマンド: ディレクトリごと削除する
 *
 * いずれも削除したファイル数を返す。ディレクトリが存在しない場合は 0。
 */

import { join } from "node:path";
import type { DirEntry, FileSystem } from "../types/mod.js";
import { defaultFileSystem } from "../types/mod.js";
import { OUTPUT } from "../utils/constants.js";
import { toError } from "../utils/error.js";
import { OutputWriteError } from "./errors.js";

/** 削除オプション */
export interface ClearOptions {
  /** ファイルシステム実装（テスト用に差し替え可能） */
  fs?: FileSystem;
  /** 件数のみ数えて削除しない */
  dryRun?: boolean;
}

/**
 * ディレクトリ配下のファイル数を再帰的に数える
 */
export async function countFiles(
  fs: FileSystem,
  dirPath: string,
): Promise<number> {
  let count = 0;
  for await (const entry of fs.readDir(dirPath)) {
    if (entry.isDirectory) {
      count += await countFiles(fs, join(dirPath, entry.name));
    } else {
      count++;
    }
  }
  return count;
}

/**
 * 削除対象がディレクトリとして存在するか確認する
 *
 * @returns 存在しない場合は false
 * @throws OutputWriteError ディレクトリ以外が存在する場合
 */
async function isExistingDirectory(
  fs: FileSystem,
  dirPath: string,
): Promise<boolean> {
  if (!(await fs.exists(dirPath))) {
    return false;
  }
  const info = await fs.stat(dirPath);
  if (!info.isDirectory) {
    throw new OutputWriteError(
      `Output path '${dirPath}' is not a directory`,
      dirPath,
    );
  }
  return true;
}

/**
 * 出力ディレクトリの中身を削除する（プレースホルダは残す）
 *
 * @returns 削除した（dry-run では削除予定の）ファイル数
 */
export async function clearOutputDirectory(
  dirPath: string,
  options: ClearOptions = {},
): Promise<number> {
  const { fs = defaultFileSystem, dryRun = false } = options;

  if (!(await isExistingDirectory(fs, dirPath))) {
    return 0;
  }

  // 走査中に削除しないよう、先にエントリを確定させる
  const entries: DirEntry[] = [];
  for await (const entry of fs.readDir(dirPath)) {
    if (entry.name !== OUTPUT.SENTINEL_FILE) {
      entries.push(entry);
    }
  }

  let removed = 0;
  for (const entry of entries) {
    const entryPath = join(dirPath, entry.name);
    removed += entry.isDirectory ? await countFiles(fs, entryPath) : 1;

    if (!dryRun) {
      try {
        await fs.remove(entryPath);
      } catch (error) {
        throw new OutputWriteError(
          `Failed to remove ${entryPath}`,
          entryPath,
          toError(error),
        );
      }
    }
  }

  return removed;
}

/**
 * 出力ディレクトリをディレクトリごと削除する
 *
 * @returns 削除した（dry-run では削除予定の）ファイル数
 */
export async function removeOutputDirectory(
  dirPath: string,
  options: ClearOptions = {},
): Promise<number> {
  const { fs = defaultFileSystem, dryRun = false } = options;

  if (!(await isExistingDirectory(fs, dirPath))) {
    return 0;
  }

  const removed = await countFiles(fs, dirPath);

  if (!dryRun) {
    try {
      await fs.remove(dirPath);
    } catch (error) {
      throw new OutputWriteError(
        `Failed to remove ${dirPath}`,
        dirPath,
        toError(error),
      );
    }
  }

  return removed;
}
