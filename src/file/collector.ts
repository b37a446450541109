/**
 * アーティファクト収集モジュール
 *
 * ソースディレクトリを走査してルールに一致したファイルを
 * 平坦な出力ディレクトリへコピーし、metadata.json を作成する
 */

import { isAbsolute, join, relative, resolve, sep } from "node:path";
import type {
  ArtifactRecord,
  CandidateFile,
  CollectOptions,
  CollectResult,
  ContentSniffer,
  DirEntry,
  FileInfo,
  FileSystem,
  RuleSet,
} from "../types/mod.js";
import { defaultFileSystem } from "../types/mod.js";
import {
  classify,
  describeRule,
  isDirectoryExcluded,
} from "../pattern/rules.js";
import { logInfo, logVerbose, logWarning } from "../ui/logger.js";
import { icons } from "../ui/colors.js";
import { OUTPUT } from "../utils/constants.js";
import { isFileNotFoundError, toError } from "../utils/error.js";
import { formatFileSize } from "../utils/format.js";
import { clearOutputDirectory } from "./clear.js";
import {
  FileNotFoundWarning,
  InvalidSourceError,
  OutputExistsError,
  OutputWriteError,
  UnreadableDirectoryWarning,
} from "./errors.js";
import { buildMetadata, writeMetadata } from "./metadata.js";
import { detectMimeType } from "./mime.js";
import { NameAllocator } from "./names.js";

/** 1回の実行で共有する状態 */
interface CollectState {
  copiedCount: number;
  allocator: NameAllocator;
  records: ArtifactRecord[];
  actions: Array<{ source: string; destination: string }>;
  skipped: FileNotFoundWarning[];
}

/** 走査のコンテキスト */
interface WalkContext {
  fs: FileSystem;
  rules: RuleSet;
  /** 走査対象から除外する出力ディレクトリの実パス */
  outputRealPath: string | null;
  skippedDirectories: UnreadableDirectoryWarning[];
}

/** 1ファイル処理のオプション */
interface ProcessOptions {
  fs: FileSystem;
  rules: RuleSet;
  dryRun: boolean;
  outputDir: string;
  sniffer?: ContentSniffer;
}

/**
 * ソースディレクトリを検証して実パスを返す
 *
 * @throws InvalidSourceError 存在しない、またはディレクトリではない場合
 */
async function resolveSourceDir(
  fs: FileSystem,
  sourceDir: string,
): Promise<string> {
  let info: FileInfo;
  try {
    info = await fs.stat(sourceDir);
  } catch (error) {
    if (isFileNotFoundError(error)) {
      throw new InvalidSourceError(sourceDir, toError(error));
    }
    throw error;
  }

  if (!info.isDirectory) {
    throw new InvalidSourceError(sourceDir);
  }

  return await fs.realPath(resolve(sourceDir));
}

/**
 * `outer` が `inner` 自身またはその祖先か
 */
function containsPath(outer: string, inner: string): boolean {
  const rel = relative(outer, inner);
  return rel === "" ||
    !(rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel));
}

/**
 * ディレクトリのエントリを名前順に取得する
 */
async function listEntries(
  fs: FileSystem,
  dirPath: string,
): Promise<DirEntry[]> {
  const entries: DirEntry[] = [];
  for await (const entry of fs.readDir(dirPath)) {
    entries.push(entry);
  }
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * ディレクトリを深さ優先で走査し、候補ファイルを列挙する
 *
 * 除外ルールにマッチするディレクトリと出力ディレクトリには降りない。
 * シンボリックリンクは対象外。読めないサブディレクトリは記録して飛ばす。
 */
async function* walk(
  ctx: WalkContext,
  dirPath: string,
  relativeBase: string,
  entries: DirEntry[],
): AsyncGenerator<CandidateFile> {
  for (const entry of entries) {
    const entryPath = join(dirPath, entry.name);
    const relativePath = relativeBase
      ? `${relativeBase}/${entry.name}`
      : entry.name;

    if (entry.isSymlink) {
      logVerbose(`Skip symlink: ${relativePath}`);
      continue;
    }

    if (entry.isDirectory) {
      if (entryPath === ctx.outputRealPath) {
        logVerbose(`Skip output directory: ${relativePath}/`);
        continue;
      }
      const excludedBy = isDirectoryExcluded(ctx.rules, relativePath);
      if (excludedBy) {
        logVerbose(
          `Excluded directory: ${relativePath}/ (${describeRule(excludedBy)})`,
        );
        continue;
      }

      let children: DirEntry[];
      try {
        children = await listEntries(ctx.fs, entryPath);
      } catch (error) {
        ctx.skippedDirectories.push(
          new UnreadableDirectoryWarning(relativePath, entryPath, toError(error)),
        );
        logWarning(`Cannot read directory: ${relativePath}/`);
        continue;
      }
      yield* walk(ctx, entryPath, relativePath, children);
    } else if (entry.isFile) {
      yield {
        absolutePath: entryPath,
        relativePath,
        baseName: entry.name,
      };
    }
  }
}

/**
 * 候補ファイルを読み取れるか確認する
 *
 * @returns 読み取れない場合は警告
 */
async function inspectCandidate(
  fs: FileSystem,
  candidate: CandidateFile,
): Promise<FileInfo | FileNotFoundWarning> {
  try {
    const info = await fs.stat(candidate.absolutePath);
    await fs.checkReadable(candidate.absolutePath);
    return info;
  } catch (error) {
    return new FileNotFoundWarning(
      candidate.relativePath,
      candidate.absolutePath,
      toError(error),
    );
  }
}

/**
 * 1ファイルを処理する（判定 → 命名 → コピー → メタデータ追加）
 */
async function processCandidate(
  candidate: CandidateFile,
  state: CollectState,
  options: ProcessOptions,
): Promise<void> {
  const { fs, rules, dryRun, outputDir, sniffer } = options;

  const classification = classify(rules, candidate.relativePath);
  if (!classification.included) {
    if (classification.reason === "excluded") {
      logVerbose(
        `Excluded: ${candidate.relativePath} (${
          describeRule(classification.rule)
        })`,
      );
    }
    return;
  }
  logVerbose(
    `Matched: ${candidate.relativePath} (${describeRule(classification.rule)})`,
  );

  const destination = state.allocator.allocate(candidate.baseName);
  const destinationPath = join(outputDir, destination);

  const inspected = await inspectCandidate(fs, candidate);
  if (inspected instanceof FileNotFoundWarning) {
    state.allocator.release(destination);
    state.skipped.push(inspected);
    logWarning(`Not found: ${candidate.relativePath}`);
    return;
  }

  if (dryRun) {
    state.copiedCount++;
    state.actions.push({ source: candidate.absolutePath, destination });
    logInfo(
      `Would copy: ${candidate.relativePath} ${icons.arrow} ${destinationPath}`,
    );
    return;
  }

  try {
    await fs.copyFile(candidate.absolutePath, destinationPath);
  } catch (error) {
    // コピー中に元ファイルが消えた場合はスキップ
    if (!(await fs.exists(candidate.absolutePath))) {
      state.allocator.release(destination);
      state.skipped.push(
        new FileNotFoundWarning(
          candidate.relativePath,
          candidate.absolutePath,
          toError(error),
        ),
      );
      logWarning(`Not found: ${candidate.relativePath}`);
      return;
    }
    throw new OutputWriteError(
      `Failed to write ${destinationPath}`,
      destinationPath,
      toError(error),
    );
  }

  const mimeType = await detectMimeType(candidate.absolutePath, sniffer);
  state.records.push({
    filename: destination,
    originalPath: candidate.absolutePath,
    sizeBytes: inspected.size,
    mimeType,
  });
  state.actions.push({ source: candidate.absolutePath, destination });
  state.copiedCount++;
  logInfo(`Copied: ${candidate.absolutePath}`);
  logVerbose(`  ${formatFileSize(inspected.size)}, ${mimeType}`);
  if (destination !== candidate.baseName) {
    logVerbose(`Renamed to avoid collision: ${destination}`);
  }
}

/**
 * ルールに一致したファイルを出力ディレクトリに収集する
 *
 * @param options 収集オプション
 * @returns 収集結果
 * @throws InvalidSourceError ソースディレクトリが存在しない、または読めない場合
 * @throws OutputExistsError 出力ディレクトリが存在し、force が指定されていない場合
 * @throws OutputWriteError 出力ディレクトリがソースを含む、または書き込めない場合
 *
 * @example
 * ```typescript
 * const rules = parseRules("app/*.php\n!vendor\n");
 * const result = await collectArtifacts({
 *   sourceDir: ".",
 *   outputDir: "artifacts",
 *   rules,
 * });
 * console.log(result.copiedCount);
 * ```
 */
export async function collectArtifacts(
  options: CollectOptions,
): Promise<CollectResult> {
  const {
    outputDir,
    rules,
    dryRun = false,
    force = false,
    clear = false,
    fs = defaultFileSystem,
    sniffer,
    now = () => new Date(),
  } = options;

  const sourceRoot = await resolveSourceDir(fs, options.sourceDir);
  const metadataPath = join(outputDir, OUTPUT.METADATA_FILE);

  // 変更を加える前に失敗させる
  let rootEntries: DirEntry[];
  try {
    rootEntries = await listEntries(fs, sourceRoot);
  } catch (error) {
    throw new InvalidSourceError(
      options.sourceDir,
      toError(error),
      "is not readable",
    );
  }

  const outputExists = await fs.exists(outputDir);
  if (
    outputExists &&
    containsPath(await fs.realPath(resolve(outputDir)), sourceRoot)
  ) {
    throw new OutputWriteError(
      `Output directory '${outputDir}' contains the source directory`,
      outputDir,
    );
  }
  if (outputExists && !force) {
    throw new OutputExistsError(outputDir);
  }

  let clearedCount = 0;
  if (clear && outputExists) {
    clearedCount = await clearOutputDirectory(outputDir, { fs, dryRun });
    logVerbose(
      `${dryRun ? "Would clear" : "Cleared"} ${clearedCount} file(s) in ${outputDir}`,
    );
  }

  if (!dryRun) {
    try {
      await fs.ensureDir(outputDir);
    } catch (error) {
      throw new OutputWriteError(
        `Cannot create output directory '${outputDir}'`,
        outputDir,
        toError(error),
      );
    }
  }

  const outputRealPath = await fs.exists(outputDir)
    ? await fs.realPath(resolve(outputDir))
    : null;

  const state: CollectState = {
    copiedCount: 0,
    allocator: new NameAllocator([OUTPUT.METADATA_FILE, OUTPUT.SENTINEL_FILE]),
    records: [],
    actions: [],
    skipped: [],
  };

  const ctx: WalkContext = {
    fs,
    rules,
    outputRealPath,
    skippedDirectories: [],
  };
  for await (const candidate of walk(ctx, sourceRoot, "", rootEntries)) {
    await processCandidate(candidate, state, {
      fs,
      rules,
      dryRun,
      outputDir,
      sniffer,
    });
  }

  if (!dryRun) {
    const document = buildMetadata(sourceRoot, state.records, now());
    try {
      await writeMetadata(fs, metadataPath, document);
    } catch (error) {
      throw new OutputWriteError(
        `Failed to write ${metadataPath}`,
        metadataPath,
        toError(error),
      );
    }
  }

  return {
    copiedCount: state.copiedCount,
    records: state.records,
    actions: state.actions,
    skipped: state.skipped,
    skippedDirectories: ctx.skippedDirectories,
    clearedCount,
    dryRun,
    outputDir,
    metadataPath,
  };
}
