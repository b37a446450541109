/**
 * ログ出力
 */

import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import type { LogLevel } from "../types/mod.js";
import { pluralize } from "../utils/format.js";
import {
  bold,
  box,
  dim,
  error,
  icons,
  info,
  path,
  success,
  warning,
} from "./colors.js";

/**
 * ANSIエスケープコードを除去
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * 表示幅を計算（ANSIコード除去後）
 */
function getDisplayWidth(str: string): number {
  return stripAnsi(str).length;
}

/** ロガー設定 */
interface LoggerConfig {
  level: LogLevel;
  logFile?: string;
}

/** グローバルロガー設定 */
let config: LoggerConfig = {
  level: "normal",
};

/** ログファイルハンドル */
let logFileHandle: FileHandle | null = null;

/** ログバッファ（バッチ書き込み用） */
let logBuffer: string[] = [];

/** ログバッファのフラッシュタイマー */
let flushTimer: ReturnType<typeof setTimeout> | null = null;

/**
 * ロガーを初期化
 */
export async function initLogger(
  options: Partial<LoggerConfig>,
): Promise<void> {
  // 既存のログファイルを閉じる
  await closeLogger();

  config = { level: "normal", ...options };

  // ログファイルを開く
  if (config.logFile) {
    try {
      logFileHandle = await open(config.logFile, "w");

      // ヘッダーを書き込み
      const timestamp = new Date().toISOString();
      await writeToLogFile(`=== artifact log started at ${timestamp} ===\n\n`);
    } catch (err) {
      console.error(
        `Warning: Failed to open log file: ${config.logFile}: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
      logFileHandle = null;
    }
  }
}

/**
 * ログファイルに書き込み
 *
 * 書き込みに失敗した場合はログファイル出力を停止する
 */
async function writeToLogFile(message: string): Promise<void> {
  if (!logFileHandle) return;

  try {
    await logFileHandle.write(message);
  } catch (err) {
    console.error(
      `Warning: Failed to write log file, file logging disabled: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
    const handle = logFileHandle;
    logFileHandle = null;
    await handle.close().catch((closeErr: unknown) => {
      console.error(
        `Warning: Failed to close log file: ${
          closeErr instanceof Error ? closeErr.message : String(closeErr)
        }`,
      );
    });
  }
}

/**
 * ログバッファをフラッシュ
 */
async function flushLogBuffer(): Promise<void> {
  if (logBuffer.length === 0 || !logFileHandle) return;

  const messages = logBuffer.join("");
  logBuffer = [];
  await writeToLogFile(messages);
}

/**
 * ログをバッファに追加（遅延書き込み）
 */
function bufferLogMessage(message: string): void {
  if (!logFileHandle) return;

  logBuffer.push(message);

  // フラッシュタイマーをリセット
  if (flushTimer !== null) {
    clearTimeout(flushTimer);
  }

  // 100ms後にフラッシュ
  flushTimer = setTimeout(() => {
    flushTimer = null;
    void flushLogBuffer();
  }, 100);
  flushTimer.unref();
}

/**
 * ロガーを閉じる（リソース解放）
 */
export async function closeLogger(): Promise<void> {
  // バッファをフラッシュ
  if (flushTimer !== null) {
    clearTimeout(flushTimer);
    flushTimer = null;
  }
  await flushLogBuffer();

  // ファイルを閉じる
  if (logFileHandle) {
    // フッターを書き込み
    const timestamp = new Date().toISOString();
    await writeToLogFile(`\n=== artifact log ended at ${timestamp} ===\n`);
    // 書き込みに失敗した場合は writeToLogFile 内で閉じられている
    const handle = logFileHandle;
    logFileHandle = null;
    if (handle) {
      await handle.close();
    }
  }
}

/**
 * 情報ログを出力
 */
export function logInfo(message: string): void {
  const output = info(icons.info) + " " + message;
  if (config.level !== "quiet") {
    console.log(output);
  }
  bufferLogMessage("[INFO] " + stripAnsi(message) + "\n");
}

/**
 * 成功ログを出力
 */
export function logSuccess(message: string): void {
  const output = success(icons.check) + " " + message;
  if (config.level !== "quiet") {
    console.log(output);
  }
  bufferLogMessage("[SUCCESS] " + stripAnsi(message) + "\n");
}

/**
 * 警告ログを出力
 */
export function logWarning(message: string): void {
  console.log(warning(icons.warning) + " " + warning(message));
  bufferLogMessage("[WARNING] " + stripAnsi(message) + "\n");
}

/**
 * エラーログを出力
 */
export function logError(message: string): void {
  console.error(error(icons.cross) + " " + error(message));
  bufferLogMessage("[ERROR] " + stripAnsi(message) + "\n");
}

/**
 * 詳細ログを出力（--verbose時のみ）
 */
export function logVerbose(message: string): void {
  if (config.level === "verbose") {
    console.log(dim("  " + message));
  }
  // ファイルには常に出力
  bufferLogMessage("[VERBOSE] " + stripAnsi(message) + "\n");
}

/**
 * セクションヘッダを出力
 */
export function logSection(title: string): void {
  if (config.level !== "quiet") {
    console.log();
    console.log(box.topLeftSquare + " " + bold(title));
    console.log(box.vertical);
  }
  bufferLogMessage("\n--- " + title + " ---\n");
}

/**
 * セクション内の行を出力
 */
export function logSectionLine(message: string, last = false): void {
  if (config.level !== "quiet") {
    const prefix = last ? box.bottomLeftSquare : box.teeRight;
    console.log(prefix + box.horizontal + " " + message);
  }
  bufferLogMessage("  " + stripAnsi(message) + "\n");
}

/** 実行設定の表示内容 */
export interface RunInfo {
  sourceDir: string;
  configFile: string;
  outputDir: string;
  dialect: string;
  includeCount: number;
  excludeCount: number;
  flags: string[];
}

/**
 * 実行設定を表示
 */
export function logRunInfo(runInfo: RunInfo): void {
  const {
    sourceDir,
    configFile,
    outputDir,
    dialect,
    includeCount,
    excludeCount,
    flags,
  } = runInfo;
  const flagText = flags.length > 0 ? flags.join(", ") : "none";

  const fileLines = [
    `\n--- Collecting artifacts ---`,
    `  Source: ${sourceDir}`,
    `  Config: ${configFile} (${dialect})`,
    `  Rules: ${includeCount} include, ${excludeCount} exclude`,
    `  Output: ${outputDir}`,
    `  Flags: ${flagText}\n`,
  ];
  bufferLogMessage(fileLines.join("\n") + "\n");

  if (config.level === "quiet") return;

  console.log();
  console.log(box.topLeftSquare + " " + bold("Collecting artifacts"));
  console.log(box.vertical);
  console.log(box.teeRight + box.horizontal + " Source: " + path(sourceDir));
  console.log(
    box.teeRight + box.horizontal + " Config: " + path(configFile) + " " +
      dim(`(${dialect})`),
  );
  console.log(
    box.vertical + "   " + box.branch + " " +
      info(`${includeCount} include`),
  );
  console.log(
    box.vertical + "   " + box.corner + " " +
      info(`${excludeCount} exclude`),
  );
  console.log(box.teeRight + box.horizontal + " Output: " + path(outputDir));
  console.log(
    box.bottomLeftSquare + box.horizontal + " Flags:  " + dim(flagText),
  );
  console.log();
}

/**
 * ボックスの内部幅を計算（動的幅対応）
 */
function calculateBoxWidth(
  title: string,
  lines: string[],
  minWidth = 44,
): number {
  // タイトルの幅（アイコン + スペース + タイトル + 余白）
  const titleWidth = 6 + getDisplayWidth(title) + 2;

  // 各行の幅（インデント + テキスト + 余白）
  const lineWidths = lines.map((l) => 6 + getDisplayWidth(l) + 2);

  // 最大幅を計算（最小幅以上）
  return Math.max(minWidth, titleWidth, ...lineWidths);
}

/**
 * アイコン付きのボックスを表示（内部用）
 */
function logBox(
  title: string,
  lines: string[],
  icon: string,
  colorFn: (s: string) => string,
): void {
  const width = calculateBoxWidth(title, lines);
  const line = box.horizontal.repeat(width);
  const blank = colorFn(box.vertical) + " ".repeat(width) +
    colorFn(box.vertical);

  console.log();
  console.log(colorFn(box.topLeft + line + box.topRight));
  console.log(blank);

  // タイトル行
  const titlePadding = Math.max(0, width - 6 - getDisplayWidth(title));
  console.log(
    colorFn(box.vertical) + "   " + colorFn(icon) + "  " + bold(title) +
      " ".repeat(titlePadding) + colorFn(box.vertical),
  );
  console.log(blank);

  // コンテンツ行
  for (const l of lines) {
    const padding = Math.max(0, width - 6 - getDisplayWidth(l));
    console.log(
      colorFn(box.vertical) + "      " + l + " ".repeat(padding) +
        colorFn(box.vertical),
    );
  }

  console.log(blank);
  console.log(colorFn(box.bottomLeft + line + box.bottomRight));
  console.log();
}

/**
 * 成功ボックスを表示
 */
export function logSuccessBox(title: string, lines: string[]): void {
  bufferLogMessage(
    [`\n[SUCCESS] ${title}`, ...lines.map((l) => `  ${stripAnsi(l)}`), ""]
      .join("\n") + "\n",
  );
  if (config.level === "quiet") return;
  logBox(title, lines, icons.check, success);
}

/**
 * 警告ボックスを表示
 */
export function logWarningBox(title: string, lines: string[]): void {
  bufferLogMessage(
    [`\n[WARNING] ${title}`, ...lines.map((l) => `  ${stripAnsi(l)}`), ""]
      .join("\n") + "\n",
  );
  logBox(title, lines, icons.warning, warning);
}

/** 収集結果のサマリー */
export interface CollectSummary {
  copiedCount: number;
  skippedCount: number;
  skippedDirectoryCount: number;
  clearedCount: number;
  dryRun: boolean;
  outputDir: string;
  metadataPath: string;
}

/**
 * 収集結果を表示
 *
 * dry-run でもコピー予定件数を必ず表示する
 */
export function logCollectSummary(summary: CollectSummary): void {
  const {
    copiedCount,
    skippedCount,
    skippedDirectoryCount,
    clearedCount,
    dryRun,
    outputDir,
    metadataPath,
  } = summary;

  if (dryRun) {
    logSection("DRY RUN MODE");
    if (clearedCount > 0) {
      logSectionLine(`Would clear ${pluralize(clearedCount, "file")}`);
    }
    if (skippedCount > 0) {
      logSectionLine(warning(`Would skip ${pluralize(skippedCount, "file")}`));
    }
    if (skippedDirectoryCount > 0) {
      logSectionLine(
        warning(
          `Would skip ${pluralize(skippedDirectoryCount, "unreadable dir")}`,
        ),
      );
    }
    logSectionLine(
      `Would create ${pluralize(copiedCount, "artifact")} in ${
        path(outputDir + "/")
      }`,
    );
    logSectionLine(dim("(no files were written)"), true);
    if (config.level !== "quiet") {
      console.log();
    }
    return;
  }

  const title = `Created ${pluralize(copiedCount, "artifact")}`;
  const lines = [
    `Output:   ${path(outputDir + "/")}`,
    `Metadata: ${path(metadataPath)}`,
  ];
  if (clearedCount > 0) {
    lines.push(`Cleared:  ${pluralize(clearedCount, "file")}`);
  }

  if (skippedCount > 0) {
    lines.push(warning(`Skipped:  ${pluralize(skippedCount, "file")}`));
  }
  if (skippedDirectoryCount > 0) {
    lines.push(
      warning(`Skipped:  ${pluralize(skippedDirectoryCount, "unreadable dir")}`),
    );
  }

  if (skippedCount > 0 || skippedDirectoryCount > 0) {
    logWarningBox(title, lines);
  } else {
    logSuccessBox(title, lines);
  }
}

/**
 * clear コマンドの結果を表示
 */
export function logClearSummary(
  removedCount: number,
  outputDir: string,
  dryRun: boolean,
): void {
  if (removedCount === 0) {
    logInfo(`No artifacts to remove in ${path(outputDir + "/")}`);
    return;
  }
  if (dryRun) {
    logInfo(
      `Would remove ${pluralize(removedCount, "file")} from ${
        path(outputDir + "/")
      }`,
    );
    return;
  }
  logSuccess(
    `Removed ${pluralize(removedCount, "file")} from ${path(outputDir + "/")}`,
  );
}
