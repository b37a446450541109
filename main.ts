#!/usr/bin/env node
/**
 * artifact - flat artifact collector
 *
 * パターンファイルに一致したファイルをソースツリーから平坦な出力ディレクトリへ
 * コピーし、出自を metadata.json に記録するCLIツール
 */

import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { clearCommand, parseArgs, showHelp, UsageError } from "./src/cli/mod.js";
import {
  ConfigLoadError,
  ConfigMissingError,
  expandTilde,
  loadRuleFile,
} from "./src/config/mod.js";
import {
  checkFileCommand,
  collectArtifacts,
  createSniffer,
  DependencyMissingError,
  InvalidSourceError,
  OutputExistsError,
  OutputWriteError,
} from "./src/file/mod.js";
import type { CliArgs, LogLevel } from "./src/types/mod.js";
import { isPermissionDeniedError } from "./src/utils/mod.js";
import {
  closeLogger,
  dim,
  initLogger,
  logCollectSummary,
  logError,
  logInfo,
  logRunInfo,
  logVerbose,
  showBanner,
} from "./src/ui/mod.js";

/** 終了コード */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
} as const;

/**
 * 実行時のフラグを表示用に並べる
 */
function describeFlags(args: CliArgs): string[] {
  const flags: string[] = [];
  if (args.dryRun) flags.push("dry-run");
  if (args.force) flags.push("force");
  if (args.clear) flags.push("clear");
  if (args.sniff !== "content") flags.push(`sniff=${args.sniff}`);
  return flags;
}

/**
 * 収集処理
 */
async function runCollect(args: CliArgs): Promise<number> {
  const sourceDir = expandTilde(args.sourceDir);
  const configFile = expandTilde(args.configFile);
  const outputDir = expandTilde(args.output);

  const rules = await loadRuleFile(configFile, { dialect: args.dialect });
  logVerbose(
    `Loaded ${rules.rules.length} rule(s) from ${configFile} (dialect: ${rules.dialect})`,
  );

  // 変更を加える前に依存コマンドを確認
  if (args.sniff === "file") {
    await checkFileCommand();
  }

  logRunInfo({
    sourceDir: resolve(sourceDir),
    configFile,
    outputDir,
    dialect: rules.dialect,
    includeCount: rules.includes.length,
    excludeCount: rules.excludes.length,
    flags: describeFlags(args),
  });

  const result = await collectArtifacts({
    sourceDir,
    outputDir,
    rules,
    dryRun: args.dryRun,
    force: args.force,
    clear: args.clear,
    sniffer: createSniffer(args.sniff),
  });

  logCollectSummary({
    copiedCount: result.copiedCount,
    skippedCount: result.skipped.length,
    skippedDirectoryCount: result.skippedDirectories.length,
    clearedCount: result.clearedCount,
    dryRun: result.dryRun,
    outputDir: result.outputDir,
    metadataPath: result.metadataPath,
  });

  return EXIT_CODES.SUCCESS;
}

/**
 * メイン処理
 *
 * @param argv コマンドライン引数（node とスクリプトパスを除く）
 * @returns 終了コード
 */
export async function main(argv: string[]): Promise<number> {
  try {
    const args = parseArgs(argv);

    // ヘルプ/バージョン表示時は終了
    if (args === null) {
      return EXIT_CODES.SUCCESS;
    }

    // ログレベルを設定
    let logLevel: LogLevel = "normal";
    if (args.verbose) {
      logLevel = "verbose";
    } else if (args.quiet) {
      logLevel = "quiet";
    }
    await initLogger({
      level: logLevel,
      logFile: args.logFile ? expandTilde(args.logFile) : undefined,
    });

    // バナー表示（quiet モード以外）
    if (logLevel !== "quiet") {
      showBanner();
    }

    if (args.command === "clear") {
      await clearCommand({
        output: expandTilde(args.output),
        dryRun: args.dryRun,
      });
      return EXIT_CODES.SUCCESS;
    }

    return await runCollect(args);
  } catch (error) {
    if (error instanceof UsageError) {
      logError(error.message);
      console.error();
      showHelp();
      return EXIT_CODES.GENERAL_ERROR;
    }

    if (error instanceof ConfigMissingError) {
      logError(error.message);
      if (error.created) {
        logInfo(`Edit ${error.filePath} and run again.`);
      }
      console.error();
      showHelp();
      return EXIT_CODES.GENERAL_ERROR;
    }

    if (error instanceof ConfigLoadError) {
      logError(`Config error: ${error.message}`);
      return EXIT_CODES.GENERAL_ERROR;
    }

    if (error instanceof InvalidSourceError) {
      logError(error.message);
      if (error.originalError) {
        console.error(dim(`  ${error.originalError.message}`));
      }
      return EXIT_CODES.GENERAL_ERROR;
    }

    if (error instanceof OutputExistsError) {
      logError(error.message);
      return EXIT_CODES.GENERAL_ERROR;
    }

    if (error instanceof DependencyMissingError) {
      logError(error.message);
      console.error(dim(`  ${error.hint}`));
      return EXIT_CODES.GENERAL_ERROR;
    }

    if (error instanceof OutputWriteError) {
      logError(`Write error: ${error.message}`);
      if (error.originalError) {
        console.error(dim(`  ${error.originalError.message}`));
      }
      if (isPermissionDeniedError(error.originalError)) {
        console.error(dim(`  Check write permissions for ${error.outputPath}`));
      }
      return EXIT_CODES.GENERAL_ERROR;
    }

    logError(
      `Unexpected error: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return EXIT_CODES.GENERAL_ERROR;
  }
}

/**
 * 直接実行されたかどうか（bin のシンボリックリンク経由を含む）
 */
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch (error) {
    logVerbose(
      `Cannot resolve entry script: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return false;
  }
}

// エントリーポイント
if (isEntryPoint()) {
  const exitCode = await main(process.argv.slice(2));
  await closeLogger();
  process.exitCode = exitCode;
}
