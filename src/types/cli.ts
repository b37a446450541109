/**
 * CLI引数の型定義
 */

import type { Dialect } from "./pattern.js";

/** ログレベル */
export type LogLevel = "verbose" | "normal" | "quiet";

/** コンテンツ判定の方式 */
export type SniffMode = "none" | "content" | "file";

/** CLI オプション */
export interface CliOptions {
  /** 出力先ディレクトリ */
  output: string;

  /** 詳細ログ */
  verbose: boolean;

  /** 最小限の出力 */
  quiet: boolean;

  /** dry-run モード */
  dryRun: boolean;

  /** 既存の出力ディレクトリを許可 */
  force: boolean;

  /** 実行前に出力ディレクトリを空にする */
  clear: boolean;

  /** 設定ファイルの書式 */
  dialect: Dialect | "auto";

  /** MIMEタイプ判定の第2段階 */
  sniff: SniffMode;

  /** ログファイルパス */
  logFile?: string;
}

/** 収集コマンドの引数 */
export interface CliArgs extends CliOptions {
  command: "collect";
  /** ソースディレクトリ */
  sourceDir: string;
  /** 設定ファイルパス */
  configFile: string;
}

/** clear サブコマンドの引数 */
export interface ClearArgs extends CliOptions {
  command: "clear";
}

/** パース結果 */
export type ParsedArgs = CliArgs | ClearArgs;
