/**
 * 収集・メタデータ関連の型定義
 */

import type {
  FileNotFoundWarning,
  UnreadableDirectoryWarning,
} from "../file/errors.js";
import type { FileSystem } from "./filesystem.js";
import type { RuleSet } from "./pattern.js";

/** 走査中に見つかったファイル */
export interface CandidateFile {
  /** 絶対パス */
  absolutePath: string;
  /** ソースルートからの相対パス（`/` 区切り） */
  relativePath: string;
  /** ファイル名 */
  baseName: string;
}

/** コピー済みファイルのメタデータ */
export interface ArtifactRecord {
  /** 出力先でのファイル名 */
  filename: string;
  /** 元ファイルの絶対パス */
  originalPath: string;
  /** サイズ（バイト） */
  sizeBytes: number;
  /** MIMEタイプ */
  mimeType: string;
}

/** metadata.json の形式 */
export interface MetadataDocument {
  created_at: string;
  source_directory: string;
  artifacts: Array<{
    filename: string;
    original_path: string;
    size_bytes: number;
    type: string;
  }>;
}

/** 内容からMIMEタイプを推定する */
export interface ContentSniffer {
  /** 判定できない場合は null */
  sniff(path: string): Promise<string | null>;
}

/** 収集オプション */
export interface CollectOptions {
  /** ソースディレクトリ */
  sourceDir: string;
  /** 出力先ディレクトリ */
  outputDir: string;
  /** パース済みルール */
  rules: RuleSet;
  dryRun?: boolean;
  force?: boolean;
  clear?: boolean;
  /** ファイルシステム実装（テスト用に差し替え可能） */
  fs?: FileSystem;
  /** MIMEタイプ判定の第2段階 */
  sniffer?: ContentSniffer;
  /** 現在時刻 */
  now?: () => Date;
}

/** 収集結果 */
export interface CollectResult {
  /** コピーした（dry-run ではコピー予定の）ファイル数 */
  copiedCount: number;
  /** 作成したメタデータ（dry-run では空） */
  records: ArtifactRecord[];
  /** 出力先ファイル名と元ファイルの対応（dry-run でも記録） */
  actions: Array<{ source: string; destination: string }>;
  /** 読み取れずスキップしたファイル */
  skipped: FileNotFoundWarning[];
  /** 読み取れず中身をスキップしたディレクトリ */
  skippedDirectories: UnreadableDirectoryWarning[];
  /** --clear で削除したファイル数 */
  clearedCount: number;
  dryRun: boolean;
  outputDir: string;
  metadataPath: string;
}
