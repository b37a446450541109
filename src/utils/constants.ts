/**
 * 共通定数
 */

/**
 * 出力ディレクトリ関連の定数
 */
export const OUTPUT = {
  /** デフォルトの出力ディレクトリ */
  DEFAULT_DIR: "artifacts",
  /** メタデータファイル名 */
  METADATA_FILE: "metadata.json",
  /** 空ディレクトリを維持するためのプレースホルダ */
  SENTINEL_FILE: ".gitkeep",
} as const;

/**
 * 設定ファイル関連の定数
 */
export const CONFIG = {
  /** デフォルトの設定ファイル名 */
  DEFAULT_FILE: ".artifacts",
} as const;

/**
 * バイナリ判定関連の定数
 */
export const BINARY_CHECK = {
  /** バイナリ判定でチェックするバイト数 */
  CHECK_LENGTH: 8192,
} as const;
