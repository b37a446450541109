/**
 * エラー検出ユーティリティ
 */

/**
 * Node.js のシステムエラーコードを取得
 *
 * @returns コードがない場合は undefined
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * ファイル不在エラーかどうかを判定
 *
 * 以下のパターンを検出する：
 * - "ENOENT" / "ENOTDIR" エラーコード
 * - "No such file" メッセージ
 *
 * @param error エラーオブジェクト
 * @returns ファイル不在エラーの場合 true
 */
export function isFileNotFoundError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code === "ENOENT" || code === "ENOTDIR") {
    return true;
  }

  return error instanceof Error && error.message.includes("No such file");
}

/**
 * 権限エラーかどうかを判定
 *
 * - "EACCES" / "EPERM" エラーコード
 * - "Permission denied" メッセージ
 *
 * @param error エラーオブジェクト
 * @returns 権限エラーの場合 true
 */
export function isPermissionDeniedError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code === "EACCES" || code === "EPERM") {
    return true;
  }

  return error instanceof Error && error.message.includes("Permission denied");
}

/**
 * unknown を Error に変換する
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
