/**
 * メタデータドキュメント（metadata.json）
 */

import type {
  ArtifactRecord,
  FileSystem,
  MetadataDocument,
} from "../types/mod.js";
import { formatUtcTimestamp } from "../utils/format.js";

/**
 * メタデータドキュメントを組み立てる
 *
 * @param sourceDir ソースディレクトリの絶対パス
 * @param records コピー順のレコード
 * @param createdAt 作成日時
 */
export function buildMetadata(
  sourceDir: string,
  records: ArtifactRecord[],
  createdAt: Date,
): MetadataDocument {
  return {
    created_at: formatUtcTimestamp(createdAt),
    source_directory: sourceDir,
    artifacts: records.map((record) => ({
      filename: record.filename,
      original_path: record.originalPath,
      size_bytes: record.sizeBytes,
      type: record.mimeType,
    })),
  };
}

/**
 * メタデータドキュメントをJSONとして書き込む
 */
export async function writeMetadata(
  fs: FileSystem,
  filePath: string,
  document: MetadataDocument,
): Promise<void> {
  await fs.writeTextFile(filePath, JSON.stringify(document, null, 2) + "\n");
}
