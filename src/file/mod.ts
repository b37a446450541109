/**
 * ファイルモジュール
 *
 * ソースツリーからのアーティファクト収集、命名、MIMEタイプ判定、
 * 出力ディレクトリの削除を提供
 */

export { collectArtifacts } from "./collector.js";

export {
  FileNotFoundWarning,
  InvalidSourceError,
  OutputExistsError,
  OutputWriteError,
  UnreadableDirectoryWarning,
} from "./errors.js";

export { NameAllocator, splitExtension } from "./names.js";

export {
  checkFileCommand,
  createContentSniffer,
  createFileCommandSniffer,
  createSniffer,
  DEFAULT_MIME_TYPE,
  DependencyMissingError,
  detectMimeType,
  isBinaryContent,
  lookupMimeType,
  MIME_TYPES,
} from "./mime.js";

export { buildMetadata, writeMetadata } from "./metadata.js";

export {
  clearOutputDirectory,
  countFiles,
  removeOutputDirectory,
} from "./clear.js";
export type { ClearOptions } from "./clear.js";
