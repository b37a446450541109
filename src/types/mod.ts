/**
 * 型定義のエクスポート
 */

export type {
  CliArgs,
  CliOptions,
  ClearArgs,
  LogLevel,
  ParsedArgs,
  SniffMode,
} from "./cli.js";

export type {
  Classification,
  Dialect,
  PathMatcher,
  Rule,
  RuleKind,
  RuleSet,
  Segment,
} from "./pattern.js";

export type {
  ArtifactRecord,
  CandidateFile,
  CollectOptions,
  CollectResult,
  ContentSniffer,
  MetadataDocument,
} from "./artifact.js";

export type { DirEntry, FileInfo, FileSystem } from "./filesystem.js";
export { defaultFileSystem, NodeFileSystem } from "./filesystem.js";
