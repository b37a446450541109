/**
 * パターンエンジン
 *
 * 設定ファイルのパースと、glob/パス形式パターンのマッチングを提供
 */

export {
  compilePattern,
  compileSegment,
  hasWildcard,
  matchesDirectory,
  matchesPath,
  matchSegments,
  normalizePath,
} from "./matcher.js";
export type { CompileOptions } from "./matcher.js";

export {
  classify,
  describeRule,
  detectDialect,
  isDirectoryExcluded,
  parseLine,
  parseRules,
} from "./rules.js";
export type { ParseRulesOptions } from "./rules.js";
