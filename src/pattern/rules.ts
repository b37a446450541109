/**
 * ルールファイルのパースと判定
 *
 * 1行1パターンの設定ファイルを include/exclude ルール列に変換し、
 * 候補ファイルの採否を判定する。exclude は宣言位置に関係なく常に優先される。
 */

import type {
  Classification,
  Dialect,
  Rule,
  RuleKind,
  RuleSet,
} from "../types/mod.js";
import {
  compilePattern,
  hasWildcard,
  matchesDirectory,
  matchesPath,
} from "./matcher.js";

/** パースオプション */
export interface ParseRulesOptions {
  /** 書式（デフォルト: auto） */
  dialect?: Dialect | "auto";
}

/** コンパイル前の行情報 */
interface RawRule {
  raw: string;
  kind: RuleKind;
  pattern: string;
  line: number;
}

/**
 * 1行をパースする
 *
 * @returns コメント・空行・空パターンの場合は null
 */
export function parseLine(raw: string, line: number): RawRule | null {
  const trimmed = raw.trim();
  if (trimmed === "" || trimmed.startsWith("#")) {
    return null;
  }

  let kind: RuleKind = "include";
  let pattern = trimmed;
  if (pattern.startsWith("!")) {
    kind = "exclude";
    pattern = pattern.slice(1).trim();
  }

  // `\#` `\!` はファイル名の先頭文字として扱う
  if (/^\\[#!]/.test(pattern)) {
    pattern = pattern.slice(1);
  }

  if (pattern === "") {
    return null;
  }

  return { raw, kind, pattern, line };
}

/**
 * パターン列から書式を推定する
 *
 * `**` を含むもの、または `/` とワイルドカードを併用するものがあれば glob
 */
export function detectDialect(patterns: string[]): Dialect {
  const isGlob = patterns.some((pattern) =>
    pattern.includes("**") ||
    (pattern.replace(/\/+$/, "").includes("/") && hasWildcard(pattern))
  );
  return isGlob ? "glob" : "simple";
}

/**
 * 書式に応じてパターンをコンパイルする
 */
function compileForDialect(pattern: string, dialect: Dialect) {
  // 末尾の `/` はディレクトリ指定であり、パス区切りとはみなさない
  const body = pattern.replace(/[\\/]+$/, "");

  if (dialect === "simple") {
    return /[\\/]/.test(body)
      ? compilePattern(pattern, { literal: true })
      : compilePattern(pattern, { recursive: true });
  }

  return compilePattern(pattern, {
    recursive: !body.includes("/") && !hasWildcard(pattern),
  });
}

/**
 * ルールファイルの内容をパースする
 *
 * @param text 設定ファイルの内容
 * @param options パースオプション
 *
 * @example
 * ```typescript
 * const ruleSet = parseRules("app/*.php\n!vendor\n");
 * classify(ruleSet, "app/a.php").included; // true
 * ```
 */
export function parseRules(
  text: string,
  options: ParseRulesOptions = {},
): RuleSet {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);

  const rawRules: RawRule[] = [];
  lines.forEach((raw, index) => {
    const parsed = parseLine(raw, index + 1);
    if (parsed) {
      rawRules.push(parsed);
    }
  });

  const dialect = !options.dialect || options.dialect === "auto"
    ? detectDialect(rawRules.map((r) => r.pattern))
    : options.dialect;

  const rules: Rule[] = [];
  for (const rawRule of rawRules) {
    const matcher = compileForDialect(rawRule.pattern, dialect);
    // `/` のみなど、セグメントが残らないパターンは評価しない
    if (!matcher) {
      continue;
    }
    rules.push({ ...rawRule, matcher });
  }

  return {
    dialect,
    rules,
    includes: rules.filter((r) => r.kind === "include"),
    excludes: rules.filter((r) => r.kind === "exclude"),
  };
}

/**
 * 候補ファイルの採否を判定する
 *
 * 1. exclude ルールのいずれかにマッチすれば除外
 * 2. include ルールのいずれかにマッチすれば採用
 * 3. どれにもマッチしなければ不採用
 *
 * @param relativePath ソースルートからの相対パス
 */
export function classify(
  ruleSet: RuleSet,
  relativePath: string,
): Classification {
  for (const rule of ruleSet.excludes) {
    if (matchesPath(rule.matcher, relativePath)) {
      return { included: false, reason: "excluded", rule };
    }
  }

  for (const rule of ruleSet.includes) {
    if (matchesPath(rule.matcher, relativePath)) {
      return { included: true, reason: "included", rule };
    }
  }

  return { included: false, reason: "unmatched" };
}

/**
 * ディレクトリ配下が丸ごと除外されるか
 *
 * 走査時の枝刈りに使う。ここで true になるディレクトリ配下のファイルは
 * classify でも必ず除外される。
 */
export function isDirectoryExcluded(
  ruleSet: RuleSet,
  dirRelativePath: string,
): Rule | null {
  for (const rule of ruleSet.excludes) {
    if (matchesDirectory(rule.matcher, dirRelativePath)) {
      return rule;
    }
  }
  return null;
}

/**
 * ルールを表示用の文字列にする
 */
export function describeRule(rule: Rule): string {
  const prefix = rule.kind === "exclude" ? "!" : "";
  return `line ${rule.line}: ${prefix}${rule.pattern}`;
}
