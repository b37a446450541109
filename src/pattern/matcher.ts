/**
 * パターンコンパイラ
 *
 * glob形式のパターンをセグメント単位のマッチャーに変換する。
 * ワイルドカードを含むセグメントは minimatch で正規表現にする。
 * - `*` は1セグメント内の任意の文字列（`/` を跨がない）
 * - `?` は任意の1文字
 * - `[abc]` `[a-z]` `[!x]` は文字クラス
 * - `**` はセグメント全体の場合のみ、0個以上のセグメントにマッチ
 */

import { Minimatch, unescape } from "minimatch";
import type { MinimatchOptions } from "minimatch";
import type { PathMatcher, Segment } from "../types/mod.js";

/** コンパイルオプション */
export interface CompileOptions {
  /** 任意の深さにマッチさせる（先頭に `**` を付与） */
  recursive?: boolean;
  /** ワイルドカードを解釈せず文字列として扱う */
  literal?: boolean;
}

/** ワイルドカード文字を含むか */
export function hasWildcard(pattern: string): boolean {
  return /[*?[]/.test(pattern);
}

/** セグメント単位の minimatch オプション */
const SEGMENT_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true,
};

/** `u` フラグ下でも有効なエスケープ対象 */
const UNICODE_SAFE_ESCAPE = /[\^$\\.*+?()[\]{}|/A-Za-z0-9]/;

/**
 * minimatch の正規表現を `u` フラグ付きで作り直す
 *
 * `u` フラグでは `\-` などの記号エスケープが構文エラーになるため、
 * コードポイント表記に置き換える。`?` がサロゲートペアを1文字として扱う。
 */
function toUnicodeRegExp(regex: RegExp): RegExp {
  const source = regex.source.replace(
    /\\(.)/gsu,
    (escape: string, ch: string) =>
      UNICODE_SAFE_ESCAPE.test(ch)
        ? escape
        : `\\u{${(ch.codePointAt(0) ?? 0).toString(16)}}`,
  );
  const flags = new Set(regex.flags);
  flags.add("u");
  return new RegExp(source, [...flags].join(""));
}

/**
 * 1セグメントをコンパイルする
 */
export function compileSegment(segment: string, literal = false): Segment {
  if (literal) {
    return { type: "literal", value: segment };
  }
  if (segment === "**") {
    return { type: "globstar" };
  }

  const mm = new Minimatch(segment, SEGMENT_OPTIONS);
  const regex = mm.hasMagic() ? mm.makeRe() : false;
  if (regex === false) {
    return { type: "literal", value: unescape(segment) };
  }
  return { type: "wildcard", source: segment, regex: toUnicodeRegExp(regex) };
}

/**
 * パスを正規化する
 *
 * バックスラッシュをスラッシュに変換し、先頭の `./` `/` と末尾の `/` を除去
 */
export function normalizePath(filePath: string): string {
  return filePath
    .replace(/\\/g, "/")
    .replace(/^(\.\/|\/)+/, "")
    .replace(/\/+$/, "");
}

/**
 * パターンをコンパイルする
 *
 * @param pattern パターン文字列（`!` は除去済み）
 * @returns セグメントが空の場合は null
 *
 * @example
 * ```typescript
 * const matcher = compilePattern("src/**\/*.ts");
 * matchesPath(matcher, "src/a/b.ts"); // true
 * ```
 */
export function compilePattern(
  pattern: string,
  options: CompileOptions = {},
): PathMatcher | null {
  const { recursive = false, literal = false } = options;

  let body = literal ? pattern.replace(/\\/g, "/") : pattern;
  const directoryOnly = body.endsWith("/");
  body = body.replace(/\/+$/, "");

  const anchored = body.startsWith("/");
  body = body.replace(/^(\.\/|\/)+/, "");

  const segments: Segment[] = [];
  for (const part of body.split("/")) {
    if (part === "" || part === ".") {
      continue;
    }
    const segment = compileSegment(part, literal);
    // 連続する ** はひとつにまとめる
    const last = segments[segments.length - 1];
    if (segment.type === "globstar" && last?.type === "globstar") {
      continue;
    }
    segments.push(segment);
  }

  if (segments.length === 0) {
    return null;
  }

  if (recursive && !anchored && segments[0].type !== "globstar") {
    segments.unshift({ type: "globstar" });
  }

  return { source: pattern, segments, directoryOnly };
}

/**
 * セグメント列がパス要素列に完全一致するか
 */
export function matchSegments(segments: Segment[], parts: string[]): boolean {
  const memo = new Map<number, boolean>();
  const width = parts.length + 1;

  const match = (si: number, pi: number): boolean => {
    const key = si * width + pi;
    const cached = memo.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let result: boolean;
    if (si === segments.length) {
      result = pi === parts.length;
    } else {
      const segment = segments[si];
      if (segment.type === "globstar") {
        result = match(si + 1, pi) || (pi < parts.length && match(si, pi + 1));
      } else if (pi === parts.length) {
        result = false;
      } else if (segment.type === "literal") {
        result = segment.value === parts[pi] && match(si + 1, pi + 1);
      } else {
        result = segment.regex.test(parts[pi]) && match(si + 1, pi + 1);
      }
    }

    memo.set(key, result);
    return result;
  };

  return match(0, 0);
}

/**
 * ファイルパスがマッチャーにマッチするか
 *
 * パス自体に加えて、祖先ディレクトリのいずれかにマッチする場合も true。
 * ディレクトリ専用パターンは祖先ディレクトリのみを対象とする。
 *
 * @param filePath ソースルートからの相対パス
 */
export function matchesPath(matcher: PathMatcher, filePath: string): boolean {
  const parts = normalizePath(filePath).split("/");

  if (!matcher.directoryOnly && matchSegments(matcher.segments, parts)) {
    return true;
  }

  for (let i = 1; i < parts.length; i++) {
    if (matchSegments(matcher.segments, parts.slice(0, i))) {
      return true;
    }
  }

  return false;
}

/**
 * ディレクトリパスがマッチャーにマッチするか（自身または祖先）
 *
 * @param dirPath ソースルートからの相対パス
 */
export function matchesDirectory(
  matcher: PathMatcher,
  dirPath: string,
): boolean {
  const parts = normalizePath(dirPath).split("/");

  for (let i = 1; i <= parts.length; i++) {
    if (matchSegments(matcher.segments, parts.slice(0, i))) {
      return true;
    }
  }

  return false;
}
