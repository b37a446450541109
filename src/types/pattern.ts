/**
 * パターンエンジン関連の型定義
 */

/** 設定ファイルの書式 */
export type Dialect = "glob" | "simple";

/** ルールの種類 */
export type RuleKind = "include" | "exclude";

/** コンパイル済みのパスセグメント */
export type Segment =
  | { type: "literal"; value: string }
  | { type: "wildcard"; source: string; regex: RegExp }
  | { type: "globstar" };

/** コンパイル済みパターン */
export interface PathMatcher {
  /** 元のパターン文字列 */
  source: string;
  /** セグメント列 */
  segments: Segment[];
  /** ディレクトリ専用（末尾 `/`） */
  directoryOnly: boolean;
}

/** 設定ファイルの1行 */
export interface Rule {
  /** 行の生テキスト */
  raw: string;
  kind: RuleKind;
  /** `!` を除いたパターン */
  pattern: string;
  matcher: PathMatcher;
  /** 1始まりの行番号 */
  line: number;
}

/** パース済みルール一式 */
export interface RuleSet {
  dialect: Dialect;
  /** 宣言順のルール */
  rules: Rule[];
  includes: Rule[];
  excludes: Rule[];
}

/** ルール判定の結果 */
export type Classification =
  | { included: true; reason: "included"; rule: Rule }
  | { included: false; reason: "excluded"; rule: Rule }
  | { included: false; reason: "unmatched" };
