/**
 * カラー定義とスタイリング
 */

import pc from "picocolors";

/** 成功 */
export const success = pc.green;

/** エラー */
export const error = pc.red;

/** 警告、スキップされたファイル */
export const warning = pc.yellow;

/** 情報 */
export const info = pc.blue;

/** パス */
export const path = pc.cyan;

/** 補助情報 */
export const dim = pc.dim;

/** 重要な情報、見出し */
export const bold = pc.bold;

/** ボックス描画文字 */
export const box = {
  // 丸角
  topLeft: "╭",
  topRight: "╮",
  bottomLeft: "╰",
  bottomRight: "╯",
  // 直角
  topLeftSquare: "┌",
  bottomLeftSquare: "└",
  // 線
  horizontal: "─",
  vertical: "│",
  // 分岐
  teeRight: "├",
  // ツリー
  branch: "├─",
  corner: "└─",
} as const;

/** アイコン */
export const icons = {
  check: "✓",
  cross: "✗",
  warning: "⚠",
  info: "ℹ",
  arrow: "→",
} as const;
