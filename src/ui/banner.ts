/**
 * 起動時の見出し表示
 */

import { bold, dim, info } from "./colors.js";

const VERSION = "1.0.0";

/** 見出しの説明文 */
const TAGLINE = "collect matched files into one flat directory";

/**
 * 見出しを1行表示
 */
export function showBanner(): void {
  console.log(
    `${info("⬡")} ${bold("artifact")} ${dim(`v${VERSION} · ${TAGLINE}`)}`,
  );
  console.log();
}

/**
 * シンプルなバージョン表示
 */
export function showVersion(): void {
  console.log(`artifact v${VERSION}`);
}
