/**
 * MIMEタイプ判定
 *
 * 1. 拡張子テーブル
 * 2. 差し替え可能な ContentSniffer（内容判定 / file コマンド）
 * 3. どちらでも判定できなければ application/octet-stream
 */

import { extname } from "node:path";
import type {
  ContentSniffer,
  FileSystem,
  SniffMode,
} from "../types/mod.js";
import { defaultFileSystem } from "../types/mod.js";
import { logVerbose } from "../ui/logger.js";
import { runCommand } from "../utils/command.js";
import type { CommandRunner } from "../utils/command.js";
import { BINARY_CHECK } from "../utils/constants.js";
import { isFileNotFoundError, toError } from "../utils/error.js";

/** 判定できない場合のMIMEタイプ */
export const DEFAULT_MIME_TYPE = "application/octet-stream";

/** 拡張子（小文字、ドットなし）とMIMEタイプの対応 */
export const MIME_TYPES: Readonly<Record<string, string>> = {
  js: "text/javascript",
  mjs: "text/javascript",
  cjs: "text/javascript",
  ts: "text/typescript",
  css: "text/css",
  html: "text/html",
  htm: "text/html",
  json: "application/json",
  md: "text/markdown",
  txt: "text/plain",
  csv: "text/csv",
  xml: "application/xml",
  yaml: "application/yaml",
  yml: "application/yaml",
  php: "application/x-httpd-php",
  py: "text/x-python",
  sh: "application/x-sh",
  svg: "image/svg+xml",
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
  ico: "image/vnd.microsoft.icon",
  pdf: "application/pdf",
  zip: "application/zip",
  gz: "application/gzip",
  tar: "application/x-tar",
  wasm: "application/wasm",
  woff: "font/woff",
  woff2: "font/woff2",
};

/** 必要な外部コマンドが見つからない */
export class DependencyMissingError extends Error {
  constructor(
    public readonly command: string,
    public readonly hint: string,
  ) {
    super(`This tool requires '${command}' for the selected option.`);
    this.name = "DependencyMissingError";
  }
}

/**
 * 拡張子テーブルからMIMEタイプを引く
 *
 * @returns 未登録の拡張子は null
 */
export function lookupMimeType(filePath: string): string | null {
  const ext = extname(filePath).slice(1).toLowerCase();
  if (!ext) {
    return null;
  }
  return MIME_TYPES[ext] ?? null;
}

/**
 * バイナリかどうかを判定（NULLバイトの有無）
 */
export function isBinaryContent(content: Uint8Array): boolean {
  // 最初の一定バイト数をチェック
  const checkLength = Math.min(content.length, BINARY_CHECK.CHECK_LENGTH);
  for (let i = 0; i < checkLength; i++) {
    // NULLバイトがあればバイナリ
    if (content[i] === 0) {
      return true;
    }
  }
  return false;
}

/**
 * ファイル先頭の内容からテキスト/バイナリを判定する Sniffer
 */
export function createContentSniffer(
  fs: FileSystem = defaultFileSystem,
): ContentSniffer {
  return {
    async sniff(filePath: string): Promise<string | null> {
      const head = await fs.readHead(filePath, BINARY_CHECK.CHECK_LENGTH);
      return isBinaryContent(head) ? DEFAULT_MIME_TYPE : "text/plain";
    },
  };
}

/**
 * `file --mime-type -b` で判定する Sniffer
 */
export function createFileCommandSniffer(
  runner: CommandRunner = runCommand,
): ContentSniffer {
  return {
    async sniff(filePath: string): Promise<string | null> {
      const { code, stdout } = await runner("file", [
        "--mime-type",
        "-b",
        filePath,
      ]);
      const mimeType = stdout.trim();
      return code === 0 && mimeType ? mimeType : null;
    },
  };
}

/**
 * file コマンドが使えるか確認する
 *
 * @throws DependencyMissingError コマンドが見つからない場合
 */
export async function checkFileCommand(
  runner: CommandRunner = runCommand,
): Promise<void> {
  try {
    await runner("file", ["--version"]);
  } catch (error) {
    if (isFileNotFoundError(error)) {
      throw new DependencyMissingError(
        "file",
        "Install it using your package manager (e.g. 'sudo apt install file'), or use --sniff content.",
      );
    }
    throw error;
  }
}

/**
 * モードに応じた Sniffer を作成する
 *
 * @returns "none" の場合は undefined
 */
export function createSniffer(
  mode: SniffMode,
  deps: { fs?: FileSystem; runner?: CommandRunner } = {},
): ContentSniffer | undefined {
  switch (mode) {
    case "content":
      return createContentSniffer(deps.fs);
    case "file":
      return createFileCommandSniffer(deps.runner);
    case "none":
      return undefined;
  }
}

/**
 * MIMEタイプを判定する
 *
 * Sniffer の失敗はコピー結果に影響させず、デフォルト値にフォールバックする
 */
export async function detectMimeType(
  filePath: string,
  sniffer?: ContentSniffer,
): Promise<string> {
  const fromTable = lookupMimeType(filePath);
  if (fromTable) {
    return fromTable;
  }

  if (sniffer) {
    try {
      const sniffed = await sniffer.sniff(filePath);
      if (sniffed) {
        return sniffed;
      }
    } catch (error) {
      logVerbose(
        `MIME sniffing failed for ${filePath}: ${toError(error).message}`,
      );
    }
  }

  return DEFAULT_MIME_TYPE;
}
