/**
 * 設定ファイル（ルールファイル）の読み込み
 */

import fse from "fs-extra";
import { parseRules } from "../pattern/mod.js";
import type { ParseRulesOptions } from "../pattern/mod.js";
import { CONFIG_TEMPLATE } from "../templates/config-template.js";
import type { RuleSet } from "../types/mod.js";
import { isFileNotFoundError } from "../utils/error.js";

/** 設定ファイル読み込みエラー */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = "ConfigLoadError";
  }
}

/**
 * 設定ファイルが存在しない
 *
 * テンプレートを作成済みの場合は created が true
 */
export class ConfigMissingError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly created: boolean,
  ) {
    super(
      created
        ? `${filePath} does not exist, created a template. Add patterns and run again.`
        : `${filePath} does not exist`,
    );
    this.name = "ConfigMissingError";
  }
}

/**
 * 設定ファイルのテンプレートを書き込む
 *
 * @param filePath 出力先ファイルパス
 * @throws ConfigLoadError 書き込みに失敗した場合
 */
export async function writeConfigTemplate(filePath: string): Promise<void> {
  try {
    await fse.writeFile(filePath, CONFIG_TEMPLATE, { flag: "wx" });
  } catch (error) {
    throw new ConfigLoadError(
      `cannot create template: ${
        error instanceof Error ? error.message : String(error)
      }`,
      filePath,
    );
  }
}

/**
 * 設定ファイルの存在を確認し、なければテンプレートを作成する
 *
 * @param filePath 設定ファイルパス
 * @throws ConfigMissingError ファイルが存在しなかった場合（テンプレート作成後）
 * @throws ConfigLoadError 通常のファイルではない場合
 */
export async function ensureRuleFile(filePath: string): Promise<void> {
  if (!(await fse.pathExists(filePath))) {
    await writeConfigTemplate(filePath);
    throw new ConfigMissingError(filePath, true);
  }

  const stat = await fse.stat(filePath);
  if (!stat.isFile()) {
    throw new ConfigLoadError("not a regular file", filePath);
  }
}

/**
 * 設定ファイルを読み込んでルールセットを作成する
 *
 * @param filePath 設定ファイルパス
 * @param options パースオプション
 * @returns パース済みルール
 */
export async function loadRuleFile(
  filePath: string,
  options: ParseRulesOptions = {},
): Promise<RuleSet> {
  await ensureRuleFile(filePath);

  let content: string;
  try {
    content = await fse.readFile(filePath, "utf8");
  } catch (error) {
    if (isFileNotFoundError(error)) {
      throw new ConfigMissingError(filePath, false);
    }
    throw new ConfigLoadError(
      `cannot read: ${
        error instanceof Error ? error.message : String(error)
      }`,
      filePath,
    );
  }

  return parseRules(content, options);
}
