/**
 * config/loader.ts のテスト
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigLoadError,
  ConfigMissingError,
  ensureRuleFile,
  loadRuleFile,
  writeConfigTemplate,
} from "../../src/config/loader.js";
import { CONFIG_TEMPLATE } from "../../src/templates/config-template.js";

describe("loadRuleFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fse.mkdtemp(join(tmpdir(), "loader-test-"));
  });

  afterEach(async () => {
    await fse.remove(tempDir);
  });

  it("ルールファイルを読み込む", async () => {
    const filePath = join(tempDir, ".artifacts");
    await fse.writeFile(filePath, "# rules\napp/*.php\n!vendor\n");

    const ruleSet = await loadRuleFile(filePath);

    expect(ruleSet.dialect).toBe("glob");
    expect(ruleSet.includes.map((r) => r.pattern)).toEqual(["app/*.php"]);
    expect(ruleSet.excludes.map((r) => r.pattern)).toEqual(["vendor"]);
  });

  it("dialect を指定できる", async () => {
    const filePath = join(tempDir, ".artifacts");
    await fse.writeFile(filePath, "*.json\n");

    const ruleSet = await loadRuleFile(filePath, { dialect: "glob" });

    expect(ruleSet.dialect).toBe("glob");
  });

  it("存在しない場合はテンプレートを作成して ConfigMissingError", async () => {
    const filePath = join(tempDir, ".artifacts");

    const promise = loadRuleFile(filePath);

    await expect(promise).rejects.toBeInstanceOf(ConfigMissingError);
    await expect(promise).rejects.toMatchObject({ filePath, created: true });
    expect(await fse.readFile(filePath, "utf8")).toBe(CONFIG_TEMPLATE);
  });

  it("テンプレートはコメントのみでルールを含まない", async () => {
    const filePath = join(tempDir, ".artifacts");
    await writeConfigTemplate(filePath);

    const ruleSet = await loadRuleFile(filePath);

    expect(ruleSet.rules).toEqual([]);
  });

  it("ディレクトリを指定すると ConfigLoadError", async () => {
    const error = await loadRuleFile(tempDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigLoadError);
    expect(error).toHaveProperty("message", `${tempDir}: not a regular file`);
  });
});

describe("ensureRuleFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fse.mkdtemp(join(tmpdir(), "loader-test-"));
  });

  afterEach(async () => {
    await fse.remove(tempDir);
  });

  it("存在するファイルはそのまま", async () => {
    const filePath = join(tempDir, "rules.txt");
    await fse.writeFile(filePath, "a.txt\n");

    await expect(ensureRuleFile(filePath)).resolves.toBeUndefined();
    expect(await fse.readFile(filePath, "utf8")).toBe("a.txt\n");
  });

  it("既存ファイルにはテンプレートを上書きしない", async () => {
    const filePath = join(tempDir, "rules.txt");
    await fse.writeFile(filePath, "a.txt\n");

    await expect(writeConfigTemplate(filePath)).rejects.toThrow(
      `${filePath}: cannot create template: EEXIST`,
    );
    expect(await fse.readFile(filePath, "utf8")).toBe("a.txt\n");
  });
});
