/**
 * main.ts のテスト
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { EXIT_CODES, main } from "../main.js";
import { closeLogger, stripAnsi } from "../src/ui/logger.js";

describe("main", () => {
  let tempDir: string;
  let sourceDir: string;
  let configFile: string;
  let outputDir: string;
  let errorSpy: MockInstance<typeof console.error>;

  /** console.error に渡されたメッセージ（ANSI除去済み） */
  function errorLines(): string[] {
    return errorSpy.mock.calls.map((args) =>
      stripAnsi(args.map(String).join(" "))
    );
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = await fse.mkdtemp(join(tmpdir(), "main-test-"));
    sourceDir = join(tempDir, "project");
    configFile = join(tempDir, ".artifacts");
    outputDir = join(tempDir, "artifacts");
    await fse.outputFile(join(sourceDir, "docs", "guide.md"), "# guide");
    await fse.outputFile(join(sourceDir, "src", "main.js"), "run();");
  });

  afterEach(async () => {
    await closeLogger();
    vi.restoreAllMocks();
    await fse.remove(tempDir);
  });

  it("--help は成功で終了する", async () => {
    expect(await main(["--help"])).toBe(EXIT_CODES.SUCCESS);
  });

  it("収集して metadata.json を作成する", async () => {
    await fse.writeFile(configFile, "*.md\nsrc/main.js\n");

    const code = await main([sourceDir, configFile, "-o", outputDir, "-q"]);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect((await fse.readdir(outputDir)).sort()).toEqual([
      "guide.md",
      "main.js",
      "metadata.json",
    ]);
  });

  it("設定ファイルがなければテンプレートを作成して失敗する", async () => {
    const code = await main([sourceDir, configFile, "-o", outputDir, "-q"]);

    expect(code).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(await fse.pathExists(configFile)).toBe(true);
    expect(await fse.pathExists(outputDir)).toBe(false);
  });

  it("出力ディレクトリが存在すれば失敗する", async () => {
    await fse.writeFile(configFile, "*.md\n");
    await fse.ensureDir(outputDir);

    const code = await main([sourceDir, configFile, "-o", outputDir, "-q"]);

    expect(code).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(errorLines()).toContain(
      `✗ Output directory '${outputDir}' already exists. Use --force to overwrite.`,
    );
  });

  it("ソースディレクトリがなければ失敗する", async () => {
    await fse.writeFile(configFile, "*.md\n");
    const missing = join(tempDir, "missing");

    const code = await main([missing, configFile, "-o", outputDir, "-q"]);

    expect(code).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(errorLines()).toContain(
      `✗ Source directory '${missing}' not found`,
    );
  });

  it("不明なオプションは失敗する", async () => {
    expect(await main(["--bogus"])).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(errorLines()).toContain("✗ Unknown option: --bogus");
  });

  it("clear サブコマンドで出力ディレクトリを削除する", async () => {
    await fse.outputFile(join(outputDir, "guide.md"), "# guide");

    expect(await main(["clear", "-o", outputDir, "-q"])).toBe(
      EXIT_CODES.SUCCESS,
    );
    expect(await fse.pathExists(outputDir)).toBe(false);
  });
});
