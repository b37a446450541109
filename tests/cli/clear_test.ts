/**
 * cli/clear.ts のテスト
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clearCommand } from "../../src/cli/clear.js";

describe("clearCommand", () => {
  let tempDir: string;
  let outputDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    tempDir = await fse.mkdtemp(join(tmpdir(), "clear-command-test-"));
    outputDir = join(tempDir, "artifacts");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fse.remove(tempDir);
  });

  it("出力ディレクトリを削除する", async () => {
    await fse.outputFile(join(outputDir, "a.md"), "a");
    await fse.outputFile(join(outputDir, "metadata.json"), "{}\n");

    expect(await clearCommand({ output: outputDir, dryRun: false })).toBe(2);
    expect(await fse.pathExists(outputDir)).toBe(false);
  });

  it("存在しなくても成功する", async () => {
    expect(await clearCommand({ output: outputDir, dryRun: false })).toBe(0);
  });

  it("dry-run では削除しない", async () => {
    await fse.outputFile(join(outputDir, "a.md"), "a");

    expect(await clearCommand({ output: outputDir, dryRun: true })).toBe(1);
    expect(await fse.pathExists(join(outputDir, "a.md"))).toBe(true);
  });
});
