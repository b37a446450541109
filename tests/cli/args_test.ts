/**
 * cli/args.ts のテスト
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { parseArgs, UsageError } from "../../src/cli/args.js";

describe("parseArgs", () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("引数なしはデフォルト値", () => {
    expect(parseArgs([])).toEqual({
      command: "collect",
      sourceDir: ".",
      configFile: ".artifacts",
      output: "artifacts",
      verbose: false,
      quiet: false,
      dryRun: false,
      force: false,
      clear: false,
      dialect: "auto",
      sniff: "content",
      logFile: undefined,
    });
  });

  it("短いオプションと位置引数", () => {
    expect(parseArgs(["-c", "-f", "-d", "-o", "out", "src", "rules.txt"]))
      .toMatchObject({
        command: "collect",
        sourceDir: "src",
        configFile: "rules.txt",
        output: "out",
        clear: true,
        force: true,
        dryRun: true,
      });
  });

  it("長いオプション", () => {
    expect(
      parseArgs([
        "--output=build",
        "--clear",
        "--force",
        "--dry-run",
        "--verbose",
        "--log-file",
        "run.log",
      ]),
    ).toMatchObject({
      output: "build",
      clear: true,
      force: true,
      dryRun: true,
      verbose: true,
      logFile: "run.log",
    });
  });

  it("数字だけの位置引数も文字列として扱う", () => {
    expect(parseArgs(["2024"])).toMatchObject({ sourceDir: "2024" });
  });

  it("--dialect と --sniff", () => {
    expect(parseArgs(["--dialect", "GLOB", "--sniff", "file"])).toMatchObject(
      { dialect: "glob", sniff: "file" },
    );
  });

  it("clear サブコマンド", () => {
    expect(parseArgs(["clear", "-o", "out", "-d"])).toMatchObject({
      command: "clear",
      output: "out",
      dryRun: true,
    });
  });

  it("-h はヘルプを表示して null", () => {
    expect(parseArgs(["-h"])).toBeNull();
    expect(logSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^Usage: artifact \[options\] \[source_dir\]/),
    );
  });

  it("ヘルプは auto 書式で *.json の意味が変わることを説明する", () => {
    parseArgs(["--help"]);
    expect(logSpy).toHaveBeenCalledWith(
      expect.stringContaining(
        "wildcard is read as glob: there *.json matches only at the top level.",
      ),
    );
  });

  it("help サブコマンドはヘルプを表示して null", () => {
    expect(parseArgs(["help"])).toBeNull();
    expect(logSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^Usage: artifact \[options\] \[source_dir\]/),
    );
  });

  it("-V はバージョンを表示して null", () => {
    expect(parseArgs(["-V"])).toBeNull();
    expect(logSpy).toHaveBeenCalledWith("artifact v1.0.0");
  });

  describe("UsageError", () => {
    it("不明なオプション", () => {
      expect(() => parseArgs(["--bogus"])).toThrow(
        new UsageError("Unknown option: --bogus"),
      );
      expect(() => parseArgs(["-x"])).toThrow(UsageError);
    });

    it("位置引数が多すぎる", () => {
      expect(() => parseArgs(["a", "b", "c"])).toThrow(
        "Too many arguments: c",
      );
    });

    it("clear に余分な引数", () => {
      expect(() => parseArgs(["clear", "extra"])).toThrow(UsageError);
    });

    it("値のないオプション", () => {
      expect(() => parseArgs(["-o"])).toThrow(
        "Option --output requires a value",
      );
      expect(() => parseArgs(["--dialect"])).toThrow(UsageError);
    });

    it("不正な列挙値", () => {
      expect(() => parseArgs(["--dialect", "regex"])).toThrow(
        'Invalid --dialect value "regex" (expected auto, glob, simple)',
      );
      expect(() => parseArgs(["--sniff", "magic"])).toThrow(UsageError);
    });
  });
});
