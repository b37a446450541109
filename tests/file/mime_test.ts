/**
 * file/mime.ts のテスト
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  checkFileCommand,
  createContentSniffer,
  createFileCommandSniffer,
  createSniffer,
  DEFAULT_MIME_TYPE,
  DependencyMissingError,
  detectMimeType,
  isBinaryContent,
  lookupMimeType,
} from "../../src/file/mime.js";
import type { ContentSniffer } from "../../src/types/mod.js";
import type { CommandOutput, CommandRunner } from "../../src/utils/command.js";

/** 呼び出しを記録するコマンドランナー */
function createRecordingRunner(output: CommandOutput): {
  runner: CommandRunner;
  calls: Array<{ command: string; args: string[] }>;
} {
  const calls: Array<{ command: string; args: string[] }> = [];
  const runner: CommandRunner = (command, args) => {
    calls.push({ command, args });
    return Promise.resolve(output);
  };
  return { runner, calls };
}

/** 指定のエラーで失敗するコマンドランナー */
function createFailingRunner(code: string): CommandRunner {
  return () =>
    Promise.reject(Object.assign(new Error(`spawn file ${code}`), { code }));
}

/** 固定値を返す Sniffer */
function fixedSniffer(result: string | null): ContentSniffer {
  return { sniff: () => Promise.resolve(result) };
}

describe("lookupMimeType", () => {
  it("拡張子から判定する", () => {
    expect(lookupMimeType("index.html")).toBe("text/html");
    expect(lookupMimeType("a/b/data.json")).toBe("application/json");
  });

  it("大文字の拡張子も判定する", () => {
    expect(lookupMimeType("script.JS")).toBe("text/javascript");
  });

  it("未登録・拡張子なしは null", () => {
    expect(lookupMimeType("archive.xyz")).toBeNull();
    expect(lookupMimeType("README")).toBeNull();
    expect(lookupMimeType(".env")).toBeNull();
  });
});

describe("isBinaryContent", () => {
  it("NULLバイトがあればバイナリ", () => {
    expect(isBinaryContent(new Uint8Array([0x41, 0x00, 0x42]))).toBe(true);
  });

  it("NULLバイトがなければテキスト", () => {
    expect(isBinaryContent(new Uint8Array([0x41, 0x42]))).toBe(false);
    expect(isBinaryContent(new Uint8Array())).toBe(false);
  });
});

describe("createContentSniffer", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fse.mkdtemp(join(tmpdir(), "mime-test-"));
  });

  afterEach(async () => {
    await fse.remove(tempDir);
  });

  it("テキストファイルは text/plain", async () => {
    const filePath = join(tempDir, "LICENSE");
    await fse.writeFile(filePath, "Permission is hereby granted\n");
    expect(await createContentSniffer().sniff(filePath)).toBe("text/plain");
  });

  it("空のファイルは text/plain", async () => {
    const filePath = join(tempDir, "empty");
    await fse.writeFile(filePath, "");
    expect(await createContentSniffer().sniff(filePath)).toBe("text/plain");
  });

  it("NULLバイトを含むファイルは application/octet-stream", async () => {
    const filePath = join(tempDir, "blob");
    await fse.writeFile(filePath, Buffer.from([0x7f, 0x45, 0x00, 0x01]));
    expect(await createContentSniffer().sniff(filePath)).toBe(
      DEFAULT_MIME_TYPE,
    );
  });
});

describe("createFileCommandSniffer", () => {
  it("file --mime-type -b の出力を返す", async () => {
    const { runner, calls } = createRecordingRunner({
      code: 0,
      stdout: "image/png\n",
      stderr: "",
    });
    const sniffer = createFileCommandSniffer(runner);

    expect(await sniffer.sniff("/tmp/picture")).toBe("image/png");
    expect(calls).toEqual([
      { command: "file", args: ["--mime-type", "-b", "/tmp/picture"] },
    ]);
  });

  it("終了コードが0以外なら null", async () => {
    const { runner } = createRecordingRunner({
      code: 1,
      stdout: "",
      stderr: "cannot open",
    });
    expect(await createFileCommandSniffer(runner).sniff("/tmp/x")).toBeNull();
  });
});

describe("checkFileCommand", () => {
  it("コマンドが存在すれば成功する", async () => {
    const { runner, calls } = createRecordingRunner({
      code: 0,
      stdout: "file-5.45\n",
      stderr: "",
    });
    await expect(checkFileCommand(runner)).resolves.toBeUndefined();
    expect(calls[0].args).toEqual(["--version"]);
  });

  it("コマンドが見つからなければ DependencyMissingError", async () => {
    const promise = checkFileCommand(createFailingRunner("ENOENT"));
    await expect(promise).rejects.toBeInstanceOf(DependencyMissingError);
    await expect(promise).rejects.toMatchObject({ command: "file" });
  });

  it("その他のエラーはそのまま送出する", async () => {
    await expect(checkFileCommand(createFailingRunner("EACCES"))).rejects
      .toThrow("spawn file EACCES");
  });
});

describe("createSniffer", () => {
  it("none では Sniffer を作らない", () => {
    expect(createSniffer("none")).toBeUndefined();
  });

  it("content と file では Sniffer を作る", () => {
    expect(createSniffer("content")).toBeDefined();
    expect(createSniffer("file")).toBeDefined();
  });
});

describe("detectMimeType", () => {
  it("拡張子テーブルを優先する", async () => {
    expect(await detectMimeType("a.json", fixedSniffer("text/x-custom"))).toBe(
      "application/json",
    );
  });

  it("テーブルにない場合は Sniffer を使う", async () => {
    expect(await detectMimeType("Makefile", fixedSniffer("text/plain"))).toBe(
      "text/plain",
    );
  });

  it("Sniffer が判定できなければデフォルト", async () => {
    expect(await detectMimeType("Makefile", fixedSniffer(null))).toBe(
      DEFAULT_MIME_TYPE,
    );
  });

  it("Sniffer の失敗はデフォルトにフォールバックする", async () => {
    const failing: ContentSniffer = {
      sniff: () => Promise.reject(new Error("EACCES")),
    };
    expect(await detectMimeType("data.bin", failing)).toBe(DEFAULT_MIME_TYPE);
  });

  it("Sniffer なしはデフォルト", async () => {
    expect(await detectMimeType("data.bin")).toBe(DEFAULT_MIME_TYPE);
  });
});
