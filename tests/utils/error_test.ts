/**
 * エラー検出ユーティリティのテスト
 */

import { describe, expect, it } from "vitest";
import {
  getErrorCode,
  isFileNotFoundError,
  isPermissionDeniedError,
  toError,
} from "../../src/utils/error.js";

/** code 付きのエラーを作成 */
function systemError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe("getErrorCode", () => {
  it("code を取得する", () => {
    expect(getErrorCode(systemError("ENOENT"))).toBe("ENOENT");
  });

  it("code がなければ undefined", () => {
    expect(getErrorCode(new Error("plain"))).toBeUndefined();
    expect(getErrorCode("ENOENT")).toBeUndefined();
  });
});

describe("isFileNotFoundError", () => {
  it("ENOENT と ENOTDIR を検出する", () => {
    expect(isFileNotFoundError(systemError("ENOENT"))).toBe(true);
    expect(isFileNotFoundError(systemError("ENOTDIR"))).toBe(true);
  });

  it("No such file メッセージを検出する", () => {
    expect(isFileNotFoundError(new Error("No such file or directory"))).toBe(
      true,
    );
  });

  it("関係ないエラーは false を返す", () => {
    expect(isFileNotFoundError(systemError("EACCES"))).toBe(false);
    expect(isFileNotFoundError(undefined)).toBe(false);
  });
});

describe("isPermissionDeniedError", () => {
  it("EACCES と EPERM を検出する", () => {
    expect(isPermissionDeniedError(systemError("EACCES"))).toBe(true);
    expect(isPermissionDeniedError(systemError("EPERM"))).toBe(true);
  });

  it("Permission denied メッセージを検出する", () => {
    expect(isPermissionDeniedError(new Error("Permission denied"))).toBe(true);
  });

  it("関係ないエラーは false を返す", () => {
    expect(isPermissionDeniedError(systemError("ENOENT"))).toBe(false);
  });
});

describe("toError", () => {
  it("Error はそのまま返す", () => {
    const error = new Error("x");
    expect(toError(error)).toBe(error);
  });

  it("それ以外は文字列化して包む", () => {
    expect(toError("boom").message).toBe("boom");
  });
});
