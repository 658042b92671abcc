import { describe, it, expect } from "vitest";
import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Code } from "./code";
import { fileSystemErrorCode, fileSystemErrorCoder, isSystemError } from "./fs";

function systemError(code: string, message = `${code}: failed`): Error {
  return Object.assign(new Error(message), { code, errno: -1, syscall: "open" });
}

describe("fileSystemErrorCode", () => {
  it("returns OK for null", () => {
    expect(fileSystemErrorCode(null)).toBe(Code.OK);
  });

  it.each([
    ["EEXIST", Code.AlreadyExists],
    ["ENOTEMPTY", Code.AlreadyExists],
    ["ENOENT", Code.NotFound],
    ["EACCES", Code.PermissionDenied],
    ["EPERM", Code.PermissionDenied],
    ["EINVAL", Code.InvalidArgument],
  ])("maps %s", (systemCode, expected) => {
    expect(fileSystemErrorCode(systemError(systemCode))).toBe(expected);
  });

  it("classifies a real EEXIST from mkdir", () => {
    const dir = mkdtempSync(join(tmpdir(), "errcode-"));
    try {
      let thrown: unknown;
      try {
        mkdirSync(dir);
      } catch (error) {
        thrown = error;
      }
      expect(fileSystemErrorCode(thrown)).toBe(Code.AlreadyExists);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("finds a system error deeper in the chain", () => {
    const error = new Error("could not load config", { cause: systemError("ENOENT") });
    expect(fileSystemErrorCode(error)).toBe(Code.NotFound);
  });

  it("returns Unknown for other system codes and non-string codes", () => {
    expect(fileSystemErrorCode(systemError("ECONNRESET"))).toBe(Code.Unknown);
    expect(fileSystemErrorCode(Object.assign(new Error("x"), { code: 5 }))).toBe(Code.Unknown);
    expect(fileSystemErrorCode(new Error("x"))).toBe(Code.Unknown);
  });

  it("is shared by fileSystemErrorCoder", () => {
    expect(fileSystemErrorCoder()).toBe(fileSystemErrorCoder());
  });
});

describe("isSystemError", () => {
  it("requires a string code", () => {
    expect(isSystemError(systemError("ENOENT"))).toBe(true);
    expect(isSystemError({ code: 2 })).toBe(false);
    expect(isSystemError("ENOENT")).toBe(false);
  });
});
