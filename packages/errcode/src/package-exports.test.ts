/**
 * Tests for the published entry points of every workspace package
 */
import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

const packagesDir = join(dirname(fileURLToPath(import.meta.url)), "..", "..");
const packageNames = ["errcode", "errcode-grpc", "errcode-mysql", "errcode-googleapis"];

function readManifest(name: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(join(packagesDir, name, "package.json"), "utf8"));
  expect(typeof parsed).toBe("object");
  return Object.fromEntries(Object.entries(parsed ?? {}));
}

describe.each(packageNames)("%s package.json", (name) => {
  const manifest = readManifest(name);
  const exportsField = Object.entries(manifest.exports ?? {});

  it("ships the dist directory it points at", () => {
    expect(manifest.files).toEqual(["dist"]);
    expect(manifest.types).toBe("./dist/index.d.ts");
    expect(manifest.main).toBe("./dist/index.cjs");
  });

  it("resolves every published condition into dist", () => {
    expect(exportsField.length).toBeGreaterThan(0);
    for (const [, target] of exportsField) {
      expect(target).toMatchObject({
        types: expect.stringMatching(/^\.\/dist\/.+\.d\.ts$/),
        import: expect.stringMatching(/^\.\/dist\/.+\.js$/),
        require: expect.stringMatching(/^\.\/dist\/.+\.cjs$/),
      });
    }
  });

  it("lists the source condition first and points it at an existing file", () => {
    for (const [, target] of exportsField) {
      const conditions = Object.entries(target ?? {});
      expect(conditions[0]?.[0]).toBe("source");
      const source = conditions[0]?.[1];
      expect(typeof source).toBe("string");
      expect(existsSync(join(packagesDir, name, String(source)))).toBe(true);
    }
  });
});
