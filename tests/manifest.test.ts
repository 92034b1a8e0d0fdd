// CHANGE: Cover manifest serialization and the temp-file write path.
// WHY: Published manifests must round-trip every descriptor field unchanged.

import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildManifest, serializeManifest, writeManifest } from "../src/manifest.js";
import { makeTempDir } from "./support/fs.js";
import { captureLogs } from "./support/logs.js";

describe("serializeManifest", () => {
  it("indents with two spaces and keeps slashes and non-ASCII literal", () => {
    const text = serializeManifest(buildManifest([{ name: "音乐", url: "https://cdn.example.com/js/a.js" }], "0.2.0"));

    expect(text).toBe(
      [
        "{",
        '  "desc": "0.2.0",',
        '  "plugins": [',
        "    {",
        '      "name": "音乐",',
        '      "url": "https://cdn.example.com/js/a.js"',
        "    }",
        "  ]",
        "}"
      ].join("\n")
    );
  });

  it("keeps an escaped backslash that precedes a slash", () => {
    const text = serializeManifest(buildManifest([{ name: "a\\/b", url: "js/a.js" }]));

    expect(text).toContain('"name": "a\\\\/b"');
  });
});

describe("writeManifest", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(root);
  });

  it("writes the document and leaves no temporary file", async () => {
    const logs = captureLogs();
    const target = path.join(root, "dist", "all.json");

    const written = await writeManifest(target, buildManifest([{ name: "A", url: "js/A.js" }]));

    expect(written).toBe(true);
    expect(await fs.readJson(target)).toEqual({ desc: "0.2.0", plugins: [{ name: "A", url: "js/A.js" }] });
    expect(await fs.pathExists(`${target}.tmp`)).toBe(false);
    expect(logs.out()[0]).toContain(`[SUCCESS] Saved 1 plugins to ${target}`);
  });

  it("reads back backslash-slash sequences unchanged", async () => {
    captureLogs();
    const target = path.join(root, "plugins.json");
    const plugin = { name: "a\\/b", url: "http://x/a.js", description: "C:\\/tmp" };

    expect(await writeManifest(target, buildManifest([plugin]))).toBe(true);

    expect(await fs.readJson(target)).toEqual({ desc: "0.2.0", plugins: [plugin] });
    expect(await fs.readFile(target, "utf8")).not.toMatch(/(?<!\\)(?:\\\\)*\\\//);
  });

  it("reports failure without throwing", async () => {
    const logs = captureLogs();
    await fs.outputFile(path.join(root, "blocker"), "");
    const target = path.join(root, "blocker", "all.json");

    const written = await writeManifest(target, buildManifest([]));

    expect(written).toBe(false);
    expect(logs.err()[0]).toContain(`[ERROR] Failed to save ${target}`);
  });
});
