import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readCommandImport } from "../utils/commandImport";

describe("readCommandImport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "runboard-import-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads valid entries and lists the skipped ones", async () => {
    await writeFile(
      path.join(dir, "commands.yaml"),
      [
        "commands:",
        "  - name: Disk usage",
        "    type: single",
        "    content: df -h",
        "    description: free space",
        "  - name: Build",
        "    type: multi",
        "    content: |",
        "      cd /tmp",
        "",
        "      make",
        "  - name: ''",
        "    type: single",
        "    content: ls",
        "  - name: Deploy",
        "    type: powershell",
        "    content: deploy.ps1",
        "  - name: Blank",
        "    type: single",
        "    content: '   '",
        "",
      ].join("\n"),
      "utf8",
    );

    const imported = await readCommandImport("commands.yaml", dir);

    expect(imported.path).toBe(path.join(dir, "commands.yaml"));
    expect(imported.commands).toEqual([
      { name: "Disk usage", kind: "single", payload: "df -h", description: "free space" },
      { name: "Build", kind: "multi", payload: "cd /tmp\n\nmake\n", description: "" },
    ]);
    expect(imported.skipped).toEqual([
      "#2: missing name",
      "#3 Deploy: unknown type 'powershell'",
      "#4 Blank: empty content",
    ]);
  });

  it("returns nothing for a document without a commands list", async () => {
    const file = path.join(dir, "other.yaml");
    await writeFile(file, "workers:\n  - id: 1\n", "utf8");

    const imported = await readCommandImport(file);

    expect(imported.commands).toEqual([]);
    expect(imported.skipped).toEqual([]);
  });

  it("rejects when the file cannot be read", async () => {
    await expect(readCommandImport(path.join(dir, "absent.yaml"))).rejects.toThrow(/ENOENT/);
  });
});
