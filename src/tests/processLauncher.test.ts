import { chmod, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCommand, fromPersisted } from "../utils/commandUtil";
import { buildLaunchPlan, quoteForShell } from "../utils/processLauncher";

describe("buildLaunchPlan", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "runboard-plan-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs a single command line as is", async () => {
    const result = await buildLaunchPlan(createCommand({ name: "Date", kind: "single", payload: "date -u" }));

    expect(result).toEqual({
      ok: true,
      plan: { kind: "single", name: "Date", script: "date -u", echo: ["date -u"] },
    });
  });

  it("joins the non-blank lines of a multi command into one script", async () => {
    const result = await buildLaunchPlan(
      createCommand({ name: "Two", kind: "multi", payload: "echo line1\n\necho line2" }),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.plan.script).toBe("echo line1\necho line2");
    expect(result.plan.echo).toEqual(["echo line1", "echo line2"]);
  });

  it("refuses a multi command with no lines", async () => {
    const result = await buildLaunchPlan(createCommand({ name: "Nothing", kind: "multi", payload: "\n   \n" }));

    expect(result).toEqual({ ok: false, error: "EMPTY_COMMAND", detail: "No commands to execute in 'Nothing'" });
  });

  it("quotes an existing script path", async () => {
    const scriptDir = path.join(dir, "my scripts");
    await mkdir(scriptDir);
    const scriptPath = path.join(scriptDir, "run.sh");
    await writeFile(scriptPath, "#!/bin/sh\necho ok\n", "utf8");
    await chmod(scriptPath, 0o755);

    const result = await buildLaunchPlan(createCommand({ name: "Run", kind: "script", payload: scriptPath }));

    expect(result).toEqual({
      ok: true,
      plan: { kind: "script", name: "Run", script: quoteForShell(scriptPath), echo: [scriptPath] },
    });
  });

  it("reports a missing script", async () => {
    const missing = path.join(dir, "nope.sh");
    const result = await buildLaunchPlan(createCommand({ name: "Gone", kind: "script", payload: missing }));

    expect(result).toEqual({ ok: false, error: "SCRIPT_NOT_FOUND", detail: `Script file does not exist: ${missing}` });
  });

  it("rejects an unrecognized command type", async () => {
    const entry = fromPersisted({ name: "PS", command_type: "powershell", content: "Get-Date", description: "" });
    const result = await buildLaunchPlan(entry);

    expect(result).toEqual({
      ok: false,
      error: "UNKNOWN_COMMAND_KIND",
      detail: "Unknown command type 'powershell' for 'PS'",
    });
  });
});

describe("quoteForShell", () => {
  it("single-quotes for POSIX shells", () => {
    expect(quoteForShell("/tmp/it's here.sh", "linux")).toBe(`'/tmp/it'\\''s here.sh'`);
  });

  it("double-quotes for cmd.exe", () => {
    expect(quoteForShell("C:\\My Scripts\\run.bat", "win32")).toBe('"C:\\My Scripts\\run.bat"');
  });
});
