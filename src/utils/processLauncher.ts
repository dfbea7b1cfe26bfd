import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import type { CommandKind, RegistryEntry } from "../types/Command";
import type { EngineFailure } from "../types/EngineResult";
import { splitCommandLines } from "./commandUtil";
import { existsPath } from "./fsUtil";

export type LaunchPlan = {
  kind: CommandKind;
  name: string;
  /** Shell text handed to one interpreter invocation. */
  script: string;
  /** What the console shows before the process starts, one entry per line. */
  echo: string[];
};

export type PlanFailure = EngineFailure<"EMPTY_COMMAND" | "SCRIPT_NOT_FOUND" | "UNKNOWN_COMMAND_KIND">;

export const quoteForShell = (value: string, platform: NodeJS.Platform = process.platform) => {
  if (platform === "win32") return `"${value.replace(/"/g, '""')}"`;
  return `'${value.replace(/'/g, `'\\''`)}'`;
};

export const buildLaunchPlan = async (
  entry: RegistryEntry,
): Promise<{ ok: true; plan: LaunchPlan } | PlanFailure> => {
  switch (entry.kind) {
    case "single":
      return {
        ok: true,
        plan: { kind: "single", name: entry.name, script: entry.payload, echo: [entry.payload] },
      };

    case "multi": {
      const lines = splitCommandLines(entry.payload);
      if (lines.length === 0) {
        return { ok: false, error: "EMPTY_COMMAND", detail: `No commands to execute in '${entry.name}'` };
      }
      // One interpreter so cd / export carry across lines.
      return {
        ok: true,
        plan: { kind: "multi", name: entry.name, script: lines.join("\n"), echo: lines },
      };
    }

    case "script": {
      const scriptPath = entry.payload.trim();
      if (scriptPath.length === 0 || !(await existsPath(scriptPath))) {
        return { ok: false, error: "SCRIPT_NOT_FOUND", detail: `Script file does not exist: ${scriptPath}` };
      }
      return {
        ok: true,
        plan: { kind: "script", name: entry.name, script: quoteForShell(scriptPath), echo: [scriptPath] },
      };
    }

    case "unrecognized":
      return {
        ok: false,
        error: "UNKNOWN_COMMAND_KIND",
        detail: `Unknown command type '${entry.rawKind}' for '${entry.name}'`,
      };

    default: {
      const unreachable: never = entry;
      return unreachable;
    }
  }
};

export type CaptureMode = { stdout: boolean; stderr: boolean };

export type LaunchedProcess = { ok: true; child: ChildProcess; pid: number } | EngineFailure<"LAUNCH_FAILURE">;

/**
 * Starts the plan in its own session with stdin closed and resolves as soon as
 * the OS has accepted the process. The child is unref'd: nothing here waits
 * for it to exit.
 */
export const launchDetached = (
  plan: LaunchPlan,
  capture: CaptureMode,
  onChild?: (child: ChildProcess) => void,
): Promise<LaunchedProcess> => {
  const stdio: StdioOptions = [
    "ignore",
    capture.stdout ? "pipe" : "inherit",
    capture.stderr ? "pipe" : "inherit",
  ];

  return new Promise<LaunchedProcess>((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(plan.script, {
        shell: true,
        detached: true,
        windowsHide: true,
        stdio,
      });
    } catch (e) {
      resolve({
        ok: false,
        error: "LAUNCH_FAILURE",
        detail: `Exception launching '${plan.name}': ${e instanceof Error ? e.message : String(e)}`,
      });
      return;
    }

    // Readers must be attached before the first chunk can be emitted.
    onChild?.(child);

    let settled = false;
    child.once("spawn", () => {
      settled = true;
      child.unref();
      if (child.pid === undefined) {
        resolve({ ok: false, error: "LAUNCH_FAILURE", detail: `No pid for '${plan.name}'` });
        return;
      }
      resolve({ ok: true, child, pid: child.pid });
    });
    child.on("error", (e) => {
      if (!settled) {
        settled = true;
        resolve({ ok: false, error: "LAUNCH_FAILURE", detail: `Failed to launch '${plan.name}': ${e.message}` });
        return;
      }
      console.error(`Process error after launch ('${plan.name}'): ${e.message}`);
    });
  });
};
