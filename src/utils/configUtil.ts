import os from "node:os";
import path from "node:path";

export type RunboardConfig = {
  commandsFilePath: string;
  activityLogFilePath: string;
  consoleLimit: number;
  consoleMaxChars: number;
};

const DEFAULT_CONSOLE_LIMIT = 1000;
const DEFAULT_CONSOLE_MAX_CHARS = 1_000_000;

const resolveConfiguredPath = (configured: string | undefined, cwd: string) => {
  if (configured && configured.trim().length > 0) {
    return path.isAbsolute(configured) ? configured : path.resolve(cwd, configured);
  }
  return null;
};

export const defaultStorageDir = (
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
) => {
  if (platform === "win32") return path.join(home, "AppData", "Roaming", "Runboard");
  if (platform === "darwin") return path.join(home, "Library", "Application Support", "Runboard");
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && path.isAbsolute(xdg) ? xdg : path.join(home, ".config");
  return path.join(base, "runboard");
};

const parseLimit = (raw: string | undefined, fallback: number) => {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
};

export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunboardConfig => {
  const commandsFilePath =
    resolveConfiguredPath(env.RUNBOARD_COMMANDS_FILE, cwd) ??
    path.join(defaultStorageDir(process.platform, env), "commands.json");

  const activityLogFilePath =
    resolveConfiguredPath(env.RUNBOARD_ACTIVITY_LOG_FILE, cwd) ??
    path.join(path.dirname(commandsFilePath), "activity.ndjson");

  return {
    commandsFilePath,
    activityLogFilePath,
    consoleLimit: parseLimit(env.RUNBOARD_CONSOLE_LIMIT, DEFAULT_CONSOLE_LIMIT),
    consoleMaxChars: parseLimit(env.RUNBOARD_CONSOLE_MAX_CHARS, DEFAULT_CONSOLE_MAX_CHARS),
  };
};
