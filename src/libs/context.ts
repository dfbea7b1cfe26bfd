import type { RunboardConfig } from "../utils/configUtil";
import { ActivityLog } from "./activityLog";
import { CommandRegistry } from "./commandRegistry";
import { ConsoleBuffer } from "./consoleBuffer";
import { ExecutionEngine } from "./executionEngine";

export type AppContext = {
  config: RunboardConfig;
  activity: ActivityLog;
  registry: CommandRegistry;
  engine: ExecutionEngine;
  console: ConsoleBuffer;
};

/**
 * Builds the single engine instance for this process. Both sinks feed the
 * console buffer: stdout is the MCP transport, so nothing may be inherited.
 */
export const createAppContext = async (config: RunboardConfig): Promise<AppContext> => {
  const activity = new ActivityLog(config.activityLogFilePath);
  const registry = await CommandRegistry.open(config.commandsFilePath, activity);
  const engine = new ExecutionEngine(registry, activity);
  const consoleBuffer = new ConsoleBuffer(config.consoleLimit, config.consoleMaxChars);

  engine.registerOutputSink((text) => {
    consoleBuffer.append("stdout", text);
  });
  engine.registerErrorSink((text) => {
    consoleBuffer.append("stderr", text);
  });

  return { config, activity, registry, engine, console: consoleBuffer };
};
