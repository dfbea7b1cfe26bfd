import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { ActivityEvent } from "../types/ActivityEvent";

export const appendActivityEvent = async (filePath: string, event: ActivityEvent): Promise<void> => {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await appendFile(filePath, `${JSON.stringify(event)}\n`, "utf8");
  } catch (e) {
    console.error(`Activity log write failed (${filePath}): ${e instanceof Error ? e.message : String(e)}`);
  }
};
