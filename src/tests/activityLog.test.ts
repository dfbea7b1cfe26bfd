import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ActivityLog } from "../libs/activityLog";

describe("ActivityLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "runboard-activity-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("keeps the most recent 500 events", () => {
    const log = new ActivityLog();
    for (let i = 0; i < 505; i++) log.record("system", `e${i}`);

    const tail = log.tail(500);
    expect(tail).toHaveLength(500);
    expect(tail[0]?.action).toBe("e5");
    expect(log.tail(1)[0]?.action).toBe("e504");
  });

  it("appends each event as one NDJSON line", async () => {
    const file = path.join(dir, "logs", "activity.ndjson");
    const log = new ActivityLog(file);
    const first = log.record("registry", "command_added", "Build (single)");
    const second = log.record("execution", "command_launched");
    await log.flush();

    const lines = (await readFile(file, "utf8")).trimEnd().split("\n");
    expect(lines.map((l) => JSON.parse(l))).toEqual([first, second]);
    expect(first).toMatchObject({ type: "registry", action: "command_added", detail: "Build (single)" });
    expect(first.id).toMatch(/^evt_[a-z0-9]+_[a-z0-9]{1,6}$/);
  });
});
