import type { ChildProcess } from "node:child_process";
import type { LaunchResult } from "../types/EngineResult";
import { buildLaunchPlan, launchDetached } from "../utils/processLauncher";
import { deliver, relayStream, type Sink } from "../utils/streamRelay";
import { ActivityLog } from "./activityLog";
import { CommandRegistry } from "./commandRegistry";

export class ExecutionEngine {
  private outputSink: Sink | null = null;
  private errorSink: Sink | null = null;

  constructor(
    readonly registry: CommandRegistry,
    private readonly activity: ActivityLog = new ActivityLog(),
  ) {}

  registerOutputSink(sink: Sink | null) {
    this.outputSink = sink;
  }

  registerErrorSink(sink: Sink | null) {
    this.errorSink = sink;
  }

  /**
   * Launches the command at `index` and returns once the OS has accepted the
   * process. The child's exit status is never observed.
   */
  async executeAt(index: number): Promise<LaunchResult> {
    const entry = this.registry.get(index);
    if (!entry) {
      const detail = `Invalid command index: ${index} (length ${this.registry.length})`;
      this.activity.record("execution", "command_rejected", detail);
      return { ok: false, error: "INDEX_OUT_OF_RANGE", detail };
    }

    this.activity.record("execution", "command_requested", `#${index} ${entry.name}`);

    const planned = await buildLaunchPlan(entry);
    if (!planned.ok) {
      console.error(planned.detail);
      this.activity.record("execution", "command_rejected", `${planned.error}: ${planned.detail}`);
      return planned;
    }
    const { plan } = planned;

    // Drains keep the sinks that were registered when they started.
    const outputSink = this.outputSink;
    const errorSink = this.errorSink;

    if (outputSink) {
      for (const line of plan.echo) deliver(outputSink, "stdout", `$ ${line}\n`);
    }

    const attach = (child: ChildProcess) => {
      if (outputSink && child.stdout) void relayStream(child.stdout, outputSink, "stdout");
      if (errorSink && child.stderr) void relayStream(child.stderr, errorSink, "stderr");
    };

    const launched = await launchDetached(
      plan,
      { stdout: outputSink !== null, stderr: errorSink !== null },
      attach,
    );
    if (!launched.ok) {
      console.error(launched.detail);
      this.activity.record("execution", "command_launch_failed", launched.detail);
      return launched;
    }

    const captured = outputSink !== null || errorSink !== null;
    this.activity.record(
      "execution",
      "command_launched",
      `${plan.name} (${plan.kind}) pid=${launched.pid}${captured ? ", output captured" : ""}`,
    );
    return { ok: true, pid: launched.pid, name: plan.name, kind: plan.kind, captured };
  }
}
