import type { Command, RegistryEntry } from "../types/Command";
import type { EngineFailure, LoadResult, MutationResult } from "../types/EngineResult";
import { readCommandsFile, writeCommandsFile } from "../utils/commandPersistence";
import { describeEntry } from "../utils/commandUtil";
import { ActivityLog } from "./activityLog";

const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Ordered, index-addressed command definitions backed by one JSON document.
 *
 * Positions are the only identity a command has. Every mutation is applied in
 * memory first and then awaits its write; a failed write is reported but the
 * in-memory change stays.
 */
export class CommandRegistry {
  private entries: RegistryEntry[] = [];
  private writes: Promise<void> = Promise.resolve();
  private lastLoadResult: LoadResult = { ok: true, loaded: 0, fresh: true };

  private constructor(
    readonly filePath: string,
    private readonly activity: ActivityLog,
  ) {}

  static async open(filePath: string, activity: ActivityLog = new ActivityLog()): Promise<CommandRegistry> {
    const registry = new CommandRegistry(filePath, activity);
    await registry.load();
    return registry;
  }

  get length(): number {
    return this.entries.length;
  }

  get lastLoad(): LoadResult {
    return this.lastLoadResult;
  }

  async load(): Promise<LoadResult> {
    const read = await readCommandsFile(this.filePath);

    if (read.status === "missing") {
      this.entries = [];
      this.lastLoadResult = { ok: true, loaded: 0, fresh: true };
      this.activity.record("registry", "commands_loaded", `no commands file at ${this.filePath}, starting fresh`);
    } else if (read.status === "loaded") {
      this.entries = read.entries;
      this.lastLoadResult = { ok: true, loaded: read.entries.length, fresh: false };
      this.activity.record("registry", "commands_loaded", `loaded ${read.entries.length} command(s)`);
    } else {
      this.entries = [];
      this.lastLoadResult = {
        ok: false,
        error: "LOAD_RECOVERED_EMPTY",
        detail: `${this.filePath}: ${read.reason}`,
      };
      console.error(`Failed to load commands, starting empty: ${this.lastLoadResult.detail}`);
      this.activity.record("registry", "commands_load_failed", this.lastLoadResult.detail);
    }

    return this.lastLoadResult;
  }

  list(): RegistryEntry[] {
    return [...this.entries];
  }

  get(index: number): RegistryEntry | undefined {
    return this.inRange(index) ? this.entries[index] : undefined;
  }

  async add(command: Command): Promise<MutationResult> {
    this.entries.push(command);
    return this.persist("command_added", describeEntry(command));
  }

  async update(index: number, command: Command): Promise<MutationResult> {
    if (!this.inRange(index)) return this.outOfRange("update", index);
    this.entries[index] = command;
    return this.persist("command_updated", `#${index} ${describeEntry(command)}`);
  }

  async delete(index: number): Promise<MutationResult> {
    if (!this.inRange(index)) return this.outOfRange("delete", index);
    const [removed] = this.entries.splice(index, 1);
    return this.persist("command_deleted", `#${index} ${removed ? describeEntry(removed) : ""}`);
  }

  async move(from: number, to: number): Promise<MutationResult> {
    if (!this.inRange(from) || !this.inRange(to)) return this.outOfRange("move", from, to);
    const [moved] = this.entries.splice(from, 1);
    if (moved) this.entries.splice(to, 0, moved);
    return this.persist("command_moved", `#${from} -> #${to}`);
  }

  private inRange(index: number) {
    return Number.isInteger(index) && index >= 0 && index < this.entries.length;
  }

  private outOfRange(op: string, ...indices: number[]): EngineFailure<"INDEX_OUT_OF_RANGE"> {
    const detail = `${op}: index ${indices.join(" -> ")} out of range (length ${this.entries.length})`;
    this.activity.record("registry", "command_rejected", detail);
    return { ok: false, error: "INDEX_OUT_OF_RANGE", detail };
  }

  private async persist(action: string, detail: string): Promise<MutationResult> {
    const snapshot = [...this.entries];
    const write = this.writes.then(() => writeCommandsFile(this.filePath, snapshot));
    // Keep the chain alive after a failed write; the failure is reported below.
    this.writes = write.catch(() => undefined);

    try {
      await write;
    } catch (e) {
      const failure = `${this.filePath}: ${errorMessage(e)}`;
      console.error(`Failed to save commands: ${failure}`);
      this.activity.record("registry", "commands_save_failed", failure);
      return {
        ok: false,
        error: "PERSISTENCE_FAILURE",
        detail: failure,
        applied: true,
        length: snapshot.length,
      };
    }

    this.activity.record("registry", action, detail);
    return { ok: true, length: snapshot.length };
  }
}
