import type { CommandKind } from "./Command";

export type EngineErrorCode =
  | "INDEX_OUT_OF_RANGE"
  | "EMPTY_COMMAND"
  | "SCRIPT_NOT_FOUND"
  | "UNKNOWN_COMMAND_KIND"
  | "LAUNCH_FAILURE"
  | "PERSISTENCE_FAILURE"
  | "LOAD_RECOVERED_EMPTY";

export type EngineFailure<E extends EngineErrorCode = EngineErrorCode> = {
  ok: false;
  error: E;
  detail: string;
};

export type MutationResult =
  | { ok: true; length: number }
  | EngineFailure<"INDEX_OUT_OF_RANGE">
  | (EngineFailure<"PERSISTENCE_FAILURE"> & { applied: true; length: number });

export type LoadResult =
  | { ok: true; loaded: number; fresh: boolean }
  | EngineFailure<"LOAD_RECOVERED_EMPTY">;

export type LaunchResult =
  | { ok: true; pid: number; name: string; kind: CommandKind; captured: boolean }
  | EngineFailure<
      | "INDEX_OUT_OF_RANGE"
      | "EMPTY_COMMAND"
      | "SCRIPT_NOT_FOUND"
      | "UNKNOWN_COMMAND_KIND"
      | "LAUNCH_FAILURE"
    >;
