import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { RegistryEntry } from "../types/Command";
import type { EngineFailure, MutationResult } from "../types/EngineResult";

export const failureResult = (failure: EngineFailure): CallToolResult => ({
  content: [{ type: "text", text: `${failure.error}: ${failure.detail}` }],
  structuredContent: { ok: false, error: failure.error, detail: failure.detail },
  isError: true,
});

// PERSISTENCE_FAILURE still reports the applied change alongside the error.
export const mutationResult = (result: MutationResult, okText: string): CallToolResult => {
  if (result.ok) {
    return {
      content: [{ type: "text", text: okText }],
      structuredContent: { ok: true, length: result.length },
    };
  }
  if (result.error === "PERSISTENCE_FAILURE") {
    return {
      content: [{ type: "text", text: `${okText} (not saved: ${result.detail})` }],
      structuredContent: { ...result },
      isError: true,
    };
  }
  return failureResult(result);
};

export const entryView = (entry: RegistryEntry, index: number) => ({
  index,
  name: entry.name,
  commandType: entry.kind === "unrecognized" ? entry.rawKind : entry.kind,
  content: entry.payload,
  description: entry.description,
});
