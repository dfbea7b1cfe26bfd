import type { Readable } from "node:stream";
import stripAnsi from "strip-ansi";
import type { ConsoleStream } from "../types/ConsoleChunk";

export type Sink = (text: string) => void;

// Longest unterminated escape held back for the next read; anything longer is passed through.
const MAX_PENDING_ESCAPE = 256;

// ESC alone, a CSI without its final byte, an intermediate-only escape, or an OSC without BEL.
const INCOMPLETE_ESCAPE = /^\x1b(?:\[[0-?]*[ -/]*|[ -/]+|\][^\x07]*)?$/;

/**
 * Splits `text` into the part that can be stripped now and a trailing escape
 * sequence that the next read has to complete.
 */
export const splitPendingEscape = (text: string): [ready: string, pending: string] => {
  const start = text.lastIndexOf("\x1b");
  if (start === -1 || text.length - start > MAX_PENDING_ESCAPE) return [text, ""];
  const tail = text.slice(start);
  return INCOMPLETE_ESCAPE.test(tail) ? [text.slice(0, start), tail] : [text, ""];
};

export const deliver = (sink: Sink, label: ConsoleStream, text: string) => {
  try {
    sink(text);
  } catch (e) {
    console.error(`[${label}] sink failed: ${e instanceof Error ? e.message : String(e)}`);
  }
};

/**
 * Drains one child stream into a sink until end-of-stream.
 *
 * Chunks arrive in the order the child wrote them, decoded as UTF-8 (invalid
 * bytes become U+FFFD) with terminal escape sequences removed, including ones
 * split across reads. An escape still unterminated at end-of-stream is
 * dropped. A read error becomes one synthetic line on the same sink and ends
 * the drain.
 */
export const relayStream = (stream: Readable, sink: Sink, label: ConsoleStream): Promise<void> =>
  new Promise<void>((resolve) => {
    let finished = false;
    let pending = "";
    const finish = () => {
      if (finished) return;
      finished = true;
      stream.removeListener("data", onData);
      resolve();
    };

    const onData = (chunk: string) => {
      const [ready, rest] = splitPendingEscape(pending + chunk);
      pending = rest;
      const clean = stripAnsi(ready);
      if (clean.length > 0) deliver(sink, label, clean);
    };

    stream.setEncoding("utf8");
    stream.on("data", onData);
    stream.once("end", finish);
    stream.once("close", finish);
    stream.once("error", (e) => {
      deliver(sink, label, `[${label}] read error: ${e.message}\n`);
      finish();
    });
  });
