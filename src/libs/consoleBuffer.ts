import type { ConsoleChunk, ConsoleStream } from "../types/ConsoleChunk";
import { getIsoTime } from "../utils/timeUtil";

/**
 * Bounded history of relayed output, read back by sequence number.
 *
 * Oldest chunks are evicted once either `limit` chunks or `maxChars`
 * characters are exceeded; the newest chunk is always kept.
 */
export class ConsoleBuffer {
  private chunks: ConsoleChunk[] = [];
  private nextSeq = 1;
  private totalChars = 0;

  constructor(
    private readonly limit: number,
    private readonly maxChars: number = Number.POSITIVE_INFINITY,
  ) {}

  append(stream: ConsoleStream, text: string): ConsoleChunk {
    const chunk: ConsoleChunk = { seq: this.nextSeq++, stream, text, timestamp: getIsoTime() };
    this.chunks.push(chunk);
    this.totalChars += text.length;

    while (this.chunks.length > this.limit || (this.totalChars > this.maxChars && this.chunks.length > 1)) {
      const evicted = this.chunks.shift();
      if (!evicted) break;
      this.totalChars -= evicted.text.length;
    }
    return chunk;
  }

  read(afterSeq = 0, limit = 200): ConsoleChunk[] {
    return this.chunks.filter((c) => c.seq > afterSeq).slice(0, limit);
  }

  get size() {
    return this.chunks.length;
  }

  get chars() {
    return this.totalChars;
  }

  get lastSeq() {
    return this.nextSeq - 1;
  }

  clear() {
    this.chunks = [];
    this.totalChars = 0;
  }
}
