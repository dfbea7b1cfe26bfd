export type ConsoleStream = "stdout" | "stderr";

export type ConsoleChunk = {
  seq: number;
  stream: ConsoleStream;
  text: string;
  timestamp: string;
};
