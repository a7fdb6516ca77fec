/**
 * Hash list input: positional arguments, repeated --tx, and --file (or "-" for stdin)
 */

import { readFile } from "fs/promises";
import { ConfigError, errorMessage } from "../core/errors.js";

export interface HashSources {
  args?: readonly string[];
  tx?: readonly string[];
  /** Path to a file with one hash per line; "-" reads stdin */
  file?: string;
}

export interface InputReaders {
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  }
  return chunks.join("");
}

export const nodeReaders: InputReaders = {
  readFile: (path) => readFile(path, "utf8"),
  readStdin: () => readStream(process.stdin),
};

/**
 * One hash per line; blank lines and lines starting with # are skipped
 */
export function parseHashList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Gather raw hashes in argument order: positionals, then --tx, then the file.
 * Validation and dedup happen later so malformed entries still get reported.
 */
export async function collectHashes(sources: HashSources, readers: InputReaders = nodeReaders): Promise<string[]> {
  const hashes = [...(sources.args ?? []), ...(sources.tx ?? [])];

  if (sources.file) {
    let text: string;
    try {
      text = sources.file === "-" ? await readers.readStdin() : await readers.readFile(sources.file);
    } catch (error) {
      throw new ConfigError(`Failed to read file ${sources.file}: ${errorMessage(error)}`, { file: sources.file });
    }
    hashes.push(...parseHashList(text));
  }

  return hashes;
}
