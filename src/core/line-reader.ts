/**
 * Line sources for the translator.
 *
 * @module core/line-reader
 */
import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';

const CHUNK_SIZE = 64 * 1024;

/**
 * Split text into lines, each keeping its `\n`.
 *
 * `\r\n` is normalized to `\n`. A final line without a newline is kept as is.
 */
export function splitLines(text: string): string[] {
  const normalized = text.replace(/\r\n/g, '\n');
  const lines = normalized.split(/(?<=\n)/);
  return lines.filter((line) => line.length > 0);
}

/**
 * Read a UTF-8 file line by line.
 *
 * The file is opened on the first iteration and closed once the lines are
 * exhausted, when the consumer stops early, or when a read fails. Open and
 * read errors propagate to the caller.
 *
 * @param path - File to read.
 */
export function* readLines(path: string): Generator<string, void, undefined> {
  const fd = openSync(path, 'r');
  try {
    const decoder = new StringDecoder('utf8');
    const buffer = Buffer.alloc(CHUNK_SIZE);
    let pending = '';

    for (;;) {
      const bytesRead = readSync(fd, buffer, 0, CHUNK_SIZE, null);
      if (bytesRead === 0) break;

      pending += decoder.write(buffer.subarray(0, bytesRead));
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        yield normalizeEnding(pending.slice(0, newline + 1));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    }

    pending += decoder.end();
    if (pending.length > 0) {
      yield pending;
    }
  } finally {
    closeSync(fd);
  }
}

function normalizeEnding(line: string): string {
  return line.endsWith('\r\n') ? line.slice(0, -2) + '\n' : line;
}
