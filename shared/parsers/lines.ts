/**
 * Lazy, forward-only line sources for the STL parser
 */

import { closeSync, openSync, readSync } from 'fs';
import { StringDecoder } from 'string_decoder';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

const stripCR = (line: string): string =>
  line.endsWith('\r') ? line.slice(0, -1) : line;

/**
 * Yield the lines of an in-memory string
 */
export function* splitLines(content: string): Generator<string> {
  let start = 0;
  while (start <= content.length) {
    const end = content.indexOf('\n', start);
    if (end === -1) {
      yield stripCR(content.slice(start));
      return;
    }
    yield stripCR(content.slice(start, end));
    start = end + 1;
  }
}

/**
 * Yield the lines of a file, reading it in chunks.
 * Open and read errors are thrown to the caller.
 */
export function* readLines(
  path: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Generator<string> {
  const fd = openSync(path, 'r');
  try {
    const decoder = new StringDecoder('utf8');
    const buffer = Buffer.alloc(chunkSize);
    let rest = '';

    for (;;) {
      const bytesRead = readSync(fd, buffer, 0, chunkSize, null);
      if (bytesRead === 0) break;

      const lines = (rest + decoder.write(buffer.subarray(0, bytesRead))).split('\n');
      rest = lines.pop() ?? '';
      for (const line of lines) {
        yield stripCR(line);
      }
    }

    yield stripCR(rest + decoder.end());
  } finally {
    closeSync(fd);
  }
}
