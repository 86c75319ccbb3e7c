import fs from 'fs/promises';

const INITIAL_CHUNK_SIZE = 1024;
const MAX_CHUNK_SIZE = 10 * 1024 * 1024;
const LF = 0x0a;
const CR = 0x0d;
const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Line breaks in `buffer`: LF, CRLF, or a lone CR (ffmpeg ends progress
 * lines with CR). `nextByte` is the byte that follows the buffer in the file.
 */
function countLineBreaks(buffer: Buffer, nextByte: number | undefined): number {
  let count = 0;
  for (let i = 0; i < buffer.length; i++) {
    const byte = buffer[i];
    if (byte === LF) {
      count++;
    } else if (byte === CR) {
      const following = i + 1 < buffer.length ? buffer[i + 1] : nextByte;
      if (following !== LF) {
        count++;
      }
    }
  }
  return count;
}

/**
 * Last `lines` lines of a text file, oldest first, without their line
 * terminators (LF, CRLF or CR). Reads backwards in doubling chunks so large
 * logs are not loaded whole. Throws ENOENT when the file is missing.
 */
export async function tailFile(filePath: string, lines: number): Promise<string[]> {
  if (lines <= 0) {
    return [];
  }

  const handle = await fs.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    if (size === 0) {
      return [];
    }

    const chunks: Buffer[] = [];
    let position = size;
    let chunkSize = INITIAL_CHUNK_SIZE;
    let breaks = 0;

    // One break more than requested guarantees the oldest wanted line is complete
    while (position > 0) {
      const readSize = Math.min(chunkSize, position);
      position -= readSize;

      const chunk = Buffer.alloc(readSize);
      const { bytesRead } = await handle.read(chunk, 0, readSize, position);
      const data = chunk.subarray(0, bytesRead);
      breaks += countLineBreaks(data, chunks.length > 0 ? chunks[0][0] : undefined);
      chunks.unshift(data);

      if (breaks > lines) {
        break;
      }
      chunkSize = Math.min(chunkSize * 2, MAX_CHUNK_SIZE);
    }

    const text = Buffer.concat(chunks).toString('utf-8');
    const allLines = text.split(LINE_BREAK);
    if (allLines[allLines.length - 1] === '') {
      allLines.pop();
    }
    return allLines.slice(-lines);
  } finally {
    await handle.close();
  }
}
