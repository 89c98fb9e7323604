import type { BigIntStats } from "node:fs";
import fs from "node:fs/promises";

const NEWLINE = 0x0a;
const BACKWARD_BLOCK_BYTES = 64 * 1024;
const DEFAULT_MAX_BYTES = 1_000_000;

/**
 * Result from reading a range of complete lines.
 */
export type TailReadResult = {
  /** Complete lines, without their line terminators */
  lines: string[];
  /** Byte offset just past the last complete line read */
  offset: number;
  /** File size at the time of the read */
  size: number;
  /** Identity of the file that was actually read */
  fingerprint: string;
};

/**
 * Device + inode identity of a file, independent of its path.
 */
export function fingerprintOf(stats: BigIntStats): string {
  return `${stats.dev}:${stats.ino}`;
}

/**
 * Stats a path for rotation checks. Returns null when the file is gone.
 */
export async function statFile(
  file: string,
): Promise<{ size: number; fingerprint: string } | null> {
  try {
    const stats = await fs.stat(file, { bigint: true });
    return { size: Number(stats.size), fingerprint: fingerprintOf(stats) };
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function splitLines(data: Buffer): string[] {
  const lines = data.toString("utf8").split("\n");
  // data ends with a newline, so the last element is always empty
  lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Reads the complete lines appended after `offset`, at most `maxBytes` at a
 * time. A line longer than `maxBytes` is read whole. A trailing line without
 * its newline is left for the next read.
 */
export async function readAppendedLines(params: {
  file: string;
  offset: number;
  maxBytes?: number;
}): Promise<TailReadResult> {
  const maxBytes = params.maxBytes ?? DEFAULT_MAX_BYTES;
  const handle = await fs.open(params.file, "r");
  try {
    const stats = await handle.stat({ bigint: true });
    const size = Number(stats.size);
    const fingerprint = fingerprintOf(stats);
    const start = Math.max(0, params.offset);

    const chunks: Buffer[] = [];
    let position = start;
    let total = 0;
    let lastNewline = -1;
    while (position < size && lastNewline < 0) {
      const length = Math.min(maxBytes, size - position);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      if (bytesRead === 0) {
        break;
      }
      const chunk = buffer.subarray(0, bytesRead);
      const newline = chunk.lastIndexOf(NEWLINE);
      if (newline >= 0) {
        lastNewline = total + newline;
      }
      chunks.push(chunk);
      total += bytesRead;
      position += bytesRead;
    }

    if (lastNewline < 0) {
      return { lines: [], offset: start, size, fingerprint };
    }

    // a multi-byte character may span two chunks
    const data = Buffer.concat(chunks, total);
    return {
      lines: splitLines(data.subarray(0, lastNewline + 1)),
      offset: start + lastNewline + 1,
      size,
      fingerprint,
    };
  } finally {
    await handle.close();
  }
}

/**
 * Reads the last `maxLines` complete lines of a file, walking backwards in
 * blocks so a large file is not loaded whole. `maxLines` of 0 reads all.
 */
export async function readLastLines(params: {
  file: string;
  maxLines: number;
}): Promise<TailReadResult> {
  const handle = await fs.open(params.file, "r");
  try {
    const stats = await handle.stat({ bigint: true });
    const size = Number(stats.size);
    const fingerprint = fingerprintOf(stats);

    const blocks: Buffer[] = [];
    let position = size;
    let newlines = 0;
    while (position > 0) {
      const length = Math.min(BACKWARD_BLOCK_BYTES, position);
      position -= length;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      const block = buffer.subarray(0, bytesRead);
      blocks.unshift(block);
      for (const byte of block) {
        if (byte === NEWLINE) {
          newlines++;
        }
      }
      // one extra newline marks where the first wanted line begins
      if (params.maxLines > 0 && newlines > params.maxLines) {
        break;
      }
    }

    const data = Buffer.concat(blocks);
    const lastNewline = data.lastIndexOf(NEWLINE);
    if (lastNewline < 0) {
      return { lines: [], offset: position, size, fingerprint };
    }

    let complete = data.subarray(0, lastNewline + 1);
    if (position > 0) {
      // started mid-file: drop the partial first line
      complete = complete.subarray(complete.indexOf(NEWLINE) + 1);
    }

    let lines = splitLines(complete);
    if (params.maxLines > 0 && lines.length > params.maxLines) {
      lines = lines.slice(-params.maxLines);
    }

    return { lines, offset: position + lastNewline + 1, size, fingerprint };
  } finally {
    await handle.close();
  }
}
