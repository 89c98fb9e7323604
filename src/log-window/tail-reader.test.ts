import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readAppendedLines, readLastLines, statFile } from "./tail-reader.js";

describe("tail-reader", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "log-window-reader-"));
    file = path.join(dir, "app.log");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("readAppendedLines", () => {
    it("returns complete lines and stops before a partial one", async () => {
      await fs.writeFile(file, "a\nb\npartial");

      const first = await readAppendedLines({ file, offset: 0 });
      expect(first.lines).toEqual(["a", "b"]);
      expect(first.offset).toBe(4);
      expect(first.size).toBe(11);

      await fs.appendFile(file, "\n");
      const second = await readAppendedLines({ file, offset: first.offset });
      expect(second.lines).toEqual(["partial"]);
      expect(second.offset).toBe(12);
    });

    it("strips carriage returns", async () => {
      await fs.writeFile(file, "x\r\ny\r\n");

      const result = await readAppendedLines({ file, offset: 0 });
      expect(result.lines).toEqual(["x", "y"]);
      expect(result.offset).toBe(6);
    });

    it("returns nothing when there is no new data", async () => {
      await fs.writeFile(file, "a\n");

      const result = await readAppendedLines({ file, offset: 2 });
      expect(result.lines).toEqual([]);
      expect(result.offset).toBe(2);
    });

    it("reports the fingerprint of the file it read", async () => {
      await fs.writeFile(file, "a\n");

      const result = await readAppendedLines({ file, offset: 0 });
      const stat = await statFile(file);
      expect(result.fingerprint).toBe(stat?.fingerprint);
    });

    it("reads at most maxBytes per call", async () => {
      await fs.writeFile(file, "line-0001\nline-0002\nline-0003\n");

      const first = await readAppendedLines({ file, offset: 0, maxBytes: 15 });
      expect(first.lines).toEqual(["line-0001"]);
      expect(first.offset).toBe(10);

      const second = await readAppendedLines({ file, offset: first.offset, maxBytes: 15 });
      expect(second.lines).toEqual(["line-0002"]);
      expect(second.offset).toBe(20);
    });

    it("keeps reading past maxBytes until a line ends", async () => {
      await fs.writeFile(file, `${"x".repeat(40)}\ntail\n`);

      const result = await readAppendedLines({ file, offset: 0, maxBytes: 16 });
      expect(result.lines).toEqual(["x".repeat(40), "tail"]);
      expect(result.offset).toBe(46);
    });

    it("decodes a character split across reads", async () => {
      await fs.writeFile(file, Buffer.from("a\u00e9\n", "utf8"));

      const result = await readAppendedLines({ file, offset: 0, maxBytes: 2 });
      expect(result.lines).toEqual(["a\u00e9"]);
      expect(result.offset).toBe(4);
    });

    it("replaces invalid UTF-8 instead of failing", async () => {
      await fs.writeFile(file, Buffer.from([0x7b, 0xff, 0x0a, 0x6f, 0x6b, 0x0a]));

      const result = await readAppendedLines({ file, offset: 0 });
      expect(result.lines).toEqual(["{\ufffd", "ok"]);
      expect(result.offset).toBe(6);
    });
  });

  describe("readLastLines", () => {
    it("keeps only the last maxLines lines", async () => {
      await fs.writeFile(file, "1\n2\n3\n");

      const result = await readLastLines({ file, maxLines: 2 });
      expect(result.lines).toEqual(["2", "3"]);
      expect(result.offset).toBe(6);
    });

    it("reads everything when maxLines is 0", async () => {
      await fs.writeFile(file, "1\n2\n3\n");

      const result = await readLastLines({ file, maxLines: 0 });
      expect(result.lines).toEqual(["1", "2", "3"]);
    });

    it("walks back across block boundaries in large files", async () => {
      const lines = Array.from({ length: 20_000 }, (_, i) => `line-${i}`);
      const content = `${lines.join("\n")}\n`;
      await fs.writeFile(file, content);

      const short = await readLastLines({ file, maxLines: 3 });
      expect(short.lines).toEqual(["line-19997", "line-19998", "line-19999"]);

      const long = await readLastLines({ file, maxLines: 15_000 });
      expect(long.lines).toHaveLength(15_000);
      expect(long.lines[0]).toBe("line-5000");
      expect(long.lines.at(-1)).toBe("line-19999");
      expect(long.offset).toBe(Buffer.byteLength(content));
    });

    it("decodes a character split across a block boundary", async () => {
      // "é" is C3 A9; A9 is the first byte of the last 64 KiB block
      const longLine = `${"x".repeat(10)}\u00e9${"y".repeat(65_534)}`;
      const content = `first\n${longLine}\n`;
      await fs.writeFile(file, content);
      expect(Buffer.byteLength(content) - 65_536).toBe(17);

      const result = await readLastLines({ file, maxLines: 1 });
      expect(result.lines).toEqual([longLine]);
      expect(result.offset).toBe(Buffer.byteLength(content));
    });

    it("replaces invalid UTF-8 instead of failing", async () => {
      await fs.writeFile(file, Buffer.from([0x61, 0x0a, 0x7b, 0xff, 0x0a]));

      const result = await readLastLines({ file, maxLines: 10 });
      expect(result.lines).toEqual(["a", "{\ufffd"]);
      expect(result.offset).toBe(5);
    });

    it("leaves a trailing partial line unread", async () => {
      await fs.writeFile(file, "1\n2\npart");

      const result = await readLastLines({ file, maxLines: 10 });
      expect(result.lines).toEqual(["1", "2"]);
      expect(result.offset).toBe(4);
    });

    it("returns nothing for a file without a complete line", async () => {
      await fs.writeFile(file, "abc");

      const result = await readLastLines({ file, maxLines: 10 });
      expect(result.lines).toEqual([]);
      expect(result.offset).toBe(0);
    });

    it("handles an empty file", async () => {
      await fs.writeFile(file, "");

      const result = await readLastLines({ file, maxLines: 3 });
      expect(result).toMatchObject({ lines: [], offset: 0, size: 0 });
    });
  });

  describe("statFile", () => {
    it("returns null for a missing file", async () => {
      expect(await statFile(path.join(dir, "missing.log"))).toBeNull();
    });

    it("changes fingerprint when the file is replaced", async () => {
      await fs.writeFile(file, "old\n");
      const before = await statFile(file);

      await fs.rename(file, `${file}.1`);
      await fs.writeFile(file, "new\n");
      const after = await statFile(file);

      expect(before?.size).toBe(4);
      expect(after?.fingerprint).not.toBe(before?.fingerprint);
    });
  });
});
