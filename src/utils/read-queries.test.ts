import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseQueries, readQueries } from "./read-queries";

describe("parseQueries", () => {
  it("trims lines and skips blanks and comments", () => {
    const content = [
      "# road damage",
      "pothole",
      "",
      "   cracked asphalt  ",
      "  # indented comment",
      "sinkhole street\r",
    ].join("\n");

    expect(parseQueries(content)).toEqual([
      "pothole",
      "cracked asphalt",
      "sinkhole street",
    ]);
  });
});

describe("readQueries", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "queries-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads queries from a file", async () => {
    const path = join(dir, "queries.txt");
    await writeFile(path, "pothole\nroad crack\n", "utf-8");

    expect(await readQueries(path)).toEqual(["pothole", "road crack"]);
  });

  it("rejects when the file is missing", async () => {
    await expect(readQueries(join(dir, "missing.txt"))).rejects.toThrow(
      /ENOENT/,
    );
  });
});
