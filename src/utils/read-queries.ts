import { readFile } from "fs/promises";

/**
 * Read search queries from a text file
 * One query per line; blank lines and "#" comments are skipped
 */
export async function readQueries(filepath: string): Promise<string[]> {
  const content = await readFile(filepath, "utf-8");
  return parseQueries(content);
}

export function parseQueries(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
