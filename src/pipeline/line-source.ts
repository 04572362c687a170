import { once } from "node:events";
import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { IoError } from "../domain/errors.js";

/**
 * Yields the lines of a text file in order as they are read. Blank lines are
 * passed through; the caller decides what to skip.
 */
export async function* readLines(path: string): AsyncGenerator<string, void, undefined> {
  const input = createReadStream(path, { encoding: "utf8" });

  try {
    await once(input, "open");
  } catch (error) {
    input.destroy();
    throw new IoError(`failed to open ${path}`, error);
  }

  const reader = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of reader) {
      yield line;
    }
  } catch (error) {
    throw new IoError(`failed to read ${path}`, error);
  } finally {
    reader.close();
    input.destroy();
  }
}
