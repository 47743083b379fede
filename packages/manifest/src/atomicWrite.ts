import * as fs from "fs";
import * as path from "path";
import { randomBytes } from "crypto";
import { toFileSystemError } from "@burrow/common";

/**
 * Writes `content` next to `file` under a temporary name, then renames it over
 * `file`. Readers see either the old or the new content, never a truncated file.
 */
export async function atomicWriteFile(file: string, content: string): Promise<void> {
  const tmp = path.join(
    path.dirname(file),
    `.${path.basename(file)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
  );
  try {
    await fs.promises.writeFile(tmp, content, { encoding: "utf8" });
    await fs.promises.rename(tmp, file);
  } catch (e) {
    await fs.promises.rm(tmp, { force: true });
    throw toFileSystemError(e, file, "write");
  }
}
