import crypto from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

export const TEMP_FILE_PREFIX = ".tmp-";

/**
 * Writes `contents` beside `filePath` and renames it into place, so readers
 * see either the previous file or the complete new one.
 */
export async function atomicWrite(
  filePath: string,
  contents: string,
  options?: { mode?: number }
) {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `${TEMP_FILE_PREFIX}${process.pid}-${crypto.randomUUID()}`
  );
  try {
    const handle = await fs.open(tempPath, "w", options?.mode ?? 0o600);
    try {
      await handle.writeFile(contents, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

export function isMissingFileError(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
