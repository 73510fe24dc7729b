import { open, rename, rm, stat } from "node:fs/promises";

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file so that readers see either the old content or the complete
 * new content: write a sibling temporary file, fsync it, rename over.
 */
export async function writeFileDurable(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  const handle = await open(tempPath, "w");

  try {
    await handle.writeFile(data);
    await handle.sync();
  } catch (error) {
    await handle.close();
    await rm(tempPath, { force: true });
    throw error;
  }

  await handle.close();
  await rename(tempPath, filePath);
}
