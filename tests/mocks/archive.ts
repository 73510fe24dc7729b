import { mkdir, mkdtemp, readFile } from "node:fs/promises";
import { join } from "node:path";

import { extract } from "tar";

/**
 * Unpack `<name>.csv` from a published archive into a scratch directory
 * under `scratchRoot` and return its text.
 */
export async function readPublishedTable(archivePath: string, name: string, scratchRoot: string): Promise<string> {
  await mkdir(scratchRoot, { recursive: true });
  const into = await mkdtemp(join(scratchRoot, "extract-"));
  await extract({ file: archivePath, cwd: into });
  return readFile(join(into, `${name}.csv`), "utf8");
}
