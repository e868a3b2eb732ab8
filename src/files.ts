import { access, readdir } from "fs/promises";
import path from "path";

/**
 * Lists every regular file below `root`, as POSIX paths relative to `root`.
 * The order is stable: entries are sorted within each directory.
 */
export async function listFiles(root: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(path.join(root, prefix), {
    withFileTypes: true,
  });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];

  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, relativePath)));
    } else if (entry.isFile()) {
      files.push(relativePath);
    }
  }

  return files;
}

/** Converts a platform path to the forward-slash form used inside archives and hrefs. */
export function toPosixPath(filename: string): string {
  return filename.split(path.sep).join("/");
}

export async function pathExists(filename: string): Promise<boolean> {
  try {
    await access(filename);
    return true;
  } catch {
    return false;
  }
}
