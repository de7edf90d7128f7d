import fs from "fs";
import path from "path";

export interface TraverseOptions {
  signal?: AbortSignal;
  onError?: (directory: string, error: unknown) => void;
}

/**
 * Walk a directory tree top-down and yield the path of every regular
 * file. Entries are visited in name order. Symbolic links to files are
 * yielded, symbolic links to directories are not followed. Directories
 * that cannot be read are reported through `onError` and skipped.
 */
export async function* walkFiles(
  rootDirectory: string,
  options: TraverseOptions = {},
): AsyncGenerator<string> {
  const pending: string[] = [rootDirectory];

  while (pending.length > 0) {
    if (options.signal?.aborted) return;

    const directory = pending.shift();
    if (directory === undefined) return;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      options.onError?.(directory, error);
      continue;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const subdirectories: string[] = [];
    for (const entry of entries) {
      if (options.signal?.aborted) return;

      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        subdirectories.push(entryPath);
      } else if (entry.isFile()) {
        yield entryPath;
      } else if (entry.isSymbolicLink() && (await isFileLink(entryPath))) {
        yield entryPath;
      }
    }

    // Depth-first: this directory's children come before its siblings
    pending.unshift(...subdirectories);
  }
}

async function isFileLink(linkPath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(linkPath);
    return stats.isFile();
  } catch {
    // dangling link
    return false;
  }
}
