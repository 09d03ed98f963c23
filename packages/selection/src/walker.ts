/**
 * Directory walk for selection roots.
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, join, relative } from 'node:path';
import { PARTIAL_OUTPUT_MARKER, toPosixPath } from '@vidbatch/utils';

export interface WalkEntry {
  /** Absolute path */
  path: string;
  /** File name */
  name: string;
  /** Path relative to the walk root, forward slashes */
  relativePath: string;
}

function isPartialOutput(name: string): boolean {
  return name.includes(PARTIAL_OUTPUT_MARKER);
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    // Dangling symlink
    return false;
  }
}

/**
 * Collect regular files under `root`, sorted lexicographically by path.
 *
 * `depth` 0 lists only the root's direct children, n descends n directory
 * levels, a negative depth is unbounded. Dot files are listed like any
 * other; only in-progress partial outputs are skipped. Symlinked
 * directories are not followed.
 */
export async function walkRoot(root: string, depth: number): Promise<WalkEntry[]> {
  const rootStat = await stat(root);

  if (rootStat.isFile()) {
    const name = basename(root);
    return [{ path: root, name, relativePath: name }];
  }

  const entries: WalkEntry[] = [];

  const visit = async (dir: string, level: number): Promise<void> => {
    const dirents = await readdir(dir, { withFileTypes: true });

    for (const dirent of dirents) {
      if (isPartialOutput(dirent.name)) continue;
      const full = join(dir, dirent.name);

      if (dirent.isDirectory()) {
        if (depth < 0 || level < depth) {
          await visit(full, level + 1);
        }
      } else if (dirent.isFile() || (dirent.isSymbolicLink() && await isRegularFile(full))) {
        entries.push({
          path: full,
          name: dirent.name,
          relativePath: toPosixPath(relative(root, full)),
        });
      }
    }
  };

  await visit(root, 0);

  return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
