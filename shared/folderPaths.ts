/**
 * Materialized folder paths.
 *
 * A root folder's path is `/<name>`; every other folder's path is its
 * parent's path followed by `/<name>`. Ancestor and descendant lookups are
 * prefix tests on these strings.
 */

export const PATH_SEPARATOR = "/";

export function buildFolderPath(parentPath: string | null, name: string): string {
  if (parentPath === null) {
    return PATH_SEPARATOR + name;
  }
  return parentPath + PATH_SEPARATOR + name;
}

/**
 * Paths of every ancestor of `path`, root first, obtained by stripping the
 * trailing segment until only the root remains.
 *
 * @example
 * ancestorPaths("/Projects/2024/Q1"); // ["/Projects", "/Projects/2024"]
 */
export function ancestorPaths(path: string): string[] {
  const ancestors: string[] = [];
  let current = path;
  let cut = current.lastIndexOf(PATH_SEPARATOR);
  while (cut > 0) {
    current = current.slice(0, cut);
    ancestors.push(current);
    cut = current.lastIndexOf(PATH_SEPARATOR);
  }
  return ancestors.reverse();
}

export function descendantPrefix(path: string): string {
  return path + PATH_SEPARATOR;
}

export function isDescendantPath(candidate: string, ancestorPath: string): boolean {
  return candidate.startsWith(descendantPrefix(ancestorPath));
}

export function isSameOrDescendantPath(candidate: string, ancestorPath: string): boolean {
  return candidate === ancestorPath || isDescendantPath(candidate, ancestorPath);
}

/**
 * Replace the `oldRoot` prefix of `path` with `newRoot`.
 * Throws when `path` is not `oldRoot` or one of its descendants.
 */
export function rebasePath(path: string, oldRoot: string, newRoot: string): string {
  if (!isSameOrDescendantPath(path, oldRoot)) {
    throw new Error(`Path ${path} is not inside ${oldRoot}`);
  }
  return newRoot + path.slice(oldRoot.length);
}
