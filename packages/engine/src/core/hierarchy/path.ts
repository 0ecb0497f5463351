/**
 * Folder Paths
 *
 * Pure string handling for slash-delimited folder paths. No store access.
 *
 *   "/foo/bar", "foo/bar", "/foo/bar/", "//foo//bar"  →  ["foo", "bar"]
 *   "", "/"                                          →  []  (root)
 *   "../x" with working folder "/a/b"                →  ["a", "x"]
 */

import { InvalidFolderPathError, MAX_FOLDER_NAME_LENGTH } from "@arbor/contracts";

/**
 * Splits a path into folder names. Relative paths are joined onto
 * `workingFolder`; empty and "." segments are dropped and ".." removes
 * the previous segment (it never climbs above the root).
 */
export function parseFolderPath(path: string, workingFolder = "/"): string[] {
  const absolute = path.startsWith("/") ? path : `${workingFolder}/${path}`;
  const segments: string[] = [];

  for (const segment of absolute.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  return segments;
}

export function formatFolderPath(segments: readonly string[]): string {
  return `/${segments.join("/")}`;
}

/**
 * Splits a target path into its parent's segments and its own name.
 *
 * @throws InvalidFolderPathError if the path names the root
 */
export function splitTargetPath(
  path: string,
  workingFolder = "/"
): { parent: string[]; name: string } {
  const segments = parseFolderPath(path, workingFolder);
  const name = segments.pop();
  if (name === undefined) {
    throw new InvalidFolderPathError(path, "the root folder cannot be created or removed");
  }
  return { parent: segments, name };
}

/**
 * @throws InvalidFolderPathError if the name cannot be a single path segment
 */
export function validateFolderName(name: string, path: string): void {
  if (name === "" || name === "." || name === ".." || name.includes("/")) {
    throw new InvalidFolderPathError(path, `"${name}" is not a valid folder name`);
  }
  if (name.length > MAX_FOLDER_NAME_LENGTH) {
    throw new InvalidFolderPathError(
      path,
      `folder names are limited to ${MAX_FOLDER_NAME_LENGTH} characters`
    );
  }
  if (/[\u0000-\u001f\u007f]/.test(name)) {
    throw new InvalidFolderPathError(path, "folder names cannot contain control characters");
  }
}
