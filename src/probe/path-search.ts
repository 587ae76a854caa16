import { isUnixLike, isWindows, type OsClassification } from "./os.js";

export type FileExistsFn = (path: string) => boolean;

export interface ResolveExecutablePathOptions {
  os: OsClassification;
  /** Value of the PATH variable; `undefined` or blank means unset. */
  pathValue: string | undefined;
  fileExists: FileExistsFn;
}

const UNIX_PATH_DELIMITER = ":";
const WINDOWS_PATH_DELIMITER = ";";
const WINDOWS_EXECUTABLE_SUFFIX = ".exe";

/**
 * Searches the PATH directories, in order, for `fileName`.
 *
 * On Windows the match is `{dir}\{fileName}.exe` and the returned path omits
 * the `.exe` suffix. When PATH is unset the current directory is checked and
 * the bare file name is returned on a hit.
 */
export function resolveExecutablePath(
  fileName: string,
  options: ResolveExecutablePathOptions,
): string | undefined {
  const { os, fileExists } = options;
  const directories = splitSearchPath(options.pathValue, os);

  if (isUnixLike(os)) {
    if (directories) {
      for (const directory of directories) {
        const candidate = `${directory}/${fileName}`;
        if (fileExists(candidate)) {
          return candidate;
        }
      }
      return undefined;
    }
    return fileExists(`./${fileName}`) ? fileName : undefined;
  }

  if (isWindows(os)) {
    if (directories) {
      for (const directory of directories) {
        const candidate = `${directory}\\${fileName}`;
        if (fileExists(`${candidate}${WINDOWS_EXECUTABLE_SUFFIX}`)) {
          return candidate;
        }
      }
      return undefined;
    }
    return fileExists(`${fileName}${WINDOWS_EXECUTABLE_SUFFIX}`)
      ? fileName
      : undefined;
  }

  return undefined;
}

export function splitSearchPath(
  pathValue: string | undefined,
  os: OsClassification,
): string[] | undefined {
  if (pathValue === undefined || pathValue.trim().length === 0) {
    return undefined;
  }

  const delimiter = isWindows(os)
    ? WINDOWS_PATH_DELIMITER
    : UNIX_PATH_DELIMITER;
  return pathValue.split(delimiter).filter((entry) => entry.length > 0);
}
